import fs from "fs";
import { readFile, rm } from "fs/promises";
import path from "path";
import { createDigestTree } from "./__fixtures__/digest";
import { pathExists } from "./files";
import { silentLogger } from "./logger";
import { stripImageMarkup, stripImages } from "./media";
import { PackageDocument } from "./package";

describe("stripImageMarkup", () => {
  it("should remove image elements", () => {
    expect(
      stripImageMarkup('<p>a</p><img src="x.png" alt="a > b"/><p>b</p>'),
    ).toBe("<p>a</p><p>b</p>");
    expect(stripImageMarkup("<p><IMG SRC='x.png'>text</p>")).toBe("<p>text</p>");
  });

  it("should keep the cover image", () => {
    const markup = '<div class="cover"><img src="images/cover.jpg" alt="Cover"/></div>';
    expect(stripImageMarkup(markup)).toBe(markup);

    const svg = '<svg><image xlink:href="Cover.png"/></svg>';
    expect(stripImageMarkup(svg)).toBe(svg);
  });

  it("should remove wrappers left empty", () => {
    expect(
      stripImageMarkup('<figure class="chart">\n  <img src="c.png"/>\n</figure><p>x</p>'),
    ).toBe("<p>x</p>");
    expect(
      stripImageMarkup(
        '<picture><source srcset="a.webp"/><img src="a.jpg"/></picture>',
      ),
    ).toBe("");
    expect(stripImageMarkup('<svg viewBox="0 0 1 1"><image href="chart.png"/></svg>')).toBe(
      "",
    );
  });

  it("should remove nested wrappers", () => {
    expect(
      stripImageMarkup('<figure><div class="img-box"><img src="a.png"/></div></figure>'),
    ).toBe("");
  });

  it("should keep containers that are not image wrappers", () => {
    expect(stripImageMarkup('<div class="body"><img src="a.png"/></div>')).toBe(
      '<div class="body"></div>',
    );
    expect(stripImageMarkup('<figure><p>Quote</p><img src="a.png"/></figure>')).toBe(
      "<figure><p>Quote</p></figure>",
    );
  });

  it("should be idempotent", () => {
    const once = stripImageMarkup(
      '<figure><img src="a.png"/></figure><div class="img"><img src="cover.png"/></div>',
    );
    expect(stripImageMarkup(once)).toBe(once);
  });
});

describe("stripImages", () => {
  const logger = silentLogger();
  let root: string;
  let pkg: PackageDocument;

  beforeEach(async () => {
    root = await createDigestTree();
    pkg = await PackageDocument.load(path.join(root, "EPUB", "content.opf"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should delete every image but the cover", async () => {
    const result = await stripImages(root, pkg, logger);

    expect(result).toEqual({
      removed: 1,
      failed: 0,
      manifestItemsRemoved: ["chart"],
      documentsRewritten: 1,
      warnings: [],
    });
    expect(await pathExists(path.join(root, "EPUB", "images", "chart.jpg"))).toBe(false);
    expect(await pathExists(path.join(root, "EPUB", "images", "cover.jpg"))).toBe(true);
    expect(pkg.getItem("chart")).toBeUndefined();
    expect(pkg.getItem("cover-image")?.href).toBe("images/cover.jpg");
  });

  it("should strip image references from the articles", async () => {
    await stripImages(root, pkg, logger);

    const article = await readFile(path.join(root, "EPUB", "article2.xhtml"), "utf-8");
    expect(article).not.toContain("<img");
    expect(article).not.toContain("<figure");
    expect(article).not.toContain("img-wrapper");
    expect(article).toContain("<p>Treasury yields climbed for a third day.</p>");

    const cover = await readFile(path.join(root, "EPUB", "cover.xhtml"), "utf-8");
    expect(cover).toContain('<img src="images/cover.jpg" alt="Cover"/>');
  });

  it("should carry on when an image cannot be deleted", async () => {
    const unlink = jest
      .spyOn(fs.promises, "unlink")
      .mockRejectedValueOnce(new Error("EBUSY: resource busy or locked"));

    try {
      const result = await stripImages(root, pkg, logger);

      expect(result).toEqual({
        removed: 0,
        failed: 1,
        manifestItemsRemoved: ["chart"],
        documentsRewritten: 1,
        warnings: [
          {
            kind: "media",
            message: "failed to remove image: EBUSY: resource busy or locked",
            path: "EPUB/images/chart.jpg",
          },
        ],
      });
    } finally {
      unlink.mockRestore();
    }

    expect(await pathExists(path.join(root, "EPUB", "images", "chart.jpg"))).toBe(true);
    expect(pkg.getItem("chart")).toBeUndefined();
    const article = await readFile(path.join(root, "EPUB", "article2.xhtml"), "utf-8");
    expect(article).not.toContain("<img");
  });

  it("should do nothing the second time", async () => {
    await stripImages(root, pkg, logger);

    expect(await stripImages(root, pkg, logger)).toEqual({
      removed: 0,
      failed: 0,
      manifestItemsRemoved: [],
      documentsRewritten: 0,
      warnings: [],
    });
  });
});
