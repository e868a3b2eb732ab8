import { readFile } from "fs/promises";
import path from "path";
import { DIGEST_FIXTURE } from "./__fixtures__/digest";
import { ContainerIOError, MalformedPackageError } from "./errors";
import { PackageDocument } from "./package";

const OPF_PATH = path.join(DIGEST_FIXTURE, "EPUB", "content.opf");

function packageXml(manifest: string, spine: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <manifest>${manifest}</manifest>
  <spine>${spine}</spine>
</package>`;
}

async function loadDigest(): Promise<PackageDocument> {
  return PackageDocument.parse(await readFile(OPF_PATH, "utf-8"), OPF_PATH);
}

describe("PackageDocument", () => {
  it("should read the manifest and spine", async () => {
    const pkg = await loadDigest();

    expect(pkg.spine).toEqual([
      "cover",
      "index",
      "article1",
      "article2",
      "article3",
    ]);
    expect(pkg.manifest.size).toBe(10);
    expect(pkg.tocId).toBe("ncx");
    expect(pkg.getItem("nav")).toEqual({
      id: "nav",
      href: "nav.xhtml",
      mediaType: "application/xhtml+xml",
      properties: "nav",
    });
    expect(pkg.directory).toBe(path.join(DIGEST_FIXTURE, "EPUB"));
  });

  it("should remove leading spine entries but keep their manifest items", async () => {
    const pkg = await loadDigest();

    expect(pkg.removeLeadingSpineEntries(2)).toEqual(["cover", "index"]);
    expect(pkg.spine).toEqual(["article1", "article2", "article3"]);

    const xml = pkg.serialize();
    expect(xml).toContain('<spine toc="ncx">\n    <itemref idref="article1"/>');
    expect(xml).not.toContain('idref="cover"');

    const reparsed = PackageDocument.parse(xml, OPF_PATH);
    expect(reparsed.spine).toEqual(["article1", "article2", "article3"]);
    expect(reparsed.getItem("cover")?.href).toBe("cover.xhtml");
  });

  it("should empty a spine that is shorter than the trim count", async () => {
    const pkg = await loadDigest();

    expect(pkg.removeLeadingSpineEntries(10)).toHaveLength(5);
    expect(pkg.spine).toEqual([]);
    expect(PackageDocument.parse(pkg.serialize(), OPF_PATH).spine).toEqual([]);
  });

  it("should keep every occurrence of an item listed twice in the spine", () => {
    const manifest =
      '<item id="a" href="a.xhtml" media-type="application/xhtml+xml"/><item id="b" href="b.xhtml" media-type="application/xhtml+xml"/>';
    const spine = '<itemref idref="a"/><itemref idref="b"/><itemref idref="a"/>';

    const trimmed = PackageDocument.parse(packageXml(manifest, spine), "/book/content.opf");
    expect(trimmed.spine).toEqual(["a", "b", "a"]);
    expect(trimmed.removeLeadingSpineEntries(1)).toEqual(["a"]);
    expect(
      PackageDocument.parse(trimmed.serialize(), "/book/content.opf").spine,
    ).toEqual(["b", "a"]);

    const removed = PackageDocument.parse(packageXml(manifest, spine), "/book/content.opf");
    removed.removeManifestItem("a");
    const xml = removed.serialize();
    expect(xml).not.toContain('idref="a"');
    expect(PackageDocument.parse(xml, "/book/content.opf").spine).toEqual(["b"]);
  });

  it("should keep metadata and namespaces", async () => {
    const xml = (await loadDigest()).serialize();

    expect(xml).toMatch(/^<\?xml version="1.0" encoding="utf-8"\?>/);
    expect(xml).toContain('<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">');
    expect(xml).toContain("<dc:title>Morning Digest</dc:title>");
    expect(xml).toContain('<meta name="cover" content="cover-image"/>');
  });

  it("should remove manifest items together with their spine entries", async () => {
    const pkg = await loadDigest();

    expect(pkg.removeManifestItem("article2")).toBe(true);
    expect(pkg.removeManifestItem("article2")).toBe(false);
    expect(pkg.spine).toEqual(["cover", "index", "article1", "article3"]);

    const reparsed = PackageDocument.parse(pkg.serialize(), OPF_PATH);
    expect(reparsed.getItem("article2")).toBeUndefined();
    expect(reparsed.spine).toEqual(["cover", "index", "article1", "article3"]);
  });

  it("should add manifest items at the manifest's indentation", async () => {
    const pkg = await loadDigest();
    pkg.addManifestItem({
      id: "diagnostics",
      href: "_diagnostics.json",
      mediaType: "application/json",
    });

    const xml = pkg.serialize();
    expect(xml).toContain(
      '\n    <item id="diagnostics" href="_diagnostics.json" media-type="application/json"/>\n  </manifest>',
    );
    expect(PackageDocument.parse(xml, OPF_PATH).getItem("diagnostics")).toEqual({
      id: "diagnostics",
      href: "_diagnostics.json",
      mediaType: "application/json",
    });
  });

  it("should write new items with the manifest's prefix", () => {
    const pkg = PackageDocument.parse(
      `<opf:package xmlns:opf="http://www.idpf.org/2007/opf" version="2.0">
  <opf:manifest>
    <opf:item id="a" href="a.xhtml" media-type="application/xhtml+xml"/>
  </opf:manifest>
  <opf:spine>
    <opf:itemref idref="a"/>
  </opf:spine>
</opf:package>`,
      "/book/content.opf",
    );
    pkg.addManifestItem({ id: "b", href: "b.css", mediaType: "text/css" });

    expect(pkg.spine).toEqual(["a"]);
    expect(pkg.serialize()).toContain(
      '<opf:item id="b" href="b.css" media-type="text/css"/>',
    );
  });

  it("should resolve hrefs against the package directory", () => {
    const pkg = PackageDocument.parse(packageXml("", ""), "/book/OEBPS/content.opf");

    expect(pkg.resolveHref("images/cover%20art.jpg#top")).toBe(
      path.resolve("/book/OEBPS", "images/cover art.jpg"),
    );
    expect(pkg.resolveHref("100%.xhtml")).toBe(
      path.resolve("/book/OEBPS", "100%.xhtml"),
    );
    expect(pkg.hrefFor(path.join("/book/OEBPS", "styles", "main.css"))).toBe(
      "styles/main.css",
    );
  });

  describe("parse", () => {
    it.each([
      ["not XML", "this is not a package document"],
      ["a different root element", "<container/>"],
      [
        "no manifest",
        '<package xmlns="http://www.idpf.org/2007/opf"><spine/></package>',
      ],
      [
        "no spine",
        '<package xmlns="http://www.idpf.org/2007/opf"><manifest/></package>',
      ],
      [
        "an item without an href",
        packageXml('<item id="a" media-type="text/css"/>', ""),
      ],
      [
        "duplicate item IDs",
        packageXml(
          '<item id="a" href="a.css" media-type="text/css"/><item id="a" href="b.css" media-type="text/css"/>',
          "",
        ),
      ],
      ["an undeclared entity", packageXml("Fish&nbsp;Chips", "")],
      [
        "a spine entry that does not resolve",
        packageXml(
          '<item id="a" href="a.xhtml" media-type="application/xhtml+xml"/>',
          '<itemref idref="b"/>',
        ),
      ],
    ])("should reject a package document with %s", (_, xml) => {
      expect(() => PackageDocument.parse(xml, "/book/content.opf")).toThrow(
        MalformedPackageError,
      );
    });
  });

  describe("load", () => {
    it("should report a missing file as an I/O error", async () => {
      await expect(
        PackageDocument.load(path.join(DIGEST_FIXTURE, "missing.opf")),
      ).rejects.toThrow(ContainerIOError);
    });
  });
});
