import { readFile, rm } from "fs/promises";
import JSZip from "jszip";
import path from "path";
import tempy from "tempy";
import { createDigestEpub } from "./__fixtures__/digest";
import { silentLogger } from "./logger";
import { run } from "./main";
import { NcxDocument } from "./navigation";

const logger = silentLogger();

describe("run", () => {
  let input: string;
  let outputDirectory: string;
  let stderr: jest.SpyInstance;

  beforeEach(async () => {
    input = await createDigestEpub();
    outputDirectory = tempy.directory();
    stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    stderr.mockRestore();
    await rm(input, { force: true });
    await rm(outputDirectory, { recursive: true, force: true });
  });

  it("should process the input", async () => {
    const output = path.join(outputDirectory, "digest.epub");

    expect(await run(["node", "epub-eink", input, output], logger)).toBe(0);

    const zip = await JSZip.loadAsync(await readFile(output));
    expect(zip.file("EPUB/images/chart.jpg")).toBeNull();
  });

  it("should pass the options on", async () => {
    const output = path.join(outputDirectory, "digest.epub");

    expect(
      await run(
        ["node", "epub-eink", "--trim", "0", "--max-title-length", "20", input, output],
        logger,
      ),
    ).toBe(0);

    const zip = await JSZip.loadAsync(await readFile(output));
    const ncxEntry = zip.file("EPUB/toc.ncx");
    if (!ncxEntry) {
      throw new Error("missing toc.ncx");
    }
    const ncx = NcxDocument.parse(await ncxEntry.async("string"), "toc.ncx");
    expect(ncx.labels().map((label) => label.text)).toEqual([
      "Cover",
      "Index",
      "Fed Hikes Rates",
      "Short Title",
      "A Very Long Artic...",
    ]);

    const opfEntry = zip.file("EPUB/content.opf");
    expect(await opfEntry?.async("string")).toContain('<itemref idref="cover"/>');
  });

  it("should fail with the error name for a missing input", async () => {
    const missing = path.join(outputDirectory, "missing.epub");

    expect(
      await run(["node", "epub-eink", missing, path.join(outputDirectory, "out.epub")], logger),
    ).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      `InvalidInputError: input file not found: ${missing}\n`,
    );
  });

  it("should fail on a malformed option", async () => {
    expect(
      await run(["node", "epub-eink", "--trim", "two", input, "out.epub"], logger),
    ).toBe(1);
  });

  it("should fail without arguments", async () => {
    expect(await run(["node", "epub-eink"], logger)).toBe(1);
  });
});
