import archiver from "archiver";
import { randomBytes } from "crypto";
import { createWriteStream } from "fs";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import JSZip from "jszip";
import path from "path";
import { pipeline } from "stream/promises";
import tempy from "tempy";
import { create } from "xmlbuilder2";
import { MEDIA_TYPES } from "./document";
import {
  ContainerIOError,
  InvalidInputError,
  ProcessingWarning,
  describeError,
} from "./errors";
import { listFiles, pathExists } from "./files";
import type { Logger } from "./logger";
import { NAMESPACES, descendantElements, parseXml } from "./xml";

/** Content of the `mimetype` entry, which must come first and uncompressed. */
export const EPUB_MIMETYPE = "application/epub+zip";

/** Anything smaller than this cannot be a real ePub from the upstream generator. */
export const MIN_EPUB_SIZE = 1000;

// [Container file is required to be located here](https://www.w3.org/TR/epub-33/#sec-container-metainf-container.xml)
export const OCF_CONTAINER_PATH = "META-INF/container.xml";

/** An input ePub that passed validation, loaded into memory. */
export interface EpubArchive {
  path: string;
  size: number;
  zip: JSZip;
  warnings: ProcessingWarning[];
}

/** Checks that `inputPath` is a plausible ePub and loads it. */
export async function validateInput(
  inputPath: string,
  logger: Logger,
): Promise<EpubArchive> {
  logger.info({ input: inputPath }, "validating input");

  let size: number;
  try {
    const stats = await stat(inputPath);
    if (!stats.isFile()) {
      throw new InvalidInputError(`input is not a file: ${inputPath}`, {
        path: inputPath,
      });
    }
    size = stats.size;
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw error;
    }
    throw new InvalidInputError(`input file not found: ${inputPath}`, {
      path: inputPath,
      cause: error,
    });
  }

  if (path.extname(inputPath).toLowerCase() !== ".epub") {
    throw new InvalidInputError(`input file must be an EPUB: ${inputPath}`, {
      path: inputPath,
    });
  }

  logger.info({ bytes: size }, "input file size");

  if (size < MIN_EPUB_SIZE) {
    throw new InvalidInputError(
      `input file is too small (${size} bytes), possibly empty or corrupt: ${inputPath}`,
      { path: inputPath },
    );
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await readFile(inputPath));
  } catch (error) {
    throw new InvalidInputError(
      `input file is not a valid EPUB archive: ${describeError(error)}`,
      { path: inputPath, cause: error },
    );
  }

  const warnings: ProcessingWarning[] = [];
  const mimetype = zip.file("mimetype");

  if (!mimetype) {
    warnings.push({
      kind: "container",
      message: "EPUB is missing its 'mimetype' entry and may be malformed",
      path: inputPath,
    });
  } else {
    const content = (await mimetype.async("string")).trim();
    if (content !== EPUB_MIMETYPE) {
      warnings.push({
        kind: "container",
        message: `unexpected 'mimetype' content '${content}'`,
        path: inputPath,
      });
    }
  }

  for (const warning of warnings) {
    logger.warn({ path: warning.path }, warning.message);
  }

  logger.debug({ entries: Object.keys(zip.files).length }, "input archive");
  logger.info("input validation passed");

  return { path: inputPath, size, zip, warnings };
}

/** Writes every entry of `zip` below `root`. Entry names that would escape `root` are refused. */
async function extractTo(zip: JSZip, root: string): Promise<void> {
  const base = path.resolve(root);

  for (const entry of Object.values(zip.files)) {
    const target = path.resolve(base, entry.name);

    if (target !== base && !target.startsWith(base + path.sep)) {
      throw new ContainerIOError(
        `archive entry escapes the extraction directory: ${entry.name}`,
        { path: entry.name },
      );
    }

    if (entry.dir) {
      await mkdir(target, { recursive: true });
      continue;
    }

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, await entry.async("nodebuffer"));
  }
}

/**
 * Extracts the archive into a fresh temporary directory, runs `callback` on it and removes the
 * directory again, whether the callback succeeded or not.
 */
export async function withExtractedArchive<T>(
  archive: EpubArchive,
  callback: (root: string) => Promise<T>,
): Promise<T> {
  return tempy.directory.task(async (root) => {
    try {
      await extractTo(archive.zip, root);
    } catch (error) {
      if (error instanceof ContainerIOError) {
        throw error;
      }
      throw new ContainerIOError(
        `failed to extract EPUB: ${describeError(error)}`,
        { path: archive.path, cause: error },
      );
    }

    return callback(root);
  });
}

/** Creates the OCF container XML file (stored at `META-INF/container.xml`). */
export function ocfContainerXml(packageDocumentPath: string): string {
  const doc = create({
    version: "1.0",
  })
    .ele("container", {
      version: "1.0",
      xmlns: NAMESPACES.container,
    })
    .ele("rootfiles")
    .ele("rootfile", {
      "full-path": packageDocumentPath,
      "media-type": MEDIA_TYPES.package,
    });

  return doc.doc().end({ prettyPrint: true });
}

/**
 * The `full-path` of every rootfile named by `META-INF/container.xml`, or `undefined` when the
 * container file is missing or cannot be parsed.
 */
async function readRootfilePaths(root: string): Promise<string[] | undefined> {
  const containerPath = path.join(root, OCF_CONTAINER_PATH);
  if (!(await pathExists(containerPath))) {
    return undefined;
  }

  let doc: Document;
  try {
    doc = parseXml(await readFile(containerPath, "utf-8"), "container");
  } catch {
    // An unreadable container file is treated like a missing one and regenerated.
    return undefined;
  }

  return descendantElements(
    doc.documentElement,
    doc.documentElement.namespaceURI ?? NAMESPACES.container,
    "rootfile",
  ).flatMap((rootfile) => rootfile.getAttribute("full-path") ?? []);
}

/**
 * Finds the package document below `root`, relative to `root`: the first existing rootfile
 * named by `META-INF/container.xml`, or else the first `.opf` file in the tree.
 */
export async function locatePackageDocument(
  root: string,
): Promise<string | undefined> {
  for (const fullPath of (await readRootfilePaths(root)) ?? []) {
    if (await pathExists(path.join(root, fullPath))) {
      return fullPath;
    }
  }

  const files = await listFiles(root);
  return files.find((file) => file.toLowerCase().endsWith(".opf"));
}

/**
 * Writes `META-INF/container.xml` pointing at `packageDocumentPath` unless the existing one
 * already names it. Returns whether a file was written.
 */
export async function ensureContainerXml(
  root: string,
  packageDocumentPath: string,
): Promise<boolean> {
  const rootfiles = await readRootfilePaths(root);
  if (rootfiles?.includes(packageDocumentPath)) {
    return false;
  }

  const containerPath = path.join(root, OCF_CONTAINER_PATH);
  await mkdir(path.dirname(containerPath), { recursive: true });
  await writeFile(containerPath, ocfContainerXml(packageDocumentPath), "utf-8");
  return true;
}

/** `META-INF/` entries first, as some readers expect, then everything else in path order. */
function entryOrder(a: string, b: string): number {
  const aMeta = a.startsWith("META-INF/");
  const bMeta = b.startsWith("META-INF/");
  if (aMeta !== bMeta) {
    return aMeta ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface PackOptions {
  /** Refuse to move a result smaller than this into place. */
  minimumSize?: number;
}

/**
 * Packs the directory `sourceDir` into an ePub at `outputPath` and returns the number of bytes
 * written. The archive is written beside `outputPath` first and renamed over it once complete.
 */
export async function pack(
  sourceDir: string,
  outputPath: string,
  options: PackOptions = {},
): Promise<number> {
  const outputDirectory = path.dirname(path.resolve(outputPath));
  const partialPath = path.join(
    outputDirectory,
    `.${path.basename(outputPath)}.${process.pid}.${randomBytes(4).toString("hex")}.partial`,
  );

  let started = false;

  try {
    await mkdir(outputDirectory, { recursive: true });

    const files = (await listFiles(sourceDir))
      .filter((file) => file !== "mimetype")
      .sort(entryOrder);
    const entries = await Promise.all(
      files.map(async (name) => ({
        name,
        contents: await readFile(path.join(sourceDir, name)),
      })),
    );

    const archive = archiver("zip", {
      zlib: { level: 9 },
    });
    const written = pipeline(archive, createWriteStream(partialPath));
    started = true;

    // 1. Add the "mimetype" file - this cannot be compressed and must be first in the zip file.
    archive.append(EPUB_MIMETYPE, { name: "mimetype", store: true });

    // 2. Add everything else, deflated, in order.
    for (const entry of entries) {
      archive.append(entry.contents, { name: entry.name });
    }

    await Promise.all([archive.finalize(), written]);

    const size = archive.pointer();
    const minimumSize = options.minimumSize ?? 0;
    if (size < minimumSize) {
      throw new Error(
        `packed EPUB is only ${size} bytes, expected at least ${minimumSize}`,
      );
    }

    await rename(partialPath, outputPath);
    return size;
  } catch (error) {
    if (started) {
      await rm(partialPath, { force: true });
    }
    throw new ContainerIOError(
      `failed to write EPUB to ${outputPath}: ${describeError(error)}`,
      { path: outputPath, cause: error },
    );
  }
}
