import { readFile, unlink, writeFile } from "fs/promises";
import path from "path";
import { ProcessingWarning, describeError } from "./errors";
import { listFiles } from "./files";
import type { Logger } from "./logger";
import { PackageDocument } from "./package";

/** Raster and vector image files the reader cannot display. */
export const IMAGE_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".svg",
  ".webp",
]);

const MARKUP_EXTENSIONS = new Set([".html", ".htm", ".xhtml"]);

// Attribute list of a start tag; quoted values may contain ">".
const ATTRIBUTES = `(?:[^>"']|"[^"]*"|'[^']*')*`;

const IMAGE_ELEMENTS = [
  new RegExp(`<img\\b${ATTRIBUTES}>(?:\\s*</img>)?`, "gi"),
  // SVG
  new RegExp(`<image\\b${ATTRIBUTES}>(?:\\s*</image>)?`, "gi"),
];

const EMPTY_WRAPPERS = [
  new RegExp(`<figure\\b${ATTRIBUTES}>\\s*</figure>`, "gi"),
  new RegExp(
    `<picture\\b${ATTRIBUTES}>(?:\\s*<source\\b${ATTRIBUTES}>)*\\s*</picture>`,
    "gi",
  ),
  new RegExp(`<svg\\b${ATTRIBUTES}>\\s*</svg>`, "gi"),
  new RegExp(
    `<(div|span|p)\\b(?=${ATTRIBUTES}\\bclass\\s*=\\s*(?:"[^"]*img[^"]*"|'[^']*img[^']*'))${ATTRIBUTES}>\\s*</\\1>`,
    "gi",
  ),
];

const REFERENCE_ATTRIBUTE = /\b(?:src|href)\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;

/** The cover image is kept for readers other than the e-ink device. */
export function isCoverReference(reference: string): boolean {
  return reference.toLowerCase().includes("cover");
}

function referencesCover(tag: string): boolean {
  for (const match of tag.matchAll(REFERENCE_ATTRIBUTE)) {
    if (isCoverReference(match[1] ?? match[2] ?? "")) {
      return true;
    }
  }
  return false;
}

/**
 * Removes image elements from HTML or XHTML markup, then the figure, picture, svg and
 * `img`-classed containers that are left empty. Images that reference the cover stay.
 */
export function stripImageMarkup(markup: string): string {
  let result = markup;
  for (const pattern of IMAGE_ELEMENTS) {
    result = result.replace(pattern, (tag) => (referencesCover(tag) ? tag : ""));
  }

  // Wrappers can nest, e.g. a figure around an img-classed div.
  for (;;) {
    const next = EMPTY_WRAPPERS.reduce(
      (text, pattern) => text.replace(pattern, ""),
      result,
    );
    if (next === result) {
      return result;
    }
    result = next;
  }
}

export interface StripImagesResult {
  /** Image files deleted from disk. */
  removed: number;

  /** Image files that could not be deleted. */
  failed: number;

  /** IDs of the image items removed from the manifest. */
  manifestItemsRemoved: string[];

  /** Markup documents that had image references removed. */
  documentsRewritten: number;

  warnings: ProcessingWarning[];
}

/**
 * Deletes every image below `root` except the cover, removes image items from the manifest,
 * and strips image references from every markup document. Files that cannot be deleted or
 * rewritten are reported as warnings; the rest of the work still happens.
 */
export async function stripImages(
  root: string,
  pkg: PackageDocument,
  logger: Logger,
): Promise<StripImagesResult> {
  const result: StripImagesResult = {
    removed: 0,
    failed: 0,
    manifestItemsRemoved: [],
    documentsRewritten: 0,
    warnings: [],
  };

  const files = await listFiles(root);

  for (const file of files) {
    const extension = path.extname(file).toLowerCase();
    if (!IMAGE_EXTENSIONS.has(extension) || isCoverReference(path.basename(file))) {
      continue;
    }

    try {
      await unlink(path.join(root, file));
      result.removed++;
      logger.debug({ file }, "removed image");
    } catch (error) {
      result.failed++;
      const warning: ProcessingWarning = {
        kind: "media",
        message: `failed to remove image: ${describeError(error)}`,
        path: file,
      };
      result.warnings.push(warning);
      logger.warn({ path: file }, warning.message);
    }
  }

  const imageItems = pkg.findItems(
    (item) => item.mediaType.startsWith("image/") && !isCoverReference(item.href),
  );
  for (const item of imageItems) {
    pkg.removeManifestItem(item.id);
    result.manifestItemsRemoved.push(item.id);
  }

  for (const file of files) {
    if (!MARKUP_EXTENSIONS.has(path.extname(file).toLowerCase())) {
      continue;
    }

    const filename = path.join(root, file);
    try {
      const markup = await readFile(filename, "utf-8");
      const stripped = stripImageMarkup(markup);
      if (stripped !== markup) {
        await writeFile(filename, stripped, "utf-8");
        result.documentsRewritten++;
      }
    } catch (error) {
      const warning: ProcessingWarning = {
        kind: "media",
        message: `failed to strip image references: ${describeError(error)}`,
        path: file,
      };
      result.warnings.push(warning);
      logger.warn({ path: file }, warning.message);
    }
  }

  logger.info(
    {
      removed: result.removed,
      failed: result.failed,
      manifestItems: result.manifestItemsRemoved.length,
      documents: result.documentsRewritten,
    },
    "images stripped",
  );

  return result;
}
