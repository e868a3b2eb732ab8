import { readFile, writeFile } from "fs/promises";
import path from "path";
import {
  ProcessOptionsInput,
  ResolvedProcessOptions,
  resolveProcessOptions,
} from "./config";
import {
  MIN_EPUB_SIZE,
  ensureContainerXml,
  locatePackageDocument,
  pack,
  validateInput,
  withExtractedArchive,
} from "./container";
import {
  DiagnosticsRecord,
  createDiagnostics,
  embedDiagnostics,
} from "./diagnostics";
import { MEDIA_TYPES } from "./document";
import {
  ContainerIOError,
  MalformedPackageError,
  ProcessingWarning,
  describeError,
} from "./errors";
import { Logger, createLogger } from "./logger";
import { stripImages } from "./media";
import { rewriteNavigation } from "./navigation";
import { PackageDocument } from "./package";
import { shortenTitle } from "./title";

/** Name of the replacement stylesheet inside the package directory. */
export const STYLESHEET_FILENAME = "stylesheet.css";

export type ProcessOptions = ProcessOptionsInput & {
  /** Defaults to a logger on stderr at the level implied by `debug`. */
  logger?: Logger;
};

export interface ProcessResult {
  outputPath: string;
  bytesWritten: number;
  durationMs: number;

  /** Manifest IDs of the leading spine entries that were dropped. */
  removedFromSpine: string[];

  imagesRemoved: number;

  /** Number of labels changed per navigation document; absent where a document was missing or failed. */
  titlesShortened: {
    ncx?: number;
    nav?: number;
  };

  /** Everything that went wrong without stopping the run. */
  warnings: ProcessingWarning[];

  diagnostics: DiagnosticsRecord;
}

function uniqueItemId(pkg: PackageDocument, base: string): string {
  let id = base;
  for (let suffix = 2; pkg.getItem(id); suffix++) {
    id = `${base}-${suffix}`;
  }
  return id;
}

/**
 * Copies the configured stylesheet into the package directory. Returns a warning when the
 * stylesheet is configured but cannot be read.
 */
async function replaceStylesheet(
  pkg: PackageDocument,
  stylesheetPath: string | undefined,
  logger: Logger,
): Promise<ProcessingWarning | undefined> {
  if (!stylesheetPath) {
    logger.debug("no replacement stylesheet configured, skipping");
    return undefined;
  }

  let css: string;
  try {
    css = await readFile(stylesheetPath, "utf-8");
  } catch (error) {
    const warning: ProcessingWarning = {
      kind: "stylesheet",
      message: `stylesheet not found, keeping the original: ${describeError(error)}`,
      path: stylesheetPath,
    };
    logger.warn({ path: stylesheetPath }, warning.message);
    return warning;
  }

  const target = path.join(pkg.directory, STYLESHEET_FILENAME);
  try {
    await writeFile(target, css, "utf-8");
  } catch (error) {
    throw new ContainerIOError(`cannot write stylesheet ${target}`, {
      path: target,
      cause: error,
    });
  }

  const href = pkg.hrefFor(target);
  if (pkg.findItems((item) => item.href === href).length === 0) {
    pkg.addManifestItem({
      id: uniqueItemId(pkg, "stylesheet"),
      href,
      mediaType: MEDIA_TYPES.css,
    });
  }

  logger.info({ bytes: Buffer.byteLength(css) }, "stylesheet replaced");
  return undefined;
}

async function processExtracted(
  root: string,
  inputPath: string,
  inputSize: number,
  outputPath: string,
  config: ResolvedProcessOptions,
  warnings: ProcessingWarning[],
  startTime: number,
  logger: Logger,
): Promise<ProcessResult> {
  const packageDocumentPath = await locatePackageDocument(root);
  if (!packageDocumentPath) {
    throw new MalformedPackageError("no package document (.opf) found in EPUB", {
      path: inputPath,
    });
  }

  const pkg = await PackageDocument.load(path.join(root, packageDocumentPath));
  logger.info(
    { packageDocument: packageDocumentPath, spine: pkg.spine.length },
    "package document parsed",
  );

  if (await ensureContainerXml(root, packageDocumentPath)) {
    const warning: ProcessingWarning = {
      kind: "container",
      message: `META-INF/container.xml did not point at ${packageDocumentPath} and was regenerated`,
    };
    warnings.push(warning);
    logger.warn(warning.message);
  }

  const spineLength = pkg.spine.length;
  const removedFromSpine = pkg.removeLeadingSpineEntries(
    config.trimLeadingPages,
  );
  logger.info({ removed: removedFromSpine }, "leading pages removed from spine");

  if (config.trimLeadingPages > 0 && spineLength <= config.trimLeadingPages) {
    const warning: ProcessingWarning = {
      kind: "spine",
      message: `spine had ${spineLength} entries, expected more than the ${config.trimLeadingPages} leading pages; the spine is now empty`,
      path: pkg.path,
    };
    warnings.push(warning);
    logger.warn(warning.message);
  }

  const media = await stripImages(root, pkg, logger.child({ step: "media" }));
  warnings.push(...media.warnings);

  const stylesheetWarning = await replaceStylesheet(
    pkg,
    config.stylesheetPath,
    logger.child({ step: "stylesheet" }),
  );
  if (stylesheetWarning) {
    warnings.push(stylesheetWarning);
  }

  const navigation = await rewriteNavigation(
    pkg,
    (title) => shortenTitle(title, config.maxTitleLength, config.titleRules),
    logger.child({ step: "navigation" }),
  );
  warnings.push(...navigation.warnings);

  const diagnostics = createDiagnostics({
    inputPath,
    outputPath,
    inputSizeBytes: inputSize,
    startTime,
    articleCount: pkg.spine.length,
    sectionsFound: navigation.sections,
    imagesRemoved: media.removed,
    warningCount: warnings.length,
    debug: config.debug,
    provenance: config.provenance,
  });
  await embedDiagnostics(pkg, diagnostics);
  logger.debug({ diagnostics }, "diagnostics embedded");

  await pkg.save();

  logger.info("repackaging EPUB");
  const bytesWritten = await pack(root, outputPath, {
    minimumSize: MIN_EPUB_SIZE,
  });

  return {
    outputPath,
    bytesWritten,
    durationMs: Date.now() - startTime,
    removedFromSpine,
    imagesRemoved: media.removed,
    titlesShortened: { ncx: navigation.ncx, nav: navigation.nav },
    warnings,
    diagnostics,
  };
}

/**
 * Rewrites the ePub at `inputPath` for an e-ink reader and writes the result to `outputPath`.
 *
 * Invalid input, a malformed package document and archive I/O failures throw; nothing is written
 * in that case. Everything else that goes wrong is returned in `warnings`.
 */
export async function processEpub(
  inputPath: string,
  outputPath: string,
  options: ProcessOptions = {},
): Promise<ProcessResult> {
  const startTime = Date.now();
  const { logger: providedLogger, ...rest } = options;
  const config = resolveProcessOptions(rest);
  const logger = providedLogger ?? createLogger({ debug: config.debug });

  logger.info({ input: inputPath, output: outputPath }, "processing EPUB");

  try {
    const archive = await validateInput(
      inputPath,
      logger.child({ step: "validate" }),
    );
    const warnings = [...archive.warnings];

    const result = await withExtractedArchive(archive, (root) =>
      processExtracted(
        root,
        inputPath,
        archive.size,
        outputPath,
        config,
        warnings,
        startTime,
        logger,
      ),
    );

    logger.info(
      {
        output: result.outputPath,
        bytes: result.bytesWritten,
        durationMs: result.durationMs,
        warnings: result.warnings.length,
      },
      "processing complete",
    );

    return result;
  } catch (error) {
    logger.error({ err: error }, "processing failed");
    throw error;
  }
}
