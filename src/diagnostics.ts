import { writeFile } from "fs/promises";
import path from "path";
import { MEDIA_TYPES } from "./document";
import { ContainerIOError } from "./errors";
import { PackageDocument } from "./package";
import { toXmlDate } from "./time";

/** Written beside the package document; registered in the manifest but never in the spine. */
export const DIAGNOSTICS_FILENAME = "_diagnostics.json";

export const DIAGNOSTICS_ITEM_ID = "diagnostics";

/** Build information embedded in every processed ePub, for tracing a file back to its run. */
export interface DiagnosticsRecord {
  buildTime: string;
  workflowRunId: string;
  gitSha: string;
  inputFile: string;
  outputFile: string;
  inputSizeBytes: number;
  processingTimeMs: number;
  articleCount: number;
  sectionsFound: string[];
  imagesRemoved: number;
  warningCount: number;
  debugMode: boolean;
  nodeVersion: string;
}

export interface DiagnosticsContext {
  inputPath: string;
  outputPath: string;
  inputSizeBytes: number;
  startTime: number;
  articleCount: number;
  sectionsFound: string[];
  imagesRemoved: number;
  warningCount: number;
  debug: boolean;
  provenance: {
    workflowRunId: string;
    gitSha: string;
  };
  now?: Date;
}

export function createDiagnostics(context: DiagnosticsContext): DiagnosticsRecord {
  const now = context.now ?? new Date();

  return {
    buildTime: toXmlDate(now),
    workflowRunId: context.provenance.workflowRunId,
    gitSha: context.provenance.gitSha,
    inputFile: path.basename(context.inputPath),
    outputFile: path.basename(context.outputPath),
    inputSizeBytes: context.inputSizeBytes,
    processingTimeMs: Math.max(0, now.getTime() - context.startTime),
    articleCount: context.articleCount,
    sectionsFound: context.sectionsFound,
    imagesRemoved: context.imagesRemoved,
    warningCount: context.warningCount,
    debugMode: context.debug,
    nodeVersion: process.version,
  };
}

/** Writes the record beside the package document and registers it in the manifest. */
export async function embedDiagnostics(
  pkg: PackageDocument,
  record: DiagnosticsRecord,
): Promise<string> {
  const filename = path.join(pkg.directory, DIAGNOSTICS_FILENAME);

  try {
    await writeFile(filename, JSON.stringify(record, null, 2), "utf-8");
  } catch (error) {
    throw new ContainerIOError(`cannot write diagnostics to ${filename}`, {
      path: filename,
      cause: error,
    });
  }

  pkg.addManifestItem({
    id: DIAGNOSTICS_ITEM_ID,
    href: pkg.hrefFor(filename),
    mediaType: MEDIA_TYPES.json,
  });

  return filename;
}
