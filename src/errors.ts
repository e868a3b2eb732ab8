interface EpubProcessingErrorOptions extends ErrorOptions {
  /** The file or directory the failure is about. */
  path?: string;
}

/** Base class for every fatal failure raised while processing an ePub. */
export class EpubProcessingError extends Error {
  readonly path?: string;

  constructor(message: string, options: EpubProcessingErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "EpubProcessingError";
    this.path = options.path;
  }
}

/** The input is missing, has the wrong extension, is undersized or is not a ZIP archive. */
export class InvalidInputError extends EpubProcessingError {
  constructor(message: string, options: EpubProcessingErrorOptions = {}) {
    super(message, options);
    this.name = "InvalidInputError";
  }
}

/** The package document lacks a manifest or spine, or its spine does not resolve. */
export class MalformedPackageError extends EpubProcessingError {
  constructor(message: string, options: EpubProcessingErrorOptions = {}) {
    super(message, options);
    this.name = "MalformedPackageError";
  }
}

/** Reading or writing the archive failed. */
export class ContainerIOError extends EpubProcessingError {
  constructor(message: string, options: EpubProcessingErrorOptions = {}) {
    super(message, options);
    this.name = "ContainerIOError";
  }
}

export type WarningKind =
  | "spine"
  | "navigation"
  | "media"
  | "stylesheet"
  | "container";

/** A non-fatal problem. The step it came from was skipped or only partially applied. */
export interface ProcessingWarning {
  kind: WarningKind;
  message: string;
  path?: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
