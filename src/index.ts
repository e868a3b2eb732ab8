export {
  processEpub,
  STYLESHEET_FILENAME,
  type ProcessOptions,
  type ProcessResult,
} from "./pipeline";
export {
  EPUB_MIMETYPE,
  MIN_EPUB_SIZE,
  ensureContainerXml,
  locatePackageDocument,
  ocfContainerXml,
  pack,
  validateInput,
  withExtractedArchive,
  type EpubArchive,
  type PackOptions,
} from "./container";
export { PackageDocument } from "./package";
export type { ManifestItem } from "./document";
export {
  NavDocument,
  NcxDocument,
  rewriteNavigation,
  type LabelNode,
  type NavigationDocument,
} from "./navigation";
export { stripImageMarkup, stripImages } from "./media";
export {
  DEFAULT_MAX_TITLE_LENGTH,
  DEFAULT_TITLE_RULES,
  shortenTitle,
  stripTitleSuffixes,
  type TitleRules,
} from "./title";
export { createDiagnostics, type DiagnosticsRecord } from "./diagnostics";
export {
  ContainerIOError,
  EpubProcessingError,
  InvalidInputError,
  MalformedPackageError,
  type ProcessingWarning,
  type WarningKind,
} from "./errors";
export {
  processOptionsSchema,
  readEnvironment,
  type ProcessOptionsInput,
} from "./config";
export { createLogger, silentLogger, type Logger } from "./logger";
