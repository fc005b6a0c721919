export * from './models/index.js';
export type * from './ports/index.js';

export {
  TrimfitError,
  InvalidSizeError,
  ConflictingOptionsError,
  UnknownPaperSizeError,
  UsageError,
  FileNotFoundError,
  InvalidInputError,
  MarginTooLargeError,
  MissingToolError,
  ExternalToolError,
  PdfIoError,
  FileSystemError,
} from './exceptions.js';
export type {
  ExternalToolFailure,
  FileSystemOperation,
  PdfOperation,
} from './exceptions.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_MARGIN,
  DEFAULT_OUTPUT,
  DEFAULT_SIZE,
  resolveConfig,
} from './config.js';
export type { TrimfitConfig, TrimfitMode } from './config.js';

export { getPaperSizes, listPaperSizes } from './paper-sizes.js';
export type { PaperSizeRegistry } from './paper-sizes.js';
export { parseDecimal, resolvePageSize } from './size-resolver.js';
export type { OrientationFlags } from './size-resolver.js';

export {
  CONTENT_PADDING,
  WHITE_CHANNEL_THRESHOLD,
  detectVisibleRegion,
  isVisibleColor,
  isVisibleDrawing,
} from './visible-region.js';
export { Cropper } from './cropper.js';
export type { CroppedDocument } from './cropper.js';
export { Fitter, validateCanvas } from './fitter.js';

export { TrimfitService } from './trimfit-service.js';
export type {
  FitRequest,
  NormalizeRequest,
  NormalizeResult,
  TrimRequest,
  TrimfitServiceDeps,
  TrimfitServiceOptions,
} from './trimfit-service.js';
