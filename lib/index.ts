/**
 * @package sheet-image-extractor
 *
 * Extract the images embedded in .xlsx workbooks, name each one after a
 * cell in the same row, drop byte-identical duplicates and bundle the
 * result as a ZIP archive.
 *
 * @example
 * ```typescript
 * import { processWorkbooks } from 'sheet-image-extractor';
 *
 * const result = await processWorkbooks(
 *   [{ fileName: 'catalog.xlsx', data: await fs.promises.readFile('catalog.xlsx') }],
 *   { imageColumn: 'A', nameColumn: 'C' }
 * );
 *
 * await fs.promises.writeFile(result.fileName, result.archive);
 * console.log(result.summary);
 * ```
 */

// Pipeline
export {
  processWorkbooks,
  extractWorkbookImages,
  suggestedArchiveName,
} from './pipeline';

export type { PipelineOptions } from './pipeline';

export { Deduplicator, fingerprint } from './pipeline/deduplicator';
export { FileNamer, sanitizeBaseName, MAX_BASE_NAME_LENGTH } from './pipeline/namer';
export { packageImages, buildManifestCsv, MANIFEST_FILE_NAME } from './pipeline/packager';
export type { ArchiveEntry, PackageOptions } from './pipeline/packager';

// Workbook reading
export { openWorkbook, readAnchoredImages } from './excel/workbook-reader';
export type { WorkbookPackage, SheetPart } from './excel/workbook-reader';

export {
  columnLetterToIndex,
  columnIndexToLetter,
  validateColumnSelection,
  readSheetCells,
  RowNameIndex,
  MAX_COLUMN_INDEX,
} from './excel/column-mapper';

export { detectImageExtension, sniffImageFormat } from './excel/image-format';

// Errors
export {
  ExtractorError,
  UnsupportedFormatError,
  NoImagesFoundError,
  InvalidColumnSelectionError,
  PackagingError,
  InvalidRequestError,
  AccessDeniedError,
  RateLimitError,
  PaymentError,
  ConfigError,
  isExtractorError,
} from './errors';

export type { ErrorCode, AccessDeniedReason } from './errors';

// Server
export { createApp, createExtractorRouter } from './express';
export type { AppDependencies } from './express';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { MemoryUserStore, JsonFileUserStore } from './accounts/user-store';
export type { UserStore, UserRecord, PaymentRecord } from './accounts/user-store';
export { checkUserAccess, getOrCreateUser } from './accounts/access';
export type { AccessGrant } from './accounts/access';
export { PayPalCheckout } from './payment/paypal';
export type { CheckoutProvider, CheckoutSession, PaymentVerification } from './payment/paypal';
export { PLANS, getPlans } from './payment/plans';
export { createLogger, setLogLevel } from './logger';

// Types
export type {
  AnchoredImage,
  ExtractedImage,
  WorkbookInput,
  ColumnSelection,
  PlanId,
  ProcessingSummary,
  ManifestRow,
  ManifestAction,
  PhaseTimings,
  PipelineResult,
  ImageExtension,
} from './types';
