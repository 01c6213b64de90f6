/**
 * Typed error classes for extraction, account and payment failures.
 *
 * Every error carries a stable `code` for programmatic handling and a
 * `statusCode` hint that the HTTP layer uses to pick a response status.
 */

export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'NO_IMAGES_FOUND'
  | 'INVALID_COLUMN_SELECTION'
  | 'PACKAGING_ERROR'
  | 'INVALID_REQUEST'
  | 'ACCESS_DENIED'
  | 'RATE_LIMIT_EXCEEDED'
  | 'PAYMENT_ERROR'
  | 'CONFIG_ERROR'
  | 'EXTRACTOR_ERROR';

/**
 * Base error class for all extractor errors
 */
export class ExtractorError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** Suggested HTTP status */
  readonly statusCode: number;

  constructor(message: string, options?: { code?: ErrorCode; statusCode?: number; cause?: Error }) {
    // Original error stays reachable as `error.cause`
    super(message, { cause: options?.cause });
    this.name = 'ExtractorError';
    this.code = options?.code ?? 'EXTRACTOR_ERROR';
    this.statusCode = options?.statusCode ?? 500;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an upload is not a readable .xlsx workbook
 */
export class UnsupportedFormatError extends ExtractorError {
  /** Upload name, when known */
  readonly fileName?: string;

  constructor(message: string, options?: { fileName?: string; cause?: Error }) {
    super(message, { code: 'UNSUPPORTED_FORMAT', statusCode: 400, cause: options?.cause });
    this.name = 'UnsupportedFormatError';
    this.fileName = options?.fileName;
  }
}

/**
 * Thrown only when the caller asks for a non-empty result and the
 * workbooks contain no image in the selected column.
 */
export class NoImagesFoundError extends ExtractorError {
  constructor(message = 'No images found in the selected image column') {
    super(message, { code: 'NO_IMAGES_FOUND', statusCode: 422 });
    this.name = 'NoImagesFoundError';
  }
}

export class InvalidColumnSelectionError extends ExtractorError {
  readonly imageColumn: string;
  readonly nameColumn: string;

  constructor(message: string, options: { imageColumn: string; nameColumn: string }) {
    super(message, { code: 'INVALID_COLUMN_SELECTION', statusCode: 400 });
    this.name = 'InvalidColumnSelectionError';
    this.imageColumn = options.imageColumn;
    this.nameColumn = options.nameColumn;
  }
}

/**
 * Thrown when the output archive cannot be generated
 */
export class PackagingError extends ExtractorError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, { code: 'PACKAGING_ERROR', statusCode: 500, cause: options?.cause });
    this.name = 'PackagingError';
  }
}

/**
 * Thrown when a request payload fails validation
 */
export class InvalidRequestError extends ExtractorError {
  /** Field-level messages */
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, { code: 'INVALID_REQUEST', statusCode: 400 });
    this.name = 'InvalidRequestError';
    this.details = details;
  }
}

export type AccessDeniedReason = 'not_registered' | 'trial_expired';

/**
 * Thrown when a user may not process files
 */
export class AccessDeniedError extends ExtractorError {
  readonly reason: AccessDeniedReason;

  constructor(message: string, reason: AccessDeniedReason) {
    super(message, { code: 'ACCESS_DENIED', statusCode: reason === 'trial_expired' ? 402 : 401 });
    this.name = 'AccessDeniedError';
    this.reason = reason;
  }
}

/**
 * Thrown when rate limit is exceeded
 */
export class RateLimitError extends ExtractorError {
  /** Seconds to wait before retrying */
  readonly retryAfter: number;

  constructor(message: string, options: { retryAfter: number }) {
    super(message, { code: 'RATE_LIMIT_EXCEEDED', statusCode: 429 });
    this.name = 'RateLimitError';
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Thrown when the checkout provider rejects or cannot be reached
 */
export class PaymentError extends ExtractorError {
  constructor(message: string, options?: { statusCode?: number; cause?: Error }) {
    super(message, { code: 'PAYMENT_ERROR', statusCode: options?.statusCode ?? 502, cause: options?.cause });
    this.name = 'PaymentError';
  }
}

export class ConfigError extends ExtractorError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, { code: 'CONFIG_ERROR', statusCode: 500 });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Type guard to check if an error is an ExtractorError
 */
export function isExtractorError(error: unknown): error is ExtractorError {
  return error instanceof ExtractorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
