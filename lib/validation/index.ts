/**
 * Request Validation Module
 *
 * zod schemas for the loosely typed form fields that reach the HTTP layer,
 * plus upload checks that run before any workbook is opened.
 */

import { z } from 'zod';
import { InvalidRequestError, UnsupportedFormatError } from '../errors';
import type { WorkbookInput } from '../types';

// ============================================================================
// Schemas
// ============================================================================

export const PLAN_IDS = ['monthly', 'per_file', 'lifetime'] as const;

export const EmailSchema = z
  .string({ required_error: 'email is required' })
  .trim()
  .max(254, 'Email address too long')
  .email('Invalid email address')
  .toLowerCase();

/** Column letters are checked in depth by validateColumnSelection */
const ColumnFieldSchema = z
  .string({ required_error: 'column is required' })
  .trim()
  .min(1, 'column is required')
  .max(3, 'Column must be in Excel format (A, B, ..., AA, AB, ...)')
  .toUpperCase();

export const ProcessRequestSchema = z.object({
  imageColumn: ColumnFieldSchema,
  nameColumn: ColumnFieldSchema,
  userEmail: EmailSchema,
  includeManifest: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(v => v === 'true' || v === '1'),
});

export const SignupRequestSchema = z.object({
  email: EmailSchema,
});

export const PlanSchema = z.enum(PLAN_IDS, {
  errorMap: () => ({ message: `Invalid plan. Must be one of: ${PLAN_IDS.join(', ')}` }),
});

export const PaymentRequestSchema = z.object({
  plan: PlanSchema,
  email: EmailSchema,
});

export const VerifyPaymentSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required').max(64).regex(/^[A-Za-z0-9-]+$/, 'Invalid sessionId'),
  email: EmailSchema,
});

export const AdminLoginSchema = z.object({
  key: z.string().min(1, 'key is required').max(256),
});

/**
 * Parse a payload or throw InvalidRequestError with one message per issue.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const result = schema.safeParse(payload ?? {});
  if (!result.success) {
    const details = result.error.errors.map(e => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new InvalidRequestError(`Invalid request: ${details.join('; ')}`, details);
  }
  return result.data;
}

// ============================================================================
// Uploads
// ============================================================================

export const ACCEPTED_EXTENSION = '.xlsx';

export interface UploadLimits {
  /** Per-file byte limit */
  maxBytes: number;
  maxFiles: number;
}

/**
 * Strip path components and characters that are unsafe in file names.
 */
export function sanitizeUploadName(fileName: string): string {
  if (!fileName) return 'unknown_file';
  const base = fileName.split('/').pop()?.split('\\').pop() ?? '';
  const clean = base.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_').slice(0, 255);
  return clean || 'unknown_file';
}

/**
 * Reject uploads that are empty, too large, too many, or not .xlsx.
 * Runs before the pipeline so the pipeline only ever sees .xlsx candidates.
 */
export function validateUploads(files: WorkbookInput[], limits: UploadLimits): WorkbookInput[] {
  if (files.length === 0) {
    throw new InvalidRequestError('No files uploaded');
  }
  if (files.length > limits.maxFiles) {
    throw new InvalidRequestError(`Too many files: at most ${limits.maxFiles} per request`);
  }

  return files.map(file => {
    const fileName = sanitizeUploadName(file.fileName);

    if (!fileName.toLowerCase().endsWith(ACCEPTED_EXTENSION)) {
      throw new UnsupportedFormatError(`Only .xlsx files are supported: ${fileName}`, { fileName });
    }
    if (file.data.length === 0) {
      throw new InvalidRequestError(`File is empty: ${fileName}`);
    }
    if (file.data.length > limits.maxBytes) {
      const mb = Math.round(limits.maxBytes / (1024 * 1024));
      throw new InvalidRequestError(`File too large: ${fileName} (maximum ${mb}MB)`);
    }

    return { ...file, fileName };
  });
}
