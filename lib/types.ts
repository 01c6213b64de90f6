/**
 * Core types for workbook image extraction
 */

export type ImageExtension = 'png' | 'jpg' | 'gif' | 'bmp' | 'tif' | 'webp' | 'emf' | 'wmf' | 'svg';

/** One image anchor discovered in a workbook drawing */
export interface AnchoredImage {
  /** Raw image bytes */
  bytes: Buffer;
  /** Sheet the drawing belongs to */
  sheetName: string;
  /** 1-based row of the anchor's top-left cell */
  anchorRow: number;
  /** Column letter of the anchor's top-left cell (e.g., "A") */
  anchorColumn: string;
  /** Media part inside the workbook (e.g., "xl/media/image1.png") */
  mediaPath: string;
}

export interface ExtractedImage extends AnchoredImage {
  /** Hex SHA-256 of `bytes` */
  fingerprint: string;
  /** Extension from the detected image format */
  extension: ImageExtension;
  /** Value of the name column in the anchor row ('' when blank) */
  rawName: string;
  /** Upload the image came from */
  sourceFile: string;
}

export interface WorkbookInput {
  /** Original file name of the upload */
  fileName: string;
  /** Raw file bytes */
  data: Buffer;
  /** Declared content type, if any */
  contentType?: string;
}

export interface ColumnSelection {
  imageColumn: string;
  nameColumn: string;
}

export type PlanId = 'monthly' | 'per_file' | 'lifetime';

export interface ProcessingSummary {
  /** Images found in the image column */
  processed: number;
  /** Unique images written to the archive */
  saved: number;
  /** Images skipped because their bytes were already saved */
  duplicates: number;
  /** Plan label of the requesting user */
  plan: string;
}

export type ManifestAction = 'Saved' | 'Duplicate';

export interface ManifestRow {
  sheet: string;
  row: number;
  name: string;
  fileName: string;
  action: ManifestAction;
}

/** Milliseconds spent per pipeline phase, summed over all files */
export interface PhaseTimings {
  read: number;
  map: number;
  dedup: number;
  package: number;
}

export interface PipelineResult {
  /** ZIP archive bytes */
  archive: Buffer;
  summary: ProcessingSummary;
  /** Archive entry names in write order */
  entries: string[];
  /** Per-image outcome in encounter order */
  manifest: ManifestRow[];
  /** Suggested download name */
  fileName: string;
  timings: PhaseTimings;
}
