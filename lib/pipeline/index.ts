/**
 * Extraction Pipeline
 *
 * Reader → Column Mapper → Deduplicator → Namer → Packager, run over the
 * uploaded workbooks one after another. All state (seen fingerprints, used
 * names, counters) lives in a single call; nothing is shared between calls.
 *
 * @example
 * ```typescript
 * import { processWorkbooks } from './pipeline';
 *
 * const result = await processWorkbooks(
 *   [{ fileName: 'bom.xlsx', data: fs.readFileSync('bom.xlsx') }],
 *   { imageColumn: 'A', nameColumn: 'B' },
 *   { plan: 'trial' }
 * );
 *
 * fs.writeFileSync(result.fileName, result.archive);
 * console.log(result.summary); // { processed: 12, saved: 10, duplicates: 2, plan: 'trial' }
 * ```
 */

import { NoImagesFoundError } from '../errors';
import { validateColumnSelection, readSheetCells } from '../excel/column-mapper';
import { detectImageExtension } from '../excel/image-format';
import { openWorkbook } from '../excel/workbook-reader';
import { createLogger } from '../logger';
import type {
  AnchoredImage,
  ColumnSelection,
  ExtractedImage,
  ManifestRow,
  PhaseTimings,
  PipelineResult,
  WorkbookInput,
} from '../types';
import { Deduplicator, fingerprint } from './deduplicator';
import { FileNamer, MAX_BASE_NAME_LENGTH } from './namer';
import { packageImages, type ArchiveEntry } from './packager';

const log = createLogger('Pipeline');

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  /** Plan label reported in the summary (default: 'unknown') */
  plan?: string;
  /** Add report.csv to the archive (default: false) */
  includeManifest?: boolean;
  /** Throw NoImagesFoundError instead of returning an empty archive (default: false) */
  failOnEmpty?: boolean;
  /** Max characters of a base name (default: 50) */
  maxNameLength?: number;
  /** Clock for the suggested archive name */
  now?: Date;
}

// ============================================================================
// Helpers
// ============================================================================

/** `sheet_images_20250131_142501.zip` (UTC) */
export function suggestedArchiveName(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `sheet_images_${stamp}.zip`;
}

export function emptyTimings(): PhaseTimings {
  return { read: 0, map: 0, dedup: 0, package: 0 };
}

/**
 * Extract the images of one workbook that sit in the image column, in
 * encounter order, each paired with its name-column value.
 * Read and map time is added to `timings` when given.
 */
export async function extractWorkbookImages(
  input: WorkbookInput,
  columns: ColumnSelection,
  timings: PhaseTimings = emptyTimings()
): Promise<ExtractedImage[]> {
  const { imageColumn, nameColumn } = validateColumnSelection(columns);

  const readStart = Date.now();
  const workbook = await openWorkbook(input);
  const anchored: AnchoredImage[] = [];
  for await (const image of workbook.images()) {
    if (image.anchorColumn === imageColumn) anchored.push(image);
  }
  timings.read += Date.now() - readStart;

  const mapStart = Date.now();
  const cells = readSheetCells(input.data, input.fileName);
  const images = anchored.map(image => ({
    ...image,
    fingerprint: fingerprint(image.bytes),
    extension: detectImageExtension(image.bytes, image.mediaPath),
    rawName: cells.columnIndex(image.sheetName, nameColumn).get(image.anchorRow),
    sourceFile: input.fileName,
  }));
  timings.map += Date.now() - mapStart;

  return images;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run the full pipeline over one or more workbooks and build the ZIP.
 *
 * Either every file is read and a complete archive is returned, or the
 * first failure is thrown and nothing is returned.
 *
 * @throws InvalidColumnSelectionError before any file is opened
 * @throws UnsupportedFormatError when a file is not a readable .xlsx
 * @throws NoImagesFoundError only with `failOnEmpty`
 * @throws PackagingError when the archive cannot be generated
 */
export async function processWorkbooks(
  inputs: WorkbookInput[],
  columns: ColumnSelection,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const selection = validateColumnSelection(columns);
  const startTime = Date.now();

  const dedup = new Deduplicator();
  const namer = new FileNamer(options.maxNameLength ?? MAX_BASE_NAME_LENGTH);
  const savedNames = new Map<string, string>();
  const entries: ArchiveEntry[] = [];
  const manifest: ManifestRow[] = [];
  let processed = 0;

  const timings = emptyTimings();

  for (const input of inputs) {
    const images = await extractWorkbookImages(input, selection, timings);
    log.debug(`${input.fileName}: ${images.length} images in column ${selection.imageColumn}`);

    const dedupStart = Date.now();
    for (const image of images) {
      processed++;

      if (!dedup.admit(image.fingerprint)) {
        manifest.push({
          sheet: image.sheetName,
          row: image.anchorRow,
          name: image.rawName,
          fileName: savedNames.get(image.fingerprint) ?? '',
          action: 'Duplicate',
        });
        continue;
      }

      const fileName = namer.assign(image.rawName, image.anchorRow, image.extension);
      savedNames.set(image.fingerprint, fileName);
      entries.push({ fileName, bytes: image.bytes });
      manifest.push({
        sheet: image.sheetName,
        row: image.anchorRow,
        name: image.rawName,
        fileName,
        action: 'Saved',
      });
    }
    timings.dedup += Date.now() - dedupStart;
  }

  if (processed === 0 && options.failOnEmpty) {
    throw new NoImagesFoundError(
      `No images found in column ${selection.imageColumn} of ${inputs.length} file(s)`
    );
  }

  const packageStart = Date.now();
  const archive = await packageImages(entries, {
    manifest: options.includeManifest ? manifest : undefined,
  });
  timings.package = Date.now() - packageStart;

  log.debug(
    `Phases: read ${timings.read}ms, map ${timings.map}ms, dedup ${timings.dedup}ms, package ${timings.package}ms`
  );

  const summary = {
    processed,
    saved: dedup.saved,
    duplicates: dedup.duplicates,
    plan: options.plan ?? 'unknown',
  };

  log.info(
    `Processed ${inputs.length} file(s): ${summary.processed} images, ${summary.saved} saved, ` +
    `${summary.duplicates} duplicates (${Date.now() - startTime}ms)`
  );

  return {
    archive,
    summary,
    entries: entries.map(e => e.fileName),
    manifest,
    fileName: suggestedArchiveName(options.now),
    timings,
  };
}
