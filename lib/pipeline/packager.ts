import JSZip from 'jszip';
import { PackagingError, errorMessage } from '../errors';
import type { ManifestRow } from '../types';

export interface ArchiveEntry {
  fileName: string;
  bytes: Buffer;
}

export interface PackageOptions {
  /** Adds report.csv describing every image, saved or not */
  manifest?: ManifestRow[];
  /** DEFLATE level 1-9 (default: 6) */
  compressionLevel?: number;
}

export const MANIFEST_FILE_NAME = 'report.csv';

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function buildManifestCsv(rows: ManifestRow[]): string {
  const lines = [['sheet', 'row', 'name', 'filename', 'action'].join(',')];
  for (const row of rows) {
    lines.push([row.sheet, row.row, row.name, row.fileName, row.action].map(csvField).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/**
 * Write entries into an in-memory ZIP archive, one file per entry at the root.
 * Entry names must already be unique.
 *
 * @throws PackagingError when the archive cannot be generated
 */
export async function packageImages(entries: ArchiveEntry[], options: PackageOptions = {}): Promise<Buffer> {
  const zip = new JSZip();

  for (const entry of entries) {
    zip.file(entry.fileName, entry.bytes, { binary: true });
  }
  if (options.manifest) {
    zip.file(MANIFEST_FILE_NAME, buildManifestCsv(options.manifest));
  }

  try {
    return await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: options.compressionLevel ?? 6 },
    });
  } catch (err) {
    throw new PackagingError(`Failed to build ZIP archive: ${errorMessage(err)}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
}
