/**
 * Output file naming: sanitize name-column values into safe base names and
 * keep every archive entry name unique within a request.
 */

import type { ImageExtension } from '../types';

export const MAX_BASE_NAME_LENGTH = 50;

// Reserved device names on Windows, with or without an extension
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

/**
 * Make a name-column value safe to use as a file base name.
 * Returns '' when nothing usable is left.
 *
 * @example
 * sanitizeBaseName('  Bolt M6 / 20mm ')  // 'Bolt_M6_20mm'
 * sanitizeBaseName('Hex\nNut')           // 'Hex_Nut'
 */
export function sanitizeBaseName(raw: string, maxLength = MAX_BASE_NAME_LENGTH): string {
  let clean = raw
    .normalize('NFC')
    .trim()
    // Tabs and line breaks become '_' here, before control characters are dropped
    .replace(/\s+/g, '_')
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/_+/g, '_')
    .replace(/^[._]+|[._ ]+$/g, '');

  if (clean.length > maxLength) {
    clean = Array.from(clean).slice(0, maxLength).join('').replace(/[._ ]+$/, '');
  }

  if (RESERVED_NAMES.test(clean)) clean = `_${clean}`;
  return clean;
}

/**
 * Assigns unique `<base>.<ext>` names in encounter order.
 * Collisions are compared case-insensitively and get `_1`, `_2`, … suffixes.
 */
export class FileNamer {
  private readonly used = new Set<string>();

  constructor(private readonly maxLength = MAX_BASE_NAME_LENGTH) {}

  /**
   * @param rawName - Name-column value for the image's row
   * @param row - 1-based anchor row, used for the `image_<row>` fallback
   */
  assign(rawName: string, row: number, extension: ImageExtension): string {
    const base = sanitizeBaseName(rawName, this.maxLength) || `image_${row}`;

    let candidate = `${base}.${extension}`;
    for (let suffix = 1; this.used.has(candidate.toLowerCase()); suffix++) {
      candidate = `${base}_${suffix}.${extension}`;
    }

    this.used.add(candidate.toLowerCase());
    return candidate;
  }
}
