import type { ImageExtension } from '../types';

const EXTENSION_ALIASES: Record<string, ImageExtension> = {
  png: 'png',
  jpg: 'jpg',
  jpeg: 'jpg',
  jpe: 'jpg',
  gif: 'gif',
  bmp: 'bmp',
  dib: 'bmp',
  tif: 'tif',
  tiff: 'tif',
  webp: 'webp',
  emf: 'emf',
  wmf: 'wmf',
  svg: 'svg',
};

function startsWith(bytes: Buffer, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((b, i) => bytes[offset + i] === b);
}

/**
 * Detect the image format from its leading bytes.
 * Returns null when the bytes match no known signature.
 */
export function sniffImageFormat(bytes: Buffer): ImageExtension | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png';
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'jpg';
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38]) && (bytes[4] === 0x37 || bytes[4] === 0x39)) return 'gif';
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) return 'webp';
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) return 'tif';
  if (startsWith(bytes, [0x42, 0x4d])) return 'bmp';
  // EMF: EMR_HEADER record type 1, " EMF" signature at offset 40
  if (startsWith(bytes, [0x01, 0x00, 0x00, 0x00]) && startsWith(bytes, [0x20, 0x45, 0x4d, 0x46], 40)) return 'emf';
  // WMF: placeable header, or a bare METAHEADER
  if (startsWith(bytes, [0xd7, 0xcd, 0xc6, 0x9a])) return 'wmf';
  if (startsWith(bytes, [0x01, 0x00, 0x09, 0x00]) || startsWith(bytes, [0x02, 0x00, 0x09, 0x00])) return 'wmf';

  const head = bytes.subarray(0, 512).toString('utf-8').trimStart().toLowerCase();
  if (head.startsWith('<svg') || (head.startsWith('<?xml') && head.includes('<svg'))) return 'svg';

  return null;
}

/** Map a file name's extension to a known image extension */
export function extensionFromPath(filePath: string): ImageExtension | null {
  const dot = filePath.lastIndexOf('.');
  if (dot === -1) return null;
  return EXTENSION_ALIASES[filePath.slice(dot + 1).toLowerCase()] ?? null;
}

/**
 * File extension for an embedded image: sniffed format first, then the
 * extension of its media part, then png.
 */
export function detectImageExtension(bytes: Buffer, mediaPath = ''): ImageExtension {
  return sniffImageFormat(bytes) ?? extensionFromPath(mediaPath) ?? 'png';
}
