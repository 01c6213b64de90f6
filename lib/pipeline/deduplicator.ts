import { createHash } from 'crypto';

/** Hex SHA-256 of the full image content */
export function fingerprint(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Exact-duplicate filter for one request.
 *
 * The first image with a fingerprint is saved; later ones are counted as
 * duplicates. The seen set only grows.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();
  private duplicateCount = 0;

  /** Returns true when the fingerprint is new and the image should be kept */
  admit(fingerprintHex: string): boolean {
    if (this.seen.has(fingerprintHex)) {
      this.duplicateCount++;
      return false;
    }
    this.seen.add(fingerprintHex);
    return true;
  }

  get saved(): number {
    return this.seen.size;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }
}
