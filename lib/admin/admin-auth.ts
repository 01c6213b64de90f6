/**
 * Admin authentication: one shared admin key, exchanged for short-lived
 * session tokens with sliding expiry.
 */

import { createHash, randomBytes, timingSafeEqual } from 'crypto';

export interface AdminAuthOptions {
  adminKey: string;
  /** Idle time before a session expires (default: 1 hour) */
  sessionTtlMs?: number;
  clock?: () => number;
}

function sha256(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

export class AdminAuth {
  private readonly keyHash: Buffer;
  private readonly sessionTtlMs: number;
  private readonly clock: () => number;
  private sessions: Map<string, number> = new Map();

  constructor(options: AdminAuthOptions) {
    this.keyHash = sha256(options.adminKey);
    this.sessionTtlMs = options.sessionTtlMs ?? 60 * 60 * 1000;
    this.clock = options.clock ?? Date.now;
  }

  verifyKey(providedKey: string): boolean {
    if (!providedKey) return false;
    return timingSafeEqual(sha256(providedKey), this.keyHash);
  }

  createSession(): string {
    const token = randomBytes(32).toString('base64url');
    this.sessions.set(token, this.clock());
    return token;
  }

  /** Valid sessions are refreshed on every check */
  verifySession(token: string | undefined): boolean {
    if (!token) return false;
    const lastSeen = this.sessions.get(token);
    if (lastSeen === undefined) return false;

    const now = this.clock();
    if (now - lastSeen > this.sessionTtlMs) {
      this.sessions.delete(token);
      return false;
    }
    this.sessions.set(token, now);
    return true;
  }

  invalidateSession(token: string): void {
    this.sessions.delete(token);
  }

  /** Returns the number of sessions removed */
  cleanupExpiredSessions(): number {
    const now = this.clock();
    let removed = 0;
    for (const [token, lastSeen] of this.sessions) {
      if (now - lastSeen > this.sessionTtlMs) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }
}
