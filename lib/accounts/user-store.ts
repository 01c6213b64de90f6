/**
 * User storage
 *
 * Users are keyed by lower-cased email. The store is reached through the
 * UserStore interface so the HTTP layer and tests can swap implementations.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { PlanId } from '../types';
import { createLogger } from '../logger';

const log = createLogger('UserStore');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Monthly subscriptions run this long from the payment date */
export const MONTHLY_PERIOD_DAYS = 30;

// ============================================================================
// Types
// ============================================================================

export type UserPlan = 'trial' | PlanId;
export type SubscriptionStatus = 'trial' | 'active' | 'expired';

const PaymentRecordSchema = z.object({
  orderId: z.string(),
  plan: z.enum(['monthly', 'per_file', 'lifetime']),
  amount: z.string(),
  currency: z.string(),
  paidAt: z.string(),
});

const UserRecordSchema = z.object({
  email: z.string(),
  plan: z.enum(['trial', 'monthly', 'per_file', 'lifetime']),
  subscriptionStatus: z.enum(['trial', 'active', 'expired']),
  trialStart: z.string(),
  trialEnd: z.string(),
  /** End of a monthly subscription period */
  subscriptionEnd: z.string().optional(),
  /** Remaining pay-per-file credits */
  credits: z.number().int().min(0),
  payments: z.array(PaymentRecordSchema),
  createdAt: z.string(),
});

const UsersFileSchema = z.record(UserRecordSchema);

export type PaymentRecord = z.infer<typeof PaymentRecordSchema>;
export type UserRecord = z.infer<typeof UserRecordSchema>;

export interface CreateUserOptions {
  trialDays: number;
  now?: Date;
}

export interface UserStore {
  getUser(email: string): Promise<UserRecord | null>;
  createUser(email: string, options: CreateUserOptions): Promise<UserRecord>;
  markTrialExpired(email: string): Promise<UserRecord | null>;
  /** Store a verified payment and activate what it bought */
  recordPayment(email: string, payment: PaymentRecord): Promise<UserRecord | null>;
  /** Use one pay-per-file credit; false when none is left */
  consumeCredit(email: string): Promise<boolean>;
  /** Give back a credit taken for a run that failed */
  refundCredit(email: string): Promise<UserRecord | null>;
  listUsers(): Promise<UserRecord[]>;
}

// ============================================================================
// Record Transitions
// ============================================================================

export function newUserRecord(email: string, options: CreateUserOptions): UserRecord {
  const now = options.now ?? new Date();
  return {
    email,
    plan: 'trial',
    subscriptionStatus: 'trial',
    trialStart: now.toISOString(),
    trialEnd: new Date(now.getTime() + options.trialDays * DAY_MS).toISOString(),
    credits: 0,
    payments: [],
    createdAt: now.toISOString(),
  };
}

/** Apply a verified payment. Re-recording the same order is a no-op. */
export function applyPayment(user: UserRecord, payment: PaymentRecord): UserRecord {
  if (user.payments.some(p => p.orderId === payment.orderId)) return user;

  const updated: UserRecord = { ...user, payments: [...user.payments, payment] };
  const paidAt = new Date(payment.paidAt);

  switch (payment.plan) {
    case 'monthly': {
      // Extend from the current period end when paying early
      const currentEnd = user.subscriptionEnd ? new Date(user.subscriptionEnd) : null;
      const start = currentEnd && currentEnd > paidAt && user.plan === 'monthly' ? currentEnd : paidAt;
      updated.plan = 'monthly';
      updated.subscriptionStatus = 'active';
      updated.subscriptionEnd = new Date(start.getTime() + MONTHLY_PERIOD_DAYS * DAY_MS).toISOString();
      break;
    }
    case 'lifetime':
      updated.plan = 'lifetime';
      updated.subscriptionStatus = 'active';
      updated.subscriptionEnd = undefined;
      break;
    case 'per_file':
      updated.credits = user.credits + 1;
      if (user.plan === 'trial') updated.plan = 'per_file';
      break;
  }

  return updated;
}

function expireTrial(user: UserRecord): UserRecord {
  return user.subscriptionStatus === 'trial' ? { ...user, subscriptionStatus: 'expired' } : user;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// ============================================================================
// In-memory Store
// ============================================================================

export class MemoryUserStore implements UserStore {
  protected users = new Map<string, UserRecord>();

  constructor(initial: UserRecord[] = []) {
    for (const user of initial) this.users.set(normalizeEmail(user.email), user);
  }

  async getUser(email: string): Promise<UserRecord | null> {
    return this.users.get(normalizeEmail(email)) ?? null;
  }

  async createUser(email: string, options: CreateUserOptions): Promise<UserRecord> {
    const key = normalizeEmail(email);
    const user = newUserRecord(key, options);
    this.users.set(key, user);
    await this.persist();
    return user;
  }

  async markTrialExpired(email: string): Promise<UserRecord | null> {
    return this.update(email, expireTrial);
  }

  async recordPayment(email: string, payment: PaymentRecord): Promise<UserRecord | null> {
    return this.update(email, user => applyPayment(user, payment));
  }

  async consumeCredit(email: string): Promise<boolean> {
    // Check and decrement inside one update so concurrent calls see each other
    let consumed = false;
    await this.update(email, user => {
      if (user.credits <= 0) return user;
      consumed = true;
      return { ...user, credits: user.credits - 1 };
    });
    return consumed;
  }

  async refundCredit(email: string): Promise<UserRecord | null> {
    return this.update(email, user => ({ ...user, credits: user.credits + 1 }));
  }

  async listUsers(): Promise<UserRecord[]> {
    return [...this.users.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  protected async update(email: string, change: (user: UserRecord) => UserRecord): Promise<UserRecord | null> {
    const key = normalizeEmail(email);
    const user = this.users.get(key);
    if (!user) return null;
    const updated = change(user);
    if (updated !== user) {
      this.users.set(key, updated);
      await this.persist();
    }
    return updated;
  }

  /** Hook for stores that keep a copy elsewhere */
  protected async persist(): Promise<void> {}
}

// ============================================================================
// JSON File Store
// ============================================================================

/**
 * Users kept in one JSON file keyed by email.
 *
 * The file is loaded once on first use; every change rewrites it through a
 * temp file and rename. Writes are chained so they never interleave.
 */
export class JsonFileUserStore extends MemoryUserStore {
  private loaded: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  private load(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.readFile();
    }
    return this.loaded;
  }

  private async readFile(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        log.info(`No users file at ${this.filePath}, starting empty`);
        return;
      }
      throw err;
    }

    const parsed = UsersFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Users file ${this.filePath} is malformed: ${parsed.error.errors[0]?.message ?? 'unknown issue'}`);
    }
    for (const [email, user] of Object.entries(parsed.data)) {
      this.users.set(normalizeEmail(email), user);
    }
  }

  async getUser(email: string): Promise<UserRecord | null> {
    await this.load();
    return super.getUser(email);
  }

  async createUser(email: string, options: CreateUserOptions): Promise<UserRecord> {
    await this.load();
    return super.createUser(email, options);
  }

  async listUsers(): Promise<UserRecord[]> {
    await this.load();
    return super.listUsers();
  }

  protected async update(email: string, change: (user: UserRecord) => UserRecord): Promise<UserRecord | null> {
    await this.load();
    return super.update(email, change);
  }

  protected persist(): Promise<void> {
    const snapshot = JSON.stringify(Object.fromEntries(this.users), null, 2);
    const write = async () => {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      const tmp = `${this.filePath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, snapshot, 'utf-8');
      await fs.rename(tmp, this.filePath);
    };
    this.writeChain = this.writeChain.then(write, write);
    return this.writeChain;
  }
}
