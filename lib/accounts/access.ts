/**
 * Trial and plan access checks
 */

import { AccessDeniedError } from '../errors';
import type { CreateUserOptions, UserRecord, UserStore } from './user-store';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AccessGrant {
  user: UserRecord;
  /** Plan label reported with processing results */
  plan: 'trial' | 'monthly' | 'lifetime' | 'per_file';
  message: string;
  /** Whole days left in the trial or subscription period */
  daysLeft?: number;
  /** True when this run uses up a pay-per-file credit */
  consumesCredit: boolean;
}

export async function getOrCreateUser(
  store: UserStore,
  email: string,
  options: CreateUserOptions
): Promise<{ user: UserRecord; created: boolean }> {
  const existing = await store.getUser(email);
  if (existing) return { user: existing, created: false };
  return { user: await store.createUser(email, options), created: true };
}

function daysUntil(end: Date, now: Date): number {
  return Math.max(0, Math.floor((end.getTime() - now.getTime()) / DAY_MS));
}

/**
 * Decide whether a user may process files right now.
 *
 * Order: active subscription, pay-per-file credit, running trial. A user
 * with none of these has the trial marked expired and is denied.
 *
 * @throws AccessDeniedError ('not_registered' or 'trial_expired')
 */
export async function checkUserAccess(store: UserStore, email: string, now: Date = new Date()): Promise<AccessGrant> {
  const user = await store.getUser(email);
  if (!user) {
    throw new AccessDeniedError('No account found for this email. Please sign up first.', 'not_registered');
  }

  if (user.subscriptionStatus === 'active') {
    if (user.plan === 'lifetime') {
      return { user, plan: 'lifetime', message: 'Lifetime access', consumesCredit: false };
    }
    if (user.plan === 'monthly' && user.subscriptionEnd && new Date(user.subscriptionEnd) > now) {
      const daysLeft = daysUntil(new Date(user.subscriptionEnd), now);
      return {
        user,
        plan: 'monthly',
        message: `Active subscription (${daysLeft} days left)`,
        daysLeft,
        consumesCredit: false,
      };
    }
  }

  if (user.credits > 0) {
    return {
      user,
      plan: 'per_file',
      message: `Pay per file (${user.credits} credit${user.credits === 1 ? '' : 's'} left)`,
      consumesCredit: true,
    };
  }

  const trialEnd = new Date(user.trialEnd);
  if (user.subscriptionStatus === 'trial' && now < trialEnd) {
    const daysLeft = daysUntil(trialEnd, now);
    return {
      user,
      plan: 'trial',
      message: `Free trial (${daysLeft} days left)`,
      daysLeft,
      consumesCredit: false,
    };
  }

  if (user.subscriptionStatus === 'trial') {
    await store.markTrialExpired(user.email);
  }
  const message = user.plan === 'monthly'
    ? 'Subscription expired. Please renew your plan to continue.'
    : 'Free trial expired. Please choose a plan to continue.';
  throw new AccessDeniedError(message, 'trial_expired');
}
