/**
 * Accounts tests: trial lifecycle, payments and the JSON user store.
 *
 * Run: node --import tsx --test tests/accounts-test.ts
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { checkUserAccess, getOrCreateUser } from '../lib/accounts/access';
import { JsonFileUserStore, MemoryUserStore, applyPayment, newUserRecord } from '../lib/accounts/user-store';
import type { PaymentRecord } from '../lib/accounts/user-store';
import { AccessDeniedError } from '../lib/errors';

const SIGNUP = new Date('2025-01-01T00:00:00Z');
const EMAIL = 'buyer@example.com';

function payment(orderId: string, plan: PaymentRecord['plan'], paidAt: string): PaymentRecord {
  const amount = { monthly: '10.00', per_file: '5.00', lifetime: '49.00' }[plan];
  return { orderId, plan, amount, currency: 'USD', paidAt };
}

async function storeWithUser(): Promise<MemoryUserStore> {
  const store = new MemoryUserStore();
  await store.createUser(EMAIL, { trialDays: 30, now: SIGNUP });
  return store;
}

describe('newUserRecord', () => {
  it('starts a trial of the given length', () => {
    assert.deepEqual(newUserRecord(EMAIL, { trialDays: 30, now: SIGNUP }), {
      email: EMAIL,
      plan: 'trial',
      subscriptionStatus: 'trial',
      trialStart: '2025-01-01T00:00:00.000Z',
      trialEnd: '2025-01-31T00:00:00.000Z',
      credits: 0,
      payments: [],
      createdAt: '2025-01-01T00:00:00.000Z',
    });
  });
});

describe('applyPayment', () => {
  const user = newUserRecord(EMAIL, { trialDays: 30, now: SIGNUP });

  it('activates a monthly plan for 30 days', () => {
    const updated = applyPayment(user, payment('ORDER-1', 'monthly', '2025-02-01T00:00:00.000Z'));
    assert.equal(updated.plan, 'monthly');
    assert.equal(updated.subscriptionStatus, 'active');
    assert.equal(updated.subscriptionEnd, '2025-03-03T00:00:00.000Z');
  });

  it('extends an early monthly renewal from the current end', () => {
    const first = applyPayment(user, payment('ORDER-1', 'monthly', '2025-02-01T00:00:00.000Z'));
    const renewed = applyPayment(first, payment('ORDER-2', 'monthly', '2025-02-20T00:00:00.000Z'));
    assert.equal(renewed.subscriptionEnd, '2025-04-02T00:00:00.000Z');
    assert.equal(renewed.payments.length, 2);
  });

  it('ignores an order it has already recorded', () => {
    const first = applyPayment(user, payment('ORDER-1', 'per_file', '2025-01-05T00:00:00.000Z'));
    const again = applyPayment(first, payment('ORDER-1', 'per_file', '2025-01-05T00:00:00.000Z'));
    assert.equal(again, first);
    assert.equal(again.credits, 1);
  });

  it('adds a credit for a per-file payment', () => {
    const updated = applyPayment(user, payment('ORDER-1', 'per_file', '2025-01-05T00:00:00.000Z'));
    assert.equal(updated.plan, 'per_file');
    assert.equal(updated.subscriptionStatus, 'trial');
    assert.equal(updated.credits, 1);
  });

  it('grants lifetime access without an end date', () => {
    const updated = applyPayment(user, payment('ORDER-1', 'lifetime', '2025-01-05T00:00:00.000Z'));
    assert.equal(updated.plan, 'lifetime');
    assert.equal(updated.subscriptionStatus, 'active');
    assert.equal(updated.subscriptionEnd, undefined);
  });
});

describe('getOrCreateUser', () => {
  it('creates once, then returns the stored user', async () => {
    const store = new MemoryUserStore();
    const first = await getOrCreateUser(store, 'New@Example.com', { trialDays: 7, now: SIGNUP });
    const second = await getOrCreateUser(store, 'new@example.com', { trialDays: 7, now: SIGNUP });

    assert.equal(first.created, true);
    assert.equal(first.user.email, 'new@example.com');
    assert.equal(second.created, false);
    assert.equal(second.user.trialEnd, '2025-01-08T00:00:00.000Z');
  });
});

describe('checkUserAccess', () => {
  it('rejects unknown users as not registered', async () => {
    await assert.rejects(checkUserAccess(new MemoryUserStore(), EMAIL, SIGNUP), (err: unknown) => {
      assert.ok(err instanceof AccessDeniedError);
      assert.equal(err.reason, 'not_registered');
      assert.equal(err.statusCode, 401);
      return true;
    });
  });

  it('grants a running trial with whole days left', async () => {
    const store = await storeWithUser();
    const grant = await checkUserAccess(store, EMAIL, new Date('2025-01-01T12:00:00Z'));

    assert.equal(grant.plan, 'trial');
    assert.equal(grant.message, 'Free trial (29 days left)');
    assert.equal(grant.daysLeft, 29);
    assert.equal(grant.consumesCredit, false);
  });

  it('expires the trial once it has ended', async () => {
    const store = await storeWithUser();

    await assert.rejects(checkUserAccess(store, EMAIL, new Date('2025-02-01T00:00:00Z')), (err: unknown) => {
      assert.ok(err instanceof AccessDeniedError);
      assert.equal(err.reason, 'trial_expired');
      assert.equal(err.statusCode, 402);
      assert.equal(err.message, 'Free trial expired. Please choose a plan to continue.');
      return true;
    });

    const user = await store.getUser(EMAIL);
    assert.equal(user?.subscriptionStatus, 'expired');
  });

  it('grants an active monthly subscription', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'monthly', '2025-02-01T00:00:00.000Z'));

    const grant = await checkUserAccess(store, EMAIL, new Date('2025-02-11T00:00:00Z'));
    assert.equal(grant.plan, 'monthly');
    assert.equal(grant.message, 'Active subscription (20 days left)');
  });

  it('asks for renewal after the monthly period', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'monthly', '2025-02-01T00:00:00.000Z'));

    await assert.rejects(
      checkUserAccess(store, EMAIL, new Date('2025-03-04T00:00:00Z')),
      { reason: 'trial_expired', message: 'Subscription expired. Please renew your plan to continue.' }
    );
  });

  it('uses pay-per-file credits one run at a time', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'per_file', '2025-02-01T00:00:00.000Z'));

    const grant = await checkUserAccess(store, EMAIL, new Date('2025-02-02T00:00:00Z'));
    assert.equal(grant.plan, 'per_file');
    assert.equal(grant.message, 'Pay per file (1 credit left)');
    assert.equal(grant.consumesCredit, true);

    assert.equal(await store.consumeCredit(EMAIL), true);
    assert.equal(await store.consumeCredit(EMAIL), false);
    await assert.rejects(checkUserAccess(store, EMAIL, new Date('2025-02-02T00:00:00Z')), AccessDeniedError);
  });

  it('spends a single credit once under concurrent calls', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'per_file', '2025-02-01T00:00:00.000Z'));

    const results = await Promise.all([store.consumeCredit(EMAIL), store.consumeCredit(EMAIL)]);
    assert.deepEqual(results.sort(), [false, true]);
    assert.equal((await store.getUser(EMAIL))?.credits, 0);
  });

  it('refunds a credit', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'per_file', '2025-02-01T00:00:00.000Z'));
    await store.consumeCredit(EMAIL);

    const refunded = await store.refundCredit(EMAIL);
    assert.equal(refunded?.credits, 1);
    assert.equal(await store.refundCredit('nobody@example.com'), null);
  });

  it('grants lifetime access regardless of dates', async () => {
    const store = await storeWithUser();
    await store.recordPayment(EMAIL, payment('ORDER-1', 'lifetime', '2025-01-10T00:00:00.000Z'));

    const grant = await checkUserAccess(store, EMAIL, new Date('2030-01-01T00:00:00Z'));
    assert.equal(grant.plan, 'lifetime');
    assert.equal(grant.message, 'Lifetime access');
  });
});

describe('JsonFileUserStore', () => {
  let dir = '';

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'user-store-'));
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = new JsonFileUserStore(path.join(dir, 'missing.json'));
    assert.deepEqual(await store.listUsers(), []);
  });

  it('persists users and payments across instances', async () => {
    const file = path.join(dir, 'nested', 'users.json');
    const store = new JsonFileUserStore(file);
    await store.createUser(EMAIL, { trialDays: 30, now: SIGNUP });
    await store.recordPayment(EMAIL, payment('ORDER-9', 'per_file', '2025-01-02T00:00:00.000Z'));

    const reopened = new JsonFileUserStore(file);
    const user = await reopened.getUser('BUYER@example.com');
    assert.equal(user?.credits, 1);
    assert.deepEqual(user?.payments.map(p => p.orderId), ['ORDER-9']);
  });

  it('rejects a malformed users file', async () => {
    const file = path.join(dir, 'bad.json');
    await fs.writeFile(file, JSON.stringify({ [EMAIL]: { email: EMAIL } }), 'utf-8');

    await assert.rejects(new JsonFileUserStore(file).listUsers(), (err: unknown) => {
      assert.ok(err instanceof Error);
      assert.ok(err.message.startsWith(`Users file ${file} is malformed`));
      return true;
    });
  });
});
