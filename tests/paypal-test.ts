/**
 * PayPal checkout tests against an in-process fake of the Orders API.
 *
 * Run: node --import tsx --test tests/paypal-test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PaymentError } from '../lib/errors';
import { PayPalCheckout, decodeCustomId, encodeCustomId } from '../lib/payment/paypal';

interface RecordedCall {
  method: string;
  path: string;
  body: string;
  authorization: string;
}

type Reply = { status?: number; body: unknown };

const URLS = { returnUrl: 'http://localhost:8000/?payment=success', cancelUrl: 'http://localhost:8000/?payment=cancelled' };

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function headerValue(headers: RequestInit['headers'], name: string): string {
  if (!headers || Array.isArray(headers) || headers instanceof Headers) return '';
  return headers[name] ?? '';
}

/** Fake fetch answering by "METHOD /path" */
function fakePayPal(routes: Record<string, Reply>) {
  const calls: RecordedCall[] = [];

  const fetchFn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(requestUrl(input));
    const method = init?.method ?? 'GET';
    calls.push({
      method,
      path: url.pathname,
      body: typeof init?.body === 'string' ? init.body : '',
      authorization: headerValue(init?.headers, 'Authorization'),
    });

    const reply = routes[`${method} ${url.pathname}`];
    if (!reply) return new Response('not found', { status: 404 });
    return new Response(JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  return { calls, fetchFn };
}

const TOKEN_ROUTE = { 'POST /v1/oauth2/token': { body: { access_token: 'test-token', expires_in: 3600 } } };

function order(status: string, customId: string | undefined, value = '10.00') {
  return {
    id: 'ORDER-1',
    status,
    purchase_units: [{ custom_id: customId, amount: { value, currency_code: 'USD' } }],
  };
}

function checkoutWith(routes: Record<string, Reply>) {
  const fake = fakePayPal({ ...TOKEN_ROUTE, ...routes });
  const checkout = new PayPalCheckout({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    environment: 'sandbox',
    fetch: fake.fetchFn,
  });
  return { checkout, calls: fake.calls };
}

describe('custom id', () => {
  it('round-trips plan and email', () => {
    assert.equal(encodeCustomId('per_file', 'a@example.com'), 'per_file|a@example.com');
    assert.deepEqual(decodeCustomId('per_file|a@example.com'), { plan: 'per_file', email: 'a@example.com' });
  });

  it('rejects foreign values', () => {
    assert.equal(decodeCustomId(undefined), null);
    assert.equal(decodeCustomId('no-separator'), null);
    assert.equal(decodeCustomId('gold|a@example.com'), null);
    assert.equal(decodeCustomId('monthly|'), null);
  });
});

describe('PayPalCheckout', () => {
  it('creates an order and returns the approval link', async () => {
    const { checkout, calls } = checkoutWith({
      'POST /v2/checkout/orders': {
        status: 201,
        body: {
          id: 'ORDER-1',
          status: 'CREATED',
          links: [
            { href: 'https://api-m.sandbox.paypal.com/v2/checkout/orders/ORDER-1', rel: 'self' },
            { href: 'https://www.sandbox.paypal.com/checkoutnow?token=ORDER-1', rel: 'approve' },
          ],
        },
      },
    });

    const session = await checkout.createCheckoutSession('lifetime', { email: 'buyer@example.com' }, URLS);

    assert.deepEqual(session, {
      checkoutUrl: 'https://www.sandbox.paypal.com/checkoutnow?token=ORDER-1',
      sessionId: 'ORDER-1',
      status: 'CREATED',
    });

    assert.deepEqual(calls.map(c => `${c.method} ${c.path}`), ['POST /v1/oauth2/token', 'POST /v2/checkout/orders']);
    assert.equal(calls[0].authorization, `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`);
    assert.equal(calls[1].authorization, 'Bearer test-token');

    const sent: unknown = JSON.parse(calls[1].body);
    assert.deepEqual(sent, {
      intent: 'CAPTURE',
      purchase_units: [{
        reference_id: 'lifetime',
        custom_id: 'lifetime|buyer@example.com',
        description: 'Unlimited image processing forever for a one-time $49',
        amount: { currency_code: 'USD', value: '49.00' },
      }],
      application_context: {
        brand_name: 'Sheet Image Extractor',
        landing_page: 'NO_PREFERENCE',
        shipping_preference: 'NO_SHIPPING',
        user_action: 'PAY_NOW',
        return_url: URLS.returnUrl,
        cancel_url: URLS.cancelUrl,
      },
    });
  });

  it('reuses the access token', async () => {
    const { checkout, calls } = checkoutWith({
      'GET /v2/checkout/orders/ORDER-1': { body: order('CREATED', 'monthly|a@example.com') },
    });

    await checkout.verifyPayment('ORDER-1');
    await checkout.verifyPayment('ORDER-1');
    assert.equal(calls.filter(c => c.path === '/v1/oauth2/token').length, 1);
  });

  it('captures an approved order and verifies it', async () => {
    const { checkout, calls } = checkoutWith({
      'GET /v2/checkout/orders/ORDER-1': { body: order('APPROVED', 'monthly|buyer@example.com') },
      'POST /v2/checkout/orders/ORDER-1/capture': { status: 201, body: order('COMPLETED', 'monthly|buyer@example.com') },
    });

    const result = await checkout.verifyPayment('ORDER-1');

    assert.deepEqual(result, {
      verified: true,
      orderId: 'ORDER-1',
      status: 'COMPLETED',
      plan: 'monthly',
      email: 'buyer@example.com',
      amount: '10.00',
      currency: 'USD',
    });
    assert.equal(calls[calls.length - 1].body, '{}');
  });

  it('refuses orders whose amount differs from the plan price', async () => {
    const { checkout, calls } = checkoutWith({
      'GET /v2/checkout/orders/ORDER-1': { body: order('APPROVED', 'lifetime|buyer@example.com', '1.00') },
    });

    const result = await checkout.verifyPayment('ORDER-1');
    assert.equal(result.verified, false);
    assert.equal(result.error, 'Order amount does not match the plan price');
    assert.equal(calls.some(c => c.path.endsWith('/capture')), false);
  });

  it('refuses orders created elsewhere', async () => {
    const { checkout } = checkoutWith({
      'GET /v2/checkout/orders/ORDER-1': { body: order('COMPLETED', undefined) },
    });

    const result = await checkout.verifyPayment('ORDER-1');
    assert.equal(result.verified, false);
    assert.equal(result.error, 'Order was not created by this application');
  });

  it('reports orders that are not paid yet', async () => {
    const { checkout } = checkoutWith({
      'GET /v2/checkout/orders/ORDER-1': { body: order('PAYER_ACTION_REQUIRED', 'per_file|a@example.com', '5.00') },
    });

    const result = await checkout.verifyPayment('ORDER-1');
    assert.equal(result.verified, false);
    assert.equal(result.status, 'PAYER_ACTION_REQUIRED');
    assert.equal(result.error, 'Order status is PAYER_ACTION_REQUIRED');
  });

  it('fails with 503 when credentials are missing', async () => {
    const checkout = new PayPalCheckout({});
    assert.equal(checkout.configured, false);
    await assert.rejects(checkout.verifyPayment('ORDER-1'), (err: unknown) => {
      assert.ok(err instanceof PaymentError);
      assert.equal(err.statusCode, 503);
      assert.equal(err.message, 'PayPal credentials not configured');
      return true;
    });
  });

  it('turns HTTP failures into PaymentError', async () => {
    const { checkout } = checkoutWith({
      'POST /v2/checkout/orders': { status: 500, body: { name: 'INTERNAL_SERVER_ERROR' } },
    });

    await assert.rejects(
      checkout.createCheckoutSession('monthly', { email: 'a@example.com' }, URLS),
      { name: 'PaymentError', message: 'PayPal order creation failed: HTTP 500' }
    );
  });

  it('turns network failures into PaymentError', async () => {
    const checkout = new PayPalCheckout({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      fetch: async () => {
        throw new Error('connection refused');
      },
    });

    await assert.rejects(
      checkout.verifyPayment('ORDER-1'),
      { name: 'PaymentError', message: 'PayPal request failed: connection refused', statusCode: 502 }
    );
  });
});
