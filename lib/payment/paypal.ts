/**
 * PayPal checkout integration
 *
 * Orders API v2 with client-credentials OAuth. One order per purchase; the
 * plan and buyer email travel in the order's custom_id so verification does
 * not trust anything the browser sends back.
 */

import { z } from 'zod';
import { PaymentError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { PlanId } from '../types';
import { PLANS, formatPrice } from './plans';

const log = createLogger('PayPal');

export const PAYPAL_BASE_URLS = {
  sandbox: 'https://api-m.sandbox.paypal.com',
  live: 'https://api-m.paypal.com',
} as const;

// ============================================================================
// Types
// ============================================================================

export interface CheckoutSession {
  /** URL to send the buyer to */
  checkoutUrl: string;
  /** Provider order id */
  sessionId: string;
  status: string;
}

export interface CheckoutUrls {
  returnUrl: string;
  cancelUrl: string;
}

export interface PaymentVerification {
  verified: boolean;
  orderId: string;
  status: string;
  plan?: PlanId;
  email?: string;
  amount?: string;
  currency?: string;
  error?: string;
}

/** What the HTTP layer needs from a checkout provider */
export interface CheckoutProvider {
  createCheckoutSession(plan: PlanId, user: { email: string }, urls: CheckoutUrls): Promise<CheckoutSession>;
  verifyPayment(sessionId: string): Promise<PaymentVerification>;
}

export interface PayPalOptions {
  clientId?: string;
  clientSecret?: string;
  environment?: keyof typeof PAYPAL_BASE_URLS;
  brandName?: string;
  /** Injected for tests */
  fetch?: typeof fetch;
}

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const LinkSchema = z.object({ href: z.string(), rel: z.string() });

const OrderSchema = z.object({
  id: z.string(),
  status: z.string(),
  links: z.array(LinkSchema).optional().default([]),
  purchase_units: z
    .array(
      z.object({
        custom_id: z.string().optional(),
        amount: z.object({ value: z.string(), currency_code: z.string() }).optional(),
      })
    )
    .optional()
    .default([]),
});

type Order = z.infer<typeof OrderSchema>;

function isPlanId(value: string): value is PlanId {
  return value in PLANS;
}

/** custom_id is "<plan>|<email>" */
export function encodeCustomId(plan: PlanId, email: string): string {
  return `${plan}|${email}`;
}

export function decodeCustomId(customId: string | undefined): { plan: PlanId; email: string } | null {
  if (!customId) return null;
  const sep = customId.indexOf('|');
  if (sep === -1) return null;
  const plan = customId.slice(0, sep);
  const email = customId.slice(sep + 1);
  return isPlanId(plan) && email ? { plan, email } : null;
}

// ============================================================================
// Client
// ============================================================================

export class PayPalCheckout implements CheckoutProvider {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly options: PayPalOptions = {}) {
    this.baseUrl = PAYPAL_BASE_URLS[options.environment ?? 'sandbox'];
    this.fetchFn = options.fetch ?? fetch;
  }

  get configured(): boolean {
    return Boolean(this.options.clientId && this.options.clientSecret);
  }

  private async request(path: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new PaymentError(`PayPal request failed: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  private async getAccessToken(): Promise<string> {
    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new PaymentError('PayPal credentials not configured', { statusCode: 503 });
    }
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const auth = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const response = await this.request('/v1/oauth2/token', {
      method: 'POST',
      headers: {
        'Accept': 'application/json',
        'Authorization': `Basic ${auth}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: 'grant_type=client_credentials',
    });

    if (!response.ok) {
      throw new PaymentError(`PayPal auth failed: HTTP ${response.status}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PaymentError('PayPal auth returned an unexpected response');
    }

    // Refresh a minute early
    const ttlMs = Math.max(0, ((parsed.data.expires_in ?? 300) - 60) * 1000);
    this.token = { value: parsed.data.access_token, expiresAt: Date.now() + ttlMs };
    return this.token.value;
  }

  private async orderRequest(path: string, init: RequestInit, expected: string): Promise<Order> {
    const token = await this.getAccessToken();
    const response = await this.request(path, {
      ...init,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${token}`,
      },
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      log.warn(`${expected} failed: HTTP ${response.status}`, detail.slice(0, 500));
      throw new PaymentError(`PayPal ${expected} failed: HTTP ${response.status}`);
    }

    const parsed = OrderSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PaymentError(`PayPal ${expected} returned an unexpected response`);
    }
    return parsed.data;
  }

  /**
   * Create an order and return the approval URL.
   *
   * @example
   * ```typescript
   * const session = await paypal.createCheckoutSession('monthly', { email }, {
   *   returnUrl: 'https://example.com/?payment=success',
   *   cancelUrl: 'https://example.com/?payment=cancelled',
   * });
   * res.json({ checkoutUrl: session.checkoutUrl });
   * ```
   */
  async createCheckoutSession(plan: PlanId, user: { email: string }, urls: CheckoutUrls): Promise<CheckoutSession> {
    const info = PLANS[plan];
    const order = await this.orderRequest('/v2/checkout/orders', {
      method: 'POST',
      body: JSON.stringify({
        intent: 'CAPTURE',
        purchase_units: [{
          reference_id: plan,
          custom_id: encodeCustomId(plan, user.email),
          description: info.description,
          amount: { currency_code: 'USD', value: formatPrice(plan) },
        }],
        application_context: {
          brand_name: this.options.brandName ?? 'Sheet Image Extractor',
          landing_page: 'NO_PREFERENCE',
          shipping_preference: 'NO_SHIPPING',
          user_action: 'PAY_NOW',
          return_url: urls.returnUrl,
          cancel_url: urls.cancelUrl,
        },
      }),
    }, 'order creation');

    const approve = order.links.find(l => l.rel === 'approve' || l.rel === 'payer-action');
    if (!approve) {
      throw new PaymentError('PayPal order created but no approval URL found');
    }

    log.info(`Created order ${order.id} (${plan})`);
    return { checkoutUrl: approve.href, sessionId: order.id, status: order.status };
  }

  /**
   * Check an order, capturing it when the buyer has approved it.
   * Verified only when the captured amount matches the plan's price.
   */
  async verifyPayment(sessionId: string): Promise<PaymentVerification> {
    let order = await this.orderRequest(`/v2/checkout/orders/${encodeURIComponent(sessionId)}`, { method: 'GET' }, 'order lookup');

    const unit = order.purchase_units[0];
    const target = decodeCustomId(unit?.custom_id);
    const result: PaymentVerification = {
      verified: false,
      orderId: order.id,
      status: order.status,
      plan: target?.plan,
      email: target?.email,
      amount: unit?.amount?.value,
      currency: unit?.amount?.currency_code,
    };

    if (!target) {
      return { ...result, error: 'Order was not created by this application' };
    }
    if (result.amount !== formatPrice(target.plan) || result.currency !== 'USD') {
      return { ...result, error: 'Order amount does not match the plan price' };
    }

    if (order.status === 'APPROVED') {
      order = await this.orderRequest(
        `/v2/checkout/orders/${encodeURIComponent(sessionId)}/capture`,
        { method: 'POST', body: '{}' },
        'capture'
      );
      result.status = order.status;
    }

    result.verified = order.status === 'COMPLETED';
    if (!result.verified) {
      result.error = `Order status is ${order.status}`;
    }
    return result;
  }
}
