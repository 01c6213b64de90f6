import type { PlanId } from '../types';

export interface PlanInfo {
  id: PlanId;
  name: string;
  /** Price in USD */
  price: number;
  description: string;
  recurring: boolean;
}

export const PLANS: Record<PlanId, PlanInfo> = {
  monthly: {
    id: 'monthly',
    name: 'Monthly Unlimited',
    price: 10,
    description: 'Unlimited image processing for $10/month',
    recurring: true,
  },
  per_file: {
    id: 'per_file',
    name: 'Pay Per File',
    price: 5,
    description: 'Process one upload for $5 (no subscription)',
    recurring: false,
  },
  lifetime: {
    id: 'lifetime',
    name: 'Lifetime Access',
    price: 49,
    description: 'Unlimited image processing forever for a one-time $49',
    recurring: false,
  },
};

export function getPlans(): PlanInfo[] {
  return Object.values(PLANS);
}

/** Price as the decimal string checkout APIs expect ("10.00") */
export function formatPrice(plan: PlanId): string {
  return PLANS[plan].price.toFixed(2);
}
