import Stripe from 'stripe'
import { getConfig } from '@/lib/config'
import { isPromotionTier, TIER_CONFIG } from '@/lib/promotion'
import type { Listing, PromotionTier } from '@/types'

let _stripe: Stripe | null = null

/** Lazily initialized so config is read at runtime, not at build time. */
export function getStripe(): Stripe {
  if (!_stripe) {
    _stripe = new Stripe(getConfig().stripe.secretKey)
  }
  return _stripe
}

export type TierPrices = Partial<Record<PromotionTier, string>>

/** Stripe price ID for a tier, or null when that tier has no configured price. */
export function getTierPriceId(tier: PromotionTier, prices: TierPrices): string | null {
  return prices[tier] || null
}

export interface SubscriptionPeriod {
  start: string
  end: string
}

/** Current billing period of a subscription, from its first item. */
export function subscriptionPeriod(sub: {
  items: { data: Array<Pick<Stripe.SubscriptionItem, 'current_period_start' | 'current_period_end'>> }
}): SubscriptionPeriod | null {
  const item = sub.items.data[0]
  if (!item?.current_period_start || !item.current_period_end) return null
  return {
    start: new Date(item.current_period_start * 1000).toISOString(),
    end: new Date(item.current_period_end * 1000).toISOString(),
  }
}

export async function getSubscriptionPeriod(subscriptionId: string): Promise<SubscriptionPeriod | null> {
  const sub = await getStripe().subscriptions.retrieve(subscriptionId)
  return subscriptionPeriod(sub)
}

/* ── Checkout ───────────────────────────────────────────────────── */

export type CheckoutError = 'unauthorized' | 'invalid_tier' | 'missing_price' | 'provider_error'

export type CheckoutResult =
  | { ok: true; sessionId: string; url: string | null }
  | { ok: false; error: CheckoutError; message: string }

export type CreateCheckoutSession = (
  params: Stripe.Checkout.SessionCreateParams,
) => Promise<Pick<Stripe.Checkout.Session, 'id' | 'url'>>

export interface PromotionCheckoutInput {
  listing: Pick<Listing, 'id' | 'name' | 'owner_id'>
  userId: string
  email: string | null
  tier: string
}

export interface PromotionCheckoutDeps {
  prices: TierPrices
  siteUrl: string
  createSession: CreateCheckoutSession
}

/** Subscription checkout for promoting a listing. Only the listing's owner may start one. */
export async function createPromotionCheckout(
  { listing, userId, email, tier }: PromotionCheckoutInput,
  deps: PromotionCheckoutDeps,
): Promise<CheckoutResult> {
  if (!listing.owner_id || listing.owner_id !== userId) {
    return { ok: false, error: 'unauthorized', message: 'Only the listing owner can promote this listing.' }
  }

  if (!isPromotionTier(tier)) {
    return { ok: false, error: 'invalid_tier', message: `Unknown promotion tier "${tier}".` }
  }

  const price = getTierPriceId(tier, deps.prices)
  if (!price) {
    console.error('[stripe] Missing price for tier', { tier })
    return { ok: false, error: 'missing_price', message: `No price is configured for the ${TIER_CONFIG[tier].label} tier.` }
  }

  const metadata = { listing_id: String(listing.id), tier }

  try {
    const session = await deps.createSession({
      mode: 'subscription',
      ...(email ? { customer_email: email } : {}),
      line_items: [{ price, quantity: 1 }],
      metadata,
      subscription_data: { metadata },
      success_url: `${deps.siteUrl}/listings/${listing.id}?checkout=success&session_id={CHECKOUT_SESSION_ID}`,
      cancel_url: `${deps.siteUrl}/listings/${listing.id}?checkout=cancelled`,
      allow_promotion_codes: true,
    })
    return { ok: true, sessionId: session.id, url: session.url }
  } catch (err) {
    console.error('[stripe] Checkout session create failed:', err)
    return {
      ok: false,
      error: 'provider_error',
      message: err instanceof Error ? err.message : 'Payment provider error',
    }
  }
}
