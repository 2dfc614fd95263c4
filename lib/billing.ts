/**
 * Stripe webhook handling for listing promotion.
 *
 * Three notifications matter: checkout completed, a subscription invoice
 * paid, and a subscription deleted. Each one writes the same promotion
 * fields from Stripe's own values, so a replayed event converges on the
 * same row.
 */

import type Stripe from 'stripe'
import { isPromotionTier, priorityForTier } from '@/lib/promotion'
import type { SubscriptionPeriod } from '@/lib/stripe'
import type { ListingStore } from '@/lib/store'
import type { ListingPatch, PromotionTier } from '@/types'

export type BillingEvent =
  | {
      kind: 'checkout_completed'
      listingId: number
      tier: PromotionTier
      sessionId: string
      customerId: string | null
      subscriptionId: string
      amountPaid: number
    }
  | { kind: 'invoice_paid'; subscriptionId: string; amountPaid: number }
  | { kind: 'subscription_canceled'; subscriptionId: string }

export type WebhookVerification =
  | { ok: true; event: Stripe.Event }
  | { ok: false; message: string }

/** Reject anything without a valid signature before it is decoded. */
export function verifyWebhookPayload(
  stripe: Pick<Stripe, 'webhooks'>,
  body: string,
  signature: string | null,
  secret: string,
): WebhookVerification {
  if (!signature) return { ok: false, message: 'Missing signature' }
  try {
    return { ok: true, event: stripe.webhooks.constructEvent(body, signature, secret) }
  } catch (err) {
    console.error('[webhook] Signature verification failed:', err instanceof Error ? err.message : err)
    return { ok: false, message: 'Invalid signature' }
  }
}

const RENEWAL_REASONS: ReadonlySet<string> = new Set(['subscription_create', 'subscription_cycle'])

function idOf(ref: string | { id: string } | null | undefined): string | null {
  if (!ref) return null
  return typeof ref === 'string' ? ref : ref.id
}

/** Cents to currency units. */
function toAmount(cents: number | null | undefined): number {
  return Math.round(cents ?? 0) / 100
}

export function decodeBillingEvent(event: Stripe.Event): BillingEvent | null {
  switch (event.type) {
    case 'checkout.session.completed': {
      const session = event.data.object
      if (session.mode !== 'subscription') return null

      const listingId = Number(session.metadata?.listing_id)
      const tier = session.metadata?.tier
      const subscriptionId = idOf(session.subscription)

      if (!Number.isInteger(listingId) || listingId <= 0 || !isPromotionTier(tier) || !subscriptionId) {
        console.error('[webhook] Checkout session missing listing metadata', { sessionId: session.id })
        return null
      }

      return {
        kind: 'checkout_completed',
        listingId,
        tier,
        sessionId: session.id,
        customerId: idOf(session.customer),
        subscriptionId,
        amountPaid: toAmount(session.amount_total),
      }
    }

    case 'invoice.paid': {
      const invoice = event.data.object
      if (!invoice.billing_reason || !RENEWAL_REASONS.has(invoice.billing_reason)) return null

      const subscriptionId = idOf(invoice.parent?.subscription_details?.subscription)
      if (!subscriptionId) return null

      return { kind: 'invoice_paid', subscriptionId, amountPaid: toAmount(invoice.amount_paid) }
    }

    case 'customer.subscription.deleted':
      return { kind: 'subscription_canceled', subscriptionId: event.data.object.id }

    default:
      return null
  }
}

export interface BillingDeps {
  listings: Pick<ListingStore, 'getById' | 'getBySubscriptionId' | 'update'>
  getSubscriptionPeriod: (subscriptionId: string) => Promise<SubscriptionPeriod | null>
}

export type BillingOutcome = 'applied' | 'listing_not_found'

async function requirePeriod(deps: BillingDeps, subscriptionId: string): Promise<SubscriptionPeriod> {
  const period = await deps.getSubscriptionPeriod(subscriptionId)
  if (!period) throw new Error(`Subscription ${subscriptionId} has no current period`)
  return period
}

export async function applyBillingEvent(event: BillingEvent, deps: BillingDeps): Promise<BillingOutcome> {
  switch (event.kind) {
    case 'checkout_completed': {
      const listing = await deps.listings.getById(event.listingId)
      if (!listing) return 'listing_not_found'

      const period = await requirePeriod(deps, event.subscriptionId)
      const patch: ListingPatch = {
        stripe_session_id: event.sessionId,
        stripe_customer_id: event.customerId,
        stripe_subscription_id: event.subscriptionId,
        plan: event.tier,
        priority: priorityForTier(event.tier),
        is_active: true,
        featured_from: period.start,
        featured_until: period.end,
        last_paid_amount: event.amountPaid,
      }
      await deps.listings.update(listing.id, patch)
      return 'applied'
    }

    case 'invoice_paid': {
      const listing = await deps.listings.getBySubscriptionId(event.subscriptionId)
      if (!listing) return 'listing_not_found'

      const period = await requirePeriod(deps, event.subscriptionId)
      await deps.listings.update(listing.id, {
        is_active: true,
        priority: priorityForTier(listing.plan),
        featured_from: period.start,
        featured_until: period.end,
        last_paid_amount: event.amountPaid,
      })
      return 'applied'
    }

    case 'subscription_canceled': {
      const listing = await deps.listings.getBySubscriptionId(event.subscriptionId)
      if (!listing) return 'listing_not_found'

      await deps.listings.update(listing.id, { is_active: false, priority: 0 })
      return 'applied'
    }
  }
}
