import { describe, it, expect, vi } from 'vitest'
import Stripe from 'stripe'
import { applyBillingEvent, decodeBillingEvent, verifyWebhookPayload, type BillingEvent } from '@/lib/billing'
import type { SubscriptionPeriod } from '@/lib/stripe'
import { createMemoryListingStore, makeListing } from '../helpers/memory-store'

const stripe = new Stripe('sk_test_placeholder')
const SECRET = 'test-secret'

function signed(event: Record<string, unknown>) {
  const body = JSON.stringify({ object: 'event', livemode: false, created: 1772323200, ...event })
  const signature = stripe.webhooks.generateTestHeaderString({ payload: body, secret: SECRET })
  return { body, signature }
}

/** Round-trip a payload through signature verification to get a typed event. */
function eventFrom(payload: Record<string, unknown>): Stripe.Event {
  const { body, signature } = signed(payload)
  const verified = verifyWebhookPayload(stripe, body, signature, SECRET)
  if (!verified.ok) throw new Error(verified.message)
  return verified.event
}

const checkoutPayload = (session: Record<string, unknown>) => ({
  id: 'evt_checkout',
  type: 'checkout.session.completed',
  data: {
    object: {
      id: 'cs_test_1',
      object: 'checkout.session',
      mode: 'subscription',
      metadata: { listing_id: '7', tier: 'premium' },
      subscription: 'sub_1',
      customer: 'cus_1',
      amount_total: 4900,
      ...session,
    },
  },
})

const invoicePayload = (invoice: Record<string, unknown>) => ({
  id: 'evt_invoice',
  type: 'invoice.paid',
  data: {
    object: {
      id: 'in_1',
      object: 'invoice',
      billing_reason: 'subscription_cycle',
      amount_paid: 9900,
      parent: { type: 'subscription_details', subscription_details: { subscription: 'sub_1' } },
      ...invoice,
    },
  },
})

describe('verifyWebhookPayload', () => {
  it('requires a signature header', () => {
    const { body } = signed(checkoutPayload({}))
    expect(verifyWebhookPayload(stripe, body, null, SECRET)).toEqual({ ok: false, message: 'Missing signature' })
  })

  it('rejects a payload signed with another secret', () => {
    const body = JSON.stringify(checkoutPayload({}))
    const signature = stripe.webhooks.generateTestHeaderString({ payload: body, secret: 'other-secret' })
    expect(verifyWebhookPayload(stripe, body, signature, SECRET)).toEqual({ ok: false, message: 'Invalid signature' })
  })

  it('rejects a body altered after signing', () => {
    const { body, signature } = signed(checkoutPayload({}))
    const tampered = body.replace('"7"', '"8"')
    expect(verifyWebhookPayload(stripe, tampered, signature, SECRET)).toEqual({
      ok: false,
      message: 'Invalid signature',
    })
  })

  it('returns the parsed event', () => {
    const { body, signature } = signed(checkoutPayload({}))
    const verified = verifyWebhookPayload(stripe, body, signature, SECRET)
    expect(verified.ok && verified.event.type).toBe('checkout.session.completed')
  })
})

describe('decodeBillingEvent', () => {
  it('decodes a completed subscription checkout', () => {
    expect(decodeBillingEvent(eventFrom(checkoutPayload({})))).toEqual({
      kind: 'checkout_completed',
      listingId: 7,
      tier: 'premium',
      sessionId: 'cs_test_1',
      customerId: 'cus_1',
      subscriptionId: 'sub_1',
      amountPaid: 49,
    })
  })

  it('accepts expanded customer and subscription objects', () => {
    const event = eventFrom(checkoutPayload({ customer: { id: 'cus_2' }, subscription: { id: 'sub_2' } }))
    expect(decodeBillingEvent(event)).toMatchObject({ customerId: 'cus_2', subscriptionId: 'sub_2' })
  })

  it('ignores one-off payments and sessions without usable metadata', () => {
    expect(decodeBillingEvent(eventFrom(checkoutPayload({ mode: 'payment' })))).toBeNull()
    expect(decodeBillingEvent(eventFrom(checkoutPayload({ metadata: { listing_id: '7', tier: 'gold' } })))).toBeNull()
    expect(decodeBillingEvent(eventFrom(checkoutPayload({ metadata: { tier: 'premium' } })))).toBeNull()
    expect(decodeBillingEvent(eventFrom(checkoutPayload({ subscription: null })))).toBeNull()
  })

  it('decodes subscription invoices', () => {
    expect(decodeBillingEvent(eventFrom(invoicePayload({})))).toEqual({
      kind: 'invoice_paid',
      subscriptionId: 'sub_1',
      amountPaid: 99,
    })
    expect(decodeBillingEvent(eventFrom(invoicePayload({ billing_reason: 'subscription_create' })))).toMatchObject({
      kind: 'invoice_paid',
    })
  })

  it('ignores invoices that are not subscription renewals', () => {
    expect(decodeBillingEvent(eventFrom(invoicePayload({ billing_reason: 'manual' })))).toBeNull()
    expect(decodeBillingEvent(eventFrom(invoicePayload({ parent: null })))).toBeNull()
  })

  it('decodes a deleted subscription', () => {
    const event = eventFrom({
      id: 'evt_deleted',
      type: 'customer.subscription.deleted',
      data: { object: { id: 'sub_1', object: 'subscription' } },
    })
    expect(decodeBillingEvent(event)).toEqual({ kind: 'subscription_canceled', subscriptionId: 'sub_1' })
  })

  it('ignores other event types', () => {
    const event = eventFrom({ id: 'evt_other', type: 'customer.created', data: { object: { id: 'cus_1' } } })
    expect(decodeBillingEvent(event)).toBeNull()
  })
})

describe('applyBillingEvent', () => {
  const march: SubscriptionPeriod = { start: '2026-03-01T00:00:00.000Z', end: '2026-04-01T00:00:00.000Z' }

  function setup(period: SubscriptionPeriod | null = march) {
    const listing = makeListing({ owner_id: 'user-1' })
    const listings = createMemoryListingStore([listing])
    const getSubscriptionPeriod = vi.fn(async (_id: string) => period)
    return { listing, listings, getSubscriptionPeriod }
  }

  it('activates the listing on checkout, the same way on replay', async () => {
    const { listing, listings, getSubscriptionPeriod } = setup()
    const event: BillingEvent = {
      kind: 'checkout_completed',
      listingId: listing.id,
      tier: 'top',
      sessionId: 'cs_test_1',
      customerId: 'cus_1',
      subscriptionId: 'sub_1',
      amountPaid: 49,
    }

    await expect(applyBillingEvent(event, { listings, getSubscriptionPeriod })).resolves.toBe('applied')
    const first = listings.rows.get(listing.id)
    await applyBillingEvent(event, { listings, getSubscriptionPeriod })

    expect(first).toMatchObject({
      stripe_session_id: 'cs_test_1',
      stripe_customer_id: 'cus_1',
      stripe_subscription_id: 'sub_1',
      plan: 'top',
      priority: 300,
      is_active: true,
      featured_from: march.start,
      featured_until: march.end,
      last_paid_amount: 49,
    })
    expect(listings.rows.get(listing.id)).toEqual(first)
    expect(getSubscriptionPeriod).toHaveBeenCalledWith('sub_1')
  })

  it('extends the window on renewal using the stored plan', async () => {
    const { listing, listings } = setup()
    await listings.update(listing.id, {
      plan: 'premium',
      stripe_subscription_id: 'sub_1',
      is_active: false,
      priority: 0,
    })
    const april: SubscriptionPeriod = { start: '2026-04-01T00:00:00.000Z', end: '2026-05-01T00:00:00.000Z' }

    const outcome = await applyBillingEvent(
      { kind: 'invoice_paid', subscriptionId: 'sub_1', amountPaid: 99 },
      { listings, getSubscriptionPeriod: async () => april },
    )

    expect(outcome).toBe('applied')
    expect(listings.rows.get(listing.id)).toMatchObject({
      is_active: true,
      priority: 200,
      featured_from: april.start,
      featured_until: april.end,
      last_paid_amount: 99,
    })
  })

  it('deactivates on cancellation', async () => {
    const { listing, listings, getSubscriptionPeriod } = setup()
    await listings.update(listing.id, { stripe_subscription_id: 'sub_1', is_active: true, priority: 100 })

    await applyBillingEvent({ kind: 'subscription_canceled', subscriptionId: 'sub_1' }, { listings, getSubscriptionPeriod })

    expect(listings.rows.get(listing.id)).toMatchObject({ is_active: false, priority: 0 })
    expect(getSubscriptionPeriod).not.toHaveBeenCalled()
  })

  it('reports unknown listings and subscriptions', async () => {
    const { listings, getSubscriptionPeriod } = setup()
    const deps = { listings, getSubscriptionPeriod }

    await expect(
      applyBillingEvent(
        {
          kind: 'checkout_completed',
          listingId: 9999,
          tier: 'featured',
          sessionId: 'cs_x',
          customerId: null,
          subscriptionId: 'sub_x',
          amountPaid: 0,
        },
        deps,
      ),
    ).resolves.toBe('listing_not_found')
    await expect(
      applyBillingEvent({ kind: 'invoice_paid', subscriptionId: 'sub_missing', amountPaid: 1 }, deps),
    ).resolves.toBe('listing_not_found')
  })

  it('fails when Stripe has no period for the subscription', async () => {
    const { listing, listings, getSubscriptionPeriod } = setup(null)

    await expect(
      applyBillingEvent(
        {
          kind: 'checkout_completed',
          listingId: listing.id,
          tier: 'featured',
          sessionId: 'cs_test_1',
          customerId: null,
          subscriptionId: 'sub_1',
          amountPaid: 19,
        },
        { listings, getSubscriptionPeriod },
      ),
    ).rejects.toThrow('Subscription sub_1 has no current period')
    expect(listings.updates).toEqual([])
  })
})
