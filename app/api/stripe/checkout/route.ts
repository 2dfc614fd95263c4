import { NextResponse } from 'next/server'
import { checkoutSchema, firstIssue } from '@/lib/schemas'
import { getServices } from '@/lib/services'
import { createPromotionCheckout, type CheckoutError } from '@/lib/stripe'

export const dynamic = 'force-dynamic'

const ERROR_STATUS: Record<CheckoutError, number> = {
  unauthorized: 403,
  invalid_tier: 400,
  missing_price: 500,
  provider_error: 502,
}

/**
 * POST /api/stripe/checkout
 * Body: { listingId, tier }. Subscription checkout for the listing's owner.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = checkoutSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const listing = await services.listings.getById(parsed.data.listingId)
    if (!listing) {
      return NextResponse.json({ error: 'Listing not found' }, { status: 404 })
    }

    const result = await createPromotionCheckout(
      { listing, userId: user.id, email: user.email, tier: parsed.data.tier },
      {
        prices: services.config.stripe.prices,
        siteUrl: services.config.siteUrl,
        createSession: services.billing.createSession,
      },
    )

    if (!result.ok) {
      return NextResponse.json({ error: result.message, code: result.error }, { status: ERROR_STATUS[result.error] })
    }

    console.log('[stripe/checkout] Session created', { listingId: listing.id, tier: parsed.data.tier })
    return NextResponse.json({ sessionId: result.sessionId, url: result.url })
  } catch (err) {
    console.error('[stripe/checkout] Error:', err)
    return NextResponse.json({ error: 'Failed to create checkout session' }, { status: 500 })
  }
}
