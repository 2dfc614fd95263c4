import { NextResponse } from 'next/server'
import { applyBillingEvent, decodeBillingEvent, verifyWebhookPayload } from '@/lib/billing'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

export async function POST(request: Request) {
  const body = await request.text()
  const services = getServices()

  const verified = verifyWebhookPayload(
    services.billing.webhooks,
    body,
    request.headers.get('stripe-signature'),
    services.config.stripe.webhookSecret,
  )
  if (!verified.ok) {
    return NextResponse.json({ error: verified.message }, { status: 400 })
  }

  const event = decodeBillingEvent(verified.event)
  if (!event) {
    return NextResponse.json({ received: true, ignored: true })
  }

  try {
    const outcome = await applyBillingEvent(event, {
      listings: services.listings,
      getSubscriptionPeriod: services.billing.getSubscriptionPeriod,
    })

    if (outcome === 'listing_not_found') {
      console.warn('[webhook] No listing for event', { type: verified.event.type, kind: event.kind })
    } else {
      console.log('[webhook] Applied', { type: verified.event.type, kind: event.kind })
    }

    return NextResponse.json({ received: true })
  } catch (err) {
    console.error('[webhook] Handler error:', err)
    return NextResponse.json({ error: 'Webhook handler failed' }, { status: 500 })
  }
}
