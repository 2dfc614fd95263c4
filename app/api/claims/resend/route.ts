import { NextResponse } from 'next/server'
import { resendClaimCode } from '@/lib/claims'
import { EmailDeliveryError } from '@/lib/email'
import { claimResendSchema, firstIssue } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

/**
 * POST /api/claims/resend
 * Body: { claimId }. New code for a pending claim, at most once a minute.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = claimResendSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const claim = await services.claims.getById(parsed.data.claimId)
    if (!claim) {
      return NextResponse.json({ error: 'Claim not found' }, { status: 404 })
    }
    if (claim.user_id !== user.id) {
      return NextResponse.json({ error: 'This claim belongs to another account' }, { status: 403 })
    }

    const listing = await services.listings.getById(claim.listing_id)
    if (!listing) {
      return NextResponse.json({ error: 'Listing not found' }, { status: 404 })
    }

    const outcome = await resendClaimCode(
      { claims: services.claims, mailer: services.mailer },
      claim,
      listing.name,
    )

    if (!outcome.ok) {
      if (outcome.reason === 'cooldown') {
        return NextResponse.json(
          { error: `Please wait ${outcome.retryAfterSeconds}s before requesting another code.` },
          { status: 429, headers: { 'Retry-After': String(outcome.retryAfterSeconds) } },
        )
      }
      return NextResponse.json({ error: 'This claim is no longer pending', status: claim.status }, { status: 409 })
    }

    console.log('[claims/resend] Code re-sent', { claimId: claim.id })
    return NextResponse.json({ ok: true, expiresAt: claim.expires_at })
  } catch (err) {
    if (err instanceof EmailDeliveryError) {
      return NextResponse.json({ error: 'Could not send verification email' }, { status: 502 })
    }
    console.error('[claims/resend] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
