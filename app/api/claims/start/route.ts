import { NextResponse } from 'next/server'
import { ClaimDomainError, startClaim } from '@/lib/claims'
import { EmailDeliveryError } from '@/lib/email'
import { clientIp, createRateLimiter } from '@/lib/rate-limit'
import { claimStartSchema, firstIssue } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

const limiter = createRateLimiter({ windowMs: 10 * 60_000, maxRequests: 5 })

/**
 * POST /api/claims/start
 * Body: { listingId, email }. Emails a 6-digit code to an address at the
 * listing's website domain.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  const { allowed, retryAfterSeconds } = limiter(clientIp(request))
  if (!allowed) {
    return NextResponse.json(
      { error: 'Too many claim attempts. Please try again later.' },
      { status: 429, headers: { 'Retry-After': String(retryAfterSeconds) } },
    )
  }

  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = claimStartSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const listing = await services.listings.getById(parsed.data.listingId)
    if (!listing) {
      return NextResponse.json({ error: 'Listing not found' }, { status: 404 })
    }
    if (listing.owner_id === user.id) {
      return NextResponse.json({ error: 'You already own this listing' }, { status: 409 })
    }
    if (listing.owner_id) {
      return NextResponse.json({ error: 'This listing has already been claimed' }, { status: 409 })
    }

    const { claim } = await startClaim(
      { claims: services.claims, mailer: services.mailer },
      listing,
      user.id,
      parsed.data.email,
    )

    console.log('[claims/start] Code sent', { claimId: claim.id, listingId: listing.id, email: claim.email })

    return NextResponse.json({ claimId: claim.id, email: claim.email, expiresAt: claim.expires_at }, { status: 201 })
  } catch (err) {
    if (err instanceof ClaimDomainError) {
      return NextResponse.json({ error: err.message, reason: err.reason }, { status: 400 })
    }
    if (err instanceof EmailDeliveryError) {
      return NextResponse.json({ error: 'Could not send verification email' }, { status: 502 })
    }
    console.error('[claims/start] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
