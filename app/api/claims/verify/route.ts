import { NextResponse } from 'next/server'
import { assignOwnership, MAX_VERIFY_ATTEMPTS, verifyClaim } from '@/lib/claims'
import { claimVerifySchema, firstIssue } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

/**
 * POST /api/claims/verify
 * Body: { claimId, code }. On a match the caller becomes the listing's
 * owner, unless someone else already is.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = claimVerifySchema.safeParse(await request.json().catch(() => null))
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

    const ok = await verifyClaim(services.claims, claim, parsed.data.code, new Date())
    if (!ok) {
      switch (claim.status) {
        case 'expired':
          return NextResponse.json(
            { error: 'This code has expired. Request a new one.', status: claim.status },
            { status: 400 },
          )
        case 'blocked':
          return NextResponse.json(
            { error: 'Too many incorrect attempts. Start a new claim.', status: claim.status },
            { status: 429 },
          )
        default:
          return NextResponse.json(
            {
              error: 'Incorrect code',
              status: claim.status,
              attemptsRemaining: Math.max(0, MAX_VERIFY_ATTEMPTS - claim.attempts),
            },
            { status: 400 },
          )
      }
    }

    const listing = await services.listings.getById(claim.listing_id)
    if (!listing) {
      return NextResponse.json({ error: 'Listing not found' }, { status: 404 })
    }

    const ownership = await assignOwnership(services.listings, listing, user.id)
    if (ownership === 'owned_by_other') {
      console.warn('[claims/verify] Listing already owned', { listingId: listing.id, claimId: claim.id })
      return NextResponse.json(
        { error: 'This listing is already owned by another account' },
        { status: 409 },
      )
    }

    console.log('[claims/verify] Verified', { claimId: claim.id, listingId: listing.id, ownership })
    return NextResponse.json({ ok: true, listingId: listing.id, ownership })
  } catch (err) {
    console.error('[claims/verify] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
