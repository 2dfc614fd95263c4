import { NextResponse } from 'next/server'
import { isPromotedNow, reconcilePromotionExpiry, TIER_CONFIG } from '@/lib/promotion'
import { getServices } from '@/lib/services'
import { applyReconciliations } from '@/lib/store'
import type { ListingReconciliation } from '@/types'

export const dynamic = 'force-dynamic'

/**
 * GET /api/owner/dashboard
 * The caller's listings with promotion state and counters.
 * Auth: Bearer token
 */
export async function GET(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const now = new Date()
    const owned = await services.listings.listByOwner(user.id)
    const reconciliations: ListingReconciliation[] = []

    const listings = owned.map((found) => {
      const patch = reconcilePromotionExpiry(found, now)
      if (patch) reconciliations.push({ listingId: found.id, reason: 'promotion_expired', patch })
      const listing = { ...found, ...patch }
      const promoted = isPromotedNow(listing, now)

      return {
        ...listing,
        promoted,
        tier_label: promoted ? TIER_CONFIG[listing.plan].label : null,
        days_remaining:
          promoted && listing.featured_until
            ? Math.max(0, Math.ceil((new Date(listing.featured_until).getTime() - now.getTime()) / 86_400_000))
            : null,
      }
    })

    if (reconciliations.length > 0) {
      await applyReconciliations(services.listings, reconciliations)
    }

    const response = NextResponse.json({ listings })
    response.headers.set('Cache-Control', 'no-store, no-cache, must-revalidate')
    return response
  } catch (err) {
    console.error('[owner/dashboard] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
