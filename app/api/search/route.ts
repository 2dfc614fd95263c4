import { NextResponse } from 'next/server'
import { createRateLimiter, clientIp } from '@/lib/rate-limit'
import { firstIssue, searchQuerySchema } from '@/lib/schemas'
import { searchDirectory } from '@/lib/search'
import { getServices } from '@/lib/services'
import { applyReconciliations } from '@/lib/store'

export const dynamic = 'force-dynamic'

const limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 20 })

/**
 * GET /api/search?term=&location=
 * Curated listings, nearby OpenStreetMap places and the promoted band.
 */
export async function GET(request: Request) {
  const { allowed, retryAfterSeconds } = limiter(clientIp(request))
  if (!allowed) {
    return NextResponse.json(
      { error: 'Too many requests' },
      { status: 429, headers: { 'Retry-After': String(retryAfterSeconds) } },
    )
  }

  try {
    const params = new URL(request.url).searchParams
    const parsed = searchQuerySchema.safeParse({
      term: params.get('term') ?? undefined,
      location: params.get('location') ?? undefined,
    })
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }
    const { term, location } = parsed.data

    const services = getServices()
    const outcome = await searchDirectory(term, location, {
      listings: services.listings,
      geocode: services.geocoder.geocode,
      searchArea: services.searchArea,
      timeZone: services.config.timeZone,
    })

    if (outcome.reconciliations.length > 0) {
      const { applied, failed } = await applyReconciliations(services.listings, outcome.reconciliations)
      console.log('[search] Reconciled listings', { applied, failed })
    }

    return NextResponse.json({
      term,
      location,
      local: outcome.local,
      external: outcome.external,
      promoted: outcome.promoted,
      error: outcome.error,
    })
  } catch (err) {
    console.error('[search] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
