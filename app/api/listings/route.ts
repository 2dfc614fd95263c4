import { NextResponse } from 'next/server'
import { buildDisplayLocation } from '@/lib/directory-results'
import { createListingSchema, firstIssue } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

/**
 * POST /api/listings
 * Create a curated listing owned by the caller.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = createListingSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const data = parsed.data
    const composite = buildDisplayLocation(data.city, data.state)
    const listing = await services.listings.insert({
      ...data,
      location: data.location || (composite === 'Unknown location' ? '' : composite),
      is_manual: true,
      owner_id: user.id,
    })

    console.log('[listings] Created', { id: listing.id, owner: user.id })
    return NextResponse.json({ listing }, { status: 201 })
  } catch (err) {
    console.error('[listings] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
