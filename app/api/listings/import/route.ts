import { NextResponse } from 'next/server'
import { buildDisplayLocation, externalKeyFor, missingFields } from '@/lib/directory-results'
import { firstIssue, importSchema } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

/**
 * POST /api/listings/import
 * Get or create the unowned listing behind an OpenStreetMap result, so it
 * can be claimed. Empty fields on an existing record are filled in.
 * Auth: Bearer token
 */
export async function POST(request: Request) {
  try {
    const services = getServices()
    const user = await services.auth.getUser(request)
    if (!user) {
      return NextResponse.json({ error: 'Not authenticated' }, { status: 401 })
    }

    const parsed = importSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const place = parsed.data
    const externalId = externalKeyFor(place.osm_id)

    let existing = await services.listings.getByExternalId(externalId)
    if (!existing) {
      const composite = buildDisplayLocation(place.city, place.state)
      try {
        const created = await services.listings.insert({
          name: place.name,
          category: place.category,
          location: composite === 'Unknown location' ? '' : composite,
          address: place.address,
          city: place.city,
          state: place.state,
          zip_code: place.zip_code,
          phone: place.phone || null,
          website: place.website || null,
          is_manual: false,
          external_id: externalId,
        })
        console.log('[listings/import] Imported', { id: created.id, externalId })
        return NextResponse.json({ listing: created, created: true }, { status: 201 })
      } catch (err) {
        // Lost a race on the unique external id; fall through to the winner
        existing = await services.listings.getByExternalId(externalId)
        if (!existing) throw err
      }
    }

    const patch = missingFields(existing, place)
    if (Object.keys(patch).length > 0) {
      await services.listings.update(existing.id, patch)
    }

    return NextResponse.json({ listing: { ...existing, ...patch }, created: false })
  } catch (err) {
    console.error('[listings/import] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
