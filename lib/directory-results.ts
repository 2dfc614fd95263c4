/**
 * Projection of curated listings and external places into one result shape.
 */

import type {
  AddressParts,
  DirectoryResult,
  ExternalPlace,
  Listing,
  ListingPatch,
  ManualResult,
  OsmResult,
  StarBreakdown,
} from '@/types'

export const OSM_KEY_PREFIX = 'osm:'

/** Full / half / empty star counts for a 0–5 rating. Half at ≥ .5. */
export function starsForRating(rating: number | null | undefined): StarBreakdown {
  const r = Math.min(5, Math.max(0, Number(rating) || 0))
  const full = Math.floor(r)
  const half = full < 5 && r - full >= 0.5 ? 1 : 0
  return { full, half, empty: 5 - full - half }
}

export function buildDisplayLocation(...parts: Array<string | null | undefined>): string {
  const cleaned = parts.map((p) => (p ?? '').trim()).filter(Boolean)
  return cleaned.length > 0 ? cleaned.join(', ') : 'Unknown location'
}

export function mapsUrl(parts: AddressParts): string {
  const query = buildDisplayLocation(parts.address, parts.city, parts.state, parts.zip_code)
  return `https://www.google.com/maps/search/?api=1&query=${encodeURIComponent(query).replace(/%20/g, '+')}`
}

/** Structured address, falling back to splitting `location` ("City, ST"). */
export function addressParts(
  listing: Pick<Listing, 'address' | 'city' | 'state' | 'zip_code' | 'location'>,
): AddressParts {
  let city = listing.city ?? ''
  let state = listing.state ?? ''
  const loc = (listing.location ?? '').trim()

  if (!city && !state && loc) {
    const comma = loc.indexOf(',')
    if (comma >= 0) {
      city = loc.slice(0, comma).trim()
      state = loc.slice(comma + 1).trim()
    } else {
      city = loc
    }
  }

  return {
    address: listing.address ?? '',
    city,
    state,
    zip_code: listing.zip_code ?? '',
  }
}

export function externalKeyFor(osmId: string): string {
  return `${OSM_KEY_PREFIX}${osmId}`
}

export function manualToResult(m: Listing): ManualResult {
  const parts = addressParts(m)
  const display = buildDisplayLocation(parts.address, parts.city, parts.state, parts.zip_code)

  return {
    source: 'manual',
    key: `manual_${m.id}`,
    listing_id: m.id,
    name: m.name,
    category: m.category,
    ...parts,
    display_location: display === 'Unknown location' && m.location ? m.location : display,
    maps_url: mapsUrl(parts),
    phone: m.phone ?? '',
    website: m.website ?? '',
    image_url: m.image_url ?? '',
    rating: m.rating ?? 0,
    review_count: m.review_count ?? 0,
    stars: starsForRating(m.rating),
    featured: m.is_active,
    plan: m.plan,
    featured_until: m.featured_until,
    owner_id: m.owner_id,
    open_time: m.open_time,
    close_time: m.close_time,
    is_on_holiday: m.is_on_holiday,
    holiday_note: m.holiday_note,
  }
}

/**
 * Project an external place. `imported` is the listing previously created
 * from the same place, if any; its promotion and owner fields are carried.
 */
export function osmToResult(place: ExternalPlace, category: string, imported?: Listing | null): OsmResult {
  const parts: AddressParts = {
    address: place.address,
    city: place.city,
    state: place.state,
    zip_code: place.zip_code,
  }
  const externalKey = externalKeyFor(place.osm_id)

  return {
    source: 'osm',
    key: externalKey,
    listing_id: imported?.id ?? null,
    osm_id: place.osm_id,
    external_key: externalKey,
    name: place.name || 'Unknown business',
    category,
    ...parts,
    display_location: buildDisplayLocation(parts.address, parts.city, parts.state, parts.zip_code),
    maps_url: mapsUrl(parts),
    phone: place.phone,
    website: place.url,
    image_url: imported?.image_url ?? '',
    rating: 0,
    review_count: 0,
    stars: starsForRating(0),
    featured: imported?.is_active ?? false,
    plan: imported?.plan ?? null,
    featured_until: imported?.featured_until ?? null,
    owner_id: imported?.owner_id ?? null,
    lat: place.lat,
    lon: place.lon,
  }
}

const FILLABLE = ['category', 'address', 'city', 'state', 'zip_code', 'phone', 'website'] as const

type FillableField = (typeof FILLABLE)[number]

/** Values from an external place for fields the stored listing leaves empty. */
export function missingFields(
  listing: Pick<Listing, FillableField>,
  place: Record<FillableField, string>,
): ListingPatch {
  const patch: ListingPatch = {}
  for (const key of FILLABLE) {
    if (!listing[key] && place[key]) patch[key] = place[key]
  }
  return patch
}

/** Where a result's detail view lives. */
export function resultHref(result: DirectoryResult): string {
  switch (result.source) {
    case 'manual':
      return `/listings/${result.listing_id}`
    case 'osm':
      return result.listing_id !== null ? `/listings/${result.listing_id}` : result.maps_url
    default:
      return assertNever(result)
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled result variant: ${JSON.stringify(value)}`)
}
