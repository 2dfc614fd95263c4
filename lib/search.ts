/**
 * Search aggregation: curated listings, live OpenStreetMap places and the
 * promoted band for one (term, location) query.
 *
 * Nothing here writes. Lazy expiry of promotions and holidays is returned
 * in `reconciliations` for the caller to persist.
 */

import { externalKeyFor, manualToResult, osmToResult } from '@/lib/directory-results'
import { geocodeErrorMessage, type GeocodeResult } from '@/lib/geocode'
import { evaluateAvailability } from '@/lib/hours'
import { mergeExternalPlaces, type AreaSearch } from '@/lib/overpass'
import { isPromotedNow, reconcilePromotionExpiry } from '@/lib/promotion'
import type { ListingStore } from '@/lib/store'
import type { ExternalPlace, Listing, ListingReconciliation, ManualResult, OsmResult } from '@/types'

export const BASE_RADIUS = { radiusM: 8000, limit: 40 }
export const WIDE_RADIUS = { radiusM: 20000, limit: 60 }
export const PROMOTION_CANDIDATE_LIMIT = 50
export const PROMOTED_BAND_SIZE = 5

export const MISSING_INPUT_MESSAGE = 'Please provide both business type and location.'

export interface SearchDeps {
  listings: Pick<ListingStore, 'searchManual' | 'findPromotionCandidates' | 'findByExternalIds'>
  geocode: (query: string) => Promise<GeocodeResult>
  searchArea: AreaSearch
  timeZone: string
  now?: Date
}

export interface SearchOutcome {
  local: ManualResult[]
  external: OsmResult[]
  promoted: ManualResult[]
  error: string | null
  reconciliations: ListingReconciliation[]
}

export function noResultsMessage(term: string, location: string): string {
  return `No results found for "${term}" near ${location}. Try a broader category or a nearby city.`
}

export async function searchDirectory(
  term: string,
  location: string,
  deps: SearchDeps,
): Promise<SearchOutcome> {
  const now = deps.now ?? new Date()
  const t = term.trim()
  const loc = location.trim()

  if (!t || !loc) {
    return { local: [], external: [], promoted: [], error: MISSING_INPUT_MESSAGE, reconciliations: [] }
  }

  const reconciliations = new Map<string, ListingReconciliation>()

  // Apply the promotion-expiry write in memory so the rendered result
  // reflects it, and queue it for the caller.
  const withPromotionExpiry = (listing: Listing): Listing => {
    const patch = reconcilePromotionExpiry(listing, now)
    if (!patch) return listing
    reconciliations.set(`${listing.id}:promotion_expired`, {
      listingId: listing.id,
      reason: 'promotion_expired',
      patch,
    })
    return { ...listing, ...patch }
  }

  const manual = (await deps.listings.searchManual(t, loc)).map(withPromotionExpiry)
  const local = manual.map(manualToResult)

  // ── Promoted band ──────────────────────────────────────────────────
  const promoted: ManualResult[] = []
  const candidates = await deps.listings.findPromotionCandidates(t, loc, PROMOTION_CANDIDATE_LIMIT)

  for (const candidate of candidates) {
    if (promoted.length >= PROMOTED_BAND_SIZE) break

    const listing = withPromotionExpiry(candidate)
    if (!isPromotedNow(listing, now)) continue

    const availability = evaluateAvailability(listing, now, deps.timeZone)
    if (availability.patch) {
      reconciliations.set(`${listing.id}:holiday_ended`, {
        listingId: listing.id,
        reason: 'holiday_ended',
        patch: availability.patch,
      })
    }
    if (!availability.open) continue

    promoted.push(manualToResult({ ...listing, ...availability.patch }))
  }

  // ── External places ────────────────────────────────────────────────
  let error: string | null = null
  let external: OsmResult[] = []

  const geo = await deps.geocode(loc)
  if (geo.status !== 'ok') {
    error = geocodeErrorMessage(geo)
  } else {
    const { lat, lon } = geo.point
    const first = await deps.searchArea(t, lat, lon, BASE_RADIUS)
    let places: ExternalPlace[] = first
    if (first.length === 0) {
      const wide = await deps.searchArea(t, lat, lon, WIDE_RADIUS)
      places = mergeExternalPlaces(first, wide)
    }

    const localKeys = new Set(manual.map((m) => m.external_id).filter((k): k is string => Boolean(k)))
    const fresh = places.filter((p) => !localKeys.has(externalKeyFor(p.osm_id)))

    const imported = await deps.listings.findByExternalIds(fresh.map((p) => externalKeyFor(p.osm_id)))
    const byKey = new Map<string, Listing>()
    for (const listing of imported) {
      if (listing.external_id) byKey.set(listing.external_id, withPromotionExpiry(listing))
    }

    external = fresh.map((p) => osmToResult(p, t, byKey.get(externalKeyFor(p.osm_id))))
  }

  if (!error && local.length === 0 && external.length === 0 && promoted.length === 0) {
    error = noResultsMessage(t, loc)
  }

  return { local, external, promoted, error, reconciliations: [...reconciliations.values()] }
}
