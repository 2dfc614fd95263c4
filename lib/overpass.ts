/**
 * Nearby place search against the Overpass API (OpenStreetMap data).
 *
 * Common category words map to fixed OSM tag sets; anything else is matched
 * case-insensitively against name/amenity/shop/tourism tags. Failures never
 * propagate: the caller gets an empty list.
 */

import { z } from 'zod'
import type { AddressParts, ExternalPlace } from '@/types'

export const OVERPASS_URLS = [
  'https://overpass-api.de/api/interpreter',
  'https://overpass.kumi.systems/api/interpreter',
  'https://overpass.openstreetmap.ru/api/interpreter',
]

type TagPair = readonly [key: string, value: string]

export const CATEGORY_TAGS: Record<string, readonly TagPair[]> = {
  gas: [['amenity', 'fuel']],
  'gas station': [['amenity', 'fuel']],
  fuel: [['amenity', 'fuel']],

  grocery: [['shop', 'supermarket'], ['shop', 'convenience'], ['shop', 'grocery']],
  supermarket: [['shop', 'supermarket']],
  convenience: [['shop', 'convenience']],

  salon: [['shop', 'hairdresser'], ['shop', 'beauty']],
  barber: [['shop', 'barber'], ['shop', 'hairdresser']],

  pizza: [['amenity', 'restaurant'], ['amenity', 'fast_food']],
  restaurant: [['amenity', 'restaurant']],
  cafe: [['amenity', 'cafe']],
  coffee: [['amenity', 'cafe']],

  pharmacy: [['amenity', 'pharmacy']],
  hospital: [['amenity', 'hospital']],
  hotel: [['tourism', 'hotel']],

  gym: [['leisure', 'fitness_centre'], ['amenity', 'gym']],
  fitness: [['leisure', 'fitness_centre'], ['amenity', 'gym']],
}

const FUZZY_TAG_KEYS = ['name', 'amenity', 'shop', 'tourism'] as const
const ELEMENT_TYPES = ['node', 'way', 'relation'] as const

const elementSchema = z.object({
  type: z.string(),
  id: z.union([z.number(), z.string()]),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: z.record(z.coerce.string()).optional(),
})

const responseSchema = z.object({
  elements: z.array(elementSchema).default([]),
})

type OverpassElement = z.infer<typeof elementSchema>

export interface AreaSearchOptions {
  radiusM: number
  limit: number
}

export interface AreaSearchDeps {
  userAgent: string
  timeoutMs: number
  /** Best-effort address backfill for places without addr:* tags */
  reverseGeocode: (lat: number, lon: number) => Promise<AddressParts>
  endpoints?: string[]
  fetch?: typeof fetch
  shuffle?: <T>(items: T[]) => T[]
}

export type AreaSearch = (
  term: string,
  lat: number,
  lon: number,
  opts: AreaSearchOptions,
) => Promise<ExternalPlace[]>

function shuffled<T>(items: T[]): T[] {
  const out = [...items]
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1))
    ;[out[i], out[j]] = [out[j], out[i]]
  }
  return out
}

/** Strip characters that would break out of an Overpass string or regex. */
export function sanitizeTerm(term: string): string {
  return term.replace(/["\\]/g, '').replace(/[.*+?^${}()|[\]]/g, '\\\\$&')
}

/** Build the Overpass QL query for a term around a point. */
export function buildOverpassQuery(term: string, lat: number, lon: number, radiusM: number): string {
  const around = `around:${radiusM},${lat},${lon}`
  const key = term.trim().toLowerCase()
  const pairs = Object.hasOwn(CATEGORY_TAGS, key) ? CATEGORY_TAGS[key] : undefined

  const filters: string[] = pairs
    ? pairs.map(([k, v]) => `["${k}"="${v}"]`)
    : FUZZY_TAG_KEYS.map((k) => `["${k}"~"${sanitizeTerm(key)}",i]`)

  const selectors = filters.flatMap((f) => ELEMENT_TYPES.map((t) => `  ${t}(${around})${f};`))

  return ['[out:json][timeout:60];', '(', ...selectors, ');', 'out tags center;'].join('\n')
}

/** `<type>_<id>`, the stable identity of an OSM element. */
export function osmIdFor(el: Pick<OverpassElement, 'type' | 'id'>): string {
  return `${el.type}_${el.id}`
}

function titleCase(s: string): string {
  return s.replace(/\b\w/g, (c) => c.toUpperCase())
}

/** Normalize one element, or null when it has no usable position. */
export function elementToPlace(el: OverpassElement, term: string): ExternalPlace | null {
  const lat = el.lat ?? el.center?.lat
  const lon = el.lon ?? el.center?.lon
  if (lat === undefined || lon === undefined) return null

  const tags = el.tags ?? {}
  const tag = (...keys: string[]) => {
    for (const k of keys) {
      const v = tags[k]?.trim()
      if (v) return v
    }
    return ''
  }

  return {
    osm_id: osmIdFor(el),
    name: tag('name') || titleCase(term.trim()),
    address: [tag('addr:housenumber'), tag('addr:street')].join(' ').trim(),
    city: tag('addr:city', 'addr:suburb'),
    state: tag('addr:state'),
    zip_code: tag('addr:postcode'),
    url: tag('website', 'contact:website', 'url'),
    phone: tag('phone', 'contact:phone'),
    lat,
    lon,
  }
}

/** Concatenate place lists, keeping the first occurrence of each OSM id. */
export function mergeExternalPlaces(...lists: ExternalPlace[][]): ExternalPlace[] {
  const seen = new Set<string>()
  const out: ExternalPlace[] = []
  for (const list of lists) {
    for (const place of list) {
      if (seen.has(place.osm_id)) continue
      seen.add(place.osm_id)
      out.push(place)
    }
  }
  return out
}

export function createAreaSearch(deps: AreaSearchDeps): AreaSearch {
  const doFetch = deps.fetch ?? fetch
  const order = deps.shuffle ?? shuffled
  const endpoints = deps.endpoints ?? OVERPASS_URLS

  async function fetchElements(query: string): Promise<OverpassElement[]> {
    for (const url of order(endpoints)) {
      try {
        const res = await doFetch(url, {
          method: 'POST',
          headers: {
            'User-Agent': deps.userAgent,
            Accept: 'application/json',
            'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          },
          body: new URLSearchParams({ data: query }).toString(),
          signal: AbortSignal.timeout(deps.timeoutMs),
        })
        if (!res.ok) {
          console.warn('[osm] Mirror returned an error', { url, status: res.status })
          continue
        }
        return responseSchema.parse(await res.json()).elements
      } catch (err) {
        console.warn('[osm] Mirror request failed', { url, error: err instanceof Error ? err.message : err })
      }
    }
    console.warn('[osm] All mirrors failed; returning no external results')
    return []
  }

  return async function searchArea(term, lat, lon, { radiusM, limit }) {
    const clean = term.trim()
    if (!clean) return []

    const elements = await fetchElements(buildOverpassQuery(clean, lat, lon, radiusM))

    const results: ExternalPlace[] = []
    const seen = new Set<string>()

    for (const el of elements) {
      if (results.length >= limit) break

      const place = elementToPlace(el, clean)
      if (!place || seen.has(place.osm_id)) continue
      seen.add(place.osm_id)

      if (!place.address || !place.city || !place.state) {
        const r = await deps.reverseGeocode(place.lat, place.lon)
        place.address = place.address || r.address
        place.city = place.city || r.city
        place.state = place.state || r.state
        place.zip_code = place.zip_code || r.zip_code
      }

      results.push(place)
    }

    return results
  }
}
