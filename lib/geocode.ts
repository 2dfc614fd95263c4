/**
 * Geocoding against Nominatim (OpenStreetMap).
 *
 * Nominatim's usage policy asks for an identifying User-Agent, a contact
 * address and at most one request per second, so every uncached call is
 * preceded by a fixed delay.
 */

import { z } from 'zod'
import { createTtlCache, type TtlCache } from '@/lib/cache'
import type { AddressParts, GeoPoint } from '@/types'

export const NOMINATIM_SEARCH_URL = 'https://nominatim.openstreetmap.org/search'
export const NOMINATIM_REVERSE_URL = 'https://nominatim.openstreetmap.org/reverse'

export type GeocodeResult =
  | { status: 'ok'; point: GeoPoint }
  | { status: 'not_found' }
  | { status: 'blocked' }
  | { status: 'error'; message: string }

export const EMPTY_ADDRESS: AddressParts = { address: '', city: '', state: '', zip_code: '' }

const searchResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  }),
)

const reverseResponseSchema = z.object({
  address: z.record(z.coerce.string()).optional(),
})

export interface GeocoderOptions {
  userAgent: string
  contactEmail?: string
  delayMs: number
  timeoutMs: number
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  cache?: TtlCache<GeocodeResult>
  reverseCache?: TtlCache<AddressParts>
}

export interface Geocoder {
  geocode(query: string): Promise<GeocodeResult>
  reverseGeocode(lat: number, lon: number): Promise<AddressParts>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** Cache key for a free-text location. */
export function normalizeGeocodeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ').toLowerCase()
}

/** Cache key for a coordinate, rounded to ~1 m. */
export function coordinateKey(lat: number, lon: number): string {
  return `${lat.toFixed(5)},${lon.toFixed(5)}`
}

/** User-facing text for a failed geocode. */
export function geocodeErrorMessage(result: Exclude<GeocodeResult, { status: 'ok' }>): string {
  switch (result.status) {
    case 'not_found':
      return "We couldn't find that location. Try a city and state, like 'Austin, TX'."
    case 'blocked':
      return 'Location lookup is temporarily unavailable. Please try again later.'
    case 'error':
      return 'Location lookup failed. Please try again in a few seconds.'
  }
}

export function createGeocoder(opts: GeocoderOptions): Geocoder {
  const doFetch = opts.fetch ?? fetch
  const sleep = opts.sleep ?? defaultSleep
  const cache = opts.cache ?? createTtlCache<GeocodeResult>({ ttlMs: 24 * 60 * 60 * 1000, maxEntries: 1000 })
  const reverseCache =
    opts.reverseCache ?? createTtlCache<AddressParts>({ ttlMs: 7 * 24 * 60 * 60 * 1000, maxEntries: 5000 })

  const headers = {
    'User-Agent': opts.userAgent,
    Accept: 'application/json',
    'Accept-Language': 'en',
  }

  function withContact(params: URLSearchParams): URLSearchParams {
    if (opts.contactEmail) params.set('email', opts.contactEmail)
    return params
  }

  async function geocode(query: string): Promise<GeocodeResult> {
    const q = query.trim()
    if (!q) return { status: 'not_found' }

    const key = normalizeGeocodeQuery(q)
    const cached = cache.get(key)
    if (cached) return cached

    await sleep(opts.delayMs)

    const params = withContact(
      new URLSearchParams({ q, format: 'jsonv2', limit: '1', addressdetails: '1' }),
    )

    let result: GeocodeResult
    try {
      const res = await doFetch(`${NOMINATIM_SEARCH_URL}?${params}`, {
        headers,
        signal: AbortSignal.timeout(opts.timeoutMs),
      })

      if (res.status === 429) {
        console.warn('[geocode] Provider rate limited request')
        return { status: 'blocked' }
      } else if (res.status === 403) {
        console.warn('[geocode] Provider refused request', { status: res.status })
        result = { status: 'blocked' }
      } else if (!res.ok) {
        // Transient; not cached
        return { status: 'error', message: `HTTP ${res.status}` }
      } else {
        const data = searchResponseSchema.parse(await res.json())
        const first = data[0]
        result = first
          ? {
              status: 'ok',
              point: { lat: first.lat, lon: first.lon, display: first.display_name ?? q },
            }
          : { status: 'not_found' }
      }
    } catch (err) {
      console.error('[geocode] Request failed:', err)
      return { status: 'error', message: err instanceof Error ? err.message : String(err) }
    }

    cache.set(key, result)
    return result
  }

  async function reverseGeocode(lat: number, lon: number): Promise<AddressParts> {
    const key = coordinateKey(lat, lon)
    const cached = reverseCache.get(key)
    if (cached) return cached

    await sleep(opts.delayMs)

    const params = withContact(
      new URLSearchParams({
        lat: String(lat),
        lon: String(lon),
        format: 'jsonv2',
        zoom: '18',
        addressdetails: '1',
      }),
    )

    try {
      const res = await doFetch(`${NOMINATIM_REVERSE_URL}?${params}`, {
        headers,
        signal: AbortSignal.timeout(opts.timeoutMs),
      })
      if (!res.ok) return { ...EMPTY_ADDRESS }

      const { address: a = {} } = reverseResponseSchema.parse(await res.json())
      const parts: AddressParts = {
        address: [a.house_number ?? '', a.road ?? ''].join(' ').trim(),
        city: a.city ?? a.town ?? a.village ?? a.suburb ?? '',
        state: a.state ?? '',
        zip_code: a.postcode ?? '',
      }
      reverseCache.set(key, parts)
      return parts
    } catch (err) {
      console.warn('[geocode] Reverse lookup failed:', err)
      return { ...EMPTY_ADDRESS }
    }
  }

  return { geocode, reverseGeocode }
}
