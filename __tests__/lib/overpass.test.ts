import { describe, it, expect, vi } from 'vitest'
import {
  buildOverpassQuery,
  createAreaSearch,
  elementToPlace,
  mergeExternalPlaces,
  sanitizeTerm,
} from '@/lib/overpass'
import type { AddressParts, ExternalPlace } from '@/types'

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })

const shell = {
  type: 'node',
  id: 1,
  lat: 30.1,
  lon: -97.1,
  tags: {
    name: 'Shell',
    'addr:housenumber': '5',
    'addr:street': 'Oak Ave',
    'addr:city': 'Austin',
    'addr:state': 'TX',
    'addr:postcode': '78701',
    phone: '555-0101',
    website: 'https://shell.example',
  },
}
const unnamedWay = { type: 'way', id: 2, center: { lat: 30.2, lon: -97.2 }, tags: { amenity: 'fuel' } }
const noPosition = { type: 'relation', id: 3, tags: { name: 'Somewhere' } }

function place(osm_id: string, name = osm_id): ExternalPlace {
  return { osm_id, name, address: '', city: '', state: '', zip_code: '', url: '', phone: '', lat: 0, lon: 0 }
}

describe('buildOverpassQuery', () => {
  it('uses the tag table for known categories', () => {
    expect(buildOverpassQuery('Gas', 1, 2, 8000)).toBe(
      [
        '[out:json][timeout:60];',
        '(',
        '  node(around:8000,1,2)["amenity"="fuel"];',
        '  way(around:8000,1,2)["amenity"="fuel"];',
        '  relation(around:8000,1,2)["amenity"="fuel"];',
        ');',
        'out tags center;',
      ].join('\n'),
    )
  })

  it('falls back to a case-insensitive match on name, amenity, shop and tourism', () => {
    const q = buildOverpassQuery('Tacos', 1, 2, 8000)
    expect(q).toContain('  node(around:8000,1,2)["name"~"tacos",i];')
    expect(q).toContain('  way(around:8000,1,2)["shop"~"tacos",i];')
    expect(q).toContain('  relation(around:8000,1,2)["tourism"~"tacos",i];')
  })

  it('does not treat inherited object keys as categories', () => {
    expect(buildOverpassQuery('constructor', 1, 2, 100)).toContain('["name"~"constructor",i]')
  })
})

describe('sanitizeTerm', () => {
  it('drops quotes and escapes regex metacharacters', () => {
    expect(sanitizeTerm('a.b"c')).toBe('a\\\\.bc')
  })
})

describe('elementToPlace', () => {
  it('normalizes tags', () => {
    expect(elementToPlace(shell, 'gas')).toEqual({
      osm_id: 'node_1',
      name: 'Shell',
      address: '5 Oak Ave',
      city: 'Austin',
      state: 'TX',
      zip_code: '78701',
      url: 'https://shell.example',
      phone: '555-0101',
      lat: 30.1,
      lon: -97.1,
    })
  })

  it('uses the centre of ways and names unnamed places after the term', () => {
    const p = elementToPlace(unnamedWay, 'gas station')
    expect(p?.name).toBe('Gas Station')
    expect(p?.lat).toBe(30.2)
    expect(p?.osm_id).toBe('way_2')
  })

  it('skips elements without a position', () => {
    expect(elementToPlace(noPosition, 'gas')).toBeNull()
  })
})

describe('mergeExternalPlaces', () => {
  it('keeps the first occurrence of each id across calls', () => {
    const merged = mergeExternalPlaces(
      [place('node_1', 'first'), place('way_2')],
      [place('node_1', 'second'), place('node_3')],
    )
    expect(merged.map((p) => p.osm_id)).toEqual(['node_1', 'way_2', 'node_3'])
    expect(merged[0].name).toBe('first')
  })
})

describe('createAreaSearch', () => {
  const backfill: AddressParts = { address: '9 Elm St', city: 'Austin', state: 'TX', zip_code: '78702' }

  function setup(fetchImpl: typeof fetch) {
    const fetchMock = vi.fn<typeof fetch>(fetchImpl)
    const reverseGeocode = vi.fn(async (_lat: number, _lon: number) => backfill)
    const searchArea = createAreaSearch({
      userAgent: 'TestDirectory/1.0',
      timeoutMs: 5000,
      reverseGeocode,
      endpoints: ['https://a.example/api', 'https://b.example/api'],
      fetch: fetchMock,
      shuffle: (items) => items,
    })
    return { searchArea, fetchMock, reverseGeocode }
  }

  it('tries the next mirror, dedupes and backfills addresses', async () => {
    const { searchArea, fetchMock, reverseGeocode } = setup(async (url) =>
      String(url) === 'https://a.example/api'
        ? json({}, 504)
        : json({ elements: [shell, unnamedWay, shell, noPosition] }),
    )

    const results = await searchArea('gas', 30, -97, { radiusM: 8000, limit: 40 })

    expect(results.map((r) => r.osm_id)).toEqual(['node_1', 'way_2'])
    expect(results[1]).toMatchObject({ name: 'Gas', ...backfill })
    expect(reverseGeocode).toHaveBeenCalledTimes(1)
    expect(reverseGeocode).toHaveBeenCalledWith(30.2, -97.2)

    expect(fetchMock).toHaveBeenCalledTimes(2)
    const init = fetchMock.mock.calls[1][1]
    expect(init?.method).toBe('POST')
    expect(String(init?.body)).toMatch(/^data=/)
  })

  it('stops at the limit', async () => {
    const { searchArea, reverseGeocode } = setup(async () => json({ elements: [shell, unnamedWay] }))

    const results = await searchArea('gas', 30, -97, { radiusM: 8000, limit: 1 })
    expect(results.map((r) => r.osm_id)).toEqual(['node_1'])
    expect(reverseGeocode).not.toHaveBeenCalled()
  })

  it('returns an empty list when every mirror fails', async () => {
    const { searchArea, fetchMock } = setup(async () => {
      throw new Error('ECONNRESET')
    })

    await expect(searchArea('gas', 30, -97, { radiusM: 8000, limit: 40 })).resolves.toEqual([])
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('returns an empty list for a malformed response', async () => {
    const { searchArea } = setup(async () => json({ elements: 'nope' }))
    await expect(searchArea('gas', 30, -97, { radiusM: 8000, limit: 40 })).resolves.toEqual([])
  })

  it('skips the request for a blank term', async () => {
    const { searchArea, fetchMock } = setup(async () => json({ elements: [] }))
    expect(await searchArea('  ', 30, -97, { radiusM: 8000, limit: 40 })).toEqual([])
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
