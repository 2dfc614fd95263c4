import { describe, it, expect } from 'vitest'
import {
  addressParts,
  buildDisplayLocation,
  manualToResult,
  mapsUrl,
  missingFields,
  osmToResult,
  resultHref,
  starsForRating,
} from '@/lib/directory-results'
import type { ExternalPlace } from '@/types'
import { makeListing } from '../helpers/memory-store'

const place: ExternalPlace = {
  osm_id: 'node_42',
  name: 'Corner Pizza',
  address: '12 Main St',
  city: 'Austin',
  state: 'TX',
  zip_code: '78701',
  url: 'https://cornerpizza.example',
  phone: '+1 512 555 0100',
  lat: 30.27,
  lon: -97.74,
}

describe('starsForRating', () => {
  it('splits ratings into full, half and empty stars', () => {
    expect(starsForRating(3.7)).toEqual({ full: 3, half: 1, empty: 1 })
    expect(starsForRating(0)).toEqual({ full: 0, half: 0, empty: 5 })
    expect(starsForRating(5)).toEqual({ full: 5, half: 0, empty: 0 })
  })

  it('uses 0.5 as the half-star threshold', () => {
    expect(starsForRating(4.5)).toEqual({ full: 4, half: 1, empty: 0 })
    expect(starsForRating(4.49)).toEqual({ full: 4, half: 0, empty: 1 })
  })

  it('clamps and defaults', () => {
    expect(starsForRating(null)).toEqual({ full: 0, half: 0, empty: 5 })
    expect(starsForRating(7)).toEqual({ full: 5, half: 0, empty: 0 })
    expect(starsForRating(-1)).toEqual({ full: 0, half: 0, empty: 5 })
  })
})

describe('buildDisplayLocation', () => {
  it('joins non-empty parts', () => {
    expect(buildDisplayLocation('12 Main St', '', 'TX', null)).toBe('12 Main St, TX')
  })

  it('falls back when nothing is known', () => {
    expect(buildDisplayLocation('', ' ', undefined)).toBe('Unknown location')
  })
})

describe('mapsUrl', () => {
  it('builds a Google Maps search link', () => {
    expect(mapsUrl({ address: '12 Main St', city: 'Austin', state: 'TX', zip_code: '78701' })).toBe(
      'https://www.google.com/maps/search/?api=1&query=12+Main+St%2C+Austin%2C+TX%2C+78701',
    )
  })
})

describe('addressParts', () => {
  it('splits the composite location when city and state are empty', () => {
    expect(addressParts(makeListing({ location: 'Austin, TX' }))).toEqual({
      address: '',
      city: 'Austin',
      state: 'TX',
      zip_code: '',
    })
  })

  it('keeps structured fields when present', () => {
    expect(addressParts(makeListing({ location: 'Elsewhere, CA', city: 'Austin', state: 'TX' })).city).toBe('Austin')
  })
})

describe('manualToResult', () => {
  it('projects a listing into the common shape', () => {
    const listing = makeListing({
      id: 5,
      name: 'Bean There',
      category: 'coffee',
      city: 'Austin',
      state: 'TX',
      rating: 3.7,
      review_count: 12,
      is_active: true,
      plan: 'premium',
    })
    const r = manualToResult(listing)

    expect(r.source).toBe('manual')
    expect(r.key).toBe('manual_5')
    expect(r.listing_id).toBe(5)
    expect(r.display_location).toBe('Austin, TX')
    expect(r.stars).toEqual({ full: 3, half: 1, empty: 1 })
    expect(r.featured).toBe(true)
    expect(r.plan).toBe('premium')
    expect(r.phone).toBe('')
  })
})

describe('osmToResult', () => {
  it('projects an external place', () => {
    const r = osmToResult(place, 'pizza')

    expect(r.source).toBe('osm')
    expect(r.key).toBe('osm:node_42')
    expect(r.external_key).toBe('osm:node_42')
    expect(r.listing_id).toBeNull()
    expect(r.website).toBe('https://cornerpizza.example')
    expect(r.featured).toBe(false)
    expect(r.stars).toEqual({ full: 0, half: 0, empty: 5 })
  })

  it('carries promotion and owner fields from an imported listing', () => {
    const imported = makeListing({ id: 9, is_active: true, plan: 'top', owner_id: 'user-7' })
    const r = osmToResult(place, 'pizza', imported)

    expect(r.listing_id).toBe(9)
    expect(r.featured).toBe(true)
    expect(r.plan).toBe('top')
    expect(r.owner_id).toBe('user-7')
  })
})

describe('resultHref', () => {
  it('links local listings to their page', () => {
    expect(resultHref(manualToResult(makeListing({ id: 5 })))).toBe('/listings/5')
  })

  it('links unimported places to the map and imported ones to their listing', () => {
    const r = osmToResult(place, 'pizza')
    expect(resultHref(r)).toBe(r.maps_url)
    expect(resultHref(osmToResult(place, 'pizza', makeListing({ id: 9 })))).toBe('/listings/9')
  })
})

describe('missingFields', () => {
  it('fills only empty fields', () => {
    const listing = makeListing({ address: '1 Old Rd', city: '', phone: null, website: 'https://kept.example' })
    expect(
      missingFields(listing, {
        category: '',
        address: '12 Main St',
        city: 'Austin',
        state: 'TX',
        zip_code: '',
        phone: '555-0100',
        website: 'https://new.example',
      }),
    ).toEqual({ city: 'Austin', state: 'TX', phone: '555-0100' })
  })
})
