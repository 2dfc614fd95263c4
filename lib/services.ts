/**
 * Process-wide wiring. Route handlers get their collaborators here so tests
 * can swap the whole set with `vi.mock('@/lib/services')`.
 */

import type Stripe from 'stripe'
import { getRequestUser, signInWithPassword, type LoginSession } from '@/lib/auth'
import { createTtlCache } from '@/lib/cache'
import { getConfig, type AppConfig } from '@/lib/config'
import { createResendMailer, type ClaimMailer } from '@/lib/email'
import { createGeocoder, type GeocodeResult, type Geocoder } from '@/lib/geocode'
import { createAreaSearch, type AreaSearch } from '@/lib/overpass'
import { getStripe, getSubscriptionPeriod, type CreateCheckoutSession, type SubscriptionPeriod } from '@/lib/stripe'
import type { ClaimStore, ListingStore, UserDirectory } from '@/lib/store'
import { createServiceClient } from '@/lib/supabase'
import {
  createSupabaseClaimStore,
  createSupabaseListingStore,
  createSupabaseUserDirectory,
} from '@/lib/supabase-store'
import type { AddressParts, RequestUser } from '@/types'

export interface Services {
  config: Pick<AppConfig, 'siteUrl' | 'timeZone' | 'stripe'>
  listings: ListingStore
  claims: ClaimStore
  users: UserDirectory
  geocoder: Geocoder
  searchArea: AreaSearch
  mailer: ClaimMailer
  auth: {
    getUser(request: Request): Promise<RequestUser | null>
    signIn(email: string, password: string): Promise<LoginSession | null>
  }
  billing: {
    webhooks: Pick<Stripe, 'webhooks'>
    createSession: CreateCheckoutSession
    getSubscriptionPeriod(subscriptionId: string): Promise<SubscriptionPeriod | null>
  }
}

let _services: Services | null = null

export function getServices(): Services {
  if (!_services) {
    const config = getConfig()
    const supabase = createServiceClient()

    const geocoder = createGeocoder({
      userAgent: config.osm.userAgent,
      contactEmail: config.osm.contactEmail,
      delayMs: config.osm.delayMs,
      timeoutMs: config.osm.timeoutMs,
      cache: createTtlCache<GeocodeResult>({ ttlMs: 24 * 60 * 60 * 1000, maxEntries: 1000 }),
      reverseCache: createTtlCache<AddressParts>({ ttlMs: 7 * 24 * 60 * 60 * 1000, maxEntries: 5000 }),
    })

    _services = {
      config,
      listings: createSupabaseListingStore(supabase),
      claims: createSupabaseClaimStore(supabase),
      users: createSupabaseUserDirectory(supabase),
      geocoder,
      searchArea: createAreaSearch({
        userAgent: config.osm.userAgent,
        timeoutMs: config.osm.timeoutMs,
        reverseGeocode: geocoder.reverseGeocode,
      }),
      mailer: createResendMailer({ apiKey: config.email.apiKey, from: config.email.from, siteUrl: config.siteUrl }),
      auth: {
        getUser: (request) => getRequestUser(request),
        signIn: (email, password) => signInWithPassword(email, password),
      },
      billing: {
        webhooks: getStripe(),
        createSession: (params) => getStripe().checkout.sessions.create(params),
        getSubscriptionPeriod,
      },
    }
  }
  return _services
}
