// ── Listings ────────────────────────────────────────────────────────

/** Paid placement levels, lowest to highest. */
export type PromotionTier = 'featured' | 'premium' | 'top'

export interface Listing {
  id: number
  name: string
  category: string
  location: string
  address: string
  city: string
  state: string
  zip_code: string
  is_manual: boolean
  external_id: string | null
  website: string | null
  phone: string | null
  image_url: string | null
  rating: number | null
  review_count: number | null
  // Time of day, "HH:MM" or "HH:MM:SS"
  open_time: string | null
  close_time: string | null
  is_on_holiday: boolean
  holiday_note: string | null
  holiday_until: string | null
  // Promotion
  plan: PromotionTier
  is_active: boolean
  featured_from: string | null
  featured_until: string | null
  priority: number
  stripe_session_id: string | null
  stripe_customer_id: string | null
  stripe_subscription_id: string | null
  last_paid_amount: number
  // Analytics
  views_count: number
  call_clicks: number
  website_clicks: number
  directions_clicks: number
  owner_id: string | null
  created_at: string
}

export type NewListing = Pick<Listing, 'name'> &
  Partial<Omit<Listing, 'id' | 'created_at'>>

export type ListingPatch = Partial<Omit<Listing, 'id' | 'created_at'>>

export type ListingCounter =
  | 'views_count'
  | 'call_clicks'
  | 'website_clicks'
  | 'directions_clicks'

/** A write produced by a read path, applied by the caller. */
export interface ListingReconciliation {
  listingId: number
  reason: 'promotion_expired' | 'holiday_ended'
  patch: ListingPatch
}

// ── Claims ──────────────────────────────────────────────────────────

export type ClaimStatus = 'pending' | 'verified' | 'expired' | 'blocked'

export interface ClaimRequest {
  id: string
  listing_id: number
  user_id: string
  email: string
  code_hash: string
  status: ClaimStatus
  expires_at: string
  attempts: number
  last_sent_at: string | null
  verified_at: string | null
  created_at: string
}

export type NewClaimRequest = Omit<ClaimRequest, 'id' | 'created_at'>

export type ClaimPatch = Partial<
  Pick<ClaimRequest, 'code_hash' | 'status' | 'expires_at' | 'attempts' | 'last_sent_at' | 'verified_at'>
>

// ── Search results ──────────────────────────────────────────────────

export interface StarBreakdown {
  full: number
  half: number
  empty: number
}

interface DirectoryResultBase {
  /** Stable per-result key, unique within one search response */
  key: string
  listing_id: number | null
  name: string
  address: string
  city: string
  state: string
  zip_code: string
  display_location: string
  maps_url: string
  phone: string
  website: string
  image_url: string
  rating: number
  review_count: number
  stars: StarBreakdown
  featured: boolean
  plan: PromotionTier | null
  featured_until: string | null
  owner_id: string | null
}

export interface ManualResult extends DirectoryResultBase {
  source: 'manual'
  listing_id: number
  category: string
  open_time: string | null
  close_time: string | null
  is_on_holiday: boolean
  holiday_note: string | null
}

export interface OsmResult extends DirectoryResultBase {
  source: 'osm'
  osm_id: string
  external_key: string
  category: string
  lat: number
  lon: number
}

export type DirectoryResult = ManualResult | OsmResult

export type ResultSource = DirectoryResult['source']

// ── External places ─────────────────────────────────────────────────

export interface GeoPoint {
  lat: number
  lon: number
  display: string
}

export interface AddressParts {
  address: string
  city: string
  state: string
  zip_code: string
}

/** A place returned by the area search, before projection into a DirectoryResult. */
export interface ExternalPlace extends AddressParts {
  osm_id: string
  name: string
  url: string
  phone: string
  lat: number
  lon: number
}

// ── Users ───────────────────────────────────────────────────────────

export interface RequestUser {
  id: string
  email: string | null
}
