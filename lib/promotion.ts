import type { Listing, ListingPatch, PromotionTier } from '@/types'

export const TIER_CONFIG: Record<PromotionTier, { priority: number; label: string }> = {
  featured: { priority: 100, label: 'Featured' },
  premium:  { priority: 200, label: 'Premium' },
  top:      { priority: 300, label: 'Top Slot' },
}

export const PROMOTION_TIERS: readonly PromotionTier[] = ['featured', 'premium', 'top']

export function isPromotionTier(value: unknown): value is PromotionTier {
  return typeof value === 'string' && Object.hasOwn(TIER_CONFIG, value)
}

/** Sort priority for a tier; 0 when the listing has no paid tier. */
export function priorityForTier(tier: PromotionTier | null | undefined): number {
  return tier ? TIER_CONFIG[tier].priority : 0
}

type PromotionFields = Pick<Listing, 'is_active' | 'featured_from' | 'featured_until' | 'priority'>

/** Active and inside its promotion window. */
export function isPromotedNow(listing: PromotionFields, now: Date): boolean {
  if (!listing.is_active) return false
  const t = now.getTime()
  if (listing.featured_from && t < new Date(listing.featured_from).getTime()) return false
  if (listing.featured_until && t > new Date(listing.featured_until).getTime()) return false
  return true
}

/**
 * The deactivation write for a listing whose promotion window has elapsed,
 * or null when nothing needs to change.
 */
export function reconcilePromotionExpiry(listing: PromotionFields, now: Date): ListingPatch | null {
  if (!listing.featured_until) return null
  if (new Date(listing.featured_until).getTime() >= now.getTime()) return null
  if (!listing.is_active && listing.priority === 0) return null
  return { is_active: false, priority: 0 }
}
