/**
 * Persistence seams for listings and claims. Route handlers talk to these
 * interfaces; `lib/supabase-store.ts` implements them against Postgres.
 */

import type {
  ClaimPatch,
  ClaimRequest,
  Listing,
  ListingCounter,
  ListingPatch,
  ListingReconciliation,
  NewClaimRequest,
  NewListing,
} from '@/types'

export interface ListingStore {
  getById(id: number): Promise<Listing | null>
  getByExternalId(externalId: string): Promise<Listing | null>
  getBySubscriptionId(subscriptionId: string): Promise<Listing | null>
  findByExternalIds(externalIds: string[]): Promise<Listing[]>
  /** Manual listings whose category/name contains `term` and whose location fields contain `location`. */
  searchManual(term: string, location: string): Promise<Listing[]>
  /** Active listings matching the same filters, by priority desc then featured_until desc. */
  findPromotionCandidates(term: string, location: string, limit: number): Promise<Listing[]>
  listByOwner(ownerId: string): Promise<Listing[]>
  insert(listing: NewListing): Promise<Listing>
  /** Narrow update touching only the given fields. */
  update(id: number, patch: ListingPatch): Promise<void>
  /** Set `owner_id` only while it is still null. Returns whether a row changed. */
  assignOwnerIfUnowned(id: number, userId: string): Promise<boolean>
  /** Atomic in-place increment. */
  incrementCounter(id: number, counter: ListingCounter): Promise<void>
}

export interface ClaimStore {
  getById(id: string): Promise<ClaimRequest | null>
  insert(claim: NewClaimRequest): Promise<ClaimRequest>
  update(id: string, patch: ClaimPatch): Promise<void>
  /** Delete unverified claims for the pair whose expiry is before `now`. Returns the count removed. */
  deleteExpiredUnverified(listingId: number, userId: string, now: Date): Promise<number>
}

export interface UserDirectory {
  /** Email for a username, case-insensitive, or null. */
  emailForUsername(username: string): Promise<string | null>
}

/**
 * Persist writes produced by read-path evaluation. One failed write does
 * not stop the others; failures are logged and counted.
 */
export async function applyReconciliations(
  store: Pick<ListingStore, 'update'>,
  reconciliations: ListingReconciliation[],
): Promise<{ applied: number; failed: number }> {
  let applied = 0
  let failed = 0
  for (const r of reconciliations) {
    try {
      await store.update(r.listingId, r.patch)
      applied++
    } catch (err) {
      failed++
      console.error('[reconcile] Write failed', { listingId: r.listingId, reason: r.reason, err })
    }
  }
  return { applied, failed }
}
