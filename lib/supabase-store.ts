import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type { ClaimStore, ListingStore, UserDirectory } from '@/lib/store'
import type { ClaimRequest, Listing } from '@/types'

const nullableText = z.string().nullable().default(null)
const text = z.string().nullable().transform((v) => v ?? '')

export const listingRowSchema = z.object({
  id: z.coerce.number(),
  name: z.string(),
  category: text,
  location: text,
  address: text,
  city: text,
  state: text,
  zip_code: text,
  is_manual: z.boolean(),
  external_id: nullableText,
  website: nullableText,
  phone: nullableText,
  image_url: nullableText,
  rating: z.coerce.number().nullable(),
  review_count: z.coerce.number().nullable(),
  open_time: nullableText,
  close_time: nullableText,
  is_on_holiday: z.boolean(),
  holiday_note: nullableText,
  holiday_until: nullableText,
  plan: z.enum(['featured', 'premium', 'top']),
  is_active: z.boolean(),
  featured_from: nullableText,
  featured_until: nullableText,
  priority: z.coerce.number(),
  stripe_session_id: nullableText,
  stripe_customer_id: nullableText,
  stripe_subscription_id: nullableText,
  last_paid_amount: z.coerce.number(),
  views_count: z.coerce.number(),
  call_clicks: z.coerce.number(),
  website_clicks: z.coerce.number(),
  directions_clicks: z.coerce.number(),
  owner_id: nullableText,
  created_at: z.string(),
}) satisfies z.ZodType<Listing, z.ZodTypeDef, unknown>

export const claimRowSchema = z.object({
  id: z.string(),
  listing_id: z.coerce.number(),
  user_id: z.string(),
  email: z.string(),
  code_hash: z.string(),
  status: z.enum(['pending', 'verified', 'expired', 'blocked']),
  expires_at: z.string(),
  attempts: z.coerce.number(),
  last_sent_at: nullableText,
  verified_at: nullableText,
  created_at: z.string(),
}) satisfies z.ZodType<ClaimRequest, z.ZodTypeDef, unknown>

const listingRows = z.array(listingRowSchema)

function fail(op: string, error: { message: string }): never {
  throw new Error(`[store] ${op} failed: ${error.message}`)
}

export function createSupabaseListingStore(supabase: SupabaseClient): ListingStore {
  const table = () => supabase.from('listings')

  async function one(op: string, query: PromiseLike<{ data: unknown; error: { message: string } | null }>) {
    const { data, error } = await query
    if (error) fail(op, error)
    return data ? listingRowSchema.parse(data) : null
  }

  async function many(op: string, query: PromiseLike<{ data: unknown; error: { message: string } | null }>) {
    const { data, error } = await query
    if (error) fail(op, error)
    return listingRows.parse(data ?? [])
  }

  return {
    getById: (id) => one('getById', table().select('*').eq('id', id).maybeSingle()),

    getByExternalId: (externalId) =>
      one('getByExternalId', table().select('*').eq('external_id', externalId).maybeSingle()),

    getBySubscriptionId: (subscriptionId) =>
      one(
        'getBySubscriptionId',
        table().select('*').eq('stripe_subscription_id', subscriptionId).limit(1).maybeSingle(),
      ),

    async findByExternalIds(externalIds) {
      if (externalIds.length === 0) return []
      return many('findByExternalIds', table().select('*').in('external_id', externalIds))
    },

    searchManual: (term, location) =>
      many('searchManual', supabase.rpc('search_manual_listings', { p_term: term, p_location: location })),

    findPromotionCandidates: (term, location, limit) =>
      many(
        'findPromotionCandidates',
        supabase.rpc('promotion_candidates', { p_term: term, p_location: location, p_limit: limit }),
      ),

    listByOwner: (ownerId) =>
      many('listByOwner', table().select('*').eq('owner_id', ownerId).order('created_at', { ascending: false })),

    async insert(listing) {
      const row = await one('insert', table().insert(listing).select('*').single())
      if (!row) throw new Error('[store] insert returned no row')
      return row
    },

    async update(id, patch) {
      const { error } = await table().update(patch).eq('id', id)
      if (error) fail('update', error)
    },

    async assignOwnerIfUnowned(id, userId) {
      const { data, error } = await table()
        .update({ owner_id: userId })
        .eq('id', id)
        .is('owner_id', null)
        .select('id')
      if (error) fail('assignOwnerIfUnowned', error)
      return (data?.length ?? 0) > 0
    },

    async incrementCounter(id, counter) {
      const { error } = await supabase.rpc('increment_listing_counter', {
        p_listing_id: id,
        p_counter: counter,
      })
      if (error) fail('incrementCounter', error)
    },
  }
}

export function createSupabaseClaimStore(supabase: SupabaseClient): ClaimStore {
  const table = () => supabase.from('claim_requests')

  return {
    async getById(id) {
      const { data, error } = await table().select('*').eq('id', id).maybeSingle()
      if (error) fail('claims.getById', error)
      return data ? claimRowSchema.parse(data) : null
    },

    async insert(claim) {
      const { data, error } = await table().insert(claim).select('*').single()
      if (error) fail('claims.insert', error)
      return claimRowSchema.parse(data)
    },

    async update(id, patch) {
      const { error } = await table().update(patch).eq('id', id)
      if (error) fail('claims.update', error)
    },

    async deleteExpiredUnverified(listingId, userId, now) {
      const { count, error } = await table()
        .delete({ count: 'exact' })
        .eq('listing_id', listingId)
        .eq('user_id', userId)
        .is('verified_at', null)
        .lt('expires_at', now.toISOString())
      if (error) fail('claims.deleteExpiredUnverified', error)
      return count ?? 0
    },
  }
}

export function createSupabaseUserDirectory(supabase: SupabaseClient): UserDirectory {
  return {
    async emailForUsername(username) {
      const { data, error } = await supabase
        .from('profiles')
        .select('email')
        .ilike('username', username.replace(/[\\%_]/g, '\\$&'))
        .limit(1)
        .maybeSingle()
      if (error) fail('profiles.emailForUsername', error)
      const row = z.object({ email: z.string() }).nullable().parse(data)
      return row?.email ?? null
    },
  }
}
