import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { getConfig } from '@/lib/config'

// Server client (anon key). Used for auth calls on behalf of a request.
// cache: 'no-store' prevents Next.js from caching Supabase fetch responses
export function createServerClient(): SupabaseClient {
  const { supabase } = getConfig()
  return createClient(supabase.url, supabase.anonKey, {
    auth: { persistSession: false },
    global: { fetch: (url, options = {}) => fetch(url, { ...options, cache: 'no-store' }) },
  })
}

let serviceClient: SupabaseClient | null = null

/** Service-role client. Bypasses RLS; server-side only. */
export function createServiceClient(): SupabaseClient {
  if (!serviceClient) {
    const { supabase } = getConfig()
    serviceClient = createClient(supabase.url, supabase.serviceRoleKey, {
      auth: { persistSession: false },
      global: { fetch: (url, options = {}) => fetch(url, { ...options, cache: 'no-store' }) },
    })
  }
  return serviceClient
}
