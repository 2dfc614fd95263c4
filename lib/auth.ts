import type { SupabaseClient } from '@supabase/supabase-js'
import { createServerClient } from '@/lib/supabase'
import type { UserDirectory } from '@/lib/store'
import type { RequestUser } from '@/types'

/** Token from an `Authorization: Bearer <token>` header, or null. */
export function bearerToken(request: Request): string | null {
  const header = request.headers.get('Authorization') ?? ''
  const match = header.match(/^Bearer\s+(.+)$/i)
  return match ? match[1].trim() : null
}

/**
 * The signed-in user behind a request, resolved from its Supabase access
 * token. Null when the header is missing or the token is not valid.
 */
export async function getRequestUser(
  request: Request,
  client?: { auth: Pick<SupabaseClient['auth'], 'getUser'> },
): Promise<RequestUser | null> {
  const token = bearerToken(request)
  if (!token) return null

  const { data, error } = await (client ?? createServerClient()).auth.getUser(token)
  if (error || !data.user) return null
  return { id: data.user.id, email: data.user.email ?? null }
}

/**
 * Email to sign in with. Identifiers containing "@" are emails already;
 * anything else is a username looked up case-insensitively.
 */
export async function resolveLoginEmail(identifier: string, directory: UserDirectory): Promise<string | null> {
  const value = identifier.trim()
  if (!value) return null
  if (value.includes('@')) return value.toLowerCase()
  return directory.emailForUsername(value)
}

export interface LoginSession {
  accessToken: string
  refreshToken: string
  expiresAt: number | null
  user: RequestUser
}

/** Password sign-in. Null when Supabase rejects the credentials. */
export async function signInWithPassword(
  email: string,
  password: string,
  client?: { auth: Pick<SupabaseClient['auth'], 'signInWithPassword'> },
): Promise<LoginSession | null> {
  const { data, error } = await (client ?? createServerClient()).auth.signInWithPassword({ email, password })
  if (error || !data.session || !data.user) {
    if (error) console.warn('[auth] Sign-in rejected:', error.message)
    return null
  }
  return {
    accessToken: data.session.access_token,
    refreshToken: data.session.refresh_token,
    expiresAt: data.session.expires_at ?? null,
    user: { id: data.user.id, email: data.user.email ?? null },
  }
}
