/**
 * Ownership claims by emailed one-time code.
 *
 * A claim binds a user to a listing once they show they can read mail at
 * the listing's website domain. Only the SHA-256 of the code is stored.
 *
 * Status moves pending → verified | expired | blocked and never leaves a
 * terminal state. Assigning the listing's owner is a separate step
 * (`assignOwnership`) taken by the caller after a successful verify.
 */

import { createHash, randomInt, timingSafeEqual } from 'node:crypto'
import type { ClaimMailer } from '@/lib/email'
import type { ClaimStore, ListingStore } from '@/lib/store'
import type { ClaimRequest, Listing } from '@/types'

export const CLAIM_CODE_TTL_MINUTES = 10
export const MAX_VERIFY_ATTEMPTS = 5
export const RESEND_COOLDOWN_SECONDS = 60

export type ClaimDomainFailure = 'missing_domain' | 'mismatch'

export class ClaimDomainError extends Error {
  readonly reason: ClaimDomainFailure

  constructor(reason: ClaimDomainFailure, message: string) {
    super(message)
    this.name = 'ClaimDomainError'
    this.reason = reason
  }
}

/** Lower-cased host of a website URL without a leading "www.", or ''. */
export function websiteDomain(website: string | null | undefined): string {
  const raw = (website ?? '').trim()
  if (!raw) return ''
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(raw) ? raw : `https://${raw}`
  try {
    return new URL(withScheme).hostname.toLowerCase().replace(/^www\./, '')
  } catch {
    return ''
  }
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@')
  return at >= 0 ? email.slice(at + 1).trim().toLowerCase() : ''
}

export function generateClaimCode(): string {
  return String(randomInt(100000, 1000000))
}

export function hashClaimCode(code: string): string {
  return createHash('sha256').update(code.trim()).digest('hex')
}

function hashesMatch(a: string, b: string): boolean {
  const x = Buffer.from(a, 'hex')
  const y = Buffer.from(b, 'hex')
  return x.length === y.length && timingSafeEqual(x, y)
}

function minutesFrom(now: Date, minutes: number): string {
  return new Date(now.getTime() + minutes * 60_000).toISOString()
}

export interface StartClaimDeps {
  claims: Pick<ClaimStore, 'deleteExpiredUnverified' | 'insert'>
  mailer: ClaimMailer
  now?: Date
  generateCode?: () => string
}

/**
 * Open a pending claim and email its code. Throws `ClaimDomainError` when
 * the email is not at the listing's website domain; mail failures propagate.
 */
export async function startClaim(
  deps: StartClaimDeps,
  listing: Pick<Listing, 'id' | 'name' | 'website'>,
  userId: string,
  email: string,
): Promise<{ claim: ClaimRequest; code: string }> {
  const domain = websiteDomain(listing.website)
  if (!domain) {
    throw new ClaimDomainError('missing_domain', 'This listing has no website, so it cannot be claimed by email.')
  }

  const address = email.trim().toLowerCase()
  if (emailDomain(address) !== domain) {
    throw new ClaimDomainError('mismatch', `Please use an email address at ${domain}.`)
  }

  const now = deps.now ?? new Date()
  const purged = await deps.claims.deleteExpiredUnverified(listing.id, userId, now)
  if (purged > 0) console.log('[claims] Purged stale claims', { listingId: listing.id, purged })

  const code = (deps.generateCode ?? generateClaimCode)()
  const claim = await deps.claims.insert({
    listing_id: listing.id,
    user_id: userId,
    email: address,
    code_hash: hashClaimCode(code),
    status: 'pending',
    expires_at: minutesFrom(now, CLAIM_CODE_TTL_MINUTES),
    attempts: 0,
    last_sent_at: now.toISOString(),
    verified_at: null,
  })

  await deps.mailer.sendClaimCode({
    to: address,
    code,
    listingName: listing.name,
    expiresInMinutes: CLAIM_CODE_TTL_MINUTES,
  })

  return { claim, code }
}

/**
 * Check a submitted code. Mutates `claim` to match what was persisted.
 * Returns true for an already-verified claim without checking the code.
 */
export async function verifyClaim(
  claims: Pick<ClaimStore, 'update'>,
  claim: ClaimRequest,
  submittedCode: string,
  now: Date = new Date(),
): Promise<boolean> {
  if (claim.status === 'verified') return true
  if (claim.status !== 'pending') return false

  if (now.getTime() > new Date(claim.expires_at).getTime()) {
    claim.status = 'expired'
    await claims.update(claim.id, { status: 'expired' })
    return false
  }

  if (claim.attempts >= MAX_VERIFY_ATTEMPTS) {
    claim.status = 'blocked'
    await claims.update(claim.id, { status: 'blocked' })
    return false
  }

  claim.attempts += 1

  if (hashesMatch(hashClaimCode(submittedCode), claim.code_hash)) {
    claim.status = 'verified'
    claim.verified_at = now.toISOString()
    await claims.update(claim.id, {
      attempts: claim.attempts,
      status: claim.status,
      verified_at: claim.verified_at,
    })
    return true
  }

  await claims.update(claim.id, { attempts: claim.attempts })
  return false
}

export function canResendNow(
  claim: Pick<ClaimRequest, 'last_sent_at'>,
  now: Date = new Date(),
  cooldownSeconds: number = RESEND_COOLDOWN_SECONDS,
): boolean {
  if (!claim.last_sent_at) return true
  return now.getTime() - new Date(claim.last_sent_at).getTime() >= cooldownSeconds * 1000
}

export type ResendOutcome =
  | { ok: true }
  | { ok: false; reason: 'not_pending' }
  | { ok: false; reason: 'cooldown'; retryAfterSeconds: number }

/** Issue a fresh code and expiry for a pending claim. Attempts carry over. */
export async function resendClaimCode(
  deps: Omit<StartClaimDeps, 'claims'> & { claims: Pick<ClaimStore, 'update'> },
  claim: ClaimRequest,
  listingName: string,
): Promise<ResendOutcome> {
  if (claim.status !== 'pending') return { ok: false, reason: 'not_pending' }
  if (claim.attempts >= MAX_VERIFY_ATTEMPTS) return { ok: false, reason: 'not_pending' }

  const now = deps.now ?? new Date()
  if (!canResendNow(claim, now)) {
    const elapsed = claim.last_sent_at ? (now.getTime() - new Date(claim.last_sent_at).getTime()) / 1000 : 0
    return { ok: false, reason: 'cooldown', retryAfterSeconds: Math.ceil(RESEND_COOLDOWN_SECONDS - elapsed) }
  }

  const code = (deps.generateCode ?? generateClaimCode)()
  const patch = {
    code_hash: hashClaimCode(code),
    expires_at: minutesFrom(now, CLAIM_CODE_TTL_MINUTES),
    last_sent_at: now.toISOString(),
  }
  await deps.claims.update(claim.id, patch)
  Object.assign(claim, patch)

  await deps.mailer.sendClaimCode({
    to: claim.email,
    code,
    listingName,
    expiresInMinutes: CLAIM_CODE_TTL_MINUTES,
  })

  return { ok: true }
}

export type OwnershipOutcome = 'assigned' | 'already_owner' | 'owned_by_other'

/**
 * Set the owner only when the listing is unowned. `listing` may be stale;
 * the write is conditional on `owner_id` still being null.
 */
export async function assignOwnership(
  listings: Pick<ListingStore, 'assignOwnerIfUnowned' | 'getById'>,
  listing: Pick<Listing, 'id' | 'owner_id'>,
  userId: string,
): Promise<OwnershipOutcome> {
  if (listing.owner_id === userId) return 'already_owner'
  if (listing.owner_id) return 'owned_by_other'
  if (await listings.assignOwnerIfUnowned(listing.id, userId)) return 'assigned'

  const current = await listings.getById(listing.id)
  return current?.owner_id === userId ? 'already_owner' : 'owned_by_other'
}
