/** Request body schemas for the API routes. */

import { z } from 'zod'
import { parseTimeOfDay } from '@/lib/hours'
import type { ListingCounter } from '@/types'

const trimmed = (max: number) => z.string().trim().max(max)

const timeOfDay = z
  .string()
  .trim()
  .refine((v) => parseTimeOfDay(v) !== null, { message: 'Times must look like HH:MM' })

const url = z
  .string()
  .trim()
  .max(500)
  .transform((v) => (v && !/^[a-z][a-z\d+.-]*:\/\//i.test(v) ? `https://${v}` : v))
  .pipe(z.union([z.literal(''), z.string().url({ message: 'Website must be a valid URL' })]))

const listingFields = {
  name: trimmed(200).min(1, 'Business name is required'),
  category: trimmed(100).default(''),
  location: trimmed(200).default(''),
  address: trimmed(300).default(''),
  city: trimmed(100).default(''),
  state: trimmed(100).default(''),
  zip_code: trimmed(20).default(''),
  website: url.nullable().default(null),
  phone: trimmed(40).nullable().default(null),
  image_url: url.nullable().default(null),
  open_time: timeOfDay.nullable().default(null),
  close_time: timeOfDay.nullable().default(null),
}

export const createListingSchema = z.object(listingFields)

export const updateListingSchema = z
  .object({
    name: listingFields.name,
    category: trimmed(100),
    location: trimmed(200),
    address: trimmed(300),
    city: trimmed(100),
    state: trimmed(100),
    zip_code: trimmed(20),
    website: url.nullable(),
    phone: trimmed(40).nullable(),
    image_url: url.nullable(),
    open_time: timeOfDay.nullable(),
    close_time: timeOfDay.nullable(),
  })
  .partial()
  .strict()
  .refine((v) => Object.keys(v).length > 0, { message: 'Nothing to update' })

export const holidaySchema = z.discriminatedUnion('on', [
  z.object({
    on: z.literal(true),
    note: trimmed(300).optional(),
    until: z.string().datetime({ offset: true, message: 'until must be an ISO timestamp' }).nullable().optional(),
  }),
  z.object({ on: z.literal(false) }),
])

const TRACK_EVENTS = {
  view: 'views_count',
  call: 'call_clicks',
  website: 'website_clicks',
  directions: 'directions_clicks',
} as const satisfies Record<string, ListingCounter>

export const trackSchema = z.object({
  event: z.enum(['view', 'call', 'website', 'directions']),
})

export function counterForEvent(event: z.infer<typeof trackSchema>['event']): ListingCounter {
  return TRACK_EVENTS[event]
}

export const importSchema = z.object({
  osm_id: z
    .string()
    .trim()
    .regex(/^(node|way|relation)_\d+$/, 'Invalid external place id'),
  name: trimmed(200).min(1, 'Business name is required'),
  category: trimmed(100).default(''),
  address: trimmed(300).default(''),
  city: trimmed(100).default(''),
  state: trimmed(100).default(''),
  zip_code: trimmed(20).default(''),
  phone: trimmed(40).default(''),
  website: url.default(''),
})

const listingId = z.coerce.number().int().positive()

export const claimStartSchema = z.object({
  listingId,
  email: z.string().trim().email('Enter a valid email address'),
})

export const claimVerifySchema = z.object({
  claimId: z.string().uuid('Invalid claim id'),
  code: z.string().trim().regex(/^\d{6}$/, 'Enter the 6-digit code'),
})

export const claimResendSchema = z.object({
  claimId: z.string().uuid('Invalid claim id'),
})

export const checkoutSchema = z.object({
  listingId,
  // Validated downstream so an unknown tier maps to its own error
  tier: z.string().trim().toLowerCase(),
})

export const loginSchema = z.object({
  identifier: z.string().trim().min(1, 'Enter your email or username'),
  password: z.string().min(1, 'Enter your password'),
})

export const searchQuerySchema = z.object({
  term: z.string().trim().max(100).default(''),
  location: z.string().trim().max(200).default(''),
})

export const listingIdParam = listingId

/** First issue message of a failed parse. */
export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid request'
}
