import { z } from 'zod'

const required = (name: string) => z.string({ required_error: `${name} is not set` }).trim().min(1, `${name} is empty`)

const optional = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))

export const envSchema = z.object({
  NEXT_PUBLIC_SUPABASE_URL: required('NEXT_PUBLIC_SUPABASE_URL').url(),
  NEXT_PUBLIC_SUPABASE_ANON_KEY: required('NEXT_PUBLIC_SUPABASE_ANON_KEY'),
  SUPABASE_SERVICE_ROLE_KEY: required('SUPABASE_SERVICE_ROLE_KEY'),
  NEXT_PUBLIC_SITE_URL: z.string().url().default('http://localhost:3000'),

  STRIPE_SECRET_KEY: required('STRIPE_SECRET_KEY'),
  STRIPE_WEBHOOK_SECRET: required('STRIPE_WEBHOOK_SECRET'),
  STRIPE_PRICE_FEATURED: optional,
  STRIPE_PRICE_PREMIUM: optional,
  STRIPE_PRICE_TOP: optional,

  RESEND_API_KEY: required('RESEND_API_KEY'),
  RESEND_FROM_EMAIL: z.string().default('Nearby Directory <noreply@example.com>'),

  OSM_USER_AGENT: z.string().default('NearbyDirectory/1.0 (contact: ops@example.com)'),
  OSM_CONTACT_EMAIL: optional,
  APP_TIME_ZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimeZone, { message: 'APP_TIME_ZONE is not a valid IANA time zone' }),
  GEOCODE_DELAY_MS: z.coerce.number().int().nonnegative().default(1050),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
})

export interface AppConfig {
  supabase: { url: string; anonKey: string; serviceRoleKey: string }
  siteUrl: string
  stripe: {
    secretKey: string
    webhookSecret: string
    prices: { featured?: string; premium?: string; top?: string }
  }
  email: { apiKey: string; from: string }
  osm: { userAgent: string; contactEmail?: string; delayMs: number; timeoutMs: number }
  timeZone: string
}

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

/**
 * Parse the environment into an AppConfig. Throws a single error listing
 * every missing or invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid environment configuration:\n${problems.join('\n')}`)
  }

  const e = parsed.data
  return {
    supabase: {
      url: e.NEXT_PUBLIC_SUPABASE_URL,
      anonKey: e.NEXT_PUBLIC_SUPABASE_ANON_KEY,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
    siteUrl: e.NEXT_PUBLIC_SITE_URL.replace(/\/+$/, ''),
    stripe: {
      secretKey: e.STRIPE_SECRET_KEY,
      webhookSecret: e.STRIPE_WEBHOOK_SECRET,
      prices: {
        featured: e.STRIPE_PRICE_FEATURED,
        premium: e.STRIPE_PRICE_PREMIUM,
        top: e.STRIPE_PRICE_TOP,
      },
    },
    email: { apiKey: e.RESEND_API_KEY, from: e.RESEND_FROM_EMAIL },
    osm: {
      userAgent: e.OSM_USER_AGENT,
      contactEmail: e.OSM_CONTACT_EMAIL,
      delayMs: e.GEOCODE_DELAY_MS,
      timeoutMs: e.HTTP_TIMEOUT_MS,
    },
    timeZone: e.APP_TIME_ZONE,
  }
}

let _config: AppConfig | null = null

/** Process-wide config, parsed once. */
export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig()
  }
  return _config
}
