import { describe, it, expect } from 'vitest'
import { loadConfig } from '@/lib/config'

const baseEnv = {
  NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321',
  NEXT_PUBLIC_SUPABASE_ANON_KEY: 'anon-key',
  SUPABASE_SERVICE_ROLE_KEY: 'service-role-key',
  STRIPE_SECRET_KEY: 'sk_test_placeholder',
  STRIPE_WEBHOOK_SECRET: 'test-secret',
  RESEND_API_KEY: 're_placeholder',
}

describe('loadConfig', () => {
  it('fills defaults for optional settings', () => {
    const config = loadConfig(baseEnv)

    expect(config.siteUrl).toBe('http://localhost:3000')
    expect(config.timeZone).toBe('UTC')
    expect(config.osm).toEqual({
      userAgent: 'NearbyDirectory/1.0 (contact: ops@example.com)',
      contactEmail: undefined,
      delayMs: 1050,
      timeoutMs: 15_000,
    })
    expect(config.stripe).toEqual({
      secretKey: 'sk_test_placeholder',
      webhookSecret: 'test-secret',
      prices: { featured: undefined, premium: undefined, top: undefined },
    })
    expect(config.email.from).toBe('Nearby Directory <noreply@example.com>')
  })

  it('normalizes overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      NEXT_PUBLIC_SITE_URL: 'https://dir.example/',
      STRIPE_PRICE_FEATURED: ' price_featured ',
      STRIPE_PRICE_TOP: '   ',
      APP_TIME_ZONE: 'America/Chicago',
      GEOCODE_DELAY_MS: '0',
    })

    expect(config.siteUrl).toBe('https://dir.example')
    expect(config.stripe.prices).toEqual({ featured: 'price_featured', premium: undefined, top: undefined })
    expect(config.timeZone).toBe('America/Chicago')
    expect(config.osm.delayMs).toBe(0)
  })

  it('lists every missing variable in one error', () => {
    const { STRIPE_SECRET_KEY: _s, RESEND_API_KEY: _r, ...env } = baseEnv

    expect(() => loadConfig(env)).toThrow(
      [
        'Invalid environment configuration:',
        '  - STRIPE_SECRET_KEY: STRIPE_SECRET_KEY is not set',
        '  - RESEND_API_KEY: RESEND_API_KEY is not set',
      ].join('\n'),
    )
  })

  it('rejects an unknown time zone', () => {
    expect(() => loadConfig({ ...baseEnv, APP_TIME_ZONE: 'Mars/Olympus_Mons' })).toThrow(
      'APP_TIME_ZONE: APP_TIME_ZONE is not a valid IANA time zone',
    )
  })
})
