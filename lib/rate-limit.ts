/**
 * In-memory sliding-window rate limiter for API routes.
 * Each server instance keeps its own map, so this limits bursts, not global volume.
 */

export interface RateLimitResult {
  allowed: boolean
  remaining: number
  /** Seconds until the oldest hit leaves the window; 0 when allowed. */
  retryAfterSeconds: number
}

export function createRateLimiter(opts: {
  windowMs: number
  maxRequests: number
  now?: () => number
}) {
  const hits = new Map<string, number[]>()
  const clock = opts.now ?? (() => Date.now())

  return function check(key: string): RateLimitResult {
    const now = clock()
    const window = hits.get(key)?.filter((t) => t > now - opts.windowMs) ?? []

    if (window.length >= opts.maxRequests) {
      hits.set(key, window)
      const retryAfterMs = window[0] + opts.windowMs - now
      return { allowed: false, remaining: 0, retryAfterSeconds: Math.max(1, Math.ceil(retryAfterMs / 1000)) }
    }

    window.push(now)
    hits.set(key, window)
    return { allowed: true, remaining: opts.maxRequests - window.length, retryAfterSeconds: 0 }
  }
}

/** First hop of x-forwarded-for, or loopback when absent. */
export function clientIp(request: Request): string {
  return request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || '127.0.0.1'
}
