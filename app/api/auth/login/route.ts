import { NextResponse } from 'next/server'
import { resolveLoginEmail } from '@/lib/auth'
import { clientIp, createRateLimiter } from '@/lib/rate-limit'
import { firstIssue, loginSchema } from '@/lib/schemas'
import { getServices } from '@/lib/services'

export const dynamic = 'force-dynamic'

const limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 10 })

/**
 * POST /api/auth/login
 * Body: { identifier, password }. The identifier is an email or a username.
 */
export async function POST(request: Request) {
  if (!limiter(clientIp(request)).allowed) {
    return NextResponse.json({ error: 'Too many requests' }, { status: 429 })
  }

  try {
    const parsed = loginSchema.safeParse(await request.json().catch(() => null))
    if (!parsed.success) {
      return NextResponse.json({ error: firstIssue(parsed.error) }, { status: 400 })
    }

    const services = getServices()
    const email = await resolveLoginEmail(parsed.data.identifier, services.users)
    const session = email ? await services.auth.signIn(email, parsed.data.password) : null
    if (!session) {
      return NextResponse.json({ error: 'Invalid credentials' }, { status: 401 })
    }

    return NextResponse.json(session)
  } catch (err) {
    console.error('[auth/login] Error:', err)
    return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
  }
}
