/**
 * Next.js server start hook. Parses the environment once so a missing key
 * stops the server at boot instead of on the first request that needs it.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return

  const { getConfig } = await import('./lib/config')
  const config = getConfig()
  console.log('[boot] Configuration loaded', {
    siteUrl: config.siteUrl,
    timeZone: config.timeZone,
    prices: Object.entries(config.stripe.prices)
      .filter(([, id]) => Boolean(id))
      .map(([tier]) => tier),
  })
}
