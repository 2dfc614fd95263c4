'use client'

import { useEffect, useRef } from 'react'

type TrackEvent = 'view' | 'call' | 'website' | 'directions'

interface Props {
  listingId: number
  children: React.ReactNode
}

function send(listingId: number, event: TrackEvent) {
  const body = JSON.stringify({ event })
  const url = `/api/listings/${listingId}/track`
  if (navigator.sendBeacon) {
    navigator.sendBeacon(url, new Blob([body], { type: 'application/json' }))
    return
  }
  fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body, keepalive: true }).catch(
    (err: unknown) => console.warn('[track] Failed:', err),
  )
}

function eventForLink(href: string): TrackEvent | null {
  if (href.startsWith('tel:')) return 'call'
  if (href.includes('google.com/maps')) return 'directions'
  if (/^https?:\/\//.test(href)) return 'website'
  return null
}

/**
 * Wraps a listing's detail view to count:
 * - one view per mount
 * - call / website / directions clicks (delegated click on any <a> inside)
 */
export default function ListingTracker({ listingId, children }: Props) {
  const sent = useRef(false)

  useEffect(() => {
    if (sent.current) return
    sent.current = true
    send(listingId, 'view')
  }, [listingId])

  function handleClick(e: React.MouseEvent<HTMLDivElement>) {
    if (!(e.target instanceof Element)) return
    const anchor = e.target.closest('a[href]')
    const href = anchor?.getAttribute('href')
    if (!href) return
    const event = eventForLink(href)
    if (event) send(listingId, event)
  }

  return <div onClick={handleClick}>{children}</div>
}
