import Link from 'next/link'
import { assertNever, resultHref } from '@/lib/directory-results'
import { TIER_CONFIG } from '@/lib/promotion'
import type { DirectoryResult, StarBreakdown } from '@/types'

interface Props {
  result: DirectoryResult
  /** Rendered in the promoted band */
  highlighted?: boolean
}

const STAR_PATH =
  'M9.049 2.927c.3-.921 1.603-.921 1.902 0l1.07 3.292a1 1 0 00.95.69h3.462c.969 0 1.371 1.24.588 1.81l-2.8 2.034a1 1 0 00-.364 1.118l1.07 3.292c.3.921-.755 1.688-1.54 1.118l-2.8-2.034a1 1 0 00-1.175 0l-2.8 2.034c-.784.57-1.838-.197-1.539-1.118l1.07-3.292a1 1 0 00-.364-1.118L2.98 8.72c-.783-.57-.38-1.81.588-1.81h3.461a1 1 0 00.951-.69l1.07-3.292z'

function Stars({ stars }: { stars: StarBreakdown }) {
  const cells = [
    ...Array.from({ length: stars.full }, () => 'text-yellow-400'),
    ...Array.from({ length: stars.half }, () => 'text-yellow-300'),
    ...Array.from({ length: stars.empty }, () => 'text-gray-200'),
  ]
  return (
    <div className="flex items-center gap-0.5">
      {cells.map((color, i) => (
        <svg key={i} className={`w-4 h-4 ${color}`} fill="currentColor" viewBox="0 0 20 20">
          <path d={STAR_PATH} />
        </svg>
      ))}
    </div>
  )
}

function sourceDetail(result: DirectoryResult): { label: string; external: boolean } {
  switch (result.source) {
    case 'manual':
      return { label: result.category || 'Local business', external: false }
    case 'osm':
      return result.listing_id !== null
        ? { label: 'Listed business', external: false }
        : { label: 'From OpenStreetMap', external: true }
    default:
      return assertNever(result)
  }
}

export default function ListingCard({ result: r, highlighted = false }: Props) {
  const href = resultHref(r)
  const { label, external } = sourceDetail(r)
  const tier = r.featured && r.plan ? TIER_CONFIG[r.plan].label : null

  return (
    <div
      className={`bg-white rounded-2xl border overflow-hidden hover:shadow-lg transition-all duration-200 flex flex-col ${
        highlighted ? 'border-amber-300 ring-1 ring-amber-200' : 'border-gray-200 hover:border-blue-200'
      }`}
    >
      {r.image_url ? (
        <div className="aspect-[4/3] overflow-hidden">
          <img src={r.image_url} alt={r.name} className="w-full h-full object-cover" loading="lazy" />
        </div>
      ) : null}

      <div className="p-4 flex flex-col flex-1">
        <div className="flex items-start justify-between gap-2">
          {external ? (
            <a href={href} target="_blank" rel="noopener noreferrer">
              <h3 className="font-bold text-base text-gray-900 leading-snug hover:text-blue-700 transition-colors line-clamp-2">
                {r.name}
              </h3>
            </a>
          ) : (
            <Link href={href}>
              <h3 className="font-bold text-base text-gray-900 leading-snug hover:text-blue-700 transition-colors line-clamp-2">
                {r.name}
              </h3>
            </Link>
          )}
          {tier && (
            <span className="shrink-0 text-[11px] font-bold text-amber-800 bg-amber-100 rounded-full px-2.5 py-1">
              {tier}
            </span>
          )}
        </div>

        {r.rating > 0 ? (
          <div className="flex items-center gap-1.5 mt-1.5">
            <Stars stars={r.stars} />
            <span className="text-sm font-bold text-gray-800">{r.rating.toFixed(1)}</span>
            <span className="text-xs text-gray-400">({r.review_count.toLocaleString()})</span>
          </div>
        ) : (
          <p className="mt-1.5 text-xs text-gray-400">No reviews yet</p>
        )}

        <p className="mt-1 text-xs text-gray-500">
          {label} &middot; {r.display_location}
        </p>

        <div className="flex-1" />

        <div className="flex gap-2 mt-4 pt-3 border-t border-gray-100">
          {r.phone ? (
            <a
              href={`tel:${r.phone}`}
              className="flex-1 flex items-center justify-center py-2 px-3 bg-blue-700 text-white text-sm font-semibold rounded-lg hover:bg-blue-800 transition-colors"
            >
              Call
            </a>
          ) : null}
          {r.website ? (
            <a
              href={r.website}
              target="_blank"
              rel="noopener noreferrer"
              className="flex-1 flex items-center justify-center py-2 px-3 bg-white border border-gray-200 text-gray-700 text-sm font-semibold rounded-lg hover:border-gray-300 transition-colors"
            >
              Website
            </a>
          ) : null}
          <a
            href={r.maps_url}
            target="_blank"
            rel="noopener noreferrer"
            className="flex-1 flex items-center justify-center py-2 px-3 bg-white border border-gray-200 text-gray-700 text-sm font-semibold rounded-lg hover:border-gray-300 transition-colors"
          >
            Directions
          </a>
        </div>
      </div>
    </div>
  )
}
