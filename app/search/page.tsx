import type { Metadata } from 'next'
import Link from 'next/link'
import ListingCard from '@/components/ListingCard'
import SearchForm from '@/components/SearchForm'
import { searchDirectory } from '@/lib/search'
import { getServices } from '@/lib/services'
import { applyReconciliations } from '@/lib/store'

export const dynamic = 'force-dynamic'

interface Props {
  searchParams: { [key: string]: string | string[] | undefined }
}

export const metadata: Metadata = {
  title: 'Search',
  description: 'Search local businesses by category and location.',
  robots: { index: false },
}

function sp(v: string | string[] | undefined): string {
  return (typeof v === 'string' ? v : Array.isArray(v) ? v[0] : '') ?? ''
}

export default async function SearchPage({ searchParams }: Props) {
  const term = sp(searchParams.term).trim()
  const location = sp(searchParams.location).trim()

  const header = (
    <div className="mb-6">
      <nav className="text-sm text-gray-500 mb-4">
        <Link href="/" className="hover:text-blue-600 transition-colors">Home</Link>
        <span className="mx-1.5">/</span>
        <span className="text-gray-900">Search</span>
      </nav>
      <h1 className="text-2xl font-bold text-gray-900">
        {term && location ? `${term} near ${location}` : 'Search local businesses'}
      </h1>
      <div className="mt-4">
        <SearchForm term={term} location={location} />
      </div>
    </div>
  )

  if (!term && !location) {
    return (
      <div className="section py-8">
        {header}
        <div className="text-center py-16 text-gray-500">
          <p className="text-sm">Enter a business type and a city, state or ZIP to search.</p>
        </div>
      </div>
    )
  }

  const services = getServices()
  const { local, external, promoted, error, reconciliations } = await searchDirectory(term, location, {
    listings: services.listings,
    geocode: services.geocoder.geocode,
    searchArea: services.searchArea,
    timeZone: services.config.timeZone,
  })

  if (reconciliations.length > 0) {
    await applyReconciliations(services.listings, reconciliations)
  }

  return (
    <div className="section py-8">
      {header}

      {error && (
        <div className="mb-6 rounded-lg border border-amber-200 bg-amber-50 px-4 py-3 text-sm text-amber-800">
          {error}
        </div>
      )}

      {promoted.length > 0 && (
        <section className="mb-10">
          <h2 className="text-sm font-semibold uppercase tracking-wide text-amber-700 mb-3">Featured nearby</h2>
          <div className="grid sm:grid-cols-2 lg:grid-cols-3 gap-4">
            {promoted.map((r) => (
              <ListingCard key={`promoted_${r.key}`} result={r} highlighted />
            ))}
          </div>
        </section>
      )}

      {local.length > 0 && (
        <section className="mb-10">
          <h2 className="text-sm font-semibold uppercase tracking-wide text-gray-500 mb-3">Directory listings</h2>
          <div className="grid sm:grid-cols-2 lg:grid-cols-3 gap-4">
            {local.map((r) => (
              <ListingCard key={r.key} result={r} />
            ))}
          </div>
        </section>
      )}

      {external.length > 0 && (
        <section>
          <h2 className="text-sm font-semibold uppercase tracking-wide text-gray-500 mb-3">More places nearby</h2>
          <div className="grid sm:grid-cols-2 lg:grid-cols-3 gap-4">
            {external.map((r) => (
              <ListingCard key={r.key} result={r} />
            ))}
          </div>
        </section>
      )}
    </div>
  )
}
