import Link from 'next/link'
import SearchForm from '@/components/SearchForm'

const POPULAR = ['pizza', 'coffee', 'gas station', 'grocery', 'salon', 'pharmacy', 'gym', 'hotel']

export default function HomePage() {
  return (
    <div>
      <section className="bg-gradient-to-b from-blue-50 to-gray-50">
        <div className="section py-16 sm:py-24">
          <h1 className="text-3xl sm:text-4xl font-extrabold text-gray-900 max-w-2xl">
            Find local businesses near you
          </h1>
          <p className="mt-3 text-gray-600 max-w-xl">
            Owner-verified listings first, then everything else nearby from OpenStreetMap.
          </p>
          <div className="mt-8 max-w-3xl">
            <SearchForm />
          </div>
        </div>
      </section>

      <section className="section py-12">
        <h2 className="text-sm font-semibold uppercase tracking-wide text-gray-500 mb-4">Popular searches</h2>
        <div className="flex flex-wrap gap-2">
          {POPULAR.map((term) => (
            <Link
              key={term}
              href={`/search?term=${encodeURIComponent(term)}`}
              className="text-sm font-medium text-blue-700 bg-blue-50 border border-blue-100 rounded-full px-3 py-1 hover:bg-blue-100 transition-colors"
            >
              {term}
            </Link>
          ))}
        </div>
      </section>
    </div>
  )
}
