interface Props {
  term?: string
  location?: string
}

/** Plain GET form to /search; works without client JS. */
export default function SearchForm({ term = '', location = '' }: Props) {
  return (
    <form action="/search" method="get" className="flex flex-col sm:flex-row gap-2">
      <input
        name="term"
        defaultValue={term}
        placeholder="What are you looking for? (pizza, salon, gas)"
        className="flex-1 rounded-lg border border-gray-200 bg-white px-4 py-3 text-sm focus:border-blue-500 focus:outline-none focus:ring-2 focus:ring-blue-100"
        required
      />
      <input
        name="location"
        defaultValue={location}
        placeholder="City, state or ZIP"
        className="flex-1 rounded-lg border border-gray-200 bg-white px-4 py-3 text-sm focus:border-blue-500 focus:outline-none focus:ring-2 focus:ring-blue-100"
        required
      />
      <button
        type="submit"
        className="rounded-lg bg-blue-700 px-6 py-3 text-sm font-semibold text-white hover:bg-blue-800 transition-colors"
      >
        Search
      </button>
    </form>
  )
}
