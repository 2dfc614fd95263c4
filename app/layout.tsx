import type { Metadata } from 'next'
import './globals.css'
import Link from 'next/link'

export const metadata: Metadata = {
  title: {
    default: 'Nearby Directory | Find local businesses',
    template: '%s | Nearby Directory',
  },
  description:
    'Search local businesses by category and location. ' +
    'Owner-verified listings alongside places from OpenStreetMap.',
  metadataBase: new URL(process.env.NEXT_PUBLIC_SITE_URL ?? 'http://localhost:3000'),
  openGraph: { siteName: 'Nearby Directory', type: 'website' },
}

// Inline SVG pin icon
function PinIcon() {
  return (
    <svg className="w-6 h-6 text-blue-600" fill="currentColor" viewBox="0 0 24 24">
      <path d="M12 2a7 7 0 00-7 7c0 5.25 7 13 7 13s7-7.75 7-13a7 7 0 00-7-7zm0 9.5a2.5 2.5 0 110-5 2.5 2.5 0 010 5z" />
    </svg>
  )
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="min-h-screen flex flex-col bg-gray-50 text-gray-900 antialiased">
        <header className="bg-white border-b border-gray-100 sticky top-0 z-50 shadow-sm">
          <div className="section flex items-center justify-between h-16">
            <Link href="/" className="flex items-center gap-2 font-bold text-lg text-blue-700 hover:text-blue-800 transition-colors">
              <PinIcon />
              <span>Nearby Directory</span>
            </Link>
            <nav className="flex items-center gap-1 text-sm font-medium">
              <Link href="/" className="px-3 py-2 text-gray-600 hover:text-blue-700 hover:bg-blue-50 rounded-lg transition-colors">
                Home
              </Link>
              <Link href="/search" className="px-3 py-2 text-gray-600 hover:text-blue-700 hover:bg-blue-50 rounded-lg transition-colors">
                Search
              </Link>
            </nav>
          </div>
        </header>

        <main className="flex-1">{children}</main>

        <footer className="bg-gray-900 text-gray-400">
          <div className="section py-10">
            <p className="text-sm leading-relaxed">
              Listings marked &ldquo;From OpenStreetMap&rdquo; come from OpenStreetMap contributors (ODbL).
              Business owners can claim a listing with an email at their website&apos;s domain.
            </p>
            <div className="border-t border-gray-800 mt-6 pt-6 text-center text-xs text-gray-600">
              © {new Date().getFullYear()} Nearby Directory
            </div>
          </div>
        </footer>
      </body>
    </html>
  )
}
