'use client'

import { useRef } from 'react'
import { useFrameResize } from '@/hooks/use-frame-resize'
import { CONFIG } from '@/lib/config'
import { INDICATOR_CATALOG, type CatalogEntry } from '@/lib/indicators/catalog'
import { IndicatorPanel } from './IndicatorPanel'

interface DashboardProps {
  catalog?: readonly CatalogEntry[]
}

export function Dashboard({ catalog = INDICATOR_CATALOG }: DashboardProps) {
  const rootRef = useRef<HTMLDivElement>(null)
  useFrameResize(rootRef)

  return (
    <div ref={rootRef} className="max-w-7xl mx-auto px-4 py-6">
      <header className="mb-6">
        <h1 className="text-2xl font-bold text-gray-900 dark:text-white">{CONFIG.app.name}</h1>
        <p className="text-sm text-gray-600 dark:text-gray-400">{CONFIG.app.description}</p>
      </header>
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        {catalog.map((entry) => (
          <IndicatorPanel key={entry.id} entry={entry} />
        ))}
      </div>
      <footer className="mt-6 text-xs text-gray-500 dark:text-gray-400">Source: Federal Reserve Economic Data (FRED), Federal Reserve Bank of St. Louis</footer>
    </div>
  )
}
