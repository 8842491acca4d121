'use client'

import { useQuery, type UseQueryResult } from '@tanstack/react-query'
import { CONFIG } from '@/lib/config'
import type { CatalogEntry } from '@/lib/indicators/catalog'
import { IndicatorDocumentSchema, type IndicatorDocument } from '@/lib/schema/indicator'
import { ValidationError } from '@/lib/utils/errors'

/**
 * Loads one published document. A 404 means the fetcher has never written it:
 * that resolves to null so the panel can be left out.
 */
export async function fetchIndicatorDocument(
  file: string,
  baseUrl: string = CONFIG.dashboard.dataBaseUrl,
  fetchImpl: typeof fetch = fetch
): Promise<IndicatorDocument | null> {
  const response = await fetchImpl(`${baseUrl.replace(/\/$/, '')}/${file}`, { cache: 'no-store' })
  if (response.status === 404) return null
  if (!response.ok) throw new Error(`Failed to load ${file} (HTTP ${response.status})`)

  let json: unknown
  try {
    json = await response.json()
  } catch {
    throw new ValidationError(`${file} is not valid JSON`)
  }

  const parsed = IndicatorDocumentSchema.safeParse(json)
  if (!parsed.success) {
    throw new ValidationError(`${file} does not match the indicator schema: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  }
  return parsed.data
}

const RETRY_DELAY = (attemptIndex: number) => Math.min(1000 * 2 ** attemptIndex, 8000)

export function useIndicator(entry: CatalogEntry): UseQueryResult<IndicatorDocument | null> {
  return useQuery({
    queryKey: ['indicator', entry.id],
    queryFn: () => fetchIndicatorDocument(entry.file),
    staleTime: CONFIG.dashboard.staleTimeMs,
    refetchInterval: false,
    refetchOnWindowFocus: false,
    // a malformed file will not fix itself on retry
    retry: (failureCount, error) => !(error instanceof ValidationError) && failureCount < 2,
    retryDelay: RETRY_DELAY,
  })
}
