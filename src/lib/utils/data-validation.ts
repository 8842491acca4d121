/**
 * Staleness of published documents, measured from the run that wrote them.
 * The dashboard only labels old data; it never hides it.
 */

export type DataFreshnessStatus = 'live' | 'delayed' | 'stale' | 'error'

export interface DataFreshnessInfo {
  status: DataFreshnessStatus
  ageInMinutes: number
  timestamp: Date
  formattedAge: string
  isStale: boolean
  warningMessage?: string
}

export interface FreshnessThresholds {
  readonly live: number
  readonly delayed: number
  readonly stale: number
}

/**
 * Maximum acceptable age (in minutes) for a file produced by the daily fetch
 */
export const DATA_FRESHNESS_THRESHOLDS = {
  // written within the last day
  DAILY_BATCH: {
    live: 1440,
    delayed: 2880, // one missed run
    stale: 10080, // a week of missed runs
  },
} as const

/**
 * Calculate data freshness based on timestamp and thresholds
 */
export function calculateDataFreshness(
  timestamp: Date | string,
  thresholds: FreshnessThresholds = DATA_FRESHNESS_THRESHOLDS.DAILY_BATCH,
  now: Date = new Date()
): DataFreshnessInfo {
  const dataDate = typeof timestamp === 'string' ? new Date(timestamp) : timestamp
  const ageMs = now.getTime() - dataDate.getTime()
  const ageInMinutes = Math.floor(ageMs / (1000 * 60))

  let status: DataFreshnessStatus = 'live'
  let warningMessage: string | undefined

  if (Number.isNaN(ageMs)) {
    status = 'error'
    warningMessage = 'Data timestamp is not a valid date'
  } else if (ageInMinutes < 0) {
    status = 'error'
    warningMessage = 'Data timestamp is in the future - system clock may be incorrect'
  } else if (ageInMinutes <= thresholds.live) {
    status = 'live'
  } else if (ageInMinutes <= thresholds.delayed) {
    status = 'delayed'
  } else if (ageInMinutes <= thresholds.stale) {
    status = 'stale'
    warningMessage = `Data is ${formatAge(ageInMinutes)} old - may be outdated`
  } else {
    status = 'stale'
    warningMessage = `Data is severely outdated (${formatAge(ageInMinutes)} old)`
  }

  return {
    status,
    ageInMinutes,
    timestamp: dataDate,
    formattedAge: Number.isNaN(ageMs) ? 'unknown' : formatAge(ageInMinutes),
    isStale: status === 'stale' || status === 'error',
    warningMessage,
  }
}

/**
 * Format age in human-readable format
 */
export function formatAge(ageInMinutes: number): string {
  if (ageInMinutes < 1) return 'just now'
  if (ageInMinutes < 60) return `${ageInMinutes}m ago`

  const hours = Math.floor(ageInMinutes / 60)
  if (hours < 24) return `${hours}h ago`

  const days = Math.floor(hours / 24)
  if (days < 30) return `${days}d ago`

  const months = Math.floor(days / 30)
  if (months < 12) return `${months}mo ago`

  const years = Math.floor(months / 12)
  return `${years}y ago`
}

/**
 * Get color class for freshness status (Tailwind CSS)
 */
export function getFreshnessColorClass(status: DataFreshnessStatus): string {
  switch (status) {
    case 'live':
      return 'text-green-600 dark:text-green-400 bg-green-50 dark:bg-green-900/20'
    case 'delayed':
      return 'text-yellow-600 dark:text-yellow-400 bg-yellow-50 dark:bg-yellow-900/20'
    case 'stale':
      return 'text-red-600 dark:text-red-400 bg-red-50 dark:bg-red-900/20'
    case 'error':
      return 'text-gray-600 dark:text-gray-400 bg-gray-50 dark:bg-gray-900/20'
  }
}

/**
 * Get status badge text
 */
export function getFreshnessLabel(status: DataFreshnessStatus): string {
  switch (status) {
    case 'live':
      return 'Fresh'
    case 'delayed':
      return 'Delayed'
    case 'stale':
      return 'Stale'
    case 'error':
      return 'Error'
  }
}
