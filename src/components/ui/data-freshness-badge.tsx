/**
 * Shows how long ago the fetcher wrote a document
 */

import {
  calculateDataFreshness,
  getFreshnessColorClass,
  getFreshnessLabel,
  type DataFreshnessStatus,
} from '@/lib/utils/data-validation'

interface DataFreshnessBadgeProps {
  lastUpdated: string
}

export function DataFreshnessBadge({ lastUpdated }: DataFreshnessBadgeProps) {
  const freshness = calculateDataFreshness(lastUpdated)
  const colorClass = getFreshnessColorClass(freshness.status)
  const label = getFreshnessLabel(freshness.status)

  return (
    <div className="inline-flex items-center gap-2">
      <span
        className={`inline-flex items-center gap-1 px-2 py-0.5 rounded-full text-xs font-medium ${colorClass}`}
        title={freshness.warningMessage ?? `Data status: ${label}`}
      >
        <StatusIndicator status={freshness.status} />
        {label}
      </span>
      <span className="text-xs text-gray-500 dark:text-gray-400" title="Time since last update">
        {freshness.formattedAge}
      </span>
    </div>
  )
}

const INDICATOR_CLASSES: Record<DataFreshnessStatus, string> = {
  live: 'bg-green-600 dark:bg-green-400',
  delayed: 'bg-yellow-600 dark:bg-yellow-400',
  stale: 'bg-red-600 dark:bg-red-400',
  error: 'bg-gray-600 dark:bg-gray-400',
}

function StatusIndicator({ status }: { status: DataFreshnessStatus }) {
  return <span className={`w-2 h-2 rounded-full ${INDICATOR_CLASSES[status]}`} aria-hidden="true" />
}
