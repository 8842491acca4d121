import type { Signal, SignalStatus } from '@/lib/schema/indicator'

const STATUS_COLORS: Record<SignalStatus, string> = {
  INVERTED: 'text-red-600 bg-red-50 dark:bg-red-900/20',
  FLAT: 'text-yellow-600 bg-yellow-50 dark:bg-yellow-900/20',
  NORMAL: 'text-green-600 bg-green-50 dark:bg-green-900/20',
  loose: 'text-green-600 bg-green-50 dark:bg-green-900/20',
  slightly_loose: 'text-emerald-600 bg-emerald-50 dark:bg-emerald-900/20',
  slightly_tight: 'text-yellow-600 bg-yellow-50 dark:bg-yellow-900/20',
  tight: 'text-red-600 bg-red-50 dark:bg-red-900/20',
  none: 'text-gray-600 bg-gray-50 dark:bg-gray-900/20',
}

export function getSignalStatusLabel(status: SignalStatus): string {
  switch (status) {
    case 'INVERTED':
      return 'Inverted'
    case 'FLAT':
      return 'Flat'
    case 'NORMAL':
      return 'Normal'
    case 'loose':
      return 'Loose'
    case 'slightly_loose':
      return 'Slightly loose'
    case 'slightly_tight':
      return 'Slightly tight'
    case 'tight':
      return 'Tight'
    case 'none':
      return ''
  }
}

interface SignalsPanelProps {
  signals: readonly Signal[]
  formatValue: (value: number) => string
}

export function SignalsPanel({ signals, formatValue }: SignalsPanelProps) {
  if (signals.length === 0) return null

  return (
    <dl className="grid grid-cols-2 gap-3">
      {signals.map((signal) => {
        const label = getSignalStatusLabel(signal.status)
        return (
          <div key={signal.key} className="rounded-md border border-gray-200 dark:border-gray-700 p-3">
            <dt className="text-xs text-gray-500 dark:text-gray-400">{signal.label}</dt>
            <dd className="flex items-center gap-2 mt-1">
              <span className="text-lg font-semibold">{formatValue(signal.value)}</span>
              {label && <span className={`px-2 py-0.5 rounded-full text-xs font-medium ${STATUS_COLORS[signal.status]}`}>{label}</span>}
            </dd>
          </div>
        )
      })}
    </dl>
  )
}
