import type { ReactNode } from 'react'
import { ErrorMessage } from '@/components/ui/error-message'

interface IndicatorCardProps {
  title: string
  value?: string
  subtitle?: string
  interpretation?: string
  alert?: boolean
  error?: Error | null
  isLoading?: boolean
  badge?: ReactNode
  onRetry?: () => void
  children?: ReactNode
}

export function IndicatorCard({
  title,
  value,
  subtitle,
  interpretation,
  alert,
  error,
  isLoading,
  badge,
  onRetry,
  children,
}: IndicatorCardProps) {
  if (error) {
    return (
      <section className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-6">
        <h3 className="text-lg font-semibold mb-4">{title}</h3>
        <ErrorMessage error={error} onRetry={onRetry} />
      </section>
    )
  }

  if (isLoading) {
    return (
      <section className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-6" aria-busy="true">
        <h3 className="text-lg font-semibold text-gray-900 dark:text-white mb-2">{title}</h3>
        <div className="h-8 w-32 bg-gray-200 dark:bg-gray-700 rounded animate-pulse" />
        <div className="h-[220px] mt-4 bg-gray-100 dark:bg-gray-900 rounded animate-pulse" />
      </section>
    )
  }

  return (
    <section className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-6 hover:shadow-lg transition-shadow">
      <div className="mb-4">
        <div className="flex items-start justify-between gap-2">
          <h3 className="text-lg font-semibold text-gray-900 dark:text-white mb-2">{title}</h3>
          {badge}
        </div>
        {value && <div className={`text-3xl font-bold ${alert ? 'text-red-600' : 'text-blue-600'}`}>{value}</div>}
        {subtitle && <p className="text-sm text-gray-600 dark:text-gray-400 mt-1">{subtitle}</p>}
        {interpretation && <p className="text-xs text-gray-500 dark:text-gray-500 mt-2">{interpretation}</p>}
      </div>
      {children && <div className="mt-4 space-y-4">{children}</div>}
    </section>
  )
}
