import { getErrorMessage, ValidationError } from '@/lib/utils/errors'

interface ErrorMessageProps {
  error: unknown
  onRetry?: () => void
}

/**
 * A malformed data file will not fix itself on reload, so it gets no retry button.
 */
export function ErrorMessage({ error, onRetry }: ErrorMessageProps) {
  const malformed = error instanceof ValidationError
  const title = malformed ? 'Published data is malformed' : 'Failed to load data'

  return (
    <div role="alert" className="bg-red-50 dark:bg-red-900/20 border border-red-200 dark:border-red-800 rounded-md p-4">
      <h4 className="text-sm font-semibold text-red-800 dark:text-red-400 mb-1">{title}</h4>
      <p className="text-sm text-red-700 dark:text-red-300">{getErrorMessage(error)}</p>
      {onRetry && !malformed && (
        <button type="button" onClick={onRetry} className="mt-2 text-sm text-red-600 dark:text-red-400 hover:underline">
          Try again
        </button>
      )}
    </div>
  )
}
