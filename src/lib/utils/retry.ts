import { getErrorMessage, isRetryableError } from './errors'
import { createLogger, type Logger } from './logger'

const defaultLogger = createLogger('retry')

export interface RetryOptions {
  maxRetries?: number
  baseDelayMs?: number
  shouldRetry?: (error: unknown) => boolean
  logger?: Logger
}

/**
 * Execute a function with exponential backoff retry
 */
export async function fetchWithRetry<T>(fetchFn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, shouldRetry = isRetryableError, logger = defaultLogger } = options
  let lastError: unknown

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fetchFn()
    } catch (error) {
      lastError = error
      if (!shouldRetry(error)) break
      if (attempt < maxRetries - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt)
        logger.warn(`Attempt ${attempt + 1}/${maxRetries} failed, retrying in ${delay}ms: ${getErrorMessage(error)}`)
        await sleep(delay)
      }
    }
  }

  throw lastError instanceof Error ? lastError : new Error(getErrorMessage(lastError))
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
