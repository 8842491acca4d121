/**
 * Error classes shared by the fetcher and the dashboard
 */
export class APIError extends Error {
  constructor(message: string, public statusCode: number, public provider: string) {
    super(message)
    this.name = 'APIError'
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class StorageError extends Error {
  constructor(message: string, public path: string) {
    super(message)
    this.name = 'StorageError'
  }
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

/**
 * Check if error is due to rate limiting
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof APIError) return error.statusCode === 429
  if (error instanceof Error) return error.message.toLowerCase().includes('rate limit')
  return false
}

/**
 * Missing key, or a key the provider rejected. FRED answers an unknown key with 400.
 */
export function isAuthError(error: unknown): boolean {
  if (error instanceof ConfigError) return true
  if (!(error instanceof APIError)) return false
  if (error.statusCode === 401 || error.statusCode === 403) return true
  return error.statusCode === 400 && error.message.toLowerCase().includes('api_key')
}

/**
 * Transport failures, timeouts, 5xx and 429 are worth another attempt; everything else is final.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof APIError) return isRateLimitError(error) || error.statusCode >= 500
  if (error instanceof ValidationError || error instanceof ConfigError || error instanceof StorageError) return false
  return error instanceof Error
}
