import { z } from 'zod'
import { ConfigError } from '@/lib/utils/errors'

export const CONFIG = {
  app: {
    name: 'Global Macro Dashboard',
    description: 'Liquidity, rates, growth and labour indicators across the US, Euro area, Japan, Korea and China',
  },
  api: {
    fred: {
      baseUrl: 'https://api.stlouisfed.org/fred',
      timeoutMs: 30_000,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
    },
  },
  output: {
    dataDir: 'public/data',
  },
  dashboard: {
    // Relative to the page so the export works under any base path
    dataBaseUrl: process.env.NEXT_PUBLIC_DATA_BASE_URL || 'data',
    staleTimeMs: 30 * 60 * 1000,
  },
} as const

const FetcherEnvSchema = z.object({
  FRED_API_KEY: z
    .string()
    .optional()
    .transform((v) => v?.trim() || undefined),
  FRED_BASE_URL: z.string().url().default(CONFIG.api.fred.baseUrl),
  DATA_DIR: z.string().min(1).default(CONFIG.output.dataDir),
  PUBLISH_DIR: z.string().min(1).optional(),
})

export type FetcherEnv = z.infer<typeof FetcherEnvSchema>

/**
 * A missing FRED_API_KEY is not rejected here: every request fails on its own
 * and the run reports each indicator as failed.
 */
export function loadFetcherEnv(env: Record<string, string | undefined> = process.env): FetcherEnv {
  const parsed = FetcherEnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`)
  }
  return parsed.data
}
