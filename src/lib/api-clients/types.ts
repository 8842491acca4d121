import { z } from 'zod'
import type { Frequency, Observation } from '@/lib/schema/indicator'

export const FREDObservationSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  value: z.string(),
})

export const FREDResponseSchema = z.object({
  observations: z.array(FREDObservationSchema).min(1),
})

export const FREDErrorSchema = z.object({
  error_code: z.number(),
  error_message: z.string(),
})

export type FREDSeries = z.infer<typeof FREDObservationSchema>[]

export interface SeriesRequest {
  start: string
  frequency?: Frequency
}

/**
 * Anything that can hand back a normalised, date-ascending observation list for a series code.
 */
export interface SeriesSource {
  getObservations(seriesId: string, request: SeriesRequest): Promise<Observation[]>
}
