import { z } from 'zod'
import { configVersionSchema, finiteNumber } from './version'

// Positivity and duration >= delta_t_s are checked by the sequencer itself.
export const discreteTimeConfigSchema = z.object({
  version: configVersionSchema,
  delta_t_s: finiteNumber,
  duration_s: finiteNumber,
})

export type DiscreteTimeConfigInput = z.infer<typeof discreteTimeConfigSchema>
