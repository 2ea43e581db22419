import { z } from 'zod'
import { discreteTimeConfigSchema } from './discrete-time'
import { motionProfileConfigSchema } from './motion-profile'
import { controllerConfigSchema } from './controller'
import { plantConfigSchema } from './plant'

/** A complete simulation document: one record per component. */
export const simulationConfigSchema = z.object({
  discrete_time: discreteTimeConfigSchema,
  motion_profile: motionProfileConfigSchema,
  controller: controllerConfigSchema,
  plant: plantConfigSchema,
})

export type SimulationConfigInput = z.infer<typeof simulationConfigSchema>
