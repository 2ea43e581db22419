import { z } from 'zod'
import { configVersionSchema, finiteNumber } from './version'

export const trapezoidalProfileConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('trapezoidal'),
  max_velocity: finiteNumber,
  acceleration: finiteNumber,
  distance: finiteNumber,
})

export const impulseProfileConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('impulse'),
  velocity: finiteNumber,
  position: finiteNumber,
  width_s: finiteNumber,
})

export const motionProfileConfigSchema = z.discriminatedUnion('type', [
  trapezoidalProfileConfigSchema,
  impulseProfileConfigSchema,
])

export type TrapezoidalProfileConfigInput = z.infer<typeof trapezoidalProfileConfigSchema>
export type ImpulseProfileConfigInput = z.infer<typeof impulseProfileConfigSchema>
export type MotionProfileConfigInput = z.infer<typeof motionProfileConfigSchema>
