import { z } from 'zod'
import { configVersionSchema, finiteNumber } from './version'

export const pidControllerConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('pid'),
  kvp: finiteNumber,
  kvi: finiteNumber,
  kvd: finiteNumber,
  kpp: finiteNumber,
  kpi: finiteNumber,
  kpd: finiteNumber,
})

export const stepControllerConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('step'),
  force: finiteNumber,
  delay_s: finiteNumber.default(0),
})

export const impulseControllerConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('impulse'),
  force: finiteNumber,
  on_steps: z.number().int(),
  delay_s: finiteNumber.default(0),
})

export const controllerConfigSchema = z.discriminatedUnion('type', [
  pidControllerConfigSchema,
  stepControllerConfigSchema,
  impulseControllerConfigSchema,
])

export type PidControllerConfigInput = z.infer<typeof pidControllerConfigSchema>
export type StepControllerConfigInput = z.infer<typeof stepControllerConfigSchema>
export type ImpulseControllerConfigInput = z.infer<typeof impulseControllerConfigSchema>
export type ControllerConfigInput = z.infer<typeof controllerConfigSchema>
