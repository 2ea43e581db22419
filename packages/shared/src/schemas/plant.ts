import { z } from 'zod'
import { configVersionSchema, finiteNumber } from './version'

export const pointMassConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('point_mass'),
  mass: finiteNumber,
})

export const massDamperSpringConfigSchema = z.object({
  version: configVersionSchema,
  type: z.literal('mass_damper_spring'),
  mass: finiteNumber,
  damper: finiteNumber,
  spring: finiteNumber,
  spring_balance_pos: finiteNumber.default(0),
})

// `type` may be omitted: a bare `{ version, mass }` record is a point mass.
function withDefaultPlantType(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw
  if ('type' in raw && raw.type !== undefined) return raw
  return { ...raw, type: 'point_mass' }
}

export const plantConfigSchema = z.preprocess(
  withDefaultPlantType,
  z.discriminatedUnion('type', [pointMassConfigSchema, massDamperSpringConfigSchema]),
)

export type PointMassConfigInput = z.infer<typeof pointMassConfigSchema>
export type MassDamperSpringConfigInput = z.infer<typeof massDamperSpringConfigSchema>
export type PlantConfigInput = z.infer<typeof plantConfigSchema>
