import { z } from 'zod'

/** Semantic version text carried by every configuration record. */
export const configVersionSchema = z
  .string()
  .regex(/^\d+\.\d+\.\d+$/, 'Version must be major.minor.patch')

export const finiteNumber = z.number().finite()
