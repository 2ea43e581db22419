import { describe, it, expect } from 'vitest'
import {
  discreteTimeConfigSchema,
  motionProfileConfigSchema,
  controllerConfigSchema,
  plantConfigSchema,
  simulationConfigSchema,
} from '../schemas/index'

// ─── Discrete Time ──────────────────────────────────────────────────────────

describe('discreteTimeConfigSchema', () => {
  it('accepts a valid record', () => {
    const result = discreteTimeConfigSchema.safeParse({
      version: '1.0.0',
      delta_t_s: 0.1,
      duration_s: 6,
    })
    expect(result.success).toBe(true)
  })

  it('requires duration_s', () => {
    const result = discreteTimeConfigSchema.safeParse({ version: '1.0.0', delta_t_s: 0.1 })
    expect(result.success).toBe(false)
  })

  it('rejects a malformed version', () => {
    const result = discreteTimeConfigSchema.safeParse({
      version: 'v1',
      delta_t_s: 0.1,
      duration_s: 6,
    })
    expect(result.success).toBe(false)
  })

  it('leaves sign checks to the sequencer', () => {
    const result = discreteTimeConfigSchema.safeParse({
      version: '1.0.0',
      delta_t_s: -0.1,
      duration_s: 6,
    })
    expect(result.success).toBe(true)
  })

  it('strips keys added by a newer minor version', () => {
    const result = discreteTimeConfigSchema.safeParse({
      version: '1.4.0',
      delta_t_s: 0.1,
      duration_s: 6,
      jitter_s: 0.001,
    })
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toEqual({ version: '1.4.0', delta_t_s: 0.1, duration_s: 6 })
    }
  })
})

// ─── Motion Profile ─────────────────────────────────────────────────────────

describe('motionProfileConfigSchema', () => {
  it('accepts a trapezoidal record', () => {
    const result = motionProfileConfigSchema.safeParse({
      version: '1.0.0',
      type: 'trapezoidal',
      max_velocity: 1,
      acceleration: 2,
      distance: 5,
    })
    expect(result.success).toBe(true)
  })

  it('accepts an impulse record', () => {
    const result = motionProfileConfigSchema.safeParse({
      version: '1.0.0',
      type: 'impulse',
      velocity: 1,
      position: 0.1,
      width_s: 0.01,
    })
    expect(result.success).toBe(true)
  })

  it('rejects an unknown type', () => {
    const result = motionProfileConfigSchema.safeParse({
      version: '1.0.0',
      type: 's-curve',
      max_velocity: 1,
      acceleration: 2,
      distance: 5,
    })
    expect(result.success).toBe(false)
  })

  it('rejects a non-numeric velocity', () => {
    const result = motionProfileConfigSchema.safeParse({
      version: '1.0.0',
      type: 'trapezoidal',
      max_velocity: 'fast',
      acceleration: 2,
      distance: 5,
    })
    expect(result.success).toBe(false)
  })
})

// ─── Controller ─────────────────────────────────────────────────────────────

describe('controllerConfigSchema', () => {
  it('accepts a pid record with negative gains', () => {
    const result = controllerConfigSchema.safeParse({
      version: '1.0.0',
      type: 'pid',
      kvp: 50,
      kvi: 0,
      kvd: 0,
      kpp: -1,
      kpi: 0,
      kpd: 0,
    })
    expect(result.success).toBe(true)
  })

  it('requires every pid gain', () => {
    const result = controllerConfigSchema.safeParse({
      version: '1.0.0',
      type: 'pid',
      kvp: 50,
    })
    expect(result.success).toBe(false)
  })

  it('defaults delay_s of a step record to zero', () => {
    const result = controllerConfigSchema.safeParse({ version: '1.0.0', type: 'step', force: 3 })
    expect(result.success).toBe(true)
    if (result.success && result.data.type === 'step') {
      expect(result.data.delay_s).toBe(0)
    }
  })

  it('requires an integer on_steps for impulse records', () => {
    const result = controllerConfigSchema.safeParse({
      version: '1.0.0',
      type: 'impulse',
      force: 3,
      on_steps: 1.5,
    })
    expect(result.success).toBe(false)
  })
})

// ─── Plant ──────────────────────────────────────────────────────────────────

describe('plantConfigSchema', () => {
  it('treats a bare mass record as a point mass', () => {
    const result = plantConfigSchema.safeParse({ version: '1.0.0', mass: 2 })
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.type).toBe('point_mass')
    }
  })

  it('accepts a mass-damper-spring record', () => {
    const result = plantConfigSchema.safeParse({
      version: '1.0.0',
      type: 'mass_damper_spring',
      mass: 1,
      damper: 0.5,
      spring: 10,
    })
    expect(result.success).toBe(true)
    if (result.success && result.data.type === 'mass_damper_spring') {
      expect(result.data.spring_balance_pos).toBe(0)
    }
  })

  it('rejects a mass-damper-spring record without spring', () => {
    const result = plantConfigSchema.safeParse({
      version: '1.0.0',
      type: 'mass_damper_spring',
      mass: 1,
      damper: 0.5,
    })
    expect(result.success).toBe(false)
  })

  it('names a mistyped point-mass field', () => {
    const result = plantConfigSchema.safeParse({ version: '1.0.0', mass: 'heavy' })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(Object.keys(result.error.flatten().fieldErrors)).toEqual(['mass'])
    }
  })

  it('names a mistyped mass-damper-spring field', () => {
    const result = plantConfigSchema.safeParse({
      version: '1.0.0',
      type: 'mass_damper_spring',
      mass: 1,
      damper: 'x',
      spring: 10,
    })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(Object.keys(result.error.flatten().fieldErrors)).toEqual(['damper'])
    }
  })

  it('reports an unknown plant type against type', () => {
    const result = plantConfigSchema.safeParse({ version: '1.0.0', type: 'rigid_body', mass: 1 })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(Object.keys(result.error.flatten().fieldErrors)).toEqual(['type'])
    }
  })
})

// ─── Whole document ─────────────────────────────────────────────────────────

describe('simulationConfigSchema', () => {
  it('requires all four component records', () => {
    const result = simulationConfigSchema.safeParse({
      discrete_time: { version: '1.0.0', delta_t_s: 0.1, duration_s: 6 },
      plant: { version: '1.0.0', mass: 1 },
    })
    expect(result.success).toBe(false)
    if (!result.success) {
      const fields = result.error.flatten().fieldErrors
      expect(Object.keys(fields).sort()).toEqual(['controller', 'motion_profile'])
    }
  })
})
