import { describe, it, expect } from 'vitest'
import { resolveSettings, isLogLevel, DEFAULT_SETTINGS } from '../index'

describe('resolveSettings', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS)
  })

  it('treats an empty value as unset', () => {
    expect(resolveSettings({ AXIS_SIM_LOG_LEVEL: '' }).LOG_LEVEL).toBe('warn')
  })

  it('reads the log level case-insensitively', () => {
    expect(resolveSettings({ AXIS_SIM_LOG_LEVEL: 'DEBUG' }).LOG_LEVEL).toBe('debug')
  })

  it('throws on an unknown log level', () => {
    expect(() => resolveSettings({ AXIS_SIM_LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid AXIS_SIM_LOG_LEVEL: "verbose". Expected one of debug, info, warn, error, silent.',
    )
  })
})

describe('isLogLevel', () => {
  it('narrows known levels only', () => {
    expect(isLogLevel('silent')).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
  })
})
