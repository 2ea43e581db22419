/**
 * Process settings resolved from the environment. Fails fast on first use.
 *
 * An unrecognised value throws immediately with the offending key rather than
 * silently falling back to a default.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/** All log levels, most verbose first. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface Settings {
  LOG_LEVEL: LogLevel
}

/** Default settings: quiet unless something needs attention. */
export const DEFAULT_SETTINGS: Settings = {
  LOG_LEVEL: 'warn',
}

type Env = Record<string, string | undefined>

function optional(env: Env, key: string, fallback: string): string {
  const val = env[key]
  return val === undefined || val === '' ? fallback : val
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

function logLevel(env: Env, key: string, fallback: LogLevel): LogLevel {
  const val = optional(env, key, fallback).toLowerCase()
  if (!isLogLevel(val)) {
    throw new Error(
      `Invalid ${key}: "${val}". ` +
      `Expected one of ${LOG_LEVELS.join(', ')}.`,
    )
  }
  return val
}

/** Resolve settings from an environment map (defaults to `process.env`). */
export function resolveSettings(env: Env = process.env): Settings {
  return {
    LOG_LEVEL: logLevel(env, 'AXIS_SIM_LOG_LEVEL', DEFAULT_SETTINGS.LOG_LEVEL),
  }
}
