// ---------------------------------------------------------------------------
// Configuration and construction errors
// ---------------------------------------------------------------------------

export type MotionConfigErrorKind =
  | 'non-positive-velocity'
  | 'non-positive-acceleration'
  | 'zero-distance'
  | 'non-positive-pulse-width'
  | 'non-positive-mass'
  | 'invalid-interval'
  | 'invalid-duration'
  | 'non-finite-gain'
  | 'invalid-parameter'
  | 'invalid-step'
  | 'config-version-incompatible'
  | 'invalid-version-format'
  | 'invalid-config';

/**
 * Base class for every error the simulation core raises.
 *
 * `kind` discriminates the failure; `parameter` and `value` name the offending
 * input so callers can assert on them without matching message text.
 */
export class MotionConfigError extends Error {
  constructor(
    public readonly kind: MotionConfigErrorKind,
    public readonly parameter: string,
    public readonly value: unknown,
    message: string,
  ) {
    super(message);
    this.name = 'MotionConfigError';
  }
}

export function isMotionConfigError(err: unknown): err is MotionConfigError {
  return err instanceof MotionConfigError;
}

// ---------------------------------------------------------------------------
// Motion profile
// ---------------------------------------------------------------------------

export class NonPositiveVelocityError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('non-positive-velocity', parameter, value, `${parameter} must be positive, got ${value}`);
    this.name = 'NonPositiveVelocityError';
  }
}

export class NonPositiveAccelerationError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('non-positive-acceleration', parameter, value, `${parameter} must be positive, got ${value}`);
    this.name = 'NonPositiveAccelerationError';
  }
}

export class ZeroDistanceError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('zero-distance', parameter, value, `${parameter} must be positive, got ${value}`);
    this.name = 'ZeroDistanceError';
  }
}

export class NonPositivePulseWidthError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('non-positive-pulse-width', parameter, value, `${parameter} must be positive, got ${value}`);
    this.name = 'NonPositivePulseWidthError';
  }
}

// ---------------------------------------------------------------------------
// Plant
// ---------------------------------------------------------------------------

export class NonPositiveMassError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('non-positive-mass', parameter, value, `${parameter} must be positive, got ${value}`);
    this.name = 'NonPositiveMassError';
  }
}

// ---------------------------------------------------------------------------
// Discrete time
// ---------------------------------------------------------------------------

export class InvalidIntervalError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('invalid-interval', parameter, value, `${parameter} must be a positive finite interval, got ${value}`);
    this.name = 'InvalidIntervalError';
  }
}

export class InvalidDurationError extends MotionConfigError {
  constructor(
    parameter: string,
    value: number,
    public readonly deltaTS: number,
  ) {
    super(
      'invalid-duration',
      parameter,
      value,
      `${parameter} must be finite and at least one step (${deltaTS}), got ${value}`,
    );
    this.name = 'InvalidDurationError';
  }
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class NonFiniteGainError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('non-finite-gain', parameter, value, `${parameter} must be a finite number, got ${value}`);
    this.name = 'NonFiniteGainError';
  }
}

/**
 * Raised when a controller is stepped with a non-positive `dt`. Only a
 * defective sequencer can cause it, so callers should treat it as fatal.
 */
export class InvalidStepError extends MotionConfigError {
  constructor(parameter: string, value: number) {
    super('invalid-step', parameter, value, `${parameter} must be a positive finite step, got ${value}`);
    this.name = 'InvalidStepError';
  }
}

/** Catch-all for constraints on the less common component parameters. */
export class InvalidParameterError extends MotionConfigError {
  constructor(parameter: string, value: unknown, requirement: string) {
    super('invalid-parameter', parameter, value, `${parameter} ${requirement}, got ${String(value)}`);
    this.name = 'InvalidParameterError';
  }
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class ConfigVersionIncompatibleError extends MotionConfigError {
  constructor(
    public readonly component: string,
    public readonly supportedVersion: string,
    public readonly configVersion: string,
  ) {
    super(
      'config-version-incompatible',
      `${component}.version`,
      configVersion,
      `Incompatible ${component} config version: supported=${supportedVersion}, config=${configVersion}`,
    );
    this.name = 'ConfigVersionIncompatibleError';
  }
}

export class InvalidVersionFormatError extends MotionConfigError {
  constructor(parameter: string, value: string) {
    super('invalid-version-format', parameter, value, `${parameter} must be major.minor.patch, got "${value}"`);
    this.name = 'InvalidVersionFormatError';
  }
}

export class InvalidConfigError extends MotionConfigError {
  constructor(
    parameter: string,
    public readonly fields: Record<string, string[] | undefined>,
  ) {
    super('invalid-config', parameter, fields, `Invalid ${parameter} configuration: ${describeFields(fields)}`);
    this.name = 'InvalidConfigError';
  }
}

function describeFields(fields: Record<string, string[] | undefined>): string {
  const parts: string[] = [];
  for (const [key, messages] of Object.entries(fields)) {
    if (messages && messages.length > 0) parts.push(`${key}: ${messages.join('; ')}`);
  }
  return parts.length > 0 ? parts.join(', ') : 'malformed record';
}
