// ---------------------------------------------------------------------------
// Trapezoidal Motion Profile
// ---------------------------------------------------------------------------

import type {
  MotionCommand,
  ProfilePhase,
  TrapezoidalProfile,
  TrapezoidalProfileConfig,
} from '../types.js';
import {
  NonPositiveAccelerationError,
  NonPositiveVelocityError,
  ZeroDistanceError,
} from '../errors.js';

// ---------------------------------------------------------------------------
// Phase boundaries
// ---------------------------------------------------------------------------

interface PhaseTiming {
  shape: 'trapezoidal' | 'triangular';
  peakVelocity: number;
  /** Ramp duration (each of accel and decel). */
  t1: number;
  /** Distance covered by one ramp. */
  d1: number;
  tCruise: number;
  total: number;
}

function computeTiming(v: number, a: number, d: number): PhaseTiming {
  const t1 = v / a;
  const d1 = 0.5 * a * t1 * t1;

  if (2 * d1 >= d) {
    // Not enough room to reach v: accelerate to the midpoint, then brake.
    const peakVelocity = Math.sqrt(a * d);
    const tRamp = peakVelocity / a;
    return {
      shape: 'triangular',
      peakVelocity,
      t1: tRamp,
      d1: 0.5 * a * tRamp * tRamp,
      tCruise: 0,
      total: 2 * tRamp,
    };
  }

  const tCruise = (d - 2 * d1) / v;
  return {
    shape: 'trapezoidal',
    peakVelocity: v,
    t1,
    d1,
    tCruise,
    total: 2 * t1 + tCruise,
  };
}

// ---------------------------------------------------------------------------
// createTrapezoidalProfile
// ---------------------------------------------------------------------------

/**
 * Build a symmetric trapezoidal velocity profile from rest to `distance`.
 *
 * All validation happens here; once constructed the profile never throws.
 * When the distance is too short to reach `maxVelocity` the profile becomes
 * triangular with peak `sqrt(acceleration * distance)`.
 *
 * Phases, keyed by elapsed time `t` (negative `t` is treated as 0):
 *
 *  - **accel**  `t < t1`: `v = a t`, `x = a t^2 / 2`
 *  - **cruise** `t < t1 + tCruise`: `v = vMax`, `x = d1 + vMax (t - t1)`
 *  - **decel**  `t < T`: with `tau = T - t`, `v = a tau`, `x = d - a tau^2 / 2`
 *  - **hold**   `t >= T`: `v = 0`, `x = d`
 */
export function createTrapezoidalProfile(config: TrapezoidalProfileConfig): TrapezoidalProfile {
  const { maxVelocity, acceleration, distance } = config;

  if (!Number.isFinite(maxVelocity) || maxVelocity <= 0) {
    throw new NonPositiveVelocityError('maxVelocity', maxVelocity);
  }
  if (!Number.isFinite(acceleration) || acceleration <= 0) {
    throw new NonPositiveAccelerationError('acceleration', acceleration);
  }
  if (!Number.isFinite(distance) || distance <= 0) {
    throw new ZeroDistanceError('distance', distance);
  }

  const timing = computeTiming(maxVelocity, acceleration, distance);
  const { t1, d1, tCruise, total, peakVelocity } = timing;
  const cruiseEnd = t1 + tCruise;

  const phaseAt = (elapsedS: number): ProfilePhase => {
    const t = Math.max(0, elapsedS);
    if (t < t1) return 'accel';
    if (t < cruiseEnd) return 'cruise';
    if (t < total) return 'decel';
    return 'hold';
  };

  const commandAt = (elapsedS: number): MotionCommand => {
    const t = Math.max(0, elapsedS);
    switch (phaseAt(t)) {
      case 'accel':
        return { cmdVel: acceleration * t, cmdPos: 0.5 * acceleration * t * t };
      case 'cruise':
        return { cmdVel: peakVelocity, cmdPos: d1 + peakVelocity * (t - t1) };
      case 'decel': {
        const tau = total - t;
        return { cmdVel: acceleration * tau, cmdPos: distance - 0.5 * acceleration * tau * tau };
      }
      case 'hold':
        return { cmdVel: 0, cmdPos: distance };
    }
  };

  return {
    type: 'trapezoidal',
    shape: timing.shape,
    maxVelocity,
    acceleration,
    distance,
    peakVelocity,
    accelTimeS: t1,
    cruiseTimeS: tCruise,
    totalTimeS: total,
    phaseAt,
    commandAt,
  };
}
