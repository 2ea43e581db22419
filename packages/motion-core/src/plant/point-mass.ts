// ---------------------------------------------------------------------------
// Point-mass plant
// ---------------------------------------------------------------------------

import type { KinematicState, Plant, PlantState, PointMassConfig } from '../types.js';
import { InvalidParameterError, NonPositiveMassError } from '../errors.js';
import { semiImplicitEuler } from './integrate.js';

export const REST_STATE: KinematicState = Object.freeze({ acc: 0, vel: 0, pos: 0 });

export function assertMass(mass: number): void {
  if (!Number.isFinite(mass) || mass <= 0) {
    throw new NonPositiveMassError('mass', mass);
  }
}

function overlay(parameter: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
  return value;
}

/**
 * Overlay the defined keys of `next` on `current`. Undefined keys keep their
 * current value; a non-finite value throws and leaves nothing changed.
 */
export function mergeState(current: KinematicState, next: Partial<KinematicState>): KinematicState {
  return Object.freeze({
    acc: overlay('acc', next.acc, current.acc),
    vel: overlay('vel', next.vel, current.vel),
    pos: overlay('pos', next.pos, current.pos),
  });
}

/**
 * A frictionless point mass on one axis, starting at rest at the origin.
 *
 * `applyForce(F, dt)`: `acc = F / m`, `vel += acc dt`, `pos += vel dt`.
 */
export function createPointMass(config: PointMassConfig): Plant {
  const { mass } = config;
  assertMass(mass);

  let current: KinematicState = REST_STATE;

  return {
    type: 'point_mass',
    mass,
    state(): PlantState {
      return Object.freeze({ mass, ...current });
    },
    applyForce(force: number, dt: number): KinematicState {
      current = Object.freeze(semiImplicitEuler(current, force, mass, dt));
      return current;
    },
    reset(): void {
      current = REST_STATE;
    },
    setState(next: Partial<KinematicState>): void {
      current = mergeState(current, next);
    },
  };
}
