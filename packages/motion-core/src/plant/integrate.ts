import type { KinematicState } from '../types.js';

/**
 * One semi-implicit (symplectic) Euler step: velocity is updated first and
 * the new velocity advances the position.
 */
export function semiImplicitEuler(
  current: KinematicState,
  netForce: number,
  mass: number,
  dt: number,
): KinematicState {
  const acc = netForce / mass;
  const vel = current.vel + acc * dt;
  const pos = current.pos + vel * dt;
  return { acc, vel, pos };
}
