// ---------------------------------------------------------------------------
// Mass-damper-spring plant
// ---------------------------------------------------------------------------

import type {
  KinematicState,
  MassDamperSpring,
  MassDamperSpringConfig,
  Plant,
  PlantState,
  SpringDamperForces,
} from '../types.js';
import { InvalidParameterError } from '../errors.js';
import { semiImplicitEuler } from './integrate.js';
import { REST_STATE, assertMass, mergeState } from './point-mass.js';

const NO_FORCES: SpringDamperForces = Object.freeze({ damperForce: 0, springForce: 0, netForce: 0 });

/**
 * A mass tied to a viscous damper and a linear spring.
 *
 * The applied force is combined with `-c vel` and `-k (pos - x0)`, both
 * evaluated on the pre-update state, then integrated like a point mass.
 */
export function createMassDamperSpring(config: MassDamperSpringConfig): MassDamperSpring {
  const { mass, damper, spring, springBalancePos } = config;
  assertMass(mass);
  if (!Number.isFinite(damper) || damper < 0) {
    throw new InvalidParameterError('damper', damper, 'must be a non-negative finite number');
  }
  if (!Number.isFinite(spring) || spring < 0) {
    throw new InvalidParameterError('spring', spring, 'must be a non-negative finite number');
  }
  if (!Number.isFinite(springBalancePos)) {
    throw new InvalidParameterError('springBalancePos', springBalancePos, 'must be a finite number');
  }

  let current: KinematicState = REST_STATE;
  let lastForces: SpringDamperForces = NO_FORCES;

  return {
    type: 'mass_damper_spring',
    mass,
    damper,
    spring,
    springBalancePos,
    state(): PlantState {
      return Object.freeze({ mass, ...current });
    },
    forces(): SpringDamperForces {
      return lastForces;
    },
    applyForce(force: number, dt: number): KinematicState {
      const damperForce = -damper * current.vel;
      const springForce = -spring * (current.pos - springBalancePos);
      const netForce = force + damperForce + springForce;
      lastForces = Object.freeze({ damperForce, springForce, netForce });
      current = Object.freeze(semiImplicitEuler(current, netForce, mass, dt));
      return current;
    },
    reset(): void {
      current = REST_STATE;
      lastForces = NO_FORCES;
    },
    setState(next: Partial<KinematicState>): void {
      current = mergeState(current, next);
    },
  };
}

export function isMassDamperSpring(plant: Plant): plant is MassDamperSpring {
  return plant.type === 'mass_damper_spring';
}
