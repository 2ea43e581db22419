// ---------------------------------------------------------------------------
// Component construction from validated config records
// ---------------------------------------------------------------------------
//
// Records arrive with snake_case keys; components take camelCase configs.
// Domain checks (positivity etc.) happen in the component factories.

import type {
  ControllerConfigInput,
  DiscreteTimeConfigInput,
  MotionProfileConfigInput,
  PlantConfigInput,
  SimulationConfigInput,
} from '@axis-sim/shared';
import type { Controller, DiscreteTime, MotionProfile, Plant } from '../types.js';
import { createDiscreteTime } from '../time/index.js';
import { createImpulseProfile, createTrapezoidalProfile } from '../profile/index.js';
import {
  createImpulseController,
  createPidController,
  createStepController,
} from '../controller/index.js';
import { createMassDamperSpring, createPointMass } from '../plant/index.js';
import { MotionFlow, type MotionFlowOptions } from '../flow/index.js';

export function buildDiscreteTime(input: DiscreteTimeConfigInput): DiscreteTime {
  return createDiscreteTime({ deltaTS: input.delta_t_s, durationS: input.duration_s });
}

export function buildMotionProfile(input: MotionProfileConfigInput): MotionProfile {
  switch (input.type) {
    case 'trapezoidal':
      return createTrapezoidalProfile({
        maxVelocity: input.max_velocity,
        acceleration: input.acceleration,
        distance: input.distance,
      });
    case 'impulse':
      return createImpulseProfile({
        velocity: input.velocity,
        position: input.position,
        widthS: input.width_s,
      });
  }
}

export function buildController(input: ControllerConfigInput): Controller {
  switch (input.type) {
    case 'pid':
      return createPidController({
        kvp: input.kvp,
        kvi: input.kvi,
        kvd: input.kvd,
        kpp: input.kpp,
        kpi: input.kpi,
        kpd: input.kpd,
      });
    case 'step':
      return createStepController({ force: input.force, delayS: input.delay_s });
    case 'impulse':
      return createImpulseController({
        force: input.force,
        onSteps: input.on_steps,
        delayS: input.delay_s,
      });
  }
}

export function buildPlant(input: PlantConfigInput): Plant {
  switch (input.type) {
    case 'point_mass':
      return createPointMass({ mass: input.mass });
    case 'mass_damper_spring':
      return createMassDamperSpring({
        mass: input.mass,
        damper: input.damper,
        spring: input.spring,
        springBalancePos: input.spring_balance_pos,
      });
  }
}

/**
 * Construct every component of a run and wire them into a {@link MotionFlow}.
 * Any invalid parameter throws here, before a single tick runs.
 */
export function buildMotionFlow(
  config: SimulationConfigInput,
  options: MotionFlowOptions = {},
): MotionFlow {
  return new MotionFlow(
    {
      time: buildDiscreteTime(config.discrete_time),
      profile: buildMotionProfile(config.motion_profile),
      controller: buildController(config.controller),
      plant: buildPlant(config.plant),
    },
    options,
  );
}
