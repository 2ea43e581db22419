// ---------------------------------------------------------------------------
// Open-loop test controllers (step and impulse force)
// ---------------------------------------------------------------------------
//
// Both ignore the command and the measurement. They drive the plant with a
// known force so its open-loop response can be inspected.

import type {
  ControlInput,
  Controller,
  ImpulseControllerConfig,
  StepControllerConfig,
} from '../types.js';
import { InvalidParameterError } from '../errors.js';
import { assertStep } from './step-guard.js';

function assertFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
}

/** Constant `force` once `timeS >= delayS`, zero before. */
export function createStepController(config: StepControllerConfig): Controller {
  const { force, delayS } = config;
  assertFinite('force', force);
  assertFinite('delayS', delayS);

  return {
    type: 'step',
    calculateForce({ timeS, dt }: ControlInput): number {
      assertStep(dt);
      return timeS < delayS ? 0 : force;
    },
    reset(): void {},
  };
}

/**
 * `force` for `onSteps` consecutive ticks starting at the first tick with
 * `timeS >= delayS`, zero otherwise. `reset()` re-arms the pulse.
 */
export function createImpulseController(config: ImpulseControllerConfig): Controller {
  const { force, onSteps, delayS } = config;
  assertFinite('force', force);
  assertFinite('delayS', delayS);
  if (!Number.isInteger(onSteps) || onSteps < 0) {
    throw new InvalidParameterError('onSteps', onSteps, 'must be a non-negative integer');
  }

  let fired = 0;

  return {
    type: 'impulse',
    calculateForce({ timeS, dt }: ControlInput): number {
      assertStep(dt);
      if (timeS < delayS || fired >= onSteps) return 0;
      fired++;
      return force;
    },
    reset(): void {
      fired = 0;
    },
  };
}
