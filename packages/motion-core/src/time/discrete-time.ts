// ---------------------------------------------------------------------------
// Discrete Time Sequencer
// ---------------------------------------------------------------------------

import type { DiscreteTime, DiscreteTimeConfig, TimeStep } from '../types.js';
import { InvalidDurationError, InvalidIntervalError } from '../errors.js';

/**
 * Tolerance on `duration / dt` before flooring, so a duration that is an exact
 * multiple of the step is not shortened by one when the division rounds down.
 */
const STEP_COUNT_TOLERANCE = 1e-9;

/**
 * Build a sequencer that yields `floor(durationS / deltaTS) + 1` steps.
 *
 * Elapsed time is `index * dt`, never a running sum, so late steps carry no
 * accumulated rounding error. The returned object is iterable any number of
 * times; each iteration starts again at index 0.
 *
 * The last `elapsedS` may exceed `durationS` by rounding in the product: with
 * `dt = 0.1` and `durationS = 0.3` the final step is `3 * 0.1`, i.e.
 * `0.30000000000000004`. The overshoot is at most about `1e-9 * dt`.
 *
 * @throws InvalidIntervalError   when `deltaTS` is not a positive finite number.
 * @throws InvalidDurationError   when `durationS` is not finite or `< deltaTS`.
 */
export function createDiscreteTime(config: DiscreteTimeConfig): DiscreteTime {
  const { deltaTS, durationS } = config;

  if (!Number.isFinite(deltaTS) || deltaTS <= 0) {
    throw new InvalidIntervalError('deltaTS', deltaTS);
  }
  if (!Number.isFinite(durationS) || durationS < deltaTS) {
    throw new InvalidDurationError('durationS', durationS, deltaTS);
  }

  const lastIndex = Math.floor(durationS / deltaTS + STEP_COUNT_TOLERANCE);
  const stepCount = lastIndex + 1;

  function* steps(): IterableIterator<TimeStep> {
    for (let index = 0; index <= lastIndex; index++) {
      yield { index, elapsedS: index * deltaTS };
    }
  }

  return {
    dt: deltaTS,
    durationS,
    stepCount,
    steps,
    [Symbol.iterator]: steps,
  };
}
