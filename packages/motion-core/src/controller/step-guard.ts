import { InvalidStepError } from '../errors.js';

/** Controllers divide by dt; a non-positive step means the sequencer is broken. */
export function assertStep(dt: number): void {
  if (!Number.isFinite(dt) || dt <= 0) {
    throw new InvalidStepError('dt', dt);
  }
}
