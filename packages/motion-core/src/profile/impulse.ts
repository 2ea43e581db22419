// ---------------------------------------------------------------------------
// Impulse Motion Profile
// ---------------------------------------------------------------------------

import type { ImpulseProfile, ImpulseProfileConfig, MotionCommand } from '../types.js';
import { InvalidParameterError, NonPositivePulseWidthError } from '../errors.js';

const REST: MotionCommand = Object.freeze({ cmdVel: 0, cmdPos: 0 });

/**
 * Rectangular command pulse: `(velocity, position)` for `0 <= t < widthS`,
 * zero everywhere else. Useful for probing the loop's impulse response.
 */
export function createImpulseProfile(config: ImpulseProfileConfig): ImpulseProfile {
  const { velocity, position, widthS } = config;

  if (!Number.isFinite(velocity)) {
    throw new InvalidParameterError('velocity', velocity, 'must be a finite number');
  }
  if (!Number.isFinite(position)) {
    throw new InvalidParameterError('position', position, 'must be a finite number');
  }
  if (!Number.isFinite(widthS) || widthS <= 0) {
    throw new NonPositivePulseWidthError('widthS', widthS);
  }

  const pulse: MotionCommand = Object.freeze({ cmdVel: velocity, cmdPos: position });

  return {
    type: 'impulse',
    widthS,
    commandAt: (elapsedS) => (elapsedS >= 0 && elapsedS < widthS ? pulse : REST),
  };
}
