// ---------------------------------------------------------------------------
// PID Controller (velocity loop + position loop)
// ---------------------------------------------------------------------------

import type { ControlInput, ControllerState, PidController, PidGains } from '../types.js';
import { NonFiniteGainError } from '../errors.js';
import { assertStep } from './step-guard.js';

const GAIN_KEYS = ['kvp', 'kvi', 'kvd', 'kpp', 'kpi', 'kpd'] as const;

/**
 * Create a two-loop PID controller.
 *
 * Each call computes
 *
 *   eV = cmdVel - measVel,  eP = cmdPos - measPos
 *   I  += e * dt                    (rectangular)
 *   D   = (e - ePrev) / dt          (backward difference)
 *   F   = kvp eV + kvi Iv + kvd Dv + kpp eP + kpi Ip + kpd Dp
 *
 * The output is not clamped and the integrators have no anti-windup.
 * Gains may be negative; only non-finite gains are rejected.
 */
export function createPidController(gains: PidGains): PidController {
  for (const key of GAIN_KEYS) {
    if (!Number.isFinite(gains[key])) {
      throw new NonFiniteGainError(key, gains[key]);
    }
  }

  const { kvp, kvi, kvd, kpp, kpi, kpd } = gains;
  const frozenGains: Readonly<PidGains> = Object.freeze({ kvp, kvi, kvd, kpp, kpi, kpd });

  let integralVel = 0;
  let integralPos = 0;
  let prevErrorVel = 0;
  let prevErrorPos = 0;

  return {
    type: 'pid',
    gains: frozenGains,

    calculateForce({ command, measured, dt }: ControlInput): number {
      assertStep(dt);

      const errorVel = command.cmdVel - measured.measVel;
      const errorPos = command.cmdPos - measured.measPos;

      integralVel += errorVel * dt;
      integralPos += errorPos * dt;

      const derivVel = (errorVel - prevErrorVel) / dt;
      const derivPos = (errorPos - prevErrorPos) / dt;

      prevErrorVel = errorVel;
      prevErrorPos = errorPos;

      return (
        kvp * errorVel +
        kvi * integralVel +
        kvd * derivVel +
        kpp * errorPos +
        kpi * integralPos +
        kpd * derivPos
      );
    },

    reset(): void {
      integralVel = 0;
      integralPos = 0;
      prevErrorVel = 0;
      prevErrorPos = 0;
    },

    state(): ControllerState {
      return Object.freeze({ integralVel, integralPos, prevErrorVel, prevErrorPos });
    },
  };
}
