/**
 * Tuning suggestions
 *
 * Starting-point gains from simple rules of thumb. Nothing here checks
 * that the suggested gains stabilize the loop; run them through
 * analyzeStability or a simulation before trusting them.
 */

import { invalidConfiguration } from '../api/errors.js';
import type { PidGains } from '../types/control.js';
import type { TuningTarget } from '../types/plants.js';

/** Below this damping ratio a second-order plant is tuned as underdamped */
const UNDERDAMPED_THRESHOLD = 0.7;

/**
 * Heuristic gains for a plant class.
 *
 * - first-order τ: kp = 1/τ, ki = 1/(2τ²), kd = τ/4
 * - second-order, ζ < 0.7: kp = 2ζωn, ki = ωn², kd = 1
 * - second-order, ζ ≥ 0.7: kp = ωn, ki = ωn²/2, kd = 2ζ/ωn
 * - integrator: kp = 1, ki = 0, kd = 0.5 (the plant already integrates)
 * - unknown: kp = 1, ki = 0.1, kd = 0.1
 */
export function suggestPidGains(target: TuningTarget): PidGains {
  switch (target.kind) {
    case 'first-order': {
      const { tau } = target;
      return { kp: 1 / tau, ki: 1 / (2 * tau ** 2), kd: tau / 4 };
    }
    case 'second-order': {
      const { wn, zeta } = target;
      if (zeta < UNDERDAMPED_THRESHOLD) {
        return { kp: 2 * zeta * wn, ki: wn ** 2, kd: 1.0 };
      }
      return { kp: wn, ki: wn ** 2 / 2, kd: (2 * zeta) / wn };
    }
    case 'integrator':
      return { kp: 1.0, ki: 0.0, kd: 0.5 };
    case 'unknown':
      return { kp: 1.0, ki: 0.1, kd: 0.1 };
  }
}

/**
 * Classic Ziegler–Nichols PID rule from the ultimate gain and period:
 * kp = 0.6·Ku, ki = 2·kp/Tu, kd = kp·Tu/8.
 *
 * @throws {ControlSystemError} InvalidConfiguration when Tu ≤ 0
 */
export function zieglerNicholsGains(ultimateGain: number, ultimatePeriod: number): PidGains {
  if (!Number.isFinite(ultimateGain)) {
    throw invalidConfiguration(`ultimate gain must be finite (got ${ultimateGain})`);
  }
  if (!Number.isFinite(ultimatePeriod) || ultimatePeriod <= 0) {
    throw invalidConfiguration(`ultimate period must be positive (got ${ultimatePeriod})`, {
      ultimatePeriod,
    });
  }
  const kp = 0.6 * ultimateGain;
  return { kp, ki: (2 * kp) / ultimatePeriod, kd: (kp * ultimatePeriod) / 8 };
}
