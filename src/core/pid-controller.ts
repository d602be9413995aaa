/**
 * PID Controller
 *
 * Two faces of the same control law:
 * - a continuous transfer function kd·s + kp + ki/s for closed-loop synthesis
 * - a discrete recurrence for stepping a loop at runtime
 *
 * The discrete form has no anti-windup and no output clamping; the
 * integral accumulates without bound. Adding either would change the
 * simulated trajectories and the metrics derived from them.
 */

import { invalidConfiguration } from '../api/errors.js';
import type { PidGains } from '../types/control.js';
import { TransferFunction } from './transfer-function.js';

/**
 * Controller transfer function (kd·s² + kp·s + ki) / s.
 *
 * Improper when kd ≠ 0; only closed loops built from it are simulated.
 */
export function pidTransferFunction(gains: PidGains): TransferFunction {
  return TransferFunction.create([gains.kd, gains.kp, gains.ki], [1, 0]);
}

/**
 * Snapshot of the discrete controller state
 */
export interface PIDState {
  integral: number;
  prevError: number;
}

export class PIDController implements PidGains {
  public kp: number;
  public ki: number;
  public kd: number;

  private integral = 0;
  private prevError = 0;

  constructor(kp = 1.0, ki = 0.0, kd = 0.0) {
    for (const [name, value] of [['kp', kp], ['ki', ki], ['kd', kd]] as const) {
      if (!Number.isFinite(value)) {
        throw invalidConfiguration(`${name} must be a finite number (got ${value})`);
      }
    }
    this.kp = kp;
    this.ki = ki;
    this.kd = kd;
  }

  public static fromGains(gains: PidGains): PIDController {
    return new PIDController(gains.kp, gains.ki, gains.kd);
  }

  /**
   * Control action for the current error.
   *
   * The integral accumulates error·dt; the derivative is the backward
   * difference against the previous error, or 0 when dt ≤ 0.
   */
  public update(error: number, dt: number): number {
    this.integral += error * dt;
    const derivative = dt > 0 ? (error - this.prevError) / dt : 0;
    this.prevError = error;
    return this.kp * error + this.ki * this.integral + this.kd * derivative;
  }

  /**
   * Zero the integral and the previous error. Gains are kept.
   */
  public reset(): void {
    this.integral = 0;
    this.prevError = 0;
  }

  public get state(): PIDState {
    return { integral: this.integral, prevError: this.prevError };
  }

  public get gains(): PidGains {
    return { kp: this.kp, ki: this.ki, kd: this.kd };
  }

  public toTransferFunction(): TransferFunction {
    return pidTransferFunction(this);
  }
}
