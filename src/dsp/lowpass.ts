/**
 * Two-pole low-pass stage (trapezoidal state-variable form).
 *
 * Unlike a Signal, the filter has memory: it advances once per distinct
 * evaluation time. Re-reading the same instant returns the cached output,
 * and a jump backwards or a long gap starts from rest.
 */

import { FILTER_MAX_STEP_S, FILTER_NYQUIST_FRACTION } from '../config';

export class LowpassKernel {
  private ic1 = 0;
  private ic2 = 0;
  private lastT: number | null = null;
  private lastOut = 0;

  process(input: number, t: number, cutoff: number, q: number): number {
    if (this.lastT === null) {
      this.restartAt(t);
      return 0;
    }

    const dt = t - this.lastT;
    if (dt === 0) return this.lastOut;
    if (dt < 0 || dt > FILTER_MAX_STEP_S) {
      this.restartAt(t);
      return 0;
    }

    const fc = Math.min(cutoff, FILTER_NYQUIST_FRACTION / dt);
    const g = Math.tan(Math.PI * fc * dt);
    const k = 1 / q;
    const a1 = 1 / (1 + g * (g + k));
    const a2 = g * a1;
    const a3 = g * a2;

    const v3 = input - this.ic2;
    const v1 = a1 * this.ic1 + a2 * v3;
    const v2 = this.ic2 + a2 * this.ic1 + a3 * v3;
    this.ic1 = 2 * v1 - this.ic1;
    this.ic2 = 2 * v2 - this.ic2;

    this.lastT = t;
    this.lastOut = v2;
    return v2;
  }

  reset(): void {
    this.ic1 = 0;
    this.ic2 = 0;
    this.lastT = null;
    this.lastOut = 0;
  }

  private restartAt(t: number): void {
    this.ic1 = 0;
    this.ic2 = 0;
    this.lastT = t;
    this.lastOut = 0;
  }
}
