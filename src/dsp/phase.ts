/**
 * Phase accumulator for oscillators whose frequency moves over time.
 *
 * Phase is the integral of frequency, so it advances by the mean frequency of
 * each step. Like the low-pass kernel it advances once per distinct evaluation
 * time: re-reading an instant returns the same phase, and a jump backwards or
 * a long gap re-derives the phase from the absolute time.
 */

import { PHASE_MAX_STEP_S } from '../config';

export class PhaseAccumulator {
  private phase = 0;
  private lastT: number | null = null;
  private lastFreq = 0;

  /** Phase in [0, 1) at time t, given the frequency (Hz) at t */
  advance(t: number, freq: number): number {
    if (this.lastT === null) {
      return this.restartAt(t, freq);
    }

    const dt = t - this.lastT;
    if (dt === 0) return this.phase;
    if (dt < 0 || dt > PHASE_MAX_STEP_S) {
      return this.restartAt(t, freq);
    }

    const next = this.phase + 0.5 * (this.lastFreq + freq) * dt;
    this.phase = next - Math.floor(next);
    this.lastT = t;
    this.lastFreq = freq;
    return this.phase;
  }

  reset(): void {
    this.phase = 0;
    this.lastT = null;
    this.lastFreq = 0;
  }

  // Exact for a constant frequency
  private restartAt(t: number, freq: number): number {
    const cycles = freq * t;
    this.phase = cycles - Math.floor(cycles);
    this.lastT = t;
    this.lastFreq = freq;
    return this.phase;
  }
}
