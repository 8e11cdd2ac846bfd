/**
 * Waveforms shared by the oscillator and the LFO.
 */

import { Signal } from '../core/signal';
import { PhaseAccumulator } from './phase';
import { NOISE_RATE_HZ } from '../config';
import type { Waveform } from '../config';

export type PeriodicWaveform = Exclude<Waveform, 'noise'>;

/** One cycle of a periodic waveform, phase in [0, 1), output in [-1, 1] */
export function wave(waveform: PeriodicWaveform, phase: number): number {
  switch (waveform) {
    case 'sine':
      return Math.sin(2 * Math.PI * phase);
    case 'saw':
      return 2 * phase - 1;
    case 'square':
      return phase < 0.5 ? 1 : -1;
    case 'triangle':
      return phase < 0.5 ? 4 * phase - 1 : 3 - 4 * phase;
  }
}

// 32-bit integer mix; same input, same output
function hash(n: number): number {
  let h = (n | 0) ^ 0x9e3779b9;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  h ^= h >>> 16;
  return (h >>> 0) / 4294967296;
}

/** White noise in [-1, 1), held for one step of NOISE_RATE_HZ */
export function noiseAt(t: number): number {
  return hash(Math.floor(t * NOISE_RATE_HZ)) * 2 - 1;
}

/** Phase in [0, 1) of an oscillator running at `freq` (Hz) */
export function phasor(freq: Signal, accumulator: PhaseAccumulator = new PhaseAccumulator()): Signal {
  return new Signal((t) => accumulator.advance(t, freq.eval(t)));
}

/**
 * A unit-amplitude waveform running at `freq` (Hz).
 * Noise ignores the frequency.
 */
export function oscillate(
  waveform: Waveform,
  freq: Signal,
  accumulator: PhaseAccumulator = new PhaseAccumulator()
): Signal {
  if (waveform === 'noise') {
    return new Signal(noiseAt);
  }
  return phasor(freq, accumulator).map((phase) => wave(waveform, phase));
}
