/**
 * Oscillator — Audio-rate waveform source with 1V/oct pitch CV and linear FM.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { controlFrom, controlSignal } from '../core/control';
import { SeededRandom } from '../core/random';
import type { Signal } from '../core/signal';
import { PhaseAccumulator } from '../dsp/phase';
import { oscillate, phasor } from '../dsp/waveform';
import {
  DEFAULT_FM_DEPTH_HZ,
  NOISE_LEVEL,
  OSC_FINE_MAX,
  OSC_FINE_MIN,
  OSC_FREQ_MAX,
  OSC_FREQ_MIN,
  OSC_OCTAVE_MAX,
  OSC_OCTAVE_MIN,
  WAVEFORMS,
} from '../config';

const oscillatorShape = {
  base_freq: z.number().positive().default(440),
  waveform: z.enum(WAVEFORMS).default('sine'),
  amplitude: z.number().min(0).max(1).default(0.5),
  octave: z.number().int().min(OSC_OCTAVE_MIN).max(OSC_OCTAVE_MAX).default(0),
  /** Semitones */
  fine: z.number().min(OSC_FINE_MIN).max(OSC_FINE_MAX).default(0),
  /** Hz of deviation per unit of fm_in */
  fm_depth: z.number().min(0).default(DEFAULT_FM_DEPTH_HZ),
};

export type OscillatorShape = typeof oscillatorShape;
export type OscillatorOptions = ModuleOptions<OscillatorShape>;

export class Oscillator extends Module<OscillatorShape> {
  readonly kind = 'oscillator';

  private readonly phase = new PhaseAccumulator();

  constructor(name: string, options: OscillatorOptions = {}) {
    super(name, z.object(oscillatorShape), options);
    this.addInput('freq_cv', 'cv');
    this.addInput('fm_in', 'audio');
    this.addOutput('audio_out', 'audio');
    // High for the first half of each cycle
    this.addOutput('sync_out', 'gate');
  }

  /**
   * base_freq · 2^octave · 2^(fine/12) · 2^cv + fm · fm_depth,
   * clamped to the audible range.
   */
  frequency(): Signal {
    const { base_freq, octave, fine, fm_depth } = this.params;
    const base = base_freq * Math.pow(2, octave) * Math.pow(2, fine / 12);
    const cv = controlSignal(controlFrom(this.input('freq_cv'), 0));
    const fm = controlSignal(controlFrom(this.input('fm_in'), 0));
    return cv.exp2().mul(base).add(fm.mul(fm_depth)).clamp(OSC_FREQ_MIN, OSC_FREQ_MAX);
  }

  frequencyAt(t: number): number {
    return this.frequency().eval(t);
  }

  /** Pick a musically useful patch: A1 to A6, any waveform, slight detune */
  randomize(random: SeededRandom = new SeededRandom()): void {
    this.setParameters({
      base_freq: 55 * Math.pow(2, random.rangeInt(0, 5)),
      waveform: random.pick(WAVEFORMS),
      octave: random.rangeInt(-1, 1),
      fine: random.range(-0.5, 0.5),
      amplitude: random.range(0.3, 0.8),
    });
  }

  protected process(): void {
    const { waveform, amplitude } = this.params;
    const freq = this.frequency();
    const level = waveform === 'noise' ? amplitude * NOISE_LEVEL : amplitude;
    this.emit('audio_out', oscillate(waveform, freq, this.phase).mul(level));
    this.emit('sync_out', phasor(freq, this.phase).map((p) => (p < 0.5 ? 1 : 0)));
  }

  protected onStop(): void {
    this.phase.reset();
  }
}
