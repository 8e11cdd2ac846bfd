/**
 * LFO — The oscillator's waveforms at control rate, scaled and offset as CV.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { controlFrom, controlSignal } from '../core/control';
import { SeededRandom } from '../core/random';
import { PhaseAccumulator } from '../dsp/phase';
import { oscillate } from '../dsp/waveform';
import { LFO_FREQ_MAX, LFO_FREQ_MIN, WAVEFORMS } from '../config';

const lfoShape = {
  freq: z.number().min(LFO_FREQ_MIN).max(LFO_FREQ_MAX).default(1),
  waveform: z.enum(WAVEFORMS).default('sine'),
  amplitude: z.number().min(0).max(10).default(1),
  offset: z.number().min(-5).max(5).default(0),
};

export type LfoShape = typeof lfoShape;
export type LfoOptions = ModuleOptions<LfoShape>;

export class Lfo extends Module<LfoShape> {
  readonly kind = 'lfo';

  private readonly phase = new PhaseAccumulator();

  constructor(name: string, options: LfoOptions = {}) {
    super(name, z.object(lfoShape), options);
    this.addInput('freq_cv', 'cv');
    this.addOutput('cv_out', 'cv');
  }

  randomize(random: SeededRandom = new SeededRandom()): void {
    this.setParameters({
      freq: random.range(0.1, 10),
      waveform: random.pick(WAVEFORMS),
      amplitude: random.range(0.5, 2),
      offset: random.range(-1, 1),
    });
  }

  protected process(): void {
    const { freq, waveform, amplitude, offset } = this.params;
    const rate = controlSignal(controlFrom(this.input('freq_cv'), 0))
      .exp2()
      .mul(freq)
      .clamp(LFO_FREQ_MIN, LFO_FREQ_MAX);
    this.emit('cv_out', oscillate(waveform, rate, this.phase).mul(amplitude).add(offset));
  }

  protected onStop(): void {
    this.phase.reset();
  }
}
