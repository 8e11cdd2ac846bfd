/**
 * Filter — Resonant low-pass with an additive cutoff CV.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { controlFrom, controlSignal } from '../core/control';
import { Signal } from '../core/signal';
import { LowpassKernel } from '../dsp/lowpass';
import {
  DEFAULT_CUTOFF_CV_DEPTH_HZ,
  FILTER_CUTOFF_MAX,
  FILTER_CUTOFF_MIN,
  FILTER_Q_MAX,
  FILTER_Q_MIN,
} from '../config';

const filterShape = {
  cutoff: z.number().min(FILTER_CUTOFF_MIN).max(FILTER_CUTOFF_MAX).default(1000),
  resonance: z.number().positive().default(1),
  /** Hz added per unit of cutoff_cv */
  cutoff_cv_depth: z.number().min(0).default(DEFAULT_CUTOFF_CV_DEPTH_HZ),
  gain: z.number().min(0).max(2).default(1),
};

export type FilterShape = typeof filterShape;
export type FilterOptions = ModuleOptions<FilterShape>;

export class Filter extends Module<FilterShape> {
  readonly kind = 'filter';

  private readonly kernel = new LowpassKernel();

  constructor(name: string, options: FilterOptions = {}) {
    super(name, z.object(filterShape), options);
    this.addInput('audio_in', 'audio');
    this.addInput('cutoff_cv', 'cv');
    this.addOutput('audio_out', 'audio');
  }

  /** Resonance as applied: the stored value clamped to the stable range */
  get effectiveResonance(): number {
    return Math.min(FILTER_Q_MAX, Math.max(FILTER_Q_MIN, this.params.resonance));
  }

  /** cutoff + cv · cutoff_cv_depth, clamped to the audible range */
  cutoffFrequency(): Signal {
    const { cutoff, cutoff_cv_depth } = this.params;
    return controlSignal(controlFrom(this.input('cutoff_cv'), 0))
      .mul(cutoff_cv_depth)
      .add(cutoff)
      .clamp(FILTER_CUTOFF_MIN, FILTER_CUTOFF_MAX);
  }

  cutoffAt(t: number): number {
    return this.cutoffFrequency().eval(t);
  }

  protected process(): void {
    const { gain } = this.params;
    const q = this.effectiveResonance;
    const audio = this.input('audio_in');
    const fc = this.cutoffFrequency();
    const kernel = this.kernel;

    this.emit('audio_out', new Signal((t) => kernel.process(audio.read(t), t, fc.eval(t), q) * gain));
  }

  protected onStop(): void {
    this.kernel.reset();
  }
}
