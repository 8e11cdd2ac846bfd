/**
 * Amplifier — VCA. Gain is either the static `gain` parameter, ramped over
 * `smoothing_time`, or driven by a bound gain_cv through a response curve.
 *
 * am_input adds to the gain, velocity_cv scales it and gate_input closes it
 * while low. Each is neutral when unconnected.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { controlFrom, controlSignal } from '../core/control';
import { SeededRandom } from '../core/random';
import { ramp } from '../core/signal';
import type { Signal } from '../core/signal';
import { GAIN_SMOOTHING_S, GATE_THRESHOLD } from '../config';

export const GAIN_CURVES = ['linear', 'exponential', 'logarithmic'] as const;

export type GainCurve = (typeof GAIN_CURVES)[number];

/** Map a non-negative control value through a response curve */
export function applyCurve(curve: GainCurve, x: number): number {
  switch (curve) {
    case 'linear':
      return x;
    case 'exponential':
      return x * x;
    case 'logarithmic':
      return Math.log2(x + 1);
  }
}

const amplifierShape = {
  gain: z.number().min(0).max(2).default(1),
  curve: z.enum(GAIN_CURVES).default('linear'),
  cv_amount: z.number().min(0).max(2).default(1),
  offset: z.number().min(-1).max(1).default(0),
  max_gain: z.number().min(0.1).max(5).default(2),
  smoothing_time: z.number().min(0).max(1).default(GAIN_SMOOTHING_S),
};

export type AmplifierShape = typeof amplifierShape;
export type AmplifierOptions = ModuleOptions<AmplifierShape>;

export class Amplifier extends Module<AmplifierShape> {
  readonly kind = 'amplifier';

  // Static gain in effect after the last recompute; null while CV drives it
  private appliedGain: number | null = null;

  constructor(name: string, options: AmplifierOptions = {}) {
    super(name, z.object(amplifierShape), options);
    this.addInput('audio_in', 'audio');
    this.addInput('gain_cv', 'cv');
    this.addInput('am_input', 'audio');
    this.addInput('gate_input', 'gate');
    this.addInput('velocity_cv', 'cv');
    this.addOutput('audio_out', 'audio');
    this.addOutput('envelope_out', 'cv');
  }

  mute(): void {
    this.setParameter('gain', 0);
  }

  unmute(gain = 1): void {
    this.setParameter('gain', gain);
  }

  randomize(random: SeededRandom = new SeededRandom()): void {
    this.setParameters({
      gain: random.range(0.3, 1.5),
      cv_amount: random.range(0.5, 1.5),
      offset: random.range(-0.2, 0.2),
      curve: random.pick(GAIN_CURVES),
      smoothing_time: random.range(0.005, 0.05),
    });
  }

  protected process(at: number): void {
    const gain = this.gainSignal(at);
    this.emit('audio_out', this.input('audio_in').follow().mul(gain));
    this.emit('envelope_out', gain);
  }

  protected onStop(): void {
    this.appliedGain = null;
  }

  private gainSignal(at: number): Signal {
    const { gain, curve, cv_amount, offset, max_gain, smoothing_time } = this.params;
    const source = controlFrom(this.input('gain_cv'), gain);
    const am = controlSignal(controlFrom(this.input('am_input'), 0));
    const velocity = controlSignal(controlFrom(this.input('velocity_cv'), 1));
    const open = controlSignal(controlFrom(this.input('gate_input'), 1)).map((g) =>
      g > GATE_THRESHOLD ? 1 : 0
    );
    const scale = velocity.mul(open);

    switch (source.kind) {
      case 'live':
        this.appliedGain = null;
        return source.ref
          .follow()
          .mul(cv_amount)
          .add(offset)
          .add(am)
          .mul(scale)
          .map((x) => applyCurve(curve, Math.max(0, x)))
          .clamp(0, max_gain);
      case 'constant': {
        const target = Math.min(source.value, max_gain);
        const from = this.appliedGain ?? target;
        this.appliedGain = target;
        return ramp(from, target, at, smoothing_time).add(am).mul(scale).clamp(0, max_gain);
      }
    }
  }
}
