/**
 * Mixer — Weighted sum of N inputs times a master level.
 *
 * Only inputs that are bound and have a level above zero take part. A
 * zero-level input is left out of the sum entirely, not multiplied by zero.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { portCount } from './fan-out';
import { SILENCE } from '../core/signal';
import type { SignalType } from '../core/types';
import { DEFAULT_MIXER_INPUTS } from '../config';

export type MixerShape = Record<string, z.ZodDefault<z.ZodNumber>>;

function mixerShape(inputs: number): MixerShape {
  const shape: MixerShape = {
    master_level: z.number().min(0).max(1).default(0.8),
  };
  for (let i = 0; i < inputs; i++) {
    shape[`level_${i}`] = z.number().min(0).max(1).default(0.5);
  }
  return shape;
}

export interface MixerOptions extends ModuleOptions<MixerShape> {
  inputs?: number;
  signalType?: SignalType;
}

export class Mixer extends Module<MixerShape> {
  readonly kind = 'mixer';
  readonly inputCount: number;

  constructor(name: string, options: MixerOptions = {}) {
    const inputs = portCount(name, 'inputs', options.inputs ?? DEFAULT_MIXER_INPUTS);
    super(name, z.object(mixerShape(inputs)), options);
    this.inputCount = inputs;
    const type = options.signalType ?? 'audio';

    for (let i = 0; i < inputs; i++) {
      this.addInput(`input${i}`, type);
    }
    this.addOutput('output', type);
  }

  setLevel(index: number, level: number): void {
    this.setParameter(`level_${index}`, level);
  }

  setMasterLevel(level: number): void {
    this.setParameter('master_level', level);
  }

  levels(): number[] {
    return Array.from({ length: this.inputCount }, (_, i) => this.params[`level_${i}`]);
  }

  /** Indices of inputs that contribute to the mix */
  activeInputs(): number[] {
    const active: number[] = [];
    for (let i = 0; i < this.inputCount; i++) {
      if (this.params[`level_${i}`] > 0 && !this.input(`input${i}`).isDefault) {
        active.push(i);
      }
    }
    return active;
  }

  protected process(): void {
    const active = this.activeInputs();
    if (active.length === 0) {
      this.emit('output', SILENCE);
      return;
    }

    const sum = active
      .map((i) => this.input(`input${i}`).follow().mul(this.params[`level_${i}`]))
      .reduce((acc, term) => acc.add(term));
    this.emit('output', sum.mul(this.params.master_level));
  }
}
