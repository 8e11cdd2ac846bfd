/**
 * Fan-out — One input copied, unchanged, onto N outputs.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { InvalidParameterError } from '../core/errors';
import type { SignalType } from '../core/types';
import { DEFAULT_FANOUT_OUTPUTS } from '../config';

const fanOutShape = {};

export type FanOutShape = typeof fanOutShape;

export interface FanOutOptions extends ModuleOptions<FanOutShape> {
  outputs?: number;
  signalType?: SignalType;
}

/** Validate a port count given at construction */
export function portCount(moduleName: string, option: string, count: number): number {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidParameterError(moduleName, option, `expected a positive integer, got ${count}`);
  }
  return count;
}

export class FanOut extends Module<FanOutShape> {
  readonly kind = 'fan-out';
  readonly outputCount: number;

  constructor(name: string, options: FanOutOptions = {}) {
    super(name, z.object(fanOutShape), options);
    this.outputCount = portCount(name, 'outputs', options.outputs ?? DEFAULT_FANOUT_OUTPUTS);
    const type = options.signalType ?? 'audio';

    this.addInput('input', type);
    for (let i = 0; i < this.outputCount; i++) {
      this.addOutput(`output${i}`, type);
    }
  }

  protected process(): void {
    const source = this.input('input');
    for (let i = 0; i < this.outputCount; i++) {
      this.emit(`output${i}`, source.follow());
    }
  }
}
