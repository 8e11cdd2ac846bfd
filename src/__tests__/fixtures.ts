import { vi } from 'vitest';
import { z } from 'zod';
import { Module } from '../modules/module';
import type { ModuleOptions } from '../modules/module';
import { Signal } from '../core/signal';
import { SeededRandom } from '../core/random';
import type { SignalType } from '../core/types';

const sourceShape = {
  value: z.number().default(0),
};

type SourceShape = typeof sourceShape;

export interface SourceOptions extends ModuleOptions<SourceShape> {
  signalType?: SignalType;
}

/** Emits its `value` parameter on `out` */
export class ConstantSource extends Module<SourceShape> {
  readonly kind: string = 'constant';
  starts = 0;
  stops = 0;

  constructor(name: string, options: SourceOptions = {}) {
    super(name, z.object(sourceShape), options);
    this.addOutput('out', options.signalType ?? 'audio');
  }

  protected process(): void {
    this.emit('out', Signal.constant(this.params.value));
  }

  protected onStart(): void {
    this.starts++;
  }

  protected onStop(): void {
    this.stops++;
  }
}

export interface RegeneratingOptions extends SourceOptions {
  /** Let the module reconcile the patch itself after replacing its handle */
  reconcile?: boolean;
}

/** Replaces its output handle on every recompute instead of repointing it */
export class RegeneratingSource extends ConstantSource {
  readonly kind: string = 'regenerating';
  private readonly autoReconcile: boolean;

  constructor(name: string, options: RegeneratingOptions = {}) {
    super(name, options);
    this.autoReconcile = options.reconcile ?? true;
  }

  protected process(): void {
    this.replaceOutput('out', this.autoReconcile);
    super.process();
  }
}

/** Emits the patch time itself */
export class ClockSource extends ConstantSource {
  readonly kind: string = 'clock';

  protected process(): void {
    this.emit('out', new Signal((t) => t));
  }
}

/** Returns the same draw every time */
export class FixedRandom extends SeededRandom {
  private readonly value: number;

  constructor(value: number) {
    super(0);
    this.value = value;
  }

  next(): number {
    return this.value;
  }
}

/** Sign changes across a buffer; a sine or square crosses twice per cycle */
export function countCrossings(samples: ArrayLike<number>): number {
  let count = 0;
  for (let i = 1; i < samples.length; i++) {
    if ((samples[i - 1] < 0) !== (samples[i] < 0)) count++;
  }
  return count;
}

export function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  };
}
