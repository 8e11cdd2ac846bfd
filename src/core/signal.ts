/**
 * Signal — A function of time that can be composed and transformed.
 *
 * This is the renderable value a module's output points at. The render engine
 * evaluates it at whatever times it samples; modules build new signals by
 * composing their inputs.
 */

import type { SignalFn } from './types';

export type { SignalFn };

export class Signal {
  private _fn: SignalFn;

  constructor(fn: SignalFn) {
    this._fn = fn;
  }

  /** A signal that holds one value forever */
  static constant(value: number): Signal {
    return new Signal(() => value);
  }

  /** Evaluate the signal at time t (seconds) */
  eval(t: number): number {
    return this._fn(t);
  }

  /** Helper: resolve number | Signal to a value at time t */
  private static toVal(x: number | Signal, t: number): number {
    return x instanceof Signal ? x.eval(t) : x;
  }

  // --- Arithmetic ---

  mul(x: number | Signal): Signal {
    return new Signal((t) => this.eval(t) * Signal.toVal(x, t));
  }

  add(x: number | Signal): Signal {
    return new Signal((t) => this.eval(t) + Signal.toVal(x, t));
  }

  sub(x: number | Signal): Signal {
    return new Signal((t) => this.eval(t) - Signal.toVal(x, t));
  }

  // --- Shaping ---

  /** Apply an arbitrary per-sample mapping */
  map(fn: (value: number) => number): Signal {
    return new Signal((t) => fn(this.eval(t)));
  }

  /** Fractional part, always in [0, 1) */
  frac(): Signal {
    return new Signal((t) => {
      const val = this.eval(t);
      return val - Math.floor(val);
    });
  }

  /** 2^x: turns a 1V/oct control value into a frequency ratio */
  exp2(): Signal {
    return new Signal((t) => Math.pow(2, this.eval(t)));
  }

  min(x: number | Signal): Signal {
    return new Signal((t) => Math.min(this.eval(t), Signal.toVal(x, t)));
  }

  max(x: number | Signal): Signal {
    return new Signal((t) => Math.max(this.eval(t), Signal.toVal(x, t)));
  }

  clamp(lo: number, hi: number): Signal {
    return this.max(lo).min(hi);
  }
}

/** Global time signal (seconds since the patch clock started) */
export const T = new Signal((t) => t);

/** Constant zero: silence for audio, zero volts for CV, low for gates */
export const SILENCE = Signal.constant(0);

/**
 * Linear ramp from `from` to `to` between `start` and `start + duration`.
 * Holds `from` before the ramp and `to` after it.
 */
export function ramp(from: number, to: number, start: number, duration: number): Signal {
  if (duration <= 0) return Signal.constant(to);
  return new Signal((t) => {
    if (t <= start) return from;
    if (t >= start + duration) return to;
    return from + (to - from) * ((t - start) / duration);
  });
}
