/**
 * Control sources — A parameter that is either a fixed number or driven by a
 * live reference, resolved when the module recomputes.
 */

import { Signal } from './signal';
import type { SignalRef } from './signal-ref';

export type ControlSource =
  | { readonly kind: 'constant'; readonly value: number }
  | { readonly kind: 'live'; readonly ref: SignalRef };

export const constant = (value: number): ControlSource => ({ kind: 'constant', value });

export const live = (ref: SignalRef): ControlSource => ({ kind: 'live', ref });

/**
 * Pick the source for a control: a bound reference wins over the static value.
 * Default references (nothing connected) count as unbound.
 */
export function controlFrom(ref: SignalRef, fallback: number): ControlSource {
  return ref.isDefault ? constant(fallback) : live(ref);
}

/** Turn a control source into a signal */
export function controlSignal(source: ControlSource): Signal {
  switch (source.kind) {
    case 'constant':
      return Signal.constant(source.value);
    case 'live':
      return source.ref.follow();
  }
}
