/**
 * SignalRef — The stable handle an output port hands to its consumers.
 *
 * A producer repoints the handle at a new Signal whenever it recomputes; the
 * handle object itself keeps its identity, so every consumer and every
 * terminal route holding it sees the new value without being rewired.
 */

import { Signal, SILENCE } from './signal';
import { StateError } from './errors';
import type { SignalType } from './types';

let nextRefId = 1;

export interface SignalRefOptions {
  /** Who owns the handle, e.g. "vco.audio_out" */
  owner: string;
  type: SignalType;
  initial?: Signal | null;
  /** Shared default handles are immutable */
  isDefault?: boolean;
}

export class SignalRef {
  readonly id: number;
  readonly owner: string;
  readonly type: SignalType;
  readonly isDefault: boolean;

  private _current: Signal | null;
  private _generation = 0;
  private _retired = false;

  constructor(options: SignalRefOptions) {
    this.id = nextRefId++;
    this.owner = options.owner;
    this.type = options.type;
    this.isDefault = options.isDefault ?? false;
    this._current = options.initial ?? null;
  }

  /** The value the handle points at, null before the first output */
  get current(): Signal | null {
    return this._current;
  }

  /** Bumped every time the underlying value changes */
  get generation(): number {
    return this._generation;
  }

  /** True once the owning port has replaced this handle */
  get retired(): boolean {
    return this._retired;
  }

  /** Point the handle at a new value */
  repoint(signal: Signal): void {
    if (this.isDefault) {
      throw new StateError(`Default reference "${this.owner}" cannot be repointed`);
    }
    if (this._retired) {
      throw new StateError(`Reference "${this.owner}" #${this.id} has been retired`);
    }
    this._current = signal;
    this._generation++;
  }

  /** Drop the underlying value; readers fall back to zero */
  release(): void {
    if (this.isDefault || this._current === null) return;
    this._current = null;
    this._generation++;
  }

  /** Release for good. Only the owning port calls this. */
  retire(): void {
    this.release();
    this._retired = true;
  }

  /** Evaluate whatever the handle points at now */
  read(t: number): number {
    return this._current ? this._current.eval(t) : 0;
  }

  /**
   * A Signal that looks the handle up on every evaluation.
   * This is how consumers hold an input: by handle, never by value.
   */
  follow(): Signal {
    return new Signal((t) => this.read(t));
  }
}

// --- Defaults for unconnected inputs ---

const DEFAULT_REFS: Record<SignalType, SignalRef> = {
  audio: new SignalRef({ owner: 'default:silence', type: 'audio', initial: SILENCE, isDefault: true }),
  cv: new SignalRef({ owner: 'default:zero', type: 'cv', initial: SILENCE, isDefault: true }),
  gate: new SignalRef({ owner: 'default:low', type: 'gate', initial: SILENCE, isDefault: true }),
  // A trigger input with nothing bound sees no pulse at all
  trigger: new SignalRef({ owner: 'default:none', type: 'trigger', initial: null, isDefault: true }),
};

/** The shared default handle for an unconnected input of the given type */
export function defaultRef(type: SignalType): SignalRef {
  return DEFAULT_REFS[type];
}
