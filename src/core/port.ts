/**
 * Ports — Named, directional, typed attachment points on a module.
 */

import { SignalRef } from './signal-ref';
import type { PortDirection, PortSpec, SignalType } from './types';

export class InputPort implements PortSpec {
  readonly direction: PortDirection = 'in';

  constructor(
    readonly module: string,
    readonly name: string,
    readonly signalType: SignalType
  ) {}
}

/**
 * An output port owns exactly one live handle at a time.
 * Terminal routes hold the port, so they follow the handle even if it is replaced.
 */
export class OutputPort implements PortSpec {
  readonly direction: PortDirection = 'out';
  private _handle: SignalRef;

  constructor(
    readonly module: string,
    readonly name: string,
    readonly signalType: SignalType
  ) {
    this._handle = this.createHandle();
  }

  get label(): string {
    return `${this.module}.${this.name}`;
  }

  get handle(): SignalRef {
    return this._handle;
  }

  /** Retire the current handle and install a fresh, empty one */
  replaceHandle(): SignalRef {
    this._handle.retire();
    this._handle = this.createHandle();
    return this._handle;
  }

  private createHandle(): SignalRef {
    return new SignalRef({ owner: this.label, type: this.signalType });
  }
}
