/**
 * Core — Signals, handles, ports and the error taxonomy.
 *
 * No modules, no registry, no rendering: just the values that flow through
 * a patch and the references that carry them.
 */

export { Signal, T, SILENCE, ramp } from './signal';
export type { SignalFn } from './signal';

export { SignalRef, defaultRef } from './signal-ref';
export type { SignalRefOptions } from './signal-ref';

export { InputPort, OutputPort } from './port';

export { SeededRandom } from './random';

export { constant, live, controlFrom, controlSignal } from './control';
export type { ControlSource } from './control';

export {
  PatchError,
  ModuleNotFoundError,
  DuplicateNameError,
  PortNotFoundError,
  PortDirectionError,
  SignalTypeMismatchError,
  InvalidParameterError,
  StateError,
} from './errors';

export type {
  SignalType,
  PortDirection,
  PortSpec,
  PortAddress,
  Connection,
  ConnectOptions,
  PatchContext,
  ModuleState,
  ParamValue,
  ModuleInfo,
  PatchLogger,
} from './types';
