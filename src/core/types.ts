/**
 * Core Types — Shared type definitions for patchbay.
 *
 * This file contains interfaces and types used across multiple modules.
 * Keeping them separate prevents circular dependencies.
 */

import type { SignalType } from '../config';
import type { SignalRef } from './signal-ref';

export type { SignalType };

// --- Signal Types ---

/** A function that takes time and returns a value */
export type SignalFn = (t: number) => number;

// --- Ports ---

export type PortDirection = 'in' | 'out';

/** A port as seen from outside its module */
export interface PortSpec {
  readonly module: string;
  readonly name: string;
  readonly direction: PortDirection;
  readonly signalType: SignalType;
}

/** Module name + port name */
export interface PortAddress {
  readonly module: string;
  readonly port: string;
}

// --- Connections ---

/** A directed, typed edge from an output port to an input port */
export interface Connection {
  readonly source: PortAddress;
  readonly destination: PortAddress;
  readonly signalType: SignalType;
  /** Scale applied on the way to the destination (0-1) */
  readonly attenuation: number;
}

export interface ConnectOptions {
  attenuation?: number;
}

/**
 * What a module sees of the patch it is registered in.
 * Implemented by ConnectionManager.
 */
export interface PatchContext {
  resolveInput(module: string, port: string): SignalRef;
  hasConnection(module: string, port: string): boolean;
  reconcile(): number;
}

// --- Modules ---

export type ModuleState = 'created' | 'started' | 'stopped';

/** Parameter values a module accepts through setParameter() */
export type ParamValue = number | string;

/** Snapshot returned by Module.getInfo() */
export interface ModuleInfo {
  name: string;
  kind: string;
  state: ModuleState;
  inputs: PortSpec[];
  outputs: PortSpec[];
  parameters: Record<string, ParamValue>;
}

// --- Logging ---

/**
 * Logging surface used by the patch.
 * `console` satisfies it; tests inject spies.
 */
export interface PatchLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}
