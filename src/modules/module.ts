/**
 * Module — Base class for every patchable unit.
 *
 * A module owns its ports, its validated parameters and the handles its output
 * ports hold. Nothing is computed implicitly: the caller drives a module with
 * recompute() whenever its inputs or parameters changed.
 */

import { z } from 'zod';
import { InputPort, OutputPort } from '../core/port';
import { defaultRef } from '../core/signal-ref';
import type { Signal } from '../core/signal';
import type { SignalRef } from '../core/signal-ref';
import type { ModuleInfo, ModuleState, ParamValue, PatchContext, SignalType } from '../core/types';
import type { OutputRoute, RenderEngine } from '../audio/engine';
import {
  DuplicateNameError,
  InvalidParameterError,
  PortNotFoundError,
  SignalTypeMismatchError,
  StateError,
} from '../core/errors';

export type ParamSchema<S extends z.ZodRawShape> = z.ZodObject<S, 'strip'>;

/** Parameter values after validation and defaults */
export type ParamsOf<S extends z.ZodRawShape> = z.output<ParamSchema<S>>;

export interface ModuleOptions<S extends z.ZodRawShape> {
  /** Initial parameter values; anything omitted takes its default */
  params?: z.input<ParamSchema<S>>;
  /** Render engine this module may route its audio output to */
  engine?: RenderEngine;
}

/** What a patch needs from a module, whatever its parameter schema */
export interface PatchModule {
  readonly name: string;
  readonly kind: string;
  readonly state: ModuleState;
  readonly attached: boolean;
  attach(patch: PatchContext): void;
  detach(): void;
  start(): void;
  stop(): void;
  recompute(at?: number): void;
  setParameter(name: string, value: ParamValue): void;
  getParameter(name: string): ParamValue;
  getInputPort(name: string): InputPort | undefined;
  getOutputPort(name: string): OutputPort | undefined;
  inputPorts(): InputPort[];
  outputPorts(): OutputPort[];
  output(name: string): SignalRef;
  getInfo(): ModuleInfo;
}

function describeIssue(error: z.ZodError): { path: string; message: string } {
  const issue = error.issues[0];
  if (!issue) return { path: '', message: error.message };
  return { path: issue.path.join('.'), message: issue.message };
}

export abstract class Module<S extends z.ZodRawShape = z.ZodRawShape> implements PatchModule {
  abstract readonly kind: string;

  readonly name: string;
  protected readonly engine: RenderEngine | null;
  protected params: ParamsOf<S>;

  private readonly schema: ParamSchema<S>;
  private readonly inputs = new Map<string, InputPort>();
  private readonly outputs = new Map<string, OutputPort>();
  private routes: OutputRoute[] = [];
  private _state: ModuleState = 'created';
  private patch: PatchContext | null = null;

  constructor(name: string, schema: ParamSchema<S>, options: ModuleOptions<S> = {}) {
    if (name.length === 0) {
      throw new InvalidParameterError(name, 'name', 'module name must not be empty');
    }
    this.name = name;
    this.schema = schema;
    this.engine = options.engine ?? null;

    const parsed = schema.safeParse(options.params ?? {});
    if (!parsed.success) {
      const { path, message } = describeIssue(parsed.error);
      throw new InvalidParameterError(name, path, message);
    }
    this.params = parsed.data;
  }

  // --- Lifecycle ---

  get state(): ModuleState {
    return this._state;
  }

  get isStarted(): boolean {
    return this._state === 'started';
  }

  start(): void {
    if (this._state === 'started') return;
    this.onStart();
    this._state = 'started';
  }

  /**
   * Stop the module. Output handles keep their identity but lose their value,
   * so consumers and terminal routes read silence until the next start.
   */
  stop(): void {
    if (this._state === 'stopped') return;
    const wasStarted = this._state === 'started';
    this._state = 'stopped';
    for (const port of this.outputs.values()) {
      port.handle.release();
    }
    if (wasStarted) {
      this.onStop();
    }
  }

  /**
   * Re-read inputs and parameters and repoint the outputs.
   * `at` is the patch time from which parameter changes take effect.
   */
  recompute(at = 0): void {
    if (this._state !== 'started') {
      throw new StateError(`Cannot recompute "${this.name}": module is ${this._state}, not started`);
    }
    this.process(at);
  }

  /** Build the outputs from the current inputs and parameters */
  protected abstract process(at: number): void;

  /** Resource acquisition; runs once per start() */
  protected onStart(): void {}

  /** Resource release; runs once per stop() of a started module */
  protected onStop(): void {}

  // --- Parameters ---

  /** Validate and store a parameter. Takes effect at the next recompute(). */
  setParameter(name: string, value: ParamValue): void {
    if (!(name in this.schema.shape)) {
      throw new InvalidParameterError(this.name, name, `unknown parameter for ${this.kind}`);
    }
    const parsed = this.schema.safeParse({ ...this.params, [name]: value });
    if (!parsed.success) {
      throw new InvalidParameterError(this.name, name, describeIssue(parsed.error).message);
    }
    this.params = parsed.data;
  }

  /** Validate and store several parameters together; on failure none change */
  setParameters(values: z.input<ParamSchema<S>>): void {
    const parsed = this.schema.safeParse({ ...this.params, ...values });
    if (!parsed.success) {
      const { path, message } = describeIssue(parsed.error);
      throw new InvalidParameterError(this.name, path, message);
    }
    this.params = parsed.data;
  }

  getParameter(name: string): ParamValue {
    const value = this.parameters[name];
    if (value === undefined) {
      throw new InvalidParameterError(this.name, name, `unknown parameter for ${this.kind}`);
    }
    return value;
  }

  /** Snapshot of every parameter */
  get parameters(): Record<string, ParamValue> {
    const snapshot: Record<string, ParamValue> = {};
    for (const [key, value] of Object.entries(this.params)) {
      if (typeof value === 'number' || typeof value === 'string') {
        snapshot[key] = value;
      }
    }
    return snapshot;
  }

  // --- Ports ---

  protected addInput(name: string, signalType: SignalType): InputPort {
    if (this.inputs.has(name)) {
      throw new DuplicateNameError(`${this.name}.${name}`, 'Input port');
    }
    const port = new InputPort(this.name, name, signalType);
    this.inputs.set(name, port);
    return port;
  }

  protected addOutput(name: string, signalType: SignalType): OutputPort {
    if (this.outputs.has(name)) {
      throw new DuplicateNameError(`${this.name}.${name}`, 'Output port');
    }
    const port = new OutputPort(this.name, name, signalType);
    this.outputs.set(name, port);
    return port;
  }

  getInputPort(name: string): InputPort | undefined {
    return this.inputs.get(name);
  }

  getOutputPort(name: string): OutputPort | undefined {
    return this.outputs.get(name);
  }

  inputPorts(): InputPort[] {
    return [...this.inputs.values()];
  }

  outputPorts(): OutputPort[] {
    return [...this.outputs.values()];
  }

  /** The handle an output port currently holds */
  output(name: string): SignalRef {
    return this.requireOutput(name).handle;
  }

  /** The reference bound to an input, or the type's default */
  protected input(name: string): SignalRef {
    const port = this.inputs.get(name);
    if (!port) {
      throw new PortNotFoundError(this.name, name, 'input');
    }
    return this.patch ? this.patch.resolveInput(this.name, name) : defaultRef(port.signalType);
  }

  /** Point an output's handle at a new value */
  protected emit(name: string, signal: Signal): void {
    this.requireOutput(name).handle.repoint(signal);
  }

  /**
   * Replace an output's handle instead of repointing it.
   * The old handle is retired; with `reconcile` the patch re-binds its
   * consumers immediately, otherwise the caller must call reconcile().
   */
  protected replaceOutput(name: string, reconcile = true): SignalRef {
    const handle = this.requireOutput(name).replaceHandle();
    if (reconcile && this.patch) {
      this.patch.reconcile();
    }
    return handle;
  }

  /** Names of inputs that have a connection in the current patch */
  connectedInputs(): string[] {
    const patch = this.patch;
    if (!patch) return [];
    return [...this.inputs.keys()].filter((port) => patch.hasConnection(this.name, port));
  }

  // --- Patch membership ---

  get attached(): boolean {
    return this.patch !== null;
  }

  /** Called by the patch on registration */
  attach(patch: PatchContext): void {
    if (this.patch && this.patch !== patch) {
      throw new StateError(`Module "${this.name}" is already registered in another patch`);
    }
    this.patch = patch;
  }

  /** Called by the patch on unregistration */
  detach(): void {
    this.patch = null;
  }

  // --- Terminal output ---

  /**
   * Bind an audio output to a channel of the render engine. The route holds
   * the port, so it follows every repoint and handle replacement.
   */
  routeToOutput(channel: number, portName?: string): OutputRoute {
    if (!this.engine) {
      throw new StateError(`Module "${this.name}" was created without a render engine`);
    }
    const port = portName === undefined ? this.primaryAudioOutput() : this.requireOutput(portName);
    if (port.signalType !== 'audio') {
      throw new SignalTypeMismatchError(
        `Cannot route "${port.label}" to an output channel: it carries ${port.signalType}, not audio`
      );
    }
    const route = this.engine.route(channel, port);
    this.routes.push(route);
    return route;
  }

  routeToOutputs(channels: number[], portName?: string): OutputRoute[] {
    return channels.map((channel) => this.routeToOutput(channel, portName));
  }

  /** Detach every route this module registered */
  stopOutput(): void {
    for (const route of this.routes) {
      route.detach();
    }
    this.routes = [];
  }

  get outputRoutes(): OutputRoute[] {
    return this.routes.filter((route) => route.active);
  }

  getInfo(): ModuleInfo {
    return {
      name: this.name,
      kind: this.kind,
      state: this._state,
      inputs: this.inputPorts(),
      outputs: this.outputPorts(),
      parameters: this.parameters,
    };
  }

  private requireOutput(name: string): OutputPort {
    const port = this.outputs.get(name);
    if (!port) {
      throw new PortNotFoundError(this.name, name, 'output');
    }
    return port;
  }

  private primaryAudioOutput(): OutputPort {
    for (const port of this.outputs.values()) {
      if (port.signalType === 'audio') return port;
    }
    throw new SignalTypeMismatchError(`Module "${this.name}" has no audio output to route`);
  }
}
