/**
 * ConnectionManager — Registry of modules and the edges between their ports.
 *
 * It validates structure and answers "which reference is bound to this
 * input?"; it never computes anything. Each edge caches the source handle it
 * is bound to. Modules repoint handles in place, so the cache only goes stale
 * when a module replaces a handle, which reconcile() repairs.
 *
 * Not safe for concurrent mutation: one caller drives the patch.
 */

import { Signal } from '../core/signal';
import { SignalRef, defaultRef } from '../core/signal-ref';
import type { InputPort, OutputPort } from '../core/port';
import type {
  ConnectOptions,
  Connection,
  PatchContext,
  PatchLogger,
  PortAddress,
  SignalType,
} from '../core/types';
import type { PatchModule } from '../modules/module';
import {
  DuplicateNameError,
  InvalidParameterError,
  ModuleNotFoundError,
  PortDirectionError,
  PortNotFoundError,
  SignalTypeMismatchError,
  StateError,
} from '../core/errors';
import { LOG_PREFIX } from '../config';

export interface ConnectionManagerOptions {
  logger?: PatchLogger;
}

interface Edge {
  readonly connection: Connection;
  readonly sourcePort: OutputPort;
  /** Source handle as of connect() or the last reconcile() */
  bound: SignalRef;
  /** Connection-owned reference that applies attenuation */
  readonly tap: SignalRef | null;
}

const portKey = (module: string, port: string): string => `${module}.${port}`;

const formatAddress = (address: PortAddress): string => portKey(address.module, address.port);

export class ConnectionManager implements PatchContext {
  private readonly registry = new Map<string, PatchModule>();
  private readonly edges = new Map<string, Edge>();
  private readonly logger: PatchLogger;

  constructor(options: ConnectionManagerOptions = {}) {
    this.logger = options.logger ?? console;
  }

  // --- Modules ---

  registerModule(name: string, module: PatchModule): void {
    if (this.registry.has(name)) {
      throw new DuplicateNameError(name);
    }
    if (name !== module.name) {
      throw new InvalidParameterError(name, 'name', `module is named "${module.name}"`);
    }
    if (module.attached) {
      throw new StateError(`Module "${name}" is already registered in a patch`);
    }

    this.registry.set(name, module);
    module.attach(this);
    this.logger.info(`${LOG_PREFIX} registered ${module.kind} "${name}"`);
  }

  /** Register a module under its own name */
  add<M extends PatchModule>(module: M): M {
    this.registerModule(module.name, module);
    return module;
  }

  /** Remove a module and every connection touching it */
  unregisterModule(name: string): boolean {
    const module = this.registry.get(name);
    if (!module) {
      this.logger.warn(`${LOG_PREFIX} cannot unregister "${name}": no such module`);
      return false;
    }

    for (const [key, edge] of [...this.edges]) {
      const { source, destination } = edge.connection;
      if (source.module === name || destination.module === name) {
        this.removeEdge(key, edge);
      }
    }
    this.registry.delete(name);
    module.detach();
    this.logger.info(`${LOG_PREFIX} unregistered "${name}"`);
    return true;
  }

  hasModule(name: string): boolean {
    return this.registry.has(name);
  }

  getModule(name: string): PatchModule {
    return this.requireModule(name);
  }

  modules(): PatchModule[] {
    return [...this.registry.values()];
  }

  // --- Connections ---

  /**
   * Connect an output port to an input port. Replaces whatever was connected
   * to the destination. Nothing changes unless every check passes.
   */
  connect(
    sourceModule: string,
    sourcePort: string,
    destModule: string,
    destPort: string,
    signalType: SignalType,
    options: ConnectOptions = {}
  ): Connection {
    const output = this.requireOutput(sourceModule, sourcePort);
    const input = this.requireInput(destModule, destPort);

    if (output.signalType !== signalType || input.signalType !== signalType) {
      throw new SignalTypeMismatchError(
        `Cannot connect ${output.label} (${output.signalType}) to ` +
          `${portKey(destModule, destPort)} (${input.signalType}) as ${signalType}`
      );
    }

    const attenuation = options.attenuation ?? 1;
    if (!(attenuation >= 0 && attenuation <= 1)) {
      throw new InvalidParameterError(destModule, 'attenuation', `expected a value in [0, 1], got ${attenuation}`);
    }

    const key = portKey(destModule, destPort);
    const previous = this.edges.get(key);
    if (previous) {
      this.removeEdge(key, previous);
    }

    const connection: Connection = {
      source: { module: sourceModule, port: sourcePort },
      destination: { module: destModule, port: destPort },
      signalType,
      attenuation,
    };
    this.edges.set(key, this.createEdge(connection, output));
    this.logger.debug(`${LOG_PREFIX} connected ${this.formatConnection(connection)}`);
    return connection;
  }

  /** Remove the edge into an input. Never raises. */
  disconnect(destModule: string, destPort: string): boolean {
    const key = portKey(destModule, destPort);
    const edge = this.edges.get(key);
    if (!edge) {
      this.logger.debug(`${LOG_PREFIX} nothing connected to ${key}`);
      return false;
    }
    this.removeEdge(key, edge);
    this.logger.debug(`${LOG_PREFIX} disconnected ${this.formatConnection(edge.connection)}`);
    return true;
  }

  /** Drop every connection; modules stay registered */
  clear(): void {
    for (const [key, edge] of [...this.edges]) {
      this.removeEdge(key, edge);
    }
    this.logger.debug(`${LOG_PREFIX} cleared all connections`);
  }

  // --- Resolution ---

  /**
   * The reference an input currently reads from: the bound source handle (or
   * its attenuating tap), or the type's default when nothing is connected or
   * the source has produced no output yet.
   */
  resolveInput(destModule: string, destPort: string): SignalRef {
    const input = this.requireInput(destModule, destPort);
    const edge = this.edges.get(portKey(destModule, destPort));
    if (!edge || edge.bound.current === null) {
      return defaultRef(input.signalType);
    }
    return edge.tap ?? edge.bound;
  }

  hasConnection(destModule: string, destPort: string): boolean {
    return this.edges.has(portKey(destModule, destPort));
  }

  /**
   * Re-bind every edge to its source port's current handle.
   * Returns how many bindings changed; a second call returns 0.
   */
  reconcile(): number {
    let changed = 0;
    for (const edge of this.edges.values()) {
      const current = edge.sourcePort.handle;
      if (edge.bound !== current) {
        edge.bound = current;
        changed++;
      }
    }
    if (changed > 0) {
      this.logger.debug(`${LOG_PREFIX} reconciled ${changed} binding(s)`);
    }
    return changed;
  }

  // --- Queries ---

  connections(): Connection[] {
    return [...this.edges.values()].map((edge) => edge.connection);
  }

  /** Connections with the module at either end */
  connectionsFor(module: string): Connection[] {
    return this.connections().filter(
      (c) => c.source.module === module || c.destination.module === module
    );
  }

  inputConnection(module: string, port: string): Connection | undefined {
    return this.edges.get(portKey(module, port))?.connection;
  }

  outputConnections(module: string, port: string): Connection[] {
    return this.connections().filter((c) => c.source.module === module && c.source.port === port);
  }

  /** Destination "module.port" to the source handle it is bound to */
  bindings(): Map<string, SignalRef> {
    const result = new Map<string, SignalRef>();
    for (const [key, edge] of this.edges) {
      result.set(key, edge.bound);
    }
    return result;
  }

  /** Connections whose binding lags behind a replaced source handle */
  staleBindings(): Connection[] {
    return [...this.edges.values()]
      .filter((edge) => edge.bound !== edge.sourcePort.handle)
      .map((edge) => edge.connection);
  }

  /** Structural problems in the current graph; empty when consistent */
  validate(): string[] {
    const problems: string[] = [];
    for (const edge of this.edges.values()) {
      const { source, destination, signalType } = edge.connection;
      const label = this.formatConnection(edge.connection);
      const src = this.registry.get(source.module);
      const dst = this.registry.get(destination.module);

      if (!src) problems.push(`${label}: source module "${source.module}" is not registered`);
      if (!dst) problems.push(`${label}: destination module "${destination.module}" is not registered`);

      const input = dst?.getInputPort(destination.port);
      if (dst && !input) {
        problems.push(`${label}: destination port is missing`);
      }
      if (src && src.getOutputPort(source.port) !== edge.sourcePort) {
        problems.push(`${label}: source port is missing`);
      }
      if (edge.sourcePort.signalType !== signalType || (input && input.signalType !== signalType)) {
        problems.push(`${label}: signal type mismatch`);
      }
      if (edge.bound !== edge.sourcePort.handle) {
        problems.push(`${label}: bound to a replaced handle (call reconcile())`);
      }
    }
    return problems;
  }

  /** One line per connection, for printing */
  describe(): string {
    if (this.edges.size === 0) {
      return 'No connections';
    }
    return this.connections()
      .map((c) => this.formatConnection(c))
      .join('\n');
  }

  // --- Internals ---

  private createEdge(connection: Connection, sourcePort: OutputPort): Edge {
    if (connection.attenuation === 1) {
      return { connection, sourcePort, bound: sourcePort.handle, tap: null };
    }

    const tap = new SignalRef({
      owner: `tap:${formatAddress(connection.destination)}`,
      type: connection.signalType,
    });
    const edge: Edge = { connection, sourcePort, bound: sourcePort.handle, tap };
    const attenuation = connection.attenuation;
    tap.repoint(new Signal((t) => edge.bound.read(t) * attenuation));
    return edge;
  }

  private removeEdge(key: string, edge: Edge): void {
    edge.tap?.retire();
    this.edges.delete(key);
  }

  private formatConnection(connection: Connection): string {
    const arrow = `${formatAddress(connection.source)} -> ${formatAddress(connection.destination)}`;
    const gain = connection.attenuation === 1 ? '' : ` x${connection.attenuation}`;
    return `${arrow} [${connection.signalType}]${gain}`;
  }

  private requireModule(name: string): PatchModule {
    const module = this.registry.get(name);
    if (!module) {
      throw new ModuleNotFoundError(name);
    }
    return module;
  }

  private requireOutput(moduleName: string, portName: string): OutputPort {
    const module = this.requireModule(moduleName);
    const port = module.getOutputPort(portName);
    if (port) return port;
    if (module.getInputPort(portName)) {
      throw new PortDirectionError(moduleName, portName, 'output');
    }
    throw new PortNotFoundError(moduleName, portName, 'output');
  }

  private requireInput(moduleName: string, portName: string): InputPort {
    const module = this.requireModule(moduleName);
    const port = module.getInputPort(portName);
    if (port) return port;
    if (module.getOutputPort(portName)) {
      throw new PortDirectionError(moduleName, portName, 'input');
    }
    throw new PortNotFoundError(moduleName, portName, 'input');
  }
}
