/**
 * Engine — The boundary toward the real-time renderer.
 *
 * The renderer is an external collaborator: it samples whatever handle is
 * bound to each output channel at its own cadence. RenderEngine is the
 * surface patchbay needs from it, passed explicitly to the modules that
 * route to it.
 *
 * OfflineEngine is an in-process implementation that renders into buffers,
 * which is enough for offline bouncing and for tests.
 */

import type { SignalRef } from '../core/signal-ref';
import type { SignalType } from '../core/types';
import { InvalidParameterError, SignalTypeMismatchError, StateError } from '../core/errors';
import { DEFAULT_CHANNEL_COUNT, DEFAULT_SAMPLE_RATE } from '../config';

/** Anything that exposes a current handle (an OutputPort does) */
export interface RouteSource {
  readonly label: string;
  readonly signalType: SignalType;
  readonly handle: SignalRef;
}

export interface RenderEngine {
  readonly sampleRate: number;
  readonly channelCount: number;
  begin(): void;
  end(): void;
  isRunning(): boolean;
  /** Register a persistent binding of a source to a physical channel */
  route(channel: number, source: RouteSource): OutputRoute;
}

/**
 * A channel binding. It resolves the source's handle on every sample, so it
 * survives both repoints and handle replacement without re-binding.
 */
export class OutputRoute {
  private _active = true;

  constructor(
    readonly channel: number,
    readonly source: RouteSource,
    private readonly onDetach: (route: OutputRoute) => void
  ) {}

  get active(): boolean {
    return this._active;
  }

  /** Current output of the source at time t */
  sample(t: number): number {
    return this._active ? this.source.handle.read(t) : 0;
  }

  detach(): void {
    if (!this._active) return;
    this._active = false;
    this.onDetach(this);
  }
}

export interface OfflineEngineOptions {
  sampleRate?: number;
  channelCount?: number;
}

export class OfflineEngine implements RenderEngine {
  readonly sampleRate: number;
  readonly channelCount: number;

  private running = false;
  private routes: OutputRoute[] = [];

  // Integer frame cursor avoids drift from accumulating 1/sampleRate
  private frame = 0;

  constructor(options: OfflineEngineOptions = {}) {
    this.sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.channelCount = options.channelCount ?? DEFAULT_CHANNEL_COUNT;
  }

  /** Start a session */
  begin(): void {
    if (this.running) return;
    this.running = true;
    this.frame = 0;
  }

  /** End the session, dropping every route */
  end(): void {
    this.running = false;
    for (const route of [...this.routes]) {
      route.detach();
    }
    this.routes = [];
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Time of the next frame to be rendered (s) */
  currentTime(): number {
    return this.frame / this.sampleRate;
  }

  /** Move the render cursor */
  seek(time: number): void {
    this.frame = Math.max(0, Math.round(time * this.sampleRate));
  }

  route(channel: number, source: RouteSource): OutputRoute {
    this.assertRunning('route');
    if (!Number.isInteger(channel) || channel < 0 || channel >= this.channelCount) {
      throw new InvalidParameterError(
        'engine',
        'channel',
        `expected an integer in [0, ${this.channelCount}), got ${channel}`
      );
    }
    if (source.signalType !== 'audio') {
      throw new SignalTypeMismatchError(
        `Only audio can be routed to an output channel; "${source.label}" carries ${source.signalType}`
      );
    }

    const route = new OutputRoute(channel, source, (r) => {
      const idx = this.routes.indexOf(r);
      if (idx !== -1) {
        this.routes.splice(idx, 1);
      }
    });
    this.routes.push(route);
    return route;
  }

  /** Routes currently bound to a channel */
  routesOn(channel: number): OutputRoute[] {
    return this.routes.filter((r) => r.channel === channel);
  }

  /** Mix of every route on a channel at time t */
  sampleAt(channel: number, t: number): number {
    let sum = 0;
    for (const route of this.routes) {
      if (route.channel === channel) {
        sum += route.sample(t);
      }
    }
    return sum;
  }

  /** Render the next block, one buffer per channel */
  render(frames: number): Float32Array[] {
    this.assertRunning('render');

    const buffers = Array.from({ length: this.channelCount }, () => new Float32Array(frames));
    for (let i = 0; i < frames; i++) {
      const t = (this.frame + i) / this.sampleRate;
      for (let ch = 0; ch < this.channelCount; ch++) {
        buffers[ch][i] = this.sampleAt(ch, t);
      }
    }
    this.frame += frames;
    return buffers;
  }

  private assertRunning(operation: string): void {
    if (!this.running) {
      throw new StateError(`Cannot ${operation}: engine has not begun (call begin() first)`);
    }
  }
}
