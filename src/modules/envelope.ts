/**
 * Envelope — ADSR state machine.
 *
 * Transitions happen only through trigger() and release(). The current
 * segment is stored as (start time, start level, progress through its stage),
 * so the level at any time is a pure function of the segment and the timing,
 * and the output signal emitted at start() stays valid for the life of the
 * module. recompute() re-anchors the running segment at its own time before
 * taking new timing, so the new values only shape what is left of the stage.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { Signal } from '../core/signal';
import { SeededRandom } from '../core/random';
import { StateError } from '../core/errors';

export type EnvelopeStage = 'idle' | 'attack' | 'decay' | 'sustain' | 'release';

const envelopeShape = {
  attack: z.number().min(0.001).max(5).default(0.01),
  decay: z.number().min(0).max(5).default(0.1),
  sustain: z.number().min(0).max(1).default(0.5),
  release: z.number().min(0.001).max(10).default(1),
};

export type EnvelopeShape = typeof envelopeShape;
export type EnvelopeOptions = ModuleOptions<EnvelopeShape>;

interface Timing {
  attack: number;
  decay: number;
  sustain: number;
  release: number;
}

/** `progress` is the fraction of the stage already covered when the segment began */
type Segment =
  | { stage: 'idle' }
  | { stage: 'attack'; start: number; from: number }
  | { stage: 'decay'; start: number; from: number; progress: number }
  | { stage: 'sustain' }
  | { stage: 'release'; start: number; from: number; progress: number };

interface Point {
  stage: EnvelopeStage;
  level: number;
  progress: number;
}

const IDLE: Point = { stage: 'idle', level: 0, progress: 0 };

export class Envelope extends Module<EnvelopeShape> {
  readonly kind = 'envelope';

  private timing: Timing;
  private segment: Segment = { stage: 'idle' };

  constructor(name: string, options: EnvelopeOptions = {}) {
    super(name, z.object(envelopeShape), options);
    this.timing = { ...this.params };
    this.addOutput('cv_out', 'cv');
  }

  /** Start (or restart) the attack from the current level */
  trigger(at = 0): void {
    this.assertStarted('trigger');
    if (this.stageAt(at) === 'attack') return;
    this.segment = { stage: 'attack', start: at, from: this.levelAt(at) };
  }

  /** Ramp from the current level to zero */
  release(at = 0): void {
    this.assertStarted('release');
    const stage = this.stageAt(at);
    if (stage === 'idle' || stage === 'release') return;
    this.segment = { stage: 'release', start: at, from: this.levelAt(at), progress: 0 };
  }

  gate(on: boolean, at = 0): void {
    if (on) {
      this.trigger(at);
    } else {
      this.release(at);
    }
  }

  levelAt(t: number): number {
    return this.pointAt(t).level;
  }

  stageAt(t: number): EnvelopeStage {
    return this.pointAt(t).stage;
  }

  randomize(random: SeededRandom = new SeededRandom()): void {
    this.setParameters({
      attack: random.range(0.01, 0.5),
      decay: random.range(0.1, 0.8),
      sustain: random.range(0.2, 0.8),
      release: random.range(0.5, 3),
    });
  }

  /** Picks up the timing parameters from `at` on; never changes the stage */
  protected process(at: number): void {
    this.segment = this.anchoredAt(at);
    this.timing = { ...this.params };
  }

  protected onStart(): void {
    this.emit('cv_out', new Signal((t) => this.levelAt(t)));
  }

  protected onStop(): void {
    this.segment = { stage: 'idle' };
  }

  private pointAt(t: number): Point {
    const seg = this.segment;
    const { attack, sustain, release } = this.timing;

    switch (seg.stage) {
      case 'idle':
        return IDLE;
      case 'sustain':
        return { stage: 'sustain', level: sustain, progress: 0 };
      case 'attack': {
        const elapsed = Math.max(0, t - seg.start);
        // Constant rate of 1/attack per second, so a restart from a higher level is shorter
        const attackTime = attack * (1 - seg.from);
        if (elapsed < attackTime) {
          return { stage: 'attack', level: seg.from + elapsed / attack, progress: 0 };
        }
        return this.decayPoint(elapsed - attackTime, 1, 0);
      }
      case 'decay':
        return this.decayPoint(Math.max(0, t - seg.start), seg.from, seg.progress);
      case 'release': {
        const elapsed = Math.max(0, t - seg.start);
        const remaining = (1 - seg.progress) * release;
        if (elapsed >= remaining) return IDLE;
        const fraction = elapsed / remaining;
        return {
          stage: 'release',
          level: seg.from * (1 - fraction),
          progress: seg.progress + (1 - seg.progress) * fraction,
        };
      }
    }
  }

  private decayPoint(elapsed: number, from: number, progress: number): Point {
    const { decay, sustain } = this.timing;
    const remaining = (1 - progress) * decay;
    if (elapsed >= remaining) {
      return { stage: 'sustain', level: sustain, progress: 0 };
    }
    const fraction = elapsed / remaining;
    return {
      stage: 'decay',
      level: from + (sustain - from) * fraction,
      progress: progress + (1 - progress) * fraction,
    };
  }

  // The running segment restated as one starting at `at`, under the current timing
  private anchoredAt(at: number): Segment {
    const seg = this.segment;
    if (seg.stage === 'idle' || seg.stage === 'sustain') return seg;

    const start = Math.max(at, seg.start);
    const { stage, level, progress } = this.pointAt(start);
    switch (stage) {
      case 'idle':
        return { stage: 'idle' };
      case 'sustain':
        return { stage: 'sustain' };
      case 'attack':
        return { stage: 'attack', start, from: level };
      case 'decay':
        return { stage: 'decay', start, from: level, progress };
      case 'release':
        return { stage: 'release', start, from: level, progress };
    }
  }

  private assertStarted(operation: string): void {
    if (!this.isStarted) {
      throw new StateError(`Cannot ${operation} envelope "${this.name}": module is ${this.state}`);
    }
  }
}
