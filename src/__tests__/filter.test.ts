import { describe, it, expect } from 'vitest';
import { ConnectionManager } from '../patch/connection-manager';
import { Filter } from '../modules/filter';
import { LowpassKernel } from '../dsp/lowpass';
import { InvalidParameterError } from '../core/errors';
import type { SignalRef } from '../core/signal-ref';
import { ConstantSource, createLogger } from './fixtures';

const SR = 48000;

/** Read a stateful output at successive sample times, return the last value */
function settle(ref: SignalRef, frames: number): number {
  let last = 0;
  for (let i = 0; i <= frames; i++) {
    last = ref.read(i / SR);
  }
  return last;
}

function dcPatch(value: number, params: { gain?: number; resonance?: number } = {}) {
  const patch = new ConnectionManager({ logger: createLogger() });
  const src = patch.add(new ConstantSource('src', { params: { value } }));
  const vcf = patch.add(new Filter('vcf', { params }));
  patch.connect('src', 'out', 'vcf', 'audio_in', 'audio');
  src.start();
  vcf.start();
  src.recompute();
  vcf.recompute();
  return { patch, src, vcf };
}

describe('LowpassKernel', () => {
  it('starts from rest', () => {
    const kernel = new LowpassKernel();
    expect(kernel.process(1, 0, 1000, 1)).toBe(0);
  });

  it('returns the cached output when the time does not advance', () => {
    const kernel = new LowpassKernel();
    kernel.process(1, 0, 1000, 1);
    const first = kernel.process(1, 1 / SR, 1000, 1);
    expect(first).toBeGreaterThan(0);
    expect(first).toBeLessThan(1);
    expect(kernel.process(5, 1 / SR, 1000, 1)).toBe(first);
  });

  it('restarts after a step backwards or a long gap', () => {
    const kernel = new LowpassKernel();
    kernel.process(1, 0, 1000, 1);
    kernel.process(1, 1 / SR, 1000, 1);
    expect(kernel.process(1, 0, 1000, 1)).toBe(0);
    expect(kernel.process(1, 0.5, 1000, 1)).toBe(0);
    expect(kernel.process(1, 0.5 + 1 / SR, 1000, 1)).toBeGreaterThan(0);
  });

  it('stays stable with a cutoff above the evaluation rate', () => {
    const kernel = new LowpassKernel();
    let out = 0;
    for (let i = 0; i <= 1000; i++) {
      out = kernel.process(1, i / 1000, 20000, 1);
      expect(Number.isFinite(out)).toBe(true);
    }
    expect(out).toBeCloseTo(1, 3);
  });
});

describe('Filter', () => {
  it('passes DC at unity gain', () => {
    const { vcf } = dcPatch(1);
    const out = vcf.output('audio_out');
    expect(out.read(0)).toBe(0);
    expect(settle(out, 4800)).toBeCloseTo(1, 3);
  });

  it('applies the output gain', () => {
    const { vcf } = dcPatch(1, { gain: 0.5 });
    expect(settle(vcf.output('audio_out'), 4800)).toBeCloseTo(0.5, 3);
  });

  it('is silent with nothing connected', () => {
    const vcf = new Filter('vcf');
    vcf.start();
    vcf.recompute();
    expect(settle(vcf.output('audio_out'), 100)).toBe(0);
  });

  it('starts from rest after a restart', () => {
    const { vcf } = dcPatch(1);
    settle(vcf.output('audio_out'), 100);
    vcf.stop();
    vcf.start();
    vcf.recompute();
    expect(vcf.output('audio_out').read(100 / SR)).toBe(0);
  });

  it('shifts the cutoff by cv × cutoff_cv_depth', () => {
    const patch = new ConnectionManager({ logger: createLogger() });
    const cv = patch.add(new ConstantSource('cv', { params: { value: 0.5 }, signalType: 'cv' }));
    const vcf = patch.add(new Filter('vcf'));
    patch.connect('cv', 'out', 'vcf', 'cutoff_cv', 'cv');
    cv.start();
    cv.recompute();
    expect(vcf.cutoffAt(0)).toBe(2000);

    cv.setParameter('value', -1);
    cv.recompute();
    expect(vcf.cutoffAt(0)).toBe(20);
  });

  it('uses the static cutoff without CV', () => {
    expect(new Filter('vcf', { params: { cutoff: 500 } }).cutoffAt(0)).toBe(500);
  });

  it('rejects non-positive resonance', () => {
    expect(() => new Filter('vcf', { params: { resonance: 0 } })).toThrow(InvalidParameterError);
    const vcf = new Filter('vcf');
    expect(() => vcf.setParameter('resonance', -1)).toThrow(InvalidParameterError);
    expect(vcf.getParameter('resonance')).toBe(1);
  });

  it('clamps positive resonance into the stable range', () => {
    expect(new Filter('vcf', { params: { resonance: 100 } }).effectiveResonance).toBe(40);
    expect(new Filter('vcf', { params: { resonance: 0.05 } }).effectiveResonance).toBe(0.1);
    expect(new Filter('vcf', { params: { resonance: 2 } }).effectiveResonance).toBe(2);
  });

  it('rejects a cutoff outside the audible range', () => {
    expect(() => new Filter('vcf', { params: { cutoff: 10 } })).toThrow(InvalidParameterError);
    expect(() => new Filter('vcf', { params: { cutoff: 25000 } })).toThrow(InvalidParameterError);
  });
});
