import { describe, it, expect, beforeEach } from 'vitest';
import { ConnectionManager } from '../patch/connection-manager';
import { Amplifier, applyCurve } from '../modules/amplifier';
import { Oscillator } from '../modules/oscillator';
import { InvalidParameterError } from '../core/errors';
import { ConstantSource, FixedRandom, createLogger } from './fixtures';

describe('applyCurve', () => {
  it('shapes the control value', () => {
    expect(applyCurve('linear', 0.5)).toBe(0.5);
    expect(applyCurve('exponential', 0.5)).toBe(0.25);
    expect(applyCurve('logarithmic', 1)).toBe(1);
    expect(applyCurve('logarithmic', 0)).toBe(0);
  });
});

describe('Amplifier', () => {
  let patch: ConnectionManager;
  let src: ConstantSource;
  let vca: Amplifier;

  beforeEach(() => {
    patch = new ConnectionManager({ logger: createLogger() });
    src = patch.add(new ConstantSource('src', { params: { value: 1 } }));
    vca = patch.add(new Amplifier('vca'));
    patch.connect('src', 'out', 'vca', 'audio_in', 'audio');
    src.start();
    vca.start();
    src.recompute();
  });

  describe('static gain', () => {
    it('starts at the gain parameter with no ramp', () => {
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(1);
      expect(vca.output('envelope_out').read(0.5)).toBe(1);
    });

    it('ramps to a new gain over smoothing_time', () => {
      vca.recompute(0);
      vca.setParameter('gain', 0.5);
      vca.recompute(1);

      const gain = vca.output('envelope_out');
      expect(gain.read(1)).toBe(1);
      expect(gain.read(1.005)).toBeCloseTo(0.75, 6);
      expect(gain.read(1.02)).toBe(0.5);
      expect(vca.output('audio_out').read(1.02)).toBe(0.5);
    });

    it('jumps when smoothing is off', () => {
      vca.setParameter('smoothing_time', 0);
      vca.recompute(0);
      vca.setParameter('gain', 0.5);
      vca.recompute(1);
      expect(vca.output('envelope_out').read(0.5)).toBe(0.5);
    });

    it('mute and unmute take effect at the next recompute', () => {
      vca.recompute(0);
      vca.mute();
      expect(vca.output('audio_out').read(2.5)).toBe(1);

      vca.recompute(2);
      expect(vca.output('audio_out').read(2)).toBe(1);
      expect(vca.output('audio_out').read(2.5)).toBe(0);

      vca.unmute();
      vca.recompute(3);
      expect(vca.output('audio_out').read(3.5)).toBe(1);
    });

    it('never exceeds max_gain', () => {
      vca.setParameter('max_gain', 1.5);
      vca.setParameter('gain', 2);
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(1.5);
    });
  });

  describe('gain CV', () => {
    let cv: ConstantSource;

    beforeEach(() => {
      cv = patch.add(new ConstantSource('cv', { params: { value: 0.5 }, signalType: 'cv' }));
      patch.connect('cv', 'out', 'vca', 'gain_cv', 'cv');
      cv.start();
      cv.recompute();
    });

    it('overrides the static gain', () => {
      vca.setParameter('gain', 2);
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(0.5);
      expect(vca.output('envelope_out').read(0)).toBe(0.5);
    });

    it('goes through the response curve', () => {
      vca.setParameter('curve', 'exponential');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(0.25);

      vca.setParameter('curve', 'logarithmic');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBeCloseTo(0.585, 3);
    });

    it('applies cv_amount and offset before the curve', () => {
      vca.setParameter('cv_amount', 2);
      vca.setParameter('offset', 0.1);
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBeCloseTo(1.1, 10);
    });

    it('clamps to [0, max_gain]', () => {
      vca.setParameter('max_gain', 0.4);
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(0.4);

      cv.setParameter('value', -1);
      cv.recompute();
      expect(vca.output('audio_out').read(0)).toBe(0);
    });

    it('tracks the CV without recomputing', () => {
      vca.recompute(0);
      cv.setParameter('value', 0.25);
      cv.recompute();
      expect(vca.output('audio_out').read(0)).toBe(0.25);
    });

    it('returns to the static gain once disconnected', () => {
      vca.recompute(0);
      patch.disconnect('vca', 'gain_cv');
      vca.recompute(1);
      expect(vca.output('audio_out').read(1)).toBe(1);
    });
  });

  describe('modulation inputs', () => {
    function feed(name: string, port: string, value: number, signalType: 'audio' | 'cv' | 'gate') {
      const source = patch.add(new ConstantSource(name, { params: { value }, signalType }));
      patch.connect(name, 'out', 'vca', port, signalType);
      source.start();
      source.recompute();
      return source;
    }

    it('a low gate closes the amplifier', () => {
      const gate = feed('gate', 'gate_input', 1, 'gate');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(1);

      gate.setParameter('value', 0.2);
      gate.recompute();
      expect(vca.output('audio_out').read(0)).toBe(0);
      expect(vca.output('envelope_out').read(0)).toBe(0);
    });

    it('velocity scales the gain', () => {
      feed('vel', 'velocity_cv', 0.5, 'cv');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(0.5);
    });

    it('am_input adds to the gain', () => {
      feed('am', 'am_input', 0.25, 'audio');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(1.25);
    });

    it('applies velocity before the response curve', () => {
      feed('cv', 'gain_cv', 0.5, 'cv');
      feed('vel', 'velocity_cv', 0.5, 'cv');
      vca.setParameter('curve', 'exponential');
      vca.recompute(0);
      expect(vca.output('audio_out').read(0)).toBe(0.0625);
    });

    it("follows an oscillator's sync gate", () => {
      const vco = patch.add(new Oscillator('vco', { params: { base_freq: 20 } }));
      patch.connect('vco', 'sync_out', 'vca', 'gate_input', 'gate');
      vco.start();
      vco.recompute();
      vca.recompute(0);

      expect(vca.output('audio_out').read(0.01)).toBe(1);
      expect(vca.output('audio_out').read(0.03)).toBe(0);
    });
  });

  it('randomizes within its ranges', () => {
    vca.randomize(new FixedRandom(0));
    expect(vca.parameters).toMatchObject({
      gain: 0.3,
      cv_amount: 0.5,
      offset: -0.2,
      curve: 'linear',
      smoothing_time: 0.005,
    });
  });

  it('rejects out-of-range parameters', () => {
    expect(() => vca.setParameter('gain', 3)).toThrow(InvalidParameterError);
    expect(() => vca.setParameter('curve', 'cubic')).toThrow(InvalidParameterError);
    expect(() => vca.setParameter('smoothing_time', -0.1)).toThrow(InvalidParameterError);
  });
});
