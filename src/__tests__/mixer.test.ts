import { describe, it, expect, beforeEach } from 'vitest';
import { ConnectionManager } from '../patch/connection-manager';
import { Mixer } from '../modules/mixer';
import { FanOut } from '../modules/fan-out';
import { InvalidParameterError } from '../core/errors';
import { ConstantSource, createLogger } from './fixtures';

describe('Mixer', () => {
  describe('weighted sum', () => {
    let patch: ConnectionManager;
    let mix: Mixer;

    beforeEach(() => {
      patch = new ConnectionManager({ logger: createLogger() });
      mix = patch.add(
        new Mixer('mix', {
          inputs: 3,
          params: { level_0: 0.4, level_1: 0, level_2: 0.3, master_level: 0.6 },
        })
      );
      [1, 2, 3].forEach((value, i) => {
        const src = patch.add(new ConstantSource(`src${i}`, { params: { value } }));
        patch.connect(`src${i}`, 'out', 'mix', `input${i}`, 'audio');
        src.start();
        src.recompute();
      });
      mix.start();
      mix.recompute();
    });

    it('leaves zero-level inputs out of the active set', () => {
      expect(mix.activeInputs()).toEqual([0, 2]);
      expect(mix.output('output').read(0)).toBeCloseTo((1 * 0.4 + 3 * 0.3) * 0.6, 10);
    });

    it('counts an input again once its level rises above zero', () => {
      mix.setLevel(1, 0.5);
      expect(mix.activeInputs()).toEqual([0, 1, 2]);
      mix.recompute();
      expect(mix.output('output').read(0)).toBeCloseTo((0.4 + 1 + 0.9) * 0.6, 10);

      mix.setLevel(1, 0);
      expect(mix.activeInputs()).toEqual([0, 2]);
    });

    it('scales the sum by the master level', () => {
      mix.setMasterLevel(1);
      mix.recompute();
      expect(mix.output('output').read(0)).toBeCloseTo(1.3, 10);
    });

    it('drops an input when it is disconnected', () => {
      patch.disconnect('mix', 'input2');
      expect(mix.activeInputs()).toEqual([0]);
      mix.recompute();
      expect(mix.output('output').read(0)).toBeCloseTo(0.24, 10);
    });

    it('keeps its output handle while the active set changes', () => {
      const handle = mix.output('output');
      mix.setLevel(0, 0);
      mix.recompute();
      expect(mix.output('output')).toBe(handle);
      expect(handle.read(0)).toBeCloseTo(0.54, 10);
    });
  });

  it('outputs silence with no active inputs', () => {
    const mix = new Mixer('mix');
    mix.start();
    mix.recompute();
    expect(mix.activeInputs()).toEqual([]);
    expect(mix.output('output').read(0)).toBe(0);
  });

  it('does not count an input whose source has no output yet', () => {
    const patch = new ConnectionManager({ logger: createLogger() });
    patch.add(new ConstantSource('src', { params: { value: 1 } }));
    const mix = patch.add(new Mixer('mix'));
    patch.connect('src', 'out', 'mix', 'input0', 'audio');
    expect(mix.activeInputs()).toEqual([]);
  });

  it('defaults to four inputs at level 0.5 and master 0.8', () => {
    const mix = new Mixer('mix');
    expect(mix.inputPorts().map((p) => p.name)).toEqual(['input0', 'input1', 'input2', 'input3']);
    expect(mix.levels()).toEqual([0.5, 0.5, 0.5, 0.5]);
    expect(mix.getParameter('master_level')).toBe(0.8);
  });

  it('mixes control signals when asked to', () => {
    const mix = new Mixer('mix', { inputs: 2, signalType: 'cv' });
    expect(mix.getOutputPort('output')?.signalType).toBe('cv');
    expect(mix.getInputPort('input1')?.signalType).toBe('cv');
  });

  it('validates levels and port counts', () => {
    const mix = new Mixer('mix', { inputs: 2 });
    expect(() => mix.setLevel(0, 1.5)).toThrow(InvalidParameterError);
    expect(() => mix.setLevel(2, 0.5)).toThrow(InvalidParameterError);
    expect(() => mix.setMasterLevel(-0.1)).toThrow(InvalidParameterError);
    expect(() => new Mixer('mix', { inputs: 0 })).toThrow(InvalidParameterError);
  });
});

describe('FanOut', () => {
  it('copies one input onto every output', () => {
    const patch = new ConnectionManager({ logger: createLogger() });
    const src = patch.add(new ConstantSource('lfo', { params: { value: 0.7 }, signalType: 'cv' }));
    const split = patch.add(new FanOut('split', { outputs: 3, signalType: 'cv' }));
    patch.connect('lfo', 'out', 'split', 'input', 'cv');
    src.start();
    split.start();
    src.recompute();
    split.recompute();

    expect(split.outputPorts().map((p) => p.name)).toEqual(['output0', 'output1', 'output2']);
    for (const port of ['output0', 'output1', 'output2']) {
      expect(split.output(port).read(0)).toBe(0.7);
    }

    src.setParameter('value', 0.9);
    src.recompute();
    expect(split.output('output2').read(0)).toBe(0.9);
  });

  it('defaults to four audio outputs', () => {
    const split = new FanOut('split');
    expect(split.outputCount).toBe(4);
    expect(split.getInputPort('input')?.signalType).toBe('audio');
  });

  it('outputs the default when nothing is connected', () => {
    const split = new FanOut('split');
    split.start();
    split.recompute();
    expect(split.output('output0').read(0)).toBe(0);
  });

  it('rejects a bad output count', () => {
    expect(() => new FanOut('split', { outputs: 0 })).toThrow(InvalidParameterError);
    expect(() => new FanOut('split', { outputs: 2.5 })).toThrow(InvalidParameterError);
  });
});
