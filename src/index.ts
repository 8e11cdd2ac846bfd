/**
 * patchbay — Signal routing and reconciliation for modular synthesis
 *
 * Main entry point. Exports all public API.
 */

// Core primitives
export * from './core';

// Modules
export * from './modules';

// Patch
export * from './patch';

// Render engine
export * from './audio';

// DSP helpers
export { wave, noiseAt, oscillate, phasor } from './dsp/waveform';
export type { PeriodicWaveform } from './dsp/waveform';
export { LowpassKernel } from './dsp/lowpass';
export { PhaseAccumulator } from './dsp/phase';

// Configuration
export {
  DEFAULT_SAMPLE_RATE,
  DEFAULT_CHANNEL_COUNT,
  DEFAULT_MIXER_INPUTS,
  DEFAULT_FANOUT_OUTPUTS,
  DIVIDE_EPSILON,
  GAIN_SMOOTHING_S,
  LOG_PREFIX,
  SIGNAL_TYPES,
  WAVEFORMS,
} from './config';
export type { Waveform } from './config';
