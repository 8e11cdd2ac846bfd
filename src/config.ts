/**
 * Configuration — Centralized constants for patchbay.
 *
 * All magic numbers live here for visibility, documentation, and testing.
 */

// --- Rendering ---

/** Default sample rate of the offline render engine (Hz) */
export const DEFAULT_SAMPLE_RATE = 48000;

/** Default number of output channels of the offline render engine */
export const DEFAULT_CHANNEL_COUNT = 2;

// --- Oscillator ---

/** Audible frequency range an oscillator is clamped to (Hz) */
export const OSC_FREQ_MIN = 20;
export const OSC_FREQ_MAX = 20000;

/** Octave offset range */
export const OSC_OCTAVE_MIN = -2;
export const OSC_OCTAVE_MAX = 2;

/** Fine tuning range (semitones) */
export const OSC_FINE_MIN = -12;
export const OSC_FINE_MAX = 12;

/** Frequency deviation per unit of FM input (Hz) */
export const DEFAULT_FM_DEPTH_HZ = 100;

/** Rate at which the noise waveform picks a new value (Hz) */
export const NOISE_RATE_HZ = 48000;

/** Noise level relative to `amplitude`, so switching to noise is not a jump in loudness */
export const NOISE_LEVEL = 0.1;

/** Largest step between evaluations before an oscillator's phase is re-derived from time (s) */
export const PHASE_MAX_STEP_S = 0.1;

// --- LFO ---

/** Control-rate frequency range (Hz) */
export const LFO_FREQ_MIN = 0.01;
export const LFO_FREQ_MAX = 100;

// --- Filter ---

/** Cutoff range (Hz) */
export const FILTER_CUTOFF_MIN = 20;
export const FILTER_CUTOFF_MAX = 20000;

/** Stable resonance (Q) range */
export const FILTER_Q_MIN = 0.1;
export const FILTER_Q_MAX = 40;

/** Cutoff shift per unit of cutoff CV (Hz) */
export const DEFAULT_CUTOFF_CV_DEPTH_HZ = 2000;

/** Largest step between evaluations before filter state is reset (s) */
export const FILTER_MAX_STEP_S = 0.1;

/** Cutoff ceiling relative to the evaluation step (fraction of 1/dt) */
export const FILTER_NYQUIST_FRACTION = 0.49;

// --- Amplifier ---

/** Default ramp applied when the static gain changes (s) */
export const GAIN_SMOOTHING_S = 0.01;

/** A gate input above this level counts as open */
export const GATE_THRESHOLD = 0.5;

// --- Composite modules ---

/** Default number of mixer inputs */
export const DEFAULT_MIXER_INPUTS = 4;

/** Default number of fan-out outputs */
export const DEFAULT_FANOUT_OUTPUTS = 4;

/** Smallest denominator magnitude used by CV-Math divide */
export const DIVIDE_EPSILON = 1e-3;

// --- Logging ---

/** Prefix for every log line */
export const LOG_PREFIX = '[patchbay]';

// --- Known values ---

/** Signal types a port can carry */
export const SIGNAL_TYPES = ['audio', 'cv', 'gate', 'trigger'] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

/** Waveforms shared by the oscillator and the LFO */
export const WAVEFORMS = ['sine', 'saw', 'square', 'triangle', 'noise'] as const;

export type Waveform = (typeof WAVEFORMS)[number];
