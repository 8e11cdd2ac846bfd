export { Module } from './module';
export type { ModuleOptions, ParamSchema, ParamsOf, PatchModule } from './module';

export { Oscillator } from './oscillator';
export type { OscillatorOptions } from './oscillator';

export { Lfo } from './lfo';
export type { LfoOptions } from './lfo';

export { Filter } from './filter';
export type { FilterOptions } from './filter';

export { Amplifier, GAIN_CURVES, applyCurve } from './amplifier';
export type { AmplifierOptions, GainCurve } from './amplifier';

export { Envelope } from './envelope';
export type { EnvelopeOptions, EnvelopeStage } from './envelope';

export { FanOut } from './fan-out';
export type { FanOutOptions } from './fan-out';

export { Mixer } from './mixer';
export type { MixerOptions } from './mixer';

export { CvMath, CV_OPERATIONS, applyOperation } from './cv-math';
export type { CvMathOptions, CvOperation } from './cv-math';
