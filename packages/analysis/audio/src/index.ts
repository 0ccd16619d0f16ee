/**
 * Audio analysis for real-time event detection
 */
export { FrequencyBandAnalyzer, calculateRms, downmixToMono } from './FrequencyBandAnalyzer.js';
export type { BandAnalyzerOptions } from './FrequencyBandAnalyzer.js';
export { RollingHistory } from './RollingHistory.js';
export { AdaptiveThresholdGate, CooldownClock, GateBank } from './ThresholdGate.js';
export type { GateDecision, GateInputs } from './ThresholdGate.js';
export { EventClassifier, isStrictlyIncreasing } from './EventClassifier.js';
export { IntensityMapper } from './IntensityMapper.js';
export { TempoScheduler } from './TempoScheduler.js';
export { AutocorrelationTempoEstimator } from './AutocorrelationTempoEstimator.js';
export type { AutocorrelationOptions } from './AutocorrelationTempoEstimator.js';
export { magnitudeSpectrum, binFrequency, isPowerOfTwo } from './spectrum.js';
export { FREQUENCY_BANDS, INT16_FULL_SCALE, TEMPO_ANALYSIS } from './constants.js';
export type {
  AudioChunk,
  BandEnergy,
  BandName,
  BandRange,
  EventKind,
  HistoryView,
  PcmSamples,
  TempoEstimator,
  TempoResult,
} from './types.js';
