/**
 * Constants for audio event detection
 */
import type { BandName, BandRange } from './types.js';

/** Largest magnitude of a signed 16-bit sample */
export const INT16_FULL_SCALE = 32768;

/** Frequency bands in Hz, both ends inclusive */
export const FREQUENCY_BANDS: Readonly<Record<BandName, BandRange>> = {
  bass: [20, 250],
  mid: [250, 2000],
  high: [2000, 8000],
  vocal: [300, 3400], // human voice
} as const;

export const TEMPO_ANALYSIS = {
  /** Hop length of the energy envelope */
  HOP_LENGTH: 512,

  /** Minimum envelope frames before autocorrelation means anything */
  MIN_ENVELOPE_FRAMES: 8,
} as const;
