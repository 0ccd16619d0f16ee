import type { EngineConfig } from './types.js';

/**
 * 標準設定
 * 最も機能の多い解析スクリプトの 2.0 / 1.5 / 1.3 の係数を採用
 * 帯域の下限値（5000 / 3000 / 1000）は int16 のままのスペクトル振幅に対する値
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  audio: {
    sampleRate: 44100,
    chunkSize: 1024,
    channels: 1,
    normalizeSamples: false,
  },
  history: {
    capacity: 10,
    warmupSamples: 5,
  },
  gating: {
    cooldownMs: 250,
    silenceFloor: 500,
    volume: {
      enabled: true,
      multiplier: 1.5,
      minThreshold: 500,
      maxThreshold: 10000,
      absoluteFloor: 500,
    },
    bass: {
      enabled: true,
      multiplier: 1.5,
      minThreshold: 0,
      maxThreshold: null,
      absoluteFloor: 3000,
    },
    mid: {
      enabled: true,
      multiplier: 1.3,
      minThreshold: 0,
      maxThreshold: null,
      absoluteFloor: 1000,
    },
  },
  classifier: {
    bassDrop: { multiplier: 2.0, floor: 5000 },
    rhythm: { multiplier: 1.5, floor: 3000 },
    vocal: { multiplier: 1.3, dominance: 1.2 },
    build: { window: 5 },
    fallbackKind: null,
  },
  intensity: {
    policy: 'continuous',
    scale: 4000,
    floors: {
      bass_drop: 0.4,
      rhythm: 0.4,
      vocal: 0.3,
      build: 0.3,
    },
    fixed: {
      bass_drop: 1.0,
      rhythm: 0.8,
      vocal: 0.7,
      build: 0.5,
    },
  },
  tempo: {
    enabled: true,
    interval: 20,
    windowChunks: 128,
    minBpm: 60,
    maxBpm: 180,
  },
};
