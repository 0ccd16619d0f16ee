import { TEMPO_ANALYSIS } from './constants.js';
import type { TempoEstimator, TempoResult } from './types.js';

export interface AutocorrelationOptions {
  minBpm?: number;
  maxBpm?: number;
  hopLength?: number;
}

/**
 * 自己相関によるテンポ推定
 * エネルギーエンベロープ（hop 単位のRMS）の周期から BPM を求める簡易版
 */
export class AutocorrelationTempoEstimator implements TempoEstimator {
  private readonly minBpm: number;
  private readonly maxBpm: number;
  private readonly hopLength: number;

  constructor(options: AutocorrelationOptions = {}) {
    this.minBpm = options.minBpm ?? 60;
    this.maxBpm = options.maxBpm ?? 180;
    this.hopLength = options.hopLength ?? TEMPO_ANALYSIS.HOP_LENGTH;
    if (!(this.minBpm > 0) || !(this.maxBpm > this.minBpm)) {
      throw new RangeError(`invalid BPM range ${this.minBpm}-${this.maxBpm}`);
    }
  }

  public async estimate(samples: Int16Array, sampleRate: number): Promise<TempoResult> {
    // 呼び出し元の処理を先に進める
    await new Promise<void>(resolve => setImmediate(resolve));

    if (!(sampleRate > 0)) {
      return { ok: false, error: new RangeError(`sampleRate must be > 0, got ${sampleRate}`) };
    }

    const envelope = this.energyEnvelope(samples);
    const framesPerSecond = sampleRate / this.hopLength;
    const minLag = Math.max(1, Math.round((60 / this.maxBpm) * framesPerSecond));
    const maxLag = Math.min(
      Math.round((60 / this.minBpm) * framesPerSecond),
      envelope.length - TEMPO_ANALYSIS.MIN_ENVELOPE_FRAMES
    );
    if (maxLag < minLag) {
      return { ok: false, error: new Error(`window too short for tempo estimation (${envelope.length} frames)`) };
    }

    let mean = 0;
    for (const value of envelope) mean += value;
    mean /= envelope.length;

    const centered = envelope.map(value => value - mean);
    let variance = 0;
    for (const value of centered) variance += value * value;
    if (variance === 0) {
      return { ok: false, error: new Error('flat energy envelope, no tempo') };
    }

    let bestLag = 0;
    let bestCorr = 0;
    for (let lag = minLag; lag <= maxLag; lag++) {
      let corr = 0;
      for (let i = 0; i < centered.length - lag; i++) {
        corr += centered[i] * centered[i + lag];
      }
      corr /= centered.length - lag;
      if (corr > bestCorr) {
        bestCorr = corr;
        bestLag = lag;
      }
    }

    if (bestLag === 0) {
      return { ok: false, error: new Error('no periodicity in energy envelope') };
    }
    return { ok: true, bpm: Math.round((60 * framesPerSecond) / bestLag) };
  }

  /**
   * hop ごとのRMS
   */
  private energyEnvelope(samples: Int16Array): Float64Array {
    const frames = Math.floor(samples.length / this.hopLength);
    const envelope = new Float64Array(frames);
    for (let f = 0; f < frames; f++) {
      let sum = 0;
      const offset = f * this.hopLength;
      for (let i = 0; i < this.hopLength; i++) {
        const s = samples[offset + i];
        sum += s * s;
      }
      envelope[f] = Math.sqrt(sum / this.hopLength);
    }
    return envelope;
  }
}
