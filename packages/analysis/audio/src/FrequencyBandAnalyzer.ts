import { FREQUENCY_BANDS, INT16_FULL_SCALE } from './constants.js';
import { binFrequency, magnitudeSpectrum } from './spectrum.js';
import type { BandEnergy, BandName, BandRange, PcmSamples } from './types.js';

export interface BandAnalyzerOptions {
  /** ±1 に正規化してから変換する（false なら int16 のまま） */
  normalize?: boolean;
  bands?: Readonly<Record<BandName, BandRange>>;
}

const BAND_NAMES: readonly BandName[] = ['bass', 'mid', 'high', 'vocal'];

/**
 * 周波数帯域アナライザー
 * 1チャンクのPCMから帯域ごとのスペクトル振幅和を求める（純関数）
 */
export class FrequencyBandAnalyzer {
  private readonly normalize: boolean;
  private readonly bands: Readonly<Record<BandName, BandRange>>;

  constructor(options: BandAnalyzerOptions = {}) {
    this.normalize = options.normalize ?? true;
    this.bands = options.bands ?? FREQUENCY_BANDS;
  }

  /**
   * 帯域エネルギーを計算
   * 長さ2未満・サンプルレート0以下は全帯域0（エラーにしない）
   */
  public analyze(samples: PcmSamples, sampleRate: number): BandEnergy {
    const energy: BandEnergy = { bass: 0, mid: 0, high: 0, vocal: 0 };
    if (samples.length < 2 || !(sampleRate > 0)) {
      return energy;
    }

    const scale = this.normalize ? INT16_FULL_SCALE : 1;
    const frame = new Float64Array(samples.length);
    for (let i = 0; i < samples.length; i++) {
      frame[i] = samples[i] / scale;
    }

    const spectrum = magnitudeSpectrum(frame);
    for (let k = 0; k < spectrum.length; k++) {
      const freq = binFrequency(k, frame.length, sampleRate);
      for (const name of BAND_NAMES) {
        const [low, high] = this.bands[name];
        if (freq >= low && freq <= high) {
          energy[name] += spectrum[k];
        }
      }
    }

    return energy;
  }
}

/**
 * RMS（int16 スケールの音量）
 */
export function calculateRms(samples: PcmSamples): number {
  if (samples.length === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumSquares / samples.length);
}

/**
 * インターリーブされた多チャンネルPCMをモノラルに変換
 * フレームごとにチャンネル平均を取り int16 に丸める
 */
export function downmixToMono(interleaved: PcmSamples, channels: number): Int16Array {
  if (!Number.isInteger(channels) || channels <= 0) {
    throw new RangeError(`channels must be a positive integer, got ${channels}`);
  }
  const frames = Math.floor(interleaved.length / channels);
  const mono = new Int16Array(frames);
  for (let f = 0; f < frames; f++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) {
      sum += interleaved[f * channels + c];
    }
    mono[f] = Math.max(-INT16_FULL_SCALE, Math.min(INT16_FULL_SCALE - 1, Math.round(sum / channels)));
  }
  return mono;
}
