/**
 * 音声解析の型定義
 */
import type { EventKind } from '@beatflash/config';

// 符号付き16bit PCM（Int16Array もしくは同等の数値列）
export type PcmSamples = Int16Array | ArrayLike<number>;

// 音声チャンク（モノラル前提、不変）
export interface AudioChunk {
  readonly samples: PcmSamples;
  readonly sampleRate: number;  // Hz
  readonly channels: number;
}

// 周波数帯域 [low, high] Hz（両端を含む）
export type BandRange = readonly [number, number];

export type BandName = 'bass' | 'mid' | 'high' | 'vocal';

// 帯域ごとのスペクトル振幅和（非負）
export interface BandEnergy {
  bass: number;
  mid: number;
  high: number;
  vocal: number;
}

// 移動履歴の読み取り専用ビュー
export interface HistoryView {
  readonly length: number;
  readonly capacity: number;
  mean(): number;
  values(): number[];
  last(n: number): number[];
}

// テンポ推定の結果
export type TempoResult =
  | { ok: true; bpm: number }
  | { ok: false; error: Error };

// 外部テンポ推定器（遅い／失敗しうる）
export interface TempoEstimator {
  estimate(samples: Int16Array, sampleRate: number): Promise<TempoResult>;
}

export type { EventKind };
