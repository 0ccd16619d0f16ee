/**
 * 検出エンジンの型定義
 */
import type { EventKind, GateSignal } from '@beatflash/config';
import type { BandEnergy, PcmSamples, TempoEstimator } from '@beatflash/audio-analysis';
import type { EventSink } from '@beatflash/obs';

export type PipelineState = 'idle' | 'running' | 'stopped';

// 検出イベント（生成後は凍結され、シンクへ渡される）
export interface DetectedEvent {
  readonly kind: EventKind;
  readonly intensity: number;      // 0..1
  readonly bpm: number;            // 最後に推定されたテンポ（未推定なら0）
  readonly bassEnergy: number;
  readonly midEnergy: number;
  readonly highEnergy: number;
  readonly vocalEnergy: number;
  readonly volume: number;         // RMS（int16 スケール）
  readonly triggeredBy: readonly GateSignal[];
  readonly timestampMs: number;
}

// 下流へ送るメッセージ形式
export interface EventWireMessage {
  event_type: EventKind;
  intensity: number;
  bpm: number;           // 整数
  bass_energy: number;   // 整数
  mid_energy: number;    // 整数
  high_energy: number;   // 整数
  timestamp: number;     // 秒
}

export interface BandAnalyzer {
  analyze(samples: PcmSamples, sampleRate: number): BandEnergy;
}

// 差し替え可能な協調オブジェクト
export interface PipelineDependencies {
  analyzer?: BandAnalyzer;
  tempoEstimator?: TempoEstimator;
  sink?: EventSink<DetectedEvent>;
  now?: () => number;    // ms
}
