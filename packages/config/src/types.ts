/**
 * beatflash 設定型定義
 */

// 検出イベントの種類（優先度順）
export type EventKind = 'bass_drop' | 'rhythm' | 'vocal' | 'build';

export const EVENT_KINDS: readonly EventKind[] = ['bass_drop', 'rhythm', 'vocal', 'build'];

// ゲート対象の信号
export type GateSignal = 'volume' | 'bass' | 'mid';

export const GATE_SIGNALS: readonly GateSignal[] = ['volume', 'bass', 'mid'];

// 強度マッピング方式
export type IntensityPolicy = 'continuous' | 'fixed';

// 入力音声
export interface AudioSettings {
  sampleRate: number;   // Hz
  chunkSize: number;    // 1チャンクあたりのサンプル数
  channels: number;     // 1 のみ（多チャンネルは downmixToMono で事前に変換）
  normalizeSamples: boolean;  // true: ±1 に正規化してからスペクトル変換（帯域の下限値も同じ単位で）
}

// 移動履歴
export interface HistorySettings {
  capacity: number;       // 保持するチャンク数
  warmupSamples: number;  // 閾値を信頼するまでの最小履歴長
}

// 適応閾値ゲート（信号ごと）
export interface GateSettings {
  enabled: boolean;
  multiplier: number;       // mean(history) × multiplier
  minThreshold: number;     // 閾値の下限
  maxThreshold: number | null;  // 閾値の上限（null なら上限なし）
  absoluteFloor: number;    // 無音付近での誤検出防止
}

export interface GatingSettings {
  cooldownMs: number;     // イベント間の最小間隔（ms）
  silenceFloor: number;   // RMSがこれ以下のチャンクは常にイベントなし
  volume: GateSettings;
  bass: GateSettings;
  mid: GateSettings;
}

// 比率ルール（平均比 + 絶対下限）
export interface RatioRule {
  multiplier: number;
  floor: number;
}

export interface ClassifierSettings {
  bassDrop: RatioRule;
  rhythm: RatioRule;
  vocal: {
    multiplier: number;   // mid > mean(mid) × multiplier
    dominance: number;    // mid > bass × dominance
  };
  build: {
    window: number;       // 単調増加を確認する直近サンプル数
  };
  fallbackKind: EventKind | null;  // どのルールにも合致しない場合（null = 破棄）
}

export interface IntensitySettings {
  policy: IntensityPolicy;
  scale: number;                        // continuous: signal / scale
  floors: Record<EventKind, number>;    // continuous: 種類ごとの下限
  fixed: Record<EventKind, number>;     // fixed: 種類ごとの固定値
}

export interface TempoSettings {
  enabled: boolean;
  interval: number;       // K チャンクごとに推定
  windowChunks: number;   // 推定に渡す直近チャンク数
  minBpm: number;
  maxBpm: number;
}

// エンジン全体設定
export interface EngineConfig {
  audio: AudioSettings;
  history: HistorySettings;
  gating: GatingSettings;
  classifier: ClassifierSettings;
  intensity: IntensitySettings;
  tempo: TempoSettings;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// プリセット（配備環境ごとの部分設定）
// settings はマージ後にまとめてバリデーションされる
export interface PresetDefinition {
  description: string;
  settings: Record<string, unknown>;
}

export interface LoadOptions {
  preset?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: DeepPartial<EngineConfig>;
  settingsPath?: string;
  presetsPath?: string;
}
