/**
 * beatflash 設定管理モジュール
 *
 * このモジュールは以下の機能を提供:
 * - YAML設定ファイルとプリセットの読み込み
 * - BEATFLASH_* 環境変数による上書き
 * - zod によるバリデーション（不正な設定は起動時に ConfigurationError）
 */

export { ConfigLoader, ENV_OVERRIDES, PRESET_ENV_VAR } from './ConfigLoader.js';
export { EngineValidator } from './validators/EngineValidator.js';
export { ConfigurationError } from './errors/ConfigurationError.js';
export { DEFAULT_ENGINE_CONFIG } from './defaults.js';
export { EVENT_KINDS, GATE_SIGNALS } from './types.js';

// 型定義のエクスポート
export type {
  EventKind,
  GateSignal,
  IntensityPolicy,
  AudioSettings,
  HistorySettings,
  GateSettings,
  GatingSettings,
  RatioRule,
  ClassifierSettings,
  IntensitySettings,
  TempoSettings,
  EngineConfig,
  DeepPartial,
  PresetDefinition,
  LoadOptions,
} from './types.js';

// ユーティリティ関数
export { ConfigUtils } from './utils/ConfigUtils.js';
export type { EnvValueKind } from './utils/ConfigUtils.js';
