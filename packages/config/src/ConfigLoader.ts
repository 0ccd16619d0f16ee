import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import path from 'path';
import { fileURLToPath } from 'url';
import type {
  EngineConfig,
  LoadOptions,
  PresetDefinition,
} from './types.js';
import { DEFAULT_ENGINE_CONFIG } from './defaults.js';
import { EngineValidator } from './validators/EngineValidator.js';
import { ConfigurationError } from './errors/ConfigurationError.js';
import { ConfigUtils, type EnvValueKind } from './utils/ConfigUtils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const PRESET_ENV_VAR = 'BEATFLASH_PRESET';

/**
 * 環境変数 → 設定パス
 */
export const ENV_OVERRIDES: Record<string, { path: string; kind: EnvValueKind }> = {
  BEATFLASH_SAMPLE_RATE: { path: 'audio.sampleRate', kind: 'number' },
  BEATFLASH_CHUNK_SIZE: { path: 'audio.chunkSize', kind: 'number' },
  BEATFLASH_HISTORY_SIZE: { path: 'history.capacity', kind: 'number' },
  BEATFLASH_WARMUP_SAMPLES: { path: 'history.warmupSamples', kind: 'number' },
  BEATFLASH_COOLDOWN_MS: { path: 'gating.cooldownMs', kind: 'number' },
  BEATFLASH_SILENCE_FLOOR: { path: 'gating.silenceFloor', kind: 'number' },
  BEATFLASH_VOLUME_THRESHOLD_MULTIPLIER: { path: 'gating.volume.multiplier', kind: 'number' },
  BEATFLASH_MIN_VOLUME_THRESHOLD: { path: 'gating.volume.minThreshold', kind: 'number' },
  BEATFLASH_MAX_VOLUME_THRESHOLD: { path: 'gating.volume.maxThreshold', kind: 'number' },
  BEATFLASH_BASS_GATE_MULTIPLIER: { path: 'gating.bass.multiplier', kind: 'number' },
  BEATFLASH_BASS_GATE_FLOOR: { path: 'gating.bass.absoluteFloor', kind: 'number' },
  BEATFLASH_MID_GATE_MULTIPLIER: { path: 'gating.mid.multiplier', kind: 'number' },
  BEATFLASH_MID_GATE_FLOOR: { path: 'gating.mid.absoluteFloor', kind: 'number' },
  BEATFLASH_BASS_DROP_MULTIPLIER: { path: 'classifier.bassDrop.multiplier', kind: 'number' },
  BEATFLASH_BASS_DROP_FLOOR: { path: 'classifier.bassDrop.floor', kind: 'number' },
  BEATFLASH_RHYTHM_MULTIPLIER: { path: 'classifier.rhythm.multiplier', kind: 'number' },
  BEATFLASH_RHYTHM_FLOOR: { path: 'classifier.rhythm.floor', kind: 'number' },
  BEATFLASH_VOCAL_MULTIPLIER: { path: 'classifier.vocal.multiplier', kind: 'number' },
  BEATFLASH_VOCAL_DOMINANCE: { path: 'classifier.vocal.dominance', kind: 'number' },
  BEATFLASH_INTENSITY_POLICY: { path: 'intensity.policy', kind: 'string' },
  BEATFLASH_INTENSITY_SCALE: { path: 'intensity.scale', kind: 'number' },
  BEATFLASH_TEMPO_ENABLED: { path: 'tempo.enabled', kind: 'boolean' },
  BEATFLASH_TEMPO_INTERVAL: { path: 'tempo.interval', kind: 'number' },
};

/**
 * 設定ローダー
 * 標準設定 → 設定ファイル → プリセット → 環境変数 → 明示的な上書き の順にマージしてバリデーション
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private readonly configDir: string;
  private readonly validator = new EngineValidator();

  constructor(configDir?: string) {
    this.configDir = configDir ?? path.resolve(__dirname, '..');
  }

  /**
   * シングルトンインスタンスを取得
   */
  public static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 設定ファイルを読み込んで解決
   */
  public async load(options: LoadOptions = {}): Promise<EngineConfig> {
    const settingsPath = options.settingsPath ?? path.join(this.configDir, 'engine-settings.yaml');
    const presetsPath = options.presetsPath ?? path.join(this.configDir, 'presets.yaml');

    const [rawSettings, rawPresets] = await Promise.all([
      this.readYaml(settingsPath),
      this.readYaml(presetsPath),
    ]);

    return this.resolve(rawSettings, this.parsePresets(rawPresets), options);
  }

  /**
   * 利用可能なプリセット名
   */
  public async listPresets(presetsPath?: string): Promise<Record<string, string>> {
    const raw = await this.readYaml(presetsPath ?? path.join(this.configDir, 'presets.yaml'));
    const presets = this.parsePresets(raw);
    return Object.fromEntries(
      Object.entries(presets).map(([name, preset]) => [name, preset.description])
    );
  }

  /**
   * 読み込み済みの生データから設定を解決（I/O なし）
   */
  public resolve(
    rawSettings: unknown,
    presets: Record<string, PresetDefinition>,
    options: LoadOptions = {}
  ): EngineConfig {
    const env = options.env ?? {};
    let merged: unknown = ConfigUtils.deepMerge(DEFAULT_ENGINE_CONFIG, rawSettings ?? undefined);

    const presetName = options.preset ?? env[PRESET_ENV_VAR];
    if (presetName) {
      const preset = presets[presetName];
      if (!preset) {
        throw new ConfigurationError(`Unknown preset "${presetName}"`, [
          `available presets: ${Object.keys(presets).join(', ') || '(none)'}`,
        ]);
      }
      merged = ConfigUtils.deepMerge(merged, preset.settings);
    }

    merged = ConfigUtils.deepMerge(merged, this.envOverrides(env));
    merged = ConfigUtils.deepMerge(merged, options.overrides);

    return this.validator.validate(merged);
  }

  /**
   * 実行時警告
   */
  public collectWarnings(config: EngineConfig): string[] {
    return this.validator.collectWarnings(config);
  }

  /**
   * 環境変数から上書き値を構築
   */
  private envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};
    for (const [name, target] of Object.entries(ENV_OVERRIDES)) {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') continue;
      ConfigUtils.setNestedValue(overrides, target.path, ConfigUtils.parseEnvValue(name, raw, target.kind));
    }
    return overrides;
  }

  private parsePresets(raw: unknown): Record<string, PresetDefinition> {
    if (raw === null || raw === undefined) return {};
    const presetsSection = ConfigUtils.getNestedValue(raw, 'presets');
    if (!ConfigUtils.isPlainObject(presetsSection)) {
      throw new ConfigurationError('Invalid presets file', ['presets: expected a mapping of preset names']);
    }

    const presets: Record<string, PresetDefinition> = {};
    for (const [name, value] of Object.entries(presetsSection)) {
      const description = ConfigUtils.getNestedValue(value, 'description');
      const settings = ConfigUtils.getNestedValue(value, 'settings') ?? {};
      if (!ConfigUtils.isPlainObject(settings)) {
        throw new ConfigurationError('Invalid presets file', [`presets.${name}.settings: expected a mapping`]);
      }
      presets[name] = {
        description: typeof description === 'string' ? description : '',
        settings,
      };
    }
    return presets;
  }

  private async readYaml(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${filePath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
    try {
      return parse(content);
    } catch (error) {
      throw new ConfigurationError(`Malformed YAML in ${filePath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
  }
}
