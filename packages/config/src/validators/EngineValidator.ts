import { z } from 'zod';
import type { EngineConfig } from '../types.js';
import { EVENT_KINDS } from '../types.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';

const eventKindSchema = z.enum(['bass_drop', 'rhythm', 'vocal', 'build']);

/**
 * エンジン設定のバリデーター
 */
export class EngineValidator {
  private readonly schema: z.ZodType<EngineConfig>;

  constructor() {
    const audioSchema = z.object({
      sampleRate: z.number().int().positive(),
      chunkSize: z.number().int().min(2),
      // パイプラインはモノラルのみ処理する
      channels: z.number().int().refine(
        (c) => c === 1,
        { message: 'engine input must be mono (1 channel); downmix with downmixToMono before processChunk' }
      ),
      normalizeSamples: z.boolean(),
    });

    const historySchema = z.object({
      capacity: z.number().int().positive(),
      warmupSamples: z.number().int().positive(),
    }).refine(
      (h) => h.warmupSamples <= h.capacity,
      { message: 'warmupSamples must not exceed capacity', path: ['warmupSamples'] }
    );

    const gateSchema = z.object({
      enabled: z.boolean(),
      multiplier: z.number().positive(),
      minThreshold: z.number().min(0),
      maxThreshold: z.number().positive().nullable(),
      absoluteFloor: z.number().min(0),
    }).refine(
      (g) => g.maxThreshold === null || g.maxThreshold >= g.minThreshold,
      { message: 'maxThreshold must be >= minThreshold', path: ['maxThreshold'] }
    );

    const gatingSchema = z.object({
      cooldownMs: z.number().min(0),
      silenceFloor: z.number().min(0),
      volume: gateSchema,
      bass: gateSchema,
      mid: gateSchema,
    }).refine(
      (g) => g.volume.enabled || g.bass.enabled || g.mid.enabled,
      { message: 'at least one gate must be enabled' }
    );

    const ratioRuleSchema = z.object({
      multiplier: z.number().positive(),
      floor: z.number().min(0),
    });

    const classifierSchema = z.object({
      bassDrop: ratioRuleSchema,
      rhythm: ratioRuleSchema,
      vocal: z.object({
        multiplier: z.number().positive(),
        dominance: z.number().positive(),
      }),
      build: z.object({
        window: z.number().int().min(2),
      }),
      fallbackKind: eventKindSchema.nullable(),
    });

    const unit = z.number().min(0).max(1);
    const perKind = z.object({
      bass_drop: unit,
      rhythm: unit,
      vocal: unit,
      build: unit,
    });

    const intensitySchema = z.object({
      policy: z.enum(['continuous', 'fixed']),
      scale: z.number().positive(),
      floors: perKind,
      fixed: perKind,
    });

    const tempoSchema = z.object({
      enabled: z.boolean(),
      interval: z.number().int().positive(),
      windowChunks: z.number().int().positive(),
      minBpm: z.number().positive(),
      maxBpm: z.number().positive(),
    }).refine(
      (t) => t.minBpm < t.maxBpm,
      { message: 'minBpm must be less than maxBpm', path: ['minBpm'] }
    );

    // 全体スキーマ
    this.schema = z.object({
      audio: audioSchema,
      history: historySchema,
      gating: gatingSchema,
      classifier: classifierSchema,
      intensity: intensitySchema,
      tempo: tempoSchema,
    }).refine(
      // build 判定の窓が履歴に収まらないと build は発火しない
      (config) => config.classifier.build.window <= config.history.capacity,
      { message: 'classifier.build.window must not exceed history.capacity', path: ['classifier', 'build', 'window'] }
    );
  }

  /**
   * 設定をバリデート
   */
  public validate(config: unknown): EngineConfig {
    const result = this.schema.safeParse(config);
    if (!result.success) {
      const issues = result.error.issues.map(issue =>
        `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new ConfigurationError('Engine settings validation failed', issues);
    }
    return result.data;
  }

  /**
   * 実行時の挙動に関する警告（エラーではない）
   */
  public collectWarnings(config: EngineConfig): string[] {
    const warnings: string[] = [];
    const chunkMs = (config.audio.chunkSize / config.audio.sampleRate) * 1000;

    if (config.gating.cooldownMs > 0 && config.gating.cooldownMs < chunkMs) {
      warnings.push(`cooldownMs (${config.gating.cooldownMs}) is shorter than one chunk (${chunkMs.toFixed(1)}ms)`);
    }
    const { bassDrop, rhythm } = config.classifier;
    if (rhythm.multiplier >= bassDrop.multiplier && rhythm.floor >= bassDrop.floor) {
      warnings.push('rhythm is unreachable: every rhythm candidate already qualifies as bass_drop');
    }
    if (config.intensity.policy === 'fixed') {
      for (const kind of EVENT_KINDS) {
        if (config.intensity.fixed[kind] === 0) {
          warnings.push(`fixed intensity for ${kind} is 0`);
        }
      }
    }
    if (config.tempo.enabled && config.tempo.windowChunks * config.audio.chunkSize < config.audio.sampleRate) {
      warnings.push('tempo window is shorter than one second; estimates will mostly fail');
    }

    return warnings;
  }
}
