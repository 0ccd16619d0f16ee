import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigLoader } from '../ConfigLoader.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';
import { DEFAULT_ENGINE_CONFIG } from '../defaults.js';
import { ConfigUtils } from '../utils/ConfigUtils.js';

describe('ConfigLoader', () => {
  let loader: ConfigLoader;

  beforeEach(() => {
    loader = new ConfigLoader();
  });

  describe('Settings file', () => {
    it('should load engine settings with canonical thresholds', async () => {
      const config = await loader.load({ env: {} });

      expect(config.audio.sampleRate).toBe(44100);
      expect(config.audio.chunkSize).toBe(1024);
      expect(config.audio.normalizeSamples).toBe(false);
      expect(config.gating.cooldownMs).toBe(250);
      expect(config.gating.volume.maxThreshold).toBe(10000);
      expect(config.gating.bass.maxThreshold).toBeNull();
      expect(config.classifier.bassDrop).toEqual({ multiplier: 2.0, floor: 5000 });
      expect(config.classifier.rhythm).toEqual({ multiplier: 1.5, floor: 3000 });
      expect(config.classifier.fallbackKind).toBeNull();
      expect(config.intensity.policy).toBe('continuous');
      // floors come from the built-in defaults, the file does not restate them
      expect(config.intensity.floors.bass_drop).toBe(0.4);
    });

    it('should list presets with descriptions', async () => {
      const presets = await loader.listPresets();

      expect(Object.keys(presets)).toEqual(['canonical', 'normalized', 'volume-only', 'fixed-table', 'live-room', 'rhythm-test']);
      expect(presets['fixed-table']).toBe('Band-aware classification with the fixed per-kind intensity table');
    });

    it('should reject a missing settings file', async () => {
      await expect(loader.load({ env: {}, settingsPath: '/nonexistent/engine-settings.yaml' }))
        .rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('Presets', () => {
    it('should apply a named preset on top of the settings file', async () => {
      const config = await loader.load({ env: {}, preset: 'live-room' });

      expect(config.history.capacity).toBe(30);
      expect(config.history.warmupSamples).toBe(10);
      expect(config.gating.volume.multiplier).toBe(1.6);
      expect(config.gating.volume.maxThreshold).toBeNull();
      expect(config.gating.mid.enabled).toBe(false);
      expect(config.classifier.fallbackKind).toBe('rhythm');
      // untouched by the preset
      expect(config.gating.cooldownMs).toBe(250);
    });

    it('should scale every band floor when samples are normalized', async () => {
      const config = await loader.load({ env: {}, preset: 'normalized' });

      expect(config.audio.normalizeSamples).toBe(true);
      expect(config.classifier.bassDrop).toEqual({ multiplier: 2.0, floor: 5000 / 32768 });
      expect(config.classifier.rhythm).toEqual({ multiplier: 1.5, floor: 3000 / 32768 });
      expect(config.gating.bass.absoluteFloor).toBe(3000 / 32768);
      expect(config.gating.mid.absoluteFloor).toBe(1000 / 32768);
      // RMS stays on the int16 scale
      expect(config.gating.volume.absoluteFloor).toBe(500);
    });

    it('should pick the preset from BEATFLASH_PRESET', async () => {
      const config = await loader.load({ env: { BEATFLASH_PRESET: 'fixed-table' } });

      expect(config.intensity.policy).toBe('fixed');
      expect(config.intensity.fixed.rhythm).toBe(0.8);
    });

    it('should reject an unknown preset', async () => {
      await expect(loader.load({ env: {}, preset: 'stadium' })).rejects.toThrow('Unknown preset "stadium"');
    });
  });

  describe('Environment overrides', () => {
    it('should parse numeric and boolean overrides', () => {
      const config = loader.resolve({}, {}, {
        env: {
          BEATFLASH_COOLDOWN_MS: '400',
          BEATFLASH_VOLUME_THRESHOLD_MULTIPLIER: ' 1.75 ',
          BEATFLASH_TEMPO_ENABLED: 'off',
          BEATFLASH_INTENSITY_POLICY: 'fixed',
        },
      });

      expect(config.gating.cooldownMs).toBe(400);
      expect(config.gating.volume.multiplier).toBe(1.75);
      expect(config.tempo.enabled).toBe(false);
      expect(config.intensity.policy).toBe('fixed');
    });

    it('should ignore empty variables', () => {
      const config = loader.resolve({}, {}, { env: { BEATFLASH_COOLDOWN_MS: '' } });
      expect(config.gating.cooldownMs).toBe(DEFAULT_ENGINE_CONFIG.gating.cooldownMs);
    });

    it('should reject malformed numbers', () => {
      expect(() => loader.resolve({}, {}, { env: { BEATFLASH_CHUNK_SIZE: 'big' } }))
        .toThrow(ConfigurationError);
    });

    it('should let explicit overrides win over the environment', () => {
      const config = loader.resolve({}, {}, {
        env: { BEATFLASH_COOLDOWN_MS: '400' },
        overrides: { gating: { cooldownMs: 100 } },
      });
      expect(config.gating.cooldownMs).toBe(100);
    });
  });

  describe('Validation', () => {
    const issuesOf = (fn: () => unknown): string[] => {
      try {
        fn();
      } catch (error) {
        if (error instanceof ConfigurationError) return error.issues;
        throw error;
      }
      throw new Error('expected a ConfigurationError');
    };

    it('should reject multi-channel input', () => {
      const issues = issuesOf(() => loader.resolve({}, {}, { overrides: { audio: { channels: 2 } } }));
      expect(issues).toEqual([
        'audio.channels: engine input must be mono (1 channel); downmix with downmixToMono before processChunk',
      ]);
    });

    it('should reject a negative cooldown', () => {
      const issues = issuesOf(() => loader.resolve({ gating: { cooldownMs: -1 } }, {}));
      expect(issues).toHaveLength(1);
      expect(issues[0].startsWith('gating.cooldownMs:')).toBe(true);
    });

    it('should reject a non-positive history capacity', () => {
      const issues = issuesOf(() => loader.resolve({ history: { capacity: 0 } }, {}));
      expect(issues.some(issue => issue.startsWith('history.capacity:'))).toBe(true);
    });

    it('should reject a build window longer than the history', () => {
      const issues = issuesOf(() => loader.resolve({ history: { capacity: 4, warmupSamples: 4 } }, {}));
      expect(issues).toEqual(['classifier.build.window: classifier.build.window must not exceed history.capacity']);
    });

    it('should reject a configuration with every gate disabled', () => {
      const issues = issuesOf(() => loader.resolve({
        gating: { volume: { enabled: false }, bass: { enabled: false }, mid: { enabled: false } },
      }, {}));
      expect(issues).toEqual(['gating: at least one gate must be enabled']);
    });

    it('should report a cooldown shorter than one chunk as a warning', () => {
      const config = loader.resolve({ gating: { cooldownMs: 10 } }, {});
      expect(loader.collectWarnings(config)).toEqual([
        'cooldownMs (10) is shorter than one chunk (23.2ms)',
      ]);
    });
  });
});

describe('ConfigUtils', () => {
  describe('Time conversions', () => {
    it('should convert milliseconds to seconds', () => {
      expect(ConfigUtils.msToSeconds(250)).toBe(0.25);
    });

    it('should compute the chunk duration', () => {
      expect(ConfigUtils.chunkDurationMs(1024, 44100)).toBeCloseTo(23.22, 2);
      expect(ConfigUtils.chunkDurationMs(441, 44100)).toBe(10);
    });

    it('should compute the tempo refresh period', () => {
      expect(ConfigUtils.tempoRefreshSeconds(20, 441, 44100)).toBe(0.2);
    });
  });

  describe('Merging', () => {
    it('should merge nested objects and replace leaves', () => {
      const merged = ConfigUtils.deepMerge(
        { a: { b: 1, c: 2 }, d: [1, 2] },
        { a: { c: 3 }, d: [9] }
      );
      expect(merged).toEqual({ a: { b: 1, c: 3 }, d: [9] });
    });

    it('should keep the base when the override is undefined', () => {
      const base = { a: 1 };
      expect(ConfigUtils.deepMerge(base, undefined)).toBe(base);
    });

    it('should set nested values creating intermediates', () => {
      const target: Record<string, unknown> = {};
      ConfigUtils.setNestedValue(target, 'gating.volume.multiplier', 2);
      expect(target).toEqual({ gating: { volume: { multiplier: 2 } } });
      expect(ConfigUtils.getNestedValue(target, 'gating.volume.multiplier')).toBe(2);
      expect(ConfigUtils.getNestedValue(target, 'gating.bass.multiplier')).toBeUndefined();
    });
  });

  describe('Environment values', () => {
    it('should parse booleans', () => {
      expect(ConfigUtils.parseEnvValue('X', 'yes', 'boolean')).toBe(true);
      expect(ConfigUtils.parseEnvValue('X', '0', 'boolean')).toBe(false);
      expect(() => ConfigUtils.parseEnvValue('X', 'maybe', 'boolean')).toThrow(ConfigurationError);
    });
  });
});
