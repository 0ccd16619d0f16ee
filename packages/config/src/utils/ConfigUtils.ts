import { ConfigurationError } from '../errors/ConfigurationError.js';

export type EnvValueKind = 'number' | 'boolean' | 'string';

/**
 * 設定関連のユーティリティ関数
 */
export class ConfigUtils {
  /**
   * ミリ秒を時間（秒）に変換
   */
  static msToSeconds(ms: number): number {
    return ms / 1000;
  }

  /**
   * 1チャンクの長さ（ms）
   */
  static chunkDurationMs(chunkSize: number, sampleRate: number): number {
    if (sampleRate <= 0) {
      throw new RangeError(`sampleRate must be positive, got ${sampleRate}`);
    }
    return (chunkSize / sampleRate) * 1000;
  }

  /**
   * テンポ推定の更新間隔（秒）
   * 1024サンプル / 44.1kHz / K=20 でおよそ 0.46 秒
   */
  static tempoRefreshSeconds(interval: number, chunkSize: number, sampleRate: number): number {
    return this.msToSeconds(this.chunkDurationMs(chunkSize, sampleRate) * interval);
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * 深いマージ（override 側が優先、配列は置き換え）
   */
  static deepMerge(base: unknown, override: unknown): unknown {
    if (override === undefined) return base;
    if (!this.isPlainObject(base) || !this.isPlainObject(override)) {
      return override;
    }
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
      merged[key] = this.deepMerge(base[key], value);
    }
    return merged;
  }

  /**
   * ネストされた値を設定（中間オブジェクトは作成する）
   */
  static setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const keys = path.split('.');
    const lastKey = keys.pop();
    if (lastKey === undefined || lastKey === '') {
      throw new Error(`Invalid config path: "${path}"`);
    }
    let target = obj;
    for (const key of keys) {
      const next = target[key];
      if (this.isPlainObject(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[key] = created;
        target = created;
      }
    }
    target[lastKey] = value;
  }

  /**
   * ネストされた値を取得
   */
  static getNestedValue(obj: unknown, path: string): unknown {
    let current: unknown = obj;
    for (const key of path.split('.')) {
      if (!this.isPlainObject(current)) return undefined;
      current = current[key];
    }
    return current;
  }

  /**
   * 環境変数の値をパース
   */
  static parseEnvValue(name: string, raw: string, kind: EnvValueKind): number | boolean | string {
    const value = raw.trim();
    switch (kind) {
      case 'number': {
        const parsed = Number(value);
        if (value === '' || !Number.isFinite(parsed)) {
          throw new ConfigurationError(`Invalid environment variable ${name}`, [`${name}: expected a number, got "${raw}"`]);
        }
        return parsed;
      }
      case 'boolean': {
        const lowered = value.toLowerCase();
        if (['true', '1', 'yes', 'on'].includes(lowered)) return true;
        if (['false', '0', 'no', 'off'].includes(lowered)) return false;
        throw new ConfigurationError(`Invalid environment variable ${name}`, [`${name}: expected a boolean, got "${raw}"`]);
      }
      default:
        return value;
    }
  }
}
