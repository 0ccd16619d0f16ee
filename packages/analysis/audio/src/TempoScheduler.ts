import type { TempoSettings } from '@beatflash/config';
import { logger } from '@beatflash/obs';
import type { PcmSamples, TempoEstimator, TempoResult } from './types.js';

/**
 * テンポ推定スケジューラー
 *
 * - 直近 windowChunks 個のチャンクを保持し、interval チャンクごとに推定器へ渡す
 * - 推定中は次の推定を投げない
 * - 失敗時は直前の BPM を保持する（warn ログのみ）
 * - reset() で世代を進め、それ以前に投げた推定の結果は捨てる
 */
export class TempoScheduler {
  private readonly window: Int16Array[] = [];
  private bpm = 0;
  private generation = 0;
  private inFlight = false;

  constructor(
    private readonly settings: TempoSettings,
    private readonly estimator: TempoEstimator,
  ) {
    if (!Number.isInteger(settings.interval) || settings.interval <= 0) {
      throw new RangeError(`tempo interval must be a positive integer, got ${settings.interval}`);
    }
  }

  public get currentBpm(): number {
    return this.bpm;
  }

  public get isEstimating(): boolean {
    return this.inFlight;
  }

  /**
   * チャンクを記録し、必要なら推定を開始する
   * 開始しなかった場合は null。返す Promise は reject しない
   */
  public maybeUpdateTempo(
    chunkCounter: number,
    chunk: PcmSamples,
    sampleRate: number
  ): Promise<number | null> | null {
    if (!this.settings.enabled) return null;

    this.window.push(Int16Array.from(chunk));
    while (this.window.length > this.settings.windowChunks) {
      this.window.shift();
    }

    if (chunkCounter % this.settings.interval !== 0) return null;
    if (this.inFlight) {
      logger.debug('tempo.skip_in_flight', { chunkCounter });
      return null;
    }

    this.inFlight = true;
    return this.run(this.generation, concatChunks(this.window), sampleRate, chunkCounter);
  }

  public reset(): void {
    this.generation++;
    this.inFlight = false;
    this.window.length = 0;
    this.bpm = 0;
  }

  private async run(
    generation: number,
    samples: Int16Array,
    sampleRate: number,
    chunkCounter: number
  ): Promise<number | null> {
    let result: TempoResult;
    try {
      result = await this.estimator.estimate(samples, sampleRate);
    } catch (err) {
      result = { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
    }

    if (generation !== this.generation) {
      logger.debug('tempo.stale_result_discarded', { generation, current: this.generation });
      return null;
    }
    this.inFlight = false;

    if (result.ok && Number.isFinite(result.bpm) && result.bpm > 0) {
      this.bpm = result.bpm;
      logger.debug('tempo.updated', { bpm: result.bpm, chunkCounter });
      return result.bpm;
    }

    const reason = result.ok ? new RangeError(`estimator returned invalid bpm ${result.bpm}`) : result.error;
    logger.warn('tempo.estimate_failed', { chunkCounter, keptBpm: this.bpm, error: reason });
    return null;
  }
}

function concatChunks(chunks: readonly Int16Array[]): Int16Array {
  let total = 0;
  for (const c of chunks) total += c.length;
  const out = new Int16Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}
