import type { ClassifierSettings, EventKind } from '@beatflash/config';
import type { HistoryView } from './types.js';

/**
 * イベント分類器
 * ゲートを通過したチャンクを種類に割り当てる（先に一致したルールが優先）
 */
export class EventClassifier {
  constructor(
    private readonly settings: ClassifierSettings,
    private readonly warmupSamples: number,
  ) {}

  /**
   * bass_drop → rhythm → vocal → build → fallbackKind の順に判定
   * 履歴がウォームアップ未満なら null
   */
  public classify(
    bass: number,
    mid: number,
    bassHistory: HistoryView,
    midHistory: HistoryView
  ): EventKind | null {
    if (bassHistory.length < this.warmupSamples || midHistory.length < this.warmupSamples) {
      return null;
    }

    const { bassDrop, rhythm, vocal, build, fallbackKind } = this.settings;
    const bassMean = bassHistory.mean();

    if (bass > bassMean * bassDrop.multiplier && bass > bassDrop.floor) {
      return 'bass_drop';
    }
    if (bass > bassMean * rhythm.multiplier && bass > rhythm.floor) {
      return 'rhythm';
    }
    if (mid > midHistory.mean() * vocal.multiplier && mid > bass * vocal.dominance) {
      return 'vocal';
    }
    if (isStrictlyIncreasing(bassHistory.last(build.window), build.window)) {
      return 'build';
    }
    return fallbackKind;
  }
}

/**
 * 長さが required 以上かつ狭義単調増加か
 */
export function isStrictlyIncreasing(values: readonly number[], required: number): boolean {
  if (required < 2 || values.length < required) return false;
  for (let i = 1; i < values.length; i++) {
    if (!(values[i] > values[i - 1])) return false;
  }
  return true;
}
