import type { EventKind, IntensitySettings } from '@beatflash/config';

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * 強度マッパー
 * 音量（RMS）とイベント種類から [0, 1] の強度を求める
 */
export class IntensityMapper {
  constructor(private readonly settings: IntensitySettings) {}

  public intensity(signalValue: number, kind: EventKind): number {
    if (this.settings.policy === 'fixed') {
      return clamp(this.settings.fixed[kind], 0, 1);
    }

    const floor = clamp(this.settings.floors[kind], 0, 1);
    // NaN・負値は下限に寄せる
    if (Number.isNaN(signalValue) || signalValue < 0) {
      return floor;
    }
    if (signalValue === Number.POSITIVE_INFINITY) {
      return 1;
    }
    return clamp(signalValue / this.settings.scale, floor, 1);
  }
}
