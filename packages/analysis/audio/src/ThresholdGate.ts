import type { GateSettings, GateSignal, GatingSettings } from '@beatflash/config';
import { GATE_SIGNALS } from '@beatflash/config';
import type { HistoryView } from './types.js';

/**
 * クールダウン時計
 * 最後にイベントを発行した時刻（ms）。発行時のみ更新される
 */
export class CooldownClock {
  private lastEvent = Number.NEGATIVE_INFINITY;

  constructor(public readonly cooldownMs: number) {
    if (!(cooldownMs >= 0)) {
      throw new RangeError(`cooldownMs must be >= 0, got ${cooldownMs}`);
    }
  }

  public get lastEventMs(): number {
    return this.lastEvent;
  }

  public isReady(nowMs: number): boolean {
    return nowMs - this.lastEvent >= this.cooldownMs;
  }

  public markFired(nowMs: number): void {
    this.lastEvent = nowMs;
  }

  public reset(): void {
    this.lastEvent = Number.NEGATIVE_INFINITY;
  }
}

/**
 * 適応閾値ゲート
 * 判定のみを行い、クールダウン状態は変更しない
 */
export class AdaptiveThresholdGate {
  constructor(
    private readonly settings: GateSettings,
    private readonly warmupSamples: number,
  ) {}

  /**
   * clamp(mean(history) × multiplier, min, max)
   */
  public threshold(history: HistoryView): number {
    const raw = history.mean() * this.settings.multiplier;
    const capped = this.settings.maxThreshold === null ? raw : Math.min(raw, this.settings.maxThreshold);
    return Math.max(this.settings.minThreshold, capped);
  }

  public shouldFire(
    currentValue: number,
    history: HistoryView,
    cooldown: CooldownClock,
    nowMs: number
  ): boolean {
    if (history.length < this.warmupSamples) return false;
    if (!cooldown.isReady(nowMs)) return false;
    return currentValue > this.threshold(history) && currentValue > this.settings.absoluteFloor;
  }
}

export type GateInputs = Record<GateSignal, { value: number; history: HistoryView }>;

export interface GateDecision {
  open: boolean;
  fired: GateSignal[];
}

/**
 * 信号ごとのゲート群（クールダウン時計は1つを共有）
 * どれか1つでも発火すればゲートは開く
 */
export class GateBank {
  private readonly gates: Array<{ signal: GateSignal; gate: AdaptiveThresholdGate }>;

  constructor(settings: GatingSettings, warmupSamples: number) {
    this.gates = GATE_SIGNALS
      .filter(signal => settings[signal].enabled)
      .map(signal => ({ signal, gate: new AdaptiveThresholdGate(settings[signal], warmupSamples) }));
  }

  public get signals(): GateSignal[] {
    return this.gates.map(g => g.signal);
  }

  public evaluate(inputs: GateInputs, cooldown: CooldownClock, nowMs: number): GateDecision {
    const fired = this.gates
      .filter(({ signal, gate }) => gate.shouldFire(inputs[signal].value, inputs[signal].history, cooldown, nowMs))
      .map(({ signal }) => signal);
    return { open: fired.length > 0, fired };
  }
}
