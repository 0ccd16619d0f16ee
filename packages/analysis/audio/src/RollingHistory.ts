import type { HistoryView } from './types.js';

/**
 * 移動履歴（固定長FIFO）
 * 容量を超えると最も古い値から捨てる
 */
export class RollingHistory implements HistoryView {
  private readonly buffer: Float64Array;
  private head = 0; // 次に書き込む位置
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Float64Array(capacity);
  }

  public push(value: number): void {
    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
  }

  public get length(): number {
    return this.count;
  }

  /**
   * 平均値（空なら0、呼び出し側がウォームアップを確認する）
   * 毎回合計し直すので誤差が蓄積しない
   */
  public mean(): number {
    if (this.count === 0) return 0;
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      sum += this.buffer[i];
    }
    return sum / this.count;
  }

  /**
   * 古い順のコピー
   */
  public values(): number[] {
    return this.last(this.count);
  }

  /**
   * 直近 n 件（古い順）
   */
  public last(n: number): number[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const out: number[] = new Array<number>(take);
    const start = this.head - take;
    for (let i = 0; i < take; i++) {
      out[i] = this.buffer[(start + i + this.capacity) % this.capacity];
    }
    return out;
  }

  public clear(): void {
    this.head = 0;
    this.count = 0;
  }
}
