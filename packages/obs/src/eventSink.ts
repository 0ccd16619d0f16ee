/**
 * packages/obs/src/eventSink.ts
 *
 * Non-blocking event sink
 * - emit() only enqueues; a sequential async drain hands messages to the transport
 * - bounded queue, oldest entries dropped when full
 * - transport failures are logged and never reach the producer
 *
 * Usage:
 *   const sink = new QueuedEventSink(socketTransport, { serialize: toWireMessage });
 *   sink.emit(event); // returns immediately
 */
import logger from './logger.js';

export interface EventSink<T> {
  emit(event: T): void;
}

export type EventTransport<M> = (message: M) => Promise<void>;

export type QueuedSinkOptions<T, M> = {
  serialize: (event: T) => M;
  maxQueueLength?: number; // default 256
  name?: string; // shows up in log tags' meta
};

export class QueuedEventSink<T, M = T> implements EventSink<T> {
  private readonly queue: M[] = [];
  private readonly maxQueueLength: number;
  private readonly name: string;
  private isDraining = false;
  private droppedCount = 0;
  private failedCount = 0;
  private deliveredCount = 0;

  constructor(
    private readonly transport: EventTransport<M>,
    private readonly options: QueuedSinkOptions<T, M>,
  ) {
    this.maxQueueLength = options.maxQueueLength ?? 256;
    this.name = options.name ?? 'events';
    if (!Number.isInteger(this.maxQueueLength) || this.maxQueueLength <= 0) {
      throw new RangeError(`maxQueueLength must be a positive integer, got ${this.maxQueueLength}`);
    }
  }

  public emit(event: T): void {
    if (this.queue.length >= this.maxQueueLength) {
      this.queue.shift();
      this.droppedCount++;
      logger.warn('sink.dropped_oldest', { sink: this.name, dropped: this.droppedCount });
    }
    this.queue.push(this.options.serialize(event));
    if (!this.isDraining) {
      void this.drain();
    }
  }

  public get pending(): number {
    return this.queue.length;
  }

  public get stats() {
    return {
      delivered: this.deliveredCount,
      failed: this.failedCount,
      dropped: this.droppedCount,
      pending: this.queue.length,
    };
  }

  /**
   * Wait until the queue is drained or the timeout passes.
   */
  public async flush(timeoutMs = 5000): Promise<void> {
    if (!this.isDraining && this.queue.length > 0) {
      await this.drain();
    }
    const start = Date.now();
    while ((this.isDraining || this.queue.length > 0) && Date.now() - start < timeoutMs) {
      // eslint-disable-next-line no-await-in-loop
      await new Promise((res) => setTimeout(res, 10));
    }
  }

  private async drain(): Promise<void> {
    if (this.isDraining) return;
    this.isDraining = true;
    try {
      while (this.queue.length > 0) {
        const message = this.queue.shift();
        if (message === undefined) break;
        try {
          // eslint-disable-next-line no-await-in-loop
          await this.transport(message);
          this.deliveredCount++;
        } catch (err) {
          this.failedCount++;
          logger.error('sink.transport_failed', {
            sink: this.name,
            error: err instanceof Error ? { message: err.message, stack: err.stack } : String(err),
          });
        }
      }
    } finally {
      this.isDraining = false;
    }
  }
}

/**
 * Transport that writes each message as a structured log line.
 * Stands in for the network publisher when running locally.
 */
export function createLoggingTransport<M>(tag = 'event.emitted'): EventTransport<M> {
  return async (message: M) => {
    logger.info(tag, message);
  };
}

export default { QueuedEventSink, createLoggingTransport };
