/**
 * Batch Queue
 *
 * Buffers encoded envelopes and hands them to the transport in batches.
 * Features:
 * - Sync enqueue, never blocks on I/O
 * - Size-triggered dispatch (fire-and-forget)
 * - Periodic timer flush
 * - Bounded concurrent sends, FIFO hand-off to waiting batches
 * - Drain on close
 */

import type { EventSink, FailureHandler, IngestionEvent } from './types';
import type { SendOptions, Transport } from './transport';
import { toIngestionError } from './errors';
import { batchError, debug, error as logError, queueEvent, warn } from './logger';

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export interface BatchQueueConfig {
  transport: Transport;
  batchSize?: number;
  flushIntervalMs?: number;
  maxConcurrentSends?: number;
  onError?: FailureHandler;
}

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_FLUSH_INTERVAL_MS = 5000;
export const DEFAULT_MAX_CONCURRENT_SENDS = 4;

const defaultFailureHandler: FailureHandler = (err, events) => {
  batchError(events.length, err);
};

// ─────────────────────────────────────────────────────────────
// BatchQueue Class
// ─────────────────────────────────────────────────────────────

export class BatchQueue implements EventSink {
  private readonly transport: Transport;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly maxConcurrentSends: number;
  private readonly onError: FailureHandler;

  private queue: IngestionEvent[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private timerFlush: Promise<void> | null = null;
  private readonly dispatched = new Set<Promise<void>>();
  private readonly waiters: Array<() => void> = [];
  private activeSends = 0;
  private closePromise: Promise<void> | null = null;

  constructor(config: BatchQueueConfig) {
    this.transport = config.transport;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.flushIntervalMs = config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.maxConcurrentSends = config.maxConcurrentSends ?? DEFAULT_MAX_CONCURRENT_SENDS;
    this.onError = config.onError ?? defaultFailureHandler;
  }

  /**
   * Start the periodic flush timer. Safe to call more than once.
   */
  start(): void {
    if (this.flushTimer !== null || this.closePromise) return;

    this.flushTimer = setInterval(() => this.onTick(), this.flushIntervalMs);
    // Never keep the host process alive just to flush telemetry
    this.flushTimer.unref();
  }

  /**
   * Append an envelope. Dispatches the whole batch once it reaches batchSize;
   * the queue is empty again by the time this returns.
   */
  enqueue(event: IngestionEvent): void {
    if (this.closePromise) {
      warn(`Queue closed, dropping ${event.type} event`);
      return;
    }

    this.queue.push(event);
    queueEvent(event.type, this.queue.length);

    if (this.queue.length >= this.batchSize) {
      this.dispatch(this.takeAll());
    }
  }

  /**
   * Send everything currently queued and wait for it.
   * Rejects with the delivery error; nothing is re-queued.
   */
  async flush(options?: SendOptions): Promise<void> {
    const events = this.takeAll();
    if (events.length === 0) return;

    await this.sendBatch(events, options);
  }

  /**
   * Stop the timer, wait for every batch already handed off, then send
   * whatever is left. Resolves once every envelope enqueued before the call
   * has been given to the transport. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.drain();
    }
    return this.closePromise;
  }

  /**
   * Get pending count (for debugging)
   */
  getPendingCount(): number {
    return this.queue.length;
  }

  /**
   * Number of size- or timer-triggered batches not yet settled
   */
  getInFlightCount(): number {
    return this.dispatched.size + (this.timerFlush ? 1 : 0);
  }

  // ─────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────

  private async drain(): Promise<void> {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.timerFlush) {
      await this.timerFlush;
    }
    await Promise.all(this.dispatched);

    debug('Queue drained, sending final batch', { pending: this.queue.length });
    await this.flush();
  }

  private takeAll(): IngestionEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  private onTick(): void {
    // Skip while the previous tick is still sending
    if (this.timerFlush || this.queue.length === 0) return;

    const events = this.takeAll();
    this.timerFlush = this.sendBatch(events)
      .catch((err: unknown) => this.reportFailure(err, events))
      .finally(() => {
        this.timerFlush = null;
      });
  }

  private dispatch(events: IngestionEvent[]): void {
    const pending: Promise<void> = this.sendBatch(events)
      .catch((err: unknown) => this.reportFailure(err, events))
      .finally(() => {
        this.dispatched.delete(pending);
      });
    this.dispatched.add(pending);
  }

  private async sendBatch(events: IngestionEvent[], options?: SendOptions): Promise<void> {
    const slot = this.acquireSlot();
    if (slot) {
      await slot;
    }

    try {
      await this.transport.send(events, options);
    } catch (err) {
      throw toIngestionError(err);
    } finally {
      this.releaseSlot();
    }
  }

  /**
   * Returns undefined when a slot was taken immediately, so a free slot
   * reaches the transport without yielding.
   */
  private acquireSlot(): Promise<void> | undefined {
    if (this.activeSends < this.maxConcurrentSends) {
      this.activeSends++;
      return undefined;
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiting batch
      next();
    } else {
      this.activeSends--;
    }
  }

  private reportFailure(err: unknown, events: readonly IngestionEvent[]): void {
    try {
      this.onError(toIngestionError(err), events);
    } catch (handlerErr) {
      logError('onError handler threw', handlerErr);
    }
  }
}
