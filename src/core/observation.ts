/**
 * Observation Base
 *
 * Shared lifecycle of spans and generations: single-end guard, metadata
 * merge, full-state update envelopes and detached scores.
 */

import type {
  EventSink,
  IngestionEvent,
  Metadata,
  ObservationLevel,
  ScoreOptions,
  ScoreValue,
  SpanBody,
  SpanOptions,
  SpanUpdateOptions,
} from './types';
import type { Sanitizer } from './sanitize';
import { encodeScore, generateId } from './encoder';
import { debug } from './logger';

/** What every entity needs from its client */
export interface EntityRuntime {
  readonly sink: EventSink;
  readonly sanitizer: Sanitizer;
}

/** IDs a child inherits from its parent */
export interface ParentRef {
  traceId: string;
  /** '' when the parent is the trace itself */
  parentSpanId: string;
}

export abstract class ObservationHandle<TUpdate extends SpanUpdateOptions> {
  readonly id: string;
  readonly traceId: string;
  readonly parentSpanId: string;
  readonly name: string;
  readonly startTime: Date;

  protected readonly runtime: EntityRuntime;
  protected input: unknown;
  protected output: unknown;
  protected metadata: Metadata | undefined;
  protected level: ObservationLevel | undefined;
  protected statusMessage: string | undefined;
  protected readonly version: string | undefined;

  private endTimeValue: Date | undefined;

  protected constructor(runtime: EntityRuntime, parent: ParentRef, name: string, options: SpanOptions) {
    this.runtime = runtime;
    this.id = generateId();
    this.traceId = parent.traceId;
    this.parentSpanId = parent.parentSpanId;
    this.name = name;
    this.startTime = options.startTime ?? new Date();
    this.input = options.input;
    this.output = options.output;
    this.metadata = options.metadata ? { ...options.metadata } : undefined;
    this.level = options.level;
    this.statusMessage = options.statusMessage;
    this.version = options.version;
  }

  get endTime(): Date | undefined {
    return this.endTimeValue;
  }

  get ended(): boolean {
    return this.endTimeValue !== undefined;
  }

  /**
   * Apply partial overrides and enqueue the full current state.
   * No-op once the observation has ended.
   */
  update(options: TUpdate): void {
    if (this.ended) {
      debug(`Ignoring update on ended observation ${this.name}`, { id: this.id });
      return;
    }

    this.applyUpdate(options);
    this.runtime.sink.enqueue(this.encodeUpdate());
  }

  /**
   * Record the end time and enqueue the final state.
   * Only the first call has any effect.
   */
  end(options?: TUpdate): void {
    if (this.ended) return;

    this.endTimeValue = new Date();
    if (options) {
      this.applyUpdate(options);
    }
    this.runtime.sink.enqueue(this.encodeUpdate());
  }

  /**
   * Attach a score to this observation. Allowed after end().
   */
  score(name: string, value: ScoreValue, options: ScoreOptions = {}): void {
    this.runtime.sink.enqueue(
      encodeScore({ ...options, traceId: this.traceId, observationId: this.id, name, value })
    );
  }

  protected applyUpdate(options: TUpdate): void {
    if (options.input !== undefined) {
      this.input = options.input;
    }
    if (options.output !== undefined) {
      this.output = options.output;
    }
    if (options.metadata) {
      this.metadata = { ...this.metadata, ...options.metadata };
    }
    if (options.level) {
      this.level = options.level;
    }
    if (options.statusMessage !== undefined) {
      this.statusMessage = options.statusMessage;
    }
  }

  /** Sanitized snapshot of the fields every observation shares */
  protected baseBody(): SpanBody {
    const { sanitizer } = this.runtime;
    return {
      id: this.id,
      traceId: this.traceId,
      parentObservationId: this.parentSpanId || undefined,
      name: this.name,
      startTime: this.startTime.toISOString(),
      endTime: this.endTimeValue?.toISOString(),
      input: sanitizer.value(this.input),
      output: sanitizer.value(this.output),
      metadata: sanitizer.metadata(this.metadata),
      level: this.level,
      statusMessage: this.statusMessage,
      version: this.version,
    };
  }

  protected abstract encodeUpdate(): IngestionEvent;
}
