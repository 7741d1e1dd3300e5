/**
 * Trace
 *
 * A handle to an in-progress trace. The create event is queued on
 * construction so the trace shows up before it finishes; updates and the
 * final state are re-sent as trace-create (the API upserts by ID).
 */

import type {
  Generation,
  GenerationOptions,
  Metadata,
  ScoreOptions,
  ScoreValue,
  Span,
  SpanOptions,
  Trace,
  TraceBody,
  TraceEndOptions,
  TraceOptions,
  TraceUpdateOptions,
} from './types';
import type { EntityRuntime, ParentRef } from './observation';
import { SpanHandle } from './span';
import { GenerationHandle } from './generation';
import { encodeEvent, encodeScore, generateId } from './encoder';
import { debug } from './logger';

export class TraceHandle implements Trace {
  readonly id: string;
  readonly name: string;
  readonly startTime: Date;

  private readonly runtime: EntityRuntime;
  private readonly release: string | undefined;
  private readonly version: string | undefined;
  private readonly isPublic: boolean | undefined;
  private input: unknown;
  private output: unknown;
  private metadata: Metadata | undefined;
  private tags: string[];
  private userId: string | undefined;
  private sessionId: string | undefined;
  private endTimeValue: Date | undefined;

  /** @internal */
  constructor(runtime: EntityRuntime, name: string, options: TraceOptions = {}) {
    this.id = options.id ?? generateId();
    this.name = name;
    this.startTime = new Date();
    this.runtime = runtime;
    this.input = options.input;
    this.output = options.output;
    this.metadata = options.metadata ? { ...options.metadata } : undefined;
    this.tags = options.tags ? [...options.tags] : [];
    this.userId = options.userId;
    this.sessionId = options.sessionId;
    this.release = options.release;
    this.version = options.version;
    this.isPublic = options.public;

    this.emit();
  }

  get endTime(): Date | undefined {
    return this.endTimeValue;
  }

  get ended(): boolean {
    return this.endTimeValue !== undefined;
  }

  /**
   * Merge metadata, append tags, replace input/output and re-send.
   * No-op after end().
   */
  update(options: TraceUpdateOptions): void {
    if (this.ended) {
      debug(`Ignoring update on ended trace ${this.name}`, { id: this.id });
      return;
    }

    if (options.input !== undefined) {
      this.input = options.input;
    }
    if (options.tags) {
      this.tags = [...this.tags, ...options.tags];
    }
    if (options.userId !== undefined) {
      this.userId = options.userId;
    }
    if (options.sessionId !== undefined) {
      this.sessionId = options.sessionId;
    }
    this.applyOutput(options);
    this.emit();
  }

  /**
   * End the trace. Calling end() more than once is a no-op.
   */
  end(options: TraceEndOptions = {}): void {
    if (this.ended) return;

    this.endTimeValue = new Date();
    this.applyOutput(options);
    this.emit();
  }

  /**
   * Start a top-level span within this trace.
   * For nested spans, call .span() on the returned span instead.
   */
  span(name: string, options?: SpanOptions): Span {
    return new SpanHandle(this.runtime, this.childRef(), name, options);
  }

  generation(name: string, options?: GenerationOptions): Generation {
    return new GenerationHandle(this.runtime, this.childRef(), name, options);
  }

  score(name: string, value: ScoreValue, options: ScoreOptions = {}): void {
    this.runtime.sink.enqueue(encodeScore({ ...options, traceId: this.id, name, value }));
  }

  private childRef(): ParentRef {
    return { traceId: this.id, parentSpanId: '' };
  }

  private applyOutput(options: TraceEndOptions): void {
    if (options.output !== undefined) {
      this.output = options.output;
    }
    if (options.metadata) {
      this.metadata = { ...this.metadata, ...options.metadata };
    }
  }

  private emit(): void {
    const { sanitizer, sink } = this.runtime;
    const body: TraceBody = {
      id: this.id,
      name: this.name,
      timestamp: this.startTime.toISOString(),
      input: sanitizer.value(this.input),
      output: sanitizer.value(this.output),
      metadata: sanitizer.metadata(this.metadata),
      tags: this.tags.length > 0 ? [...this.tags] : undefined,
      userId: this.userId,
      sessionId: this.sessionId,
      release: this.release,
      version: this.version,
      public: this.isPublic,
    };
    sink.enqueue(encodeEvent('trace-create', body));
  }
}
