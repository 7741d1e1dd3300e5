/**
 * Core types for TraceBatch SDK
 */

import type { IngestionError } from './errors';
import type { SendOptions, Transport } from './transport';

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export interface ServiceConfig {
  /** Service name (e.g., "my-ai-chatbot") */
  name?: string;
  /** Service version (e.g., "1.2.3") */
  version?: string;
  /** Deployment environment (e.g., "production", "staging", "development") */
  environment?: string;
}

export interface RedactionConfig {
  /** Extra key fragments to redact (case-insensitive substring match) */
  keys?: string[];
  /** Regex patterns replaced with [REDACTED] inside string values */
  patterns?: RegExp[];
  /** Replace email addresses with [EMAIL] */
  emails?: boolean;
  /** Replace long digit runs with [PHONE] */
  phones?: boolean;
}

/**
 * Called when a background (size- or timer-triggered) batch send fails.
 * Explicit flush() / close() calls still reject.
 */
export type FailureHandler = (error: IngestionError, events: readonly IngestionEvent[]) => void;

export interface ClientConfig {
  /** Public key for Basic auth (or set TRACEBATCH_PUBLIC_KEY) */
  publicKey?: string;
  /** Secret key for Basic auth (or set TRACEBATCH_SECRET_KEY) */
  secretKey?: string;
  /** API key for header auth (or set TRACEBATCH_API_KEY) */
  apiKey?: string;
  /**
   * Header carrying the API key. `Authorization` (default) sends `Bearer <key>`,
   * any other header name carries the raw key.
   */
  apiKeyHeader?: string;
  /** Ingestion host (default: https://cloud.langfuse.com, or TRACEBATCH_HOST) */
  endpoint?: string;
  /** Enable debug logging */
  debug?: boolean;
  /** Disable tracing; every entity becomes a no-op */
  disabled?: boolean;
  /** Batch size before flush (default: 100) */
  batchSize?: number;
  /** Auto-flush interval in ms (default: 5000) */
  flushIntervalMs?: number;
  /** Request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
  /** Maximum concurrent batch sends (default: 4) */
  maxConcurrentSends?: number;
  /** Service metadata for telemetry */
  service?: ServiceConfig;
  /** PII redaction rules applied to input, output and metadata */
  redaction?: RedactionConfig;
  /** Observer for dropped background batches (default: log) */
  onError?: FailureHandler;
  /** fetch implementation used by the HTTP transport */
  fetch?: typeof fetch;
  /** Replace the HTTP transport entirely (tests, custom delivery) */
  transport?: Transport;
}

export type Credentials =
  | { type: 'basic'; publicKey: string; secretKey: string }
  | { type: 'apiKey'; apiKey: string; header: string };

// ─────────────────────────────────────────────────────────────
// SDK Telemetry
// ─────────────────────────────────────────────────────────────

export interface SDKTelemetry {
  /** SDK name */
  'telemetry.sdk.name': string;
  /** SDK version */
  'telemetry.sdk.version': string;
  /** SDK language */
  'telemetry.sdk.language': string;
  /** Runtime name */
  'process.runtime.name'?: string;
  /** Runtime version */
  'process.runtime.version'?: string;
  /** OS type (linux, darwin, windows) */
  'os.type'?: string;
  /** Service name */
  'service.name'?: string;
  /** Service version */
  'service.version'?: string;
  /** Deployment environment */
  'deployment.environment'?: string;
}

// ─────────────────────────────────────────────────────────────
// Entity Options
// ─────────────────────────────────────────────────────────────

export type Metadata = Record<string, unknown>;

export type ObservationLevel = 'DEBUG' | 'DEFAULT' | 'WARNING' | 'ERROR';

export interface TraceOptions {
  /** Forwarded trace ID (defaults to a fresh UUID) */
  id?: string;
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  tags?: string[];
  userId?: string;
  sessionId?: string;
  release?: string;
  version?: string;
  public?: boolean;
}

export interface TraceUpdateOptions {
  input?: unknown;
  output?: unknown;
  /** Merged key-by-key into existing metadata */
  metadata?: Metadata;
  /** Appended to existing tags */
  tags?: string[];
  userId?: string;
  sessionId?: string;
}

export interface TraceEndOptions {
  output?: unknown;
  metadata?: Metadata;
}

export interface SpanOptions {
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  level?: ObservationLevel;
  statusMessage?: string;
  version?: string;
  startTime?: Date;
}

export interface SpanUpdateOptions {
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  level?: ObservationLevel;
  statusMessage?: string;
}

export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  /** Derived from prompt + completion when omitted */
  totalTokens?: number;
  inputCost?: number;
  outputCost?: number;
  totalCost?: number;
  /** TOKENS, CHARACTERS, ... */
  unit?: string;
}

export interface GenerationOptions extends SpanOptions {
  model?: string;
  modelParameters?: Metadata;
  promptName?: string;
  promptVersion?: number;
  usage?: Usage;
  completionStartTime?: Date;
}

export interface GenerationUpdateOptions extends SpanUpdateOptions {
  model?: string;
  modelParameters?: Metadata;
  promptName?: string;
  promptVersion?: number;
  usage?: Usage;
  completionStartTime?: Date;
}

export type ScoreDataType = 'NUMERIC' | 'CATEGORICAL' | 'BOOLEAN';
export type ScoreSource = 'API' | 'ANNOTATION' | 'EVAL';
export type ScoreValue = number | string | boolean;

export interface ScoreOptions {
  comment?: string;
  source?: ScoreSource;
  /** Overrides the data type inferred from the value */
  dataType?: ScoreDataType;
}

export interface ClientScoreOptions extends ScoreOptions {
  traceId: string;
  observationId?: string;
  name: string;
  value: ScoreValue;
}

// ─────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────

/**
 * Root record of one end-to-end operation.
 * Created by Client.startTrace(); children hang off span() / generation().
 */
export interface Trace {
  readonly id: string;
  readonly name: string;
  readonly startTime: Date;
  /** Set once by end(), never changed afterwards */
  readonly endTime: Date | undefined;
  readonly ended: boolean;
  /** No-op after end() */
  update(options: TraceUpdateOptions): void;
  /** Idempotent: only the first call is recorded */
  end(options?: TraceEndOptions): void;
  span(name: string, options?: SpanOptions): Span;
  generation(name: string, options?: GenerationOptions): Generation;
  /** Allowed at any time, including after end() */
  score(name: string, value: ScoreValue, options?: ScoreOptions): void;
}

/** Shared read accessors of spans and generations */
export interface Observation {
  readonly id: string;
  readonly traceId: string;
  /** Immediate parent span, '' for direct children of the trace */
  readonly parentSpanId: string;
  readonly name: string;
  readonly startTime: Date;
  readonly endTime: Date | undefined;
  readonly ended: boolean;
  score(name: string, value: ScoreValue, options?: ScoreOptions): void;
}

export interface Span extends Observation {
  update(options: SpanUpdateOptions): void;
  end(options?: SpanUpdateOptions): void;
  span(name: string, options?: SpanOptions): Span;
  generation(name: string, options?: GenerationOptions): Generation;
}

/** A leaf observation for one model call; it cannot have children */
export interface Generation extends Observation {
  readonly model: string | undefined;
  readonly usage: Readonly<Usage> | undefined;
  readonly completionStartTime: Date | undefined;
  update(options: GenerationUpdateOptions): void;
  end(options?: GenerationUpdateOptions): void;
  /** Record first-token time; later calls keep the first value */
  markCompletionStart(): void;
  setOutput(output: unknown): void;
  setUsage(usage: Usage): void;
}

/**
 * Options for Client.trace(): runs a callback inside a trace and ends it
 * with the callback's result.
 */
export interface TraceRunOptions extends TraceOptions {
  name: string;
  /**
   * Key to extract from the result for the trace output.
   * If not specified, auto-detection tries: text, content, message, output, response, result, answer.
   * Set to `false` to send the raw result.
   */
  outputKey?: string | false;
  /** Custom output formatting; takes precedence over outputKey */
  outputTransform?: (result: unknown) => unknown;
}

export interface Client {
  /** false for the no-op client */
  readonly enabled: boolean;
  startTrace(name: string, options?: TraceOptions): Trace;
  /**
   * Start a trace, run fn inside the ambient context carrying it, and end
   * it with fn's result. Errors are recorded and rethrown.
   */
  trace<T>(nameOrOptions: string | TraceRunOptions, fn: (trace: Trace) => Promise<T>): Promise<T>;
  /** Score an entity by ID, e.g. from a later evaluation pass */
  score(options: ClientScoreOptions): void;
  /** Send everything queued; rejects with the delivery error */
  flush(options?: SendOptions): Promise<void>;
  /** Stop background flushing and deliver everything still queued */
  close(): Promise<void>;
  getPendingCount(): number;
}

// ─────────────────────────────────────────────────────────────
// Wire Format
// ─────────────────────────────────────────────────────────────

export type EventType =
  | 'trace-create'
  | 'span-create'
  | 'span-update'
  | 'generation-create'
  | 'generation-update'
  | 'score-create';

export interface TraceBody {
  id: string;
  name?: string;
  /** Trace start (RFC3339) */
  timestamp: string;
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  tags?: string[];
  userId?: string;
  sessionId?: string;
  release?: string;
  version?: string;
  public?: boolean;
}

export interface SpanBody {
  id: string;
  traceId: string;
  parentObservationId?: string;
  name?: string;
  startTime: string;
  endTime?: string;
  input?: unknown;
  output?: unknown;
  metadata?: Metadata;
  level?: ObservationLevel;
  statusMessage?: string;
  version?: string;
}

export interface GenerationBody extends SpanBody {
  completionStartTime?: string;
  model?: string;
  modelParameters?: Metadata;
  usage?: Usage;
  promptName?: string;
  promptVersion?: number;
}

export interface ScoreBody {
  id: string;
  traceId: string;
  observationId?: string;
  name: string;
  value?: number;
  stringValue?: string;
  dataType: ScoreDataType;
  comment?: string;
  source?: ScoreSource;
}

export interface EventBodies {
  'trace-create': TraceBody;
  'span-create': SpanBody;
  'span-update': SpanBody;
  'generation-create': GenerationBody;
  'generation-update': GenerationBody;
  'score-create': ScoreBody;
}

export interface IngestionEventOf<T extends EventType> {
  readonly id: string;
  readonly type: T;
  /** Encoding time (RFC3339) */
  readonly timestamp: string;
  readonly body: Readonly<EventBodies[T]>;
}

export type IngestionEvent = { [T in EventType]: IngestionEventOf<T> }[EventType];

export interface BatchIngestionRequest {
  batch: readonly IngestionEvent[];
  metadata?: SDKTelemetry;
}

/** Where encoded envelopes go */
export interface EventSink {
  enqueue(event: IngestionEvent): void;
}
