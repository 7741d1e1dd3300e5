/**
 * TraceBatch SDK
 * Batched trace ingestion for LLM applications
 *
 * @example Explicit handles
 * ```typescript
 * import { createClient } from '@tracebatch/sdk';
 *
 * const client = createClient({ publicKey: 'pk-...', secretKey: 'sk-...' });
 *
 * const trace = client.startTrace('support-chat', { userId: 'user-1', input: question });
 * const retrieval = trace.span('retrieval', { input: question });
 * retrieval.end({ output: docs });
 *
 * const generation = trace.generation('answer', { model: 'gpt-4o', input: prompt });
 * generation.end({ output: reply, usage: { promptTokens: 120, completionTokens: 40 } });
 * trace.end({ output: reply });
 *
 * await client.close(); // delivers everything still queued
 * ```
 *
 * @example Ambient context
 * ```typescript
 * import { init, getClient, withSpan, shutdown } from '@tracebatch/sdk';
 *
 * init();
 *
 * await getClient().trace('sales-agent', async () => {
 *   await withSpan('lookup', async () => crm.find(id));
 *   return { text: 'done' };
 * });
 *
 * await shutdown();
 * ```
 */

// ─────────────────────────────────────────────────────────────
// Main API
// ─────────────────────────────────────────────────────────────

// Configuration
export { init, getClient, isInitialized, isEnabled, flush, shutdown } from './core/config';
export { resolveConfig, resolveCredentials, readEnv, DEFAULT_ENDPOINT, MAX_TIMER_MS } from './core/options';

// Client
export { createClient, IngestionClient } from './core/client';
export { NoopClient, NoopTrace, NoopSpan, NoopGeneration } from './core/noop';

// Context
export {
  ROOT_CONTEXT,
  contextWithTrace,
  contextWithSpan,
  contextWithGeneration,
  contextWithClient,
  traceFromContext,
  spanFromContext,
  generationFromContext,
  clientFromContext,
  currentTraceId,
  currentSpanId,
  startSpan,
  startGeneration,
  endSpan,
  endGeneration,
  endTrace,
  activeContext,
  runWithContext,
  withSpan,
  withGeneration,
  extractOutput,
} from './core/context';

// Delivery
export { BatchQueue, DEFAULT_BATCH_SIZE, DEFAULT_FLUSH_INTERVAL_MS, DEFAULT_MAX_CONCURRENT_SENDS } from './core/queue';
export { HttpTransport, INGESTION_PATH, DEFAULT_REQUEST_TIMEOUT_MS } from './core/transport';
export { encodeEvent, encodeScore, generateId } from './core/encoder';

// Datasets
export { DatasetClient, createDatasetClient } from './core/datasets';

// Errors
export {
  TraceBatchError,
  ConfigError,
  NoActiveTraceError,
  NoActiveSpanError,
  NoActiveGenerationError,
  ApiError,
  RequestTimeoutError,
  TransportError,
  SerializationError,
  isNotFound,
  isUnauthorized,
  isRateLimited,
} from './core/errors';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type {
  ClientConfig,
  Credentials,
  ServiceConfig,
  RedactionConfig,
  FailureHandler,
  SDKTelemetry,
  Metadata,
  ObservationLevel,
  TraceOptions,
  TraceUpdateOptions,
  TraceEndOptions,
  TraceRunOptions,
  SpanOptions,
  SpanUpdateOptions,
  GenerationOptions,
  GenerationUpdateOptions,
  Usage,
  ScoreDataType,
  ScoreSource,
  ScoreValue,
  ScoreOptions,
  ClientScoreOptions,
  Client,
  Trace,
  Observation,
  Span,
  Generation,
  EventType,
  TraceBody,
  SpanBody,
  GenerationBody,
  ScoreBody,
  IngestionEvent,
  BatchIngestionRequest,
  EventSink,
} from './core/types';

export type { TraceContext, SpanScope, GenerationScope, NamedSpanOptions, NamedGenerationOptions } from './core/context';
export type { Transport, SendOptions, HttpTransportConfig } from './core/transport';
export type { BatchQueueConfig } from './core/queue';
export type { ResolvedConfig, DisabledConfig } from './core/options';
export type { ConfigErrorCode, IngestionError } from './core/errors';
export type {
  Dataset,
  DatasetItem,
  DatasetRun,
  DatasetRunItem,
  Page,
  PageMeta,
  PageOptions,
  CreateDatasetOptions,
  CreateDatasetItemOptions,
  LinkTraceOptions,
} from './core/datasets';
