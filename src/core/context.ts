/**
 * Trace Context Module
 *
 * Lets call sites without a reference to the active trace or span still
 * create properly nested children.
 *
 * Two layers:
 * - Explicit, immutable context values (contextWithTrace / startSpan / ...)
 *   that callers thread through their own call chains.
 * - An AsyncLocalStorage-backed ambient context (runWithContext / withSpan /
 *   Client.trace) that follows async execution automatically.
 *
 * @example
 * ```typescript
 * import { init, getClient, withSpan, withGeneration } from '@tracebatch/sdk';
 *
 * init({ publicKey: 'pk-...', secretKey: 'sk-...' });
 *
 * await getClient().trace({ name: 'rag-query', input: question }, async () => {
 *   const docs = await withSpan('retrieval', async () => search(question));
 *   return withGeneration({ name: 'answer', model: 'gpt-4o' }, async (generation) => {
 *     const reply = await llm(docs);
 *     generation.end({ output: reply.text, usage: reply.usage });
 *     return { text: reply.text };
 *   });
 * });
 * ```
 */

import { AsyncLocalStorage } from 'async_hooks';
import type {
  Client,
  Generation,
  GenerationOptions,
  GenerationUpdateOptions,
  Span,
  SpanOptions,
  SpanUpdateOptions,
  Trace,
  TraceEndOptions,
  TraceRunOptions,
} from './types';
import { NoActiveGenerationError, NoActiveSpanError, NoActiveTraceError } from './errors';
import { debug } from './logger';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface TraceContext {
  readonly client?: Client;
  readonly trace?: Trace;
  readonly span?: Span;
  readonly generation?: Generation;
}

export interface SpanScope {
  /** Derived context carrying the new span */
  context: TraceContext;
  span: Span;
}

export interface GenerationScope {
  /** Derived context carrying the new generation */
  context: TraceContext;
  generation: Generation;
}

export type NamedSpanOptions = SpanOptions & { name: string };
export type NamedGenerationOptions = GenerationOptions & { name: string };

/** The empty context */
export const ROOT_CONTEXT: TraceContext = Object.freeze({});

// ─────────────────────────────────────────────────────────────
// Derivation
// ─────────────────────────────────────────────────────────────

function derive(ctx: TraceContext, patch: TraceContext): TraceContext {
  return Object.freeze({ ...ctx, ...patch });
}

/**
 * Attach a trace. A span or generation belonging to another trace is dropped.
 */
export function contextWithTrace(ctx: TraceContext, trace: Trace): TraceContext {
  return derive(ctx, {
    trace,
    span: ctx.span?.traceId === trace.id ? ctx.span : undefined,
    generation: ctx.generation?.traceId === trace.id ? ctx.generation : undefined,
  });
}

/**
 * Attach a span. An outer generation stays with the outer context.
 */
export function contextWithSpan(ctx: TraceContext, span: Span): TraceContext {
  return derive(ctx, { span, generation: undefined });
}

export function contextWithGeneration(ctx: TraceContext, generation: Generation): TraceContext {
  return derive(ctx, { generation });
}

export function contextWithClient(ctx: TraceContext, client: Client): TraceContext {
  return derive(ctx, { client });
}

// ─────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────

export function traceFromContext(ctx: TraceContext): Trace | undefined {
  return ctx.trace;
}

export function spanFromContext(ctx: TraceContext): Span | undefined {
  return ctx.span;
}

export function generationFromContext(ctx: TraceContext): Generation | undefined {
  return ctx.generation;
}

export function clientFromContext(ctx: TraceContext): Client | undefined {
  return ctx.client;
}

/**
 * Trace ID in context, '' if none
 */
export function currentTraceId(ctx: TraceContext): string {
  return ctx.trace?.id ?? ctx.span?.traceId ?? ctx.generation?.traceId ?? '';
}

/**
 * Innermost observation ID: span, then generation, '' if none
 */
export function currentSpanId(ctx: TraceContext): string {
  return ctx.span?.id ?? ctx.generation?.id ?? '';
}

// ─────────────────────────────────────────────────────────────
// Start / End from context
// ─────────────────────────────────────────────────────────────

/**
 * Start a span under the active span, or else the active trace.
 * @throws NoActiveTraceError when neither is present; ctx is left as is.
 */
export function startSpan(ctx: TraceContext, name: string, options?: SpanOptions): SpanScope {
  const parent = ctx.span ?? ctx.trace;
  if (!parent) {
    throw new NoActiveTraceError();
  }

  const span = parent.span(name, options);
  return { context: contextWithSpan(ctx, span), span };
}

/**
 * Start a generation under the active span, or else the active trace.
 * @throws NoActiveTraceError when neither is present.
 */
export function startGeneration(ctx: TraceContext, name: string, options?: GenerationOptions): GenerationScope {
  const parent = ctx.span ?? ctx.trace;
  if (!parent) {
    throw new NoActiveTraceError();
  }

  const generation = parent.generation(name, options);
  return { context: contextWithGeneration(ctx, generation), generation };
}

export function endSpan(ctx: TraceContext, options?: SpanUpdateOptions): void {
  if (!ctx.span) {
    throw new NoActiveSpanError();
  }
  ctx.span.end(options);
}

export function endGeneration(ctx: TraceContext, options?: GenerationUpdateOptions): void {
  if (!ctx.generation) {
    throw new NoActiveGenerationError();
  }
  ctx.generation.end(options);
}

export function endTrace(ctx: TraceContext, options?: TraceEndOptions): void {
  if (!ctx.trace) {
    throw new NoActiveTraceError();
  }
  ctx.trace.end(options);
}

// ─────────────────────────────────────────────────────────────
// AsyncLocalStorage for ambient context
// ─────────────────────────────────────────────────────────────

// Use a global symbol to ensure single instance across all entry points
// (the core and integration bundles are built separately)
const CONTEXT_STORAGE_KEY = Symbol.for('@tracebatch/sdk:contextStorage');

function getContextStorage(): AsyncLocalStorage<TraceContext> {
  const globalObj = globalThis as Record<symbol, AsyncLocalStorage<TraceContext> | undefined>;
  let storage = globalObj[CONTEXT_STORAGE_KEY];
  if (!storage) {
    storage = new AsyncLocalStorage<TraceContext>();
    globalObj[CONTEXT_STORAGE_KEY] = storage;
  }
  return storage;
}

const contextStorage = getContextStorage();

/**
 * Get the ambient context (ROOT_CONTEXT outside any run)
 */
export function activeContext(): TraceContext {
  return contextStorage.getStore() ?? ROOT_CONTEXT;
}

/**
 * Run fn with ctx as the ambient context
 */
export function runWithContext<T>(ctx: TraceContext, fn: () => T): T {
  return contextStorage.run(ctx, fn);
}

/**
 * Run fn inside a new span under the ambient span or trace. The span ends
 * when fn settles; a thrown error marks it ERROR and is rethrown.
 */
export async function withSpan<T>(
  nameOrOptions: string | NamedSpanOptions,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const named: NamedSpanOptions = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  const { name, ...options } = named;
  const { context, span } = startSpan(activeContext(), name, options);

  return runWithContext(context, async () => {
    try {
      const result = await fn(span);
      span.end();
      return result;
    } catch (err) {
      span.end({ level: 'ERROR', statusMessage: errorMessage(err) });
      throw err;
    }
  });
}

/**
 * Run fn with a new generation under the ambient span or trace. Ended when
 * fn settles unless fn already ended it (with usage, output, ...).
 */
export async function withGeneration<T>(
  nameOrOptions: string | NamedGenerationOptions,
  fn: (generation: Generation) => Promise<T>
): Promise<T> {
  const named: NamedGenerationOptions = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  const { name, ...options } = named;
  const { context, generation } = startGeneration(activeContext(), name, options);

  return runWithContext(context, async () => {
    try {
      const result = await fn(generation);
      generation.end();
      return result;
    } catch (err) {
      generation.end({ level: 'ERROR', statusMessage: errorMessage(err) });
      throw err;
    }
  });
}

// ─────────────────────────────────────────────────────────────
// Client.trace() implementation
// ─────────────────────────────────────────────────────────────

/**
 * Start a trace on client, run fn inside the ambient context carrying it,
 * and end the trace with fn's (extracted) result.
 * @internal
 */
export async function runInTrace<T>(
  client: Client,
  nameOrOptions: string | TraceRunOptions,
  fn: (trace: Trace) => Promise<T>
): Promise<T> {
  const runOptions: TraceRunOptions = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  const { name, outputKey, outputTransform, ...traceOptions } = runOptions;

  const trace = client.startTrace(name, traceOptions);
  const context = contextWithTrace(contextWithClient(activeContext(), client), trace);

  return runWithContext(context, async () => {
    try {
      const result = await fn(trace);
      trace.end({ output: extractOutput(result, outputKey, outputTransform) });
      return result;
    } catch (err) {
      debug(`Trace ${name} failed`, { error: errorMessage(err) });
      trace.end({ metadata: { error: errorMessage(err) } });
      throw err;
    }
  });
}

/** Common field names for auto-extracting text output (in priority order) */
const OUTPUT_TEXT_FIELDS = ['text', 'content', 'message', 'output', 'response', 'result', 'answer'];

/**
 * Extract display-friendly output from a result object.
 *
 * Priority:
 * 1. outputTransform function (if provided)
 * 2. Explicit outputKey (if provided)
 * 3. Auto-detection of common text fields
 * 4. Raw result (if outputKey === false or no text field found)
 */
export function extractOutput(
  result: unknown,
  outputKey?: string | false,
  outputTransform?: (r: unknown) => unknown
): unknown {
  if (outputTransform) {
    try {
      return outputTransform(result);
    } catch (err) {
      debug('outputTransform failed, using raw result', { error: errorMessage(err) });
      return result;
    }
  }

  if (outputKey === false) return result;
  if (result === null || typeof result !== 'object' || Array.isArray(result)) return result;

  const entries = new Map(Object.entries(result));

  if (typeof outputKey === 'string') {
    return entries.has(outputKey) ? entries.get(outputKey) : result;
  }

  for (const field of OUTPUT_TEXT_FIELDS) {
    const value = entries.get(field);
    if (typeof value === 'string') {
      return value;
    }
  }

  return result;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
