/**
 * Ingestion Client
 *
 * Owns the batch queue and hands it to every trace it creates.
 */

import type { Client, ClientConfig, ClientScoreOptions, Trace, TraceOptions, TraceRunOptions } from './types';
import type { SendOptions, Transport } from './transport';
import type { EntityRuntime } from './observation';
import type { ResolvedConfig } from './options';
import { resolveConfig } from './options';
import { HttpTransport } from './transport';
import { BatchQueue } from './queue';
import { TraceHandle } from './trace';
import { NoopClient } from './noop';
import { runInTrace } from './context';
import { encodeScore } from './encoder';
import { createSanitizer } from './sanitize';
import { buildTelemetry } from './telemetry';
import { debug, setDebug } from './logger';

export class IngestionClient implements Client {
  readonly enabled = true;

  private readonly queue: BatchQueue;
  private readonly runtime: EntityRuntime;

  constructor(config: ResolvedConfig) {
    this.queue = new BatchQueue({
      transport: config.transport ?? createTransport(config),
      batchSize: config.batchSize,
      flushIntervalMs: config.flushIntervalMs,
      maxConcurrentSends: config.maxConcurrentSends,
      onError: config.onError,
    });
    this.runtime = { sink: this.queue, sanitizer: createSanitizer(config.redaction) };
    this.queue.start();
  }

  startTrace(name: string, options?: TraceOptions): Trace {
    return new TraceHandle(this.runtime, name, options);
  }

  trace<T>(nameOrOptions: string | TraceRunOptions, fn: (trace: Trace) => Promise<T>): Promise<T> {
    return runInTrace(this, nameOrOptions, fn);
  }

  score(options: ClientScoreOptions): void {
    this.queue.enqueue(encodeScore(options));
  }

  flush(options?: SendOptions): Promise<void> {
    return this.queue.flush(options);
  }

  close(): Promise<void> {
    return this.queue.close();
  }

  getPendingCount(): number {
    return this.queue.getPendingCount();
  }
}

/**
 * Build a client from explicit config plus TRACEBATCH_* env vars.
 * Returns a no-op client when disabled.
 * @throws ConfigError
 */
export function createClient(config: ClientConfig = {}): Client {
  const resolved = resolveConfig(config);
  setDebug(resolved.debug);
  if (resolved.disabled) {
    debug('Tracing disabled, using no-op client');
    return new NoopClient();
  }
  return new IngestionClient(resolved);
}

function createTransport(config: ResolvedConfig): Transport {
  return new HttpTransport({
    endpoint: config.endpoint,
    credentials: config.credentials,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: config.fetch,
    telemetry: buildTelemetry(config.service),
  });
}
