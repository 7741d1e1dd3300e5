/**
 * Transport Layer
 *
 * Delivers a batch of envelopes to the ingestion API.
 * Features:
 * - Basic or API-key authentication
 * - Request timeout protection and caller abort signals
 * - Typed classification of failed responses
 */

import type { BatchIngestionRequest, Credentials, IngestionEvent, SDKTelemetry } from './types';
import { ApiError, RequestTimeoutError, SerializationError, TraceBatchError, TransportError } from './errors';
import { batchSend, batchSuccess, requestDetails, responseDetails } from './logger';
import { SDK_VERSION } from './telemetry';

// ─────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────

export interface SendOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface Transport {
  send(events: readonly IngestionEvent[], options?: SendOptions): Promise<void>;
}

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export interface HttpTransportConfig {
  endpoint: string;
  credentials: Credentials;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
  /** Sent as batch metadata */
  telemetry?: SDKTelemetry;
}

export type HttpMethod = 'GET' | 'POST';

export const INGESTION_PATH = '/api/public/ingestion';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

// ─────────────────────────────────────────────────────────────
// HTTP Transport
// ─────────────────────────────────────────────────────────────

export class HttpTransport implements Transport {
  readonly endpoint: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;
  private readonly telemetry?: SDKTelemetry;

  constructor(config: HttpTransportConfig) {
    this.endpoint = config.endpoint.replace(/\/+$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.telemetry = config.telemetry;
    this.headers = {
      'Content-Type': 'application/json',
      'User-Agent': `tracebatch-node/${SDK_VERSION}`,
      ...authHeaders(config.credentials),
    };
  }

  /**
   * POST one batch to the ingestion endpoint.
   * Any 2xx is success; partial-batch responses are not inspected.
   */
  async send(events: readonly IngestionEvent[], options: SendOptions = {}): Promise<void> {
    if (events.length === 0) return;

    const payload: BatchIngestionRequest = { batch: events, metadata: this.telemetry };
    const startTime = Date.now();

    batchSend(events.length, this.endpoint);
    await this.request('POST', INGESTION_PATH, payload, options);
    batchSuccess(events.length, Date.now() - startTime);
  }

  /**
   * Authenticated JSON request. Resolves with the parsed response body,
   * the raw text when it is not JSON, or undefined when it is empty.
   */
  async request(method: HttpMethod, path: string, body?: unknown, options: SendOptions = {}): Promise<unknown> {
    const url = `${this.endpoint}${path}`;
    const serialized = body === undefined ? undefined : serialize(body);

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);

    const onCallerAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    requestDetails(method, url, serialized?.length ?? 0);
    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.headers,
        body: serialized,
        signal: controller.signal,
      });

      responseDetails(response.status, Date.now() - startTime);

      if (response.status >= 400) {
        const errorText = await response.text().catch(() => 'Unknown error');
        throw new ApiError(response.status, errorText);
      }

      const text = await response.text();
      return text ? parseBody(text) : undefined;
    } catch (err) {
      if (err instanceof TraceBatchError) throw err;
      if (timedOut) throw new RequestTimeoutError(this.requestTimeoutMs);
      if (options.signal?.aborted) throw new TransportError('Request aborted', err);

      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request failed: ${message}`, err);
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function authHeaders(credentials: Credentials): Record<string, string> {
  if (credentials.type === 'basic') {
    const token = Buffer.from(`${credentials.publicKey}:${credentials.secretKey}`).toString('base64');
    return { Authorization: `Basic ${token}` };
  }

  if (credentials.header.toLowerCase() === 'authorization') {
    return { Authorization: `Bearer ${credentials.apiKey}` };
  }
  return { [credentials.header]: credentials.apiKey };
}

function serialize(body: unknown): string {
  try {
    return JSON.stringify(body);
  } catch (err) {
    throw new SerializationError(err);
  }
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
