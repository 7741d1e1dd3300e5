/**
 * Dataset API
 *
 * Direct REST calls for evaluation datasets. Unlike ingestion these are not
 * batched: each call is one request and rejects with the classified error.
 */

import { z } from 'zod';
import type { ClientConfig, Metadata } from './types';
import type { SendOptions } from './transport';
import { HttpTransport } from './transport';
import { resolveConfig } from './options';
import { ConfigError, TransportError } from './errors';
import { buildTelemetry } from './telemetry';

// ─────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────

const metadataSchema = z.record(z.unknown());

const datasetSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  metadata: metadataSchema.nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const datasetItemSchema = z.object({
  id: z.string(),
  datasetId: z.string().nullish(),
  datasetName: z.string().nullish(),
  input: z.unknown(),
  expectedOutput: z.unknown(),
  metadata: metadataSchema.nullish(),
  sourceTraceId: z.string().nullish(),
  sourceObservationId: z.string().nullish(),
  status: z.enum(['ACTIVE', 'ARCHIVED']).nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const datasetRunItemSchema = z.object({
  id: z.string(),
  datasetRunId: z.string(),
  datasetRunName: z.string(),
  datasetItemId: z.string(),
  traceId: z.string(),
  observationId: z.string().nullish(),
  createdAt: z.string(),
});

const datasetRunSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  datasetId: z.string(),
  datasetName: z.string().nullish(),
  metadata: metadataSchema.nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const pageMetaSchema = z.object({
  page: z.number(),
  limit: z.number(),
  totalItems: z.number(),
  totalPages: z.number(),
});

const datasetPageSchema = z.object({ data: z.array(datasetSchema), meta: pageMetaSchema });
const datasetItemPageSchema = z.object({ data: z.array(datasetItemSchema), meta: pageMetaSchema });
const datasetRunPageSchema = z.object({ data: z.array(datasetRunSchema), meta: pageMetaSchema });

export type Dataset = z.infer<typeof datasetSchema>;
export type DatasetItem = z.infer<typeof datasetItemSchema>;
export type DatasetRun = z.infer<typeof datasetRunSchema>;
export type DatasetRunItem = z.infer<typeof datasetRunItemSchema>;
export type PageMeta = z.infer<typeof pageMetaSchema>;

export interface Page<T> {
  data: T[];
  meta: PageMeta;
}

// ─────────────────────────────────────────────────────────────
// Request Types
// ─────────────────────────────────────────────────────────────

export interface CreateDatasetOptions {
  description?: string;
  metadata?: Metadata;
}

export interface PageOptions {
  /** 1-based */
  page?: number;
  limit?: number;
}

export interface CreateDatasetItemOptions {
  input?: unknown;
  expectedOutput?: unknown;
  metadata?: Metadata;
  /** Upserts when an item with this ID exists */
  id?: string;
  sourceTraceId?: string;
  sourceObservationId?: string;
}

export interface LinkTraceOptions {
  datasetItemId: string;
  traceId: string;
  runName: string;
  observationId?: string;
  runDescription?: string;
  metadata?: Metadata;
}

// ─────────────────────────────────────────────────────────────
// DatasetClient
// ─────────────────────────────────────────────────────────────

export class DatasetClient {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async createDataset(name: string, options: CreateDatasetOptions = {}, request?: SendOptions): Promise<Dataset> {
    const body = await this.transport.request('POST', '/api/public/v2/datasets', { name, ...options }, request);
    return parseResponse(datasetSchema, body, 'dataset');
  }

  async getDataset(name: string, request?: SendOptions): Promise<Dataset> {
    const body = await this.transport.request(
      'GET',
      `/api/public/v2/datasets/${encodeURIComponent(name)}`,
      undefined,
      request
    );
    return parseResponse(datasetSchema, body, 'dataset');
  }

  async listDatasets(options: PageOptions = {}, request?: SendOptions): Promise<Page<Dataset>> {
    const body = await this.transport.request(
      'GET',
      `/api/public/v2/datasets${queryString({ page: options.page, limit: options.limit })}`,
      undefined,
      request
    );
    return parseResponse(datasetPageSchema, body, 'dataset page');
  }

  async createDatasetItem(
    datasetName: string,
    item: CreateDatasetItemOptions,
    request?: SendOptions
  ): Promise<DatasetItem> {
    const body = await this.transport.request('POST', '/api/public/dataset-items', { datasetName, ...item }, request);
    return parseResponse(datasetItemSchema, body, 'dataset item');
  }

  async getDatasetItems(
    datasetName: string,
    options: PageOptions = {},
    request?: SendOptions
  ): Promise<Page<DatasetItem>> {
    const body = await this.transport.request(
      'GET',
      `/api/public/dataset-items${queryString({ datasetName, page: options.page, limit: options.limit })}`,
      undefined,
      request
    );
    return parseResponse(datasetItemPageSchema, body, 'dataset item page');
  }

  /**
   * Experiment runs recorded against a dataset
   */
  async getDatasetRuns(
    datasetName: string,
    options: PageOptions = {},
    request?: SendOptions
  ): Promise<Page<DatasetRun>> {
    const query = queryString({ page: options.page, limit: options.limit });
    const body = await this.transport.request(
      'GET',
      `/api/public/datasets/${encodeURIComponent(datasetName)}/runs${query}`,
      undefined,
      request
    );
    return parseResponse(datasetRunPageSchema, body, 'dataset run page');
  }

  /**
   * Record a trace as one run of a dataset item (for experiment comparison)
   */
  async linkTraceToDatasetItem(options: LinkTraceOptions, request?: SendOptions): Promise<DatasetRunItem> {
    const body = await this.transport.request('POST', '/api/public/dataset-run-items', options, request);
    return parseResponse(datasetRunItemSchema, body, 'dataset run item');
  }
}

/**
 * Build a dataset client with the same credentials and env fallbacks as
 * createClient(). The disabled flag does not apply here.
 * @throws ConfigError
 */
export function createDatasetClient(config: ClientConfig = {}): DatasetClient {
  const resolved = resolveConfig({ ...config, disabled: false });
  if (resolved.disabled) {
    throw new ConfigError('INVALID_CONFIG', 'Dataset client cannot be disabled');
  }

  return new DatasetClient(
    new HttpTransport({
      endpoint: resolved.endpoint,
      credentials: resolved.credentials,
      requestTimeoutMs: resolved.requestTimeoutMs,
      fetch: resolved.fetch,
      telemetry: buildTelemetry(resolved.service),
    })
  );
}

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function queryString(params: Record<string, string | number | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

function parseResponse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(`Unexpected ${what} response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
  }
  return parsed.data;
}
