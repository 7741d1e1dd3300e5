import { describe, it, expect } from 'vitest';
import { DatasetClient, createDatasetClient } from '../../src/core/datasets';
import { HttpTransport } from '../../src/core/transport';
import { ApiError, TransportError, isNotFound } from '../../src/core/errors';
import { createMockFetch } from '../helpers/mock-fetch';
import type { MockResponse } from '../helpers/mock-fetch';

const dataset = {
  id: 'ds-1',
  name: 'qa-regression',
  description: 'Support questions',
  metadata: null,
  projectId: 'project-1',
  createdAt: '2024-02-01T00:00:00.000Z',
  updatedAt: '2024-02-01T00:00:00.000Z',
};

const item = {
  id: 'item-1',
  datasetId: 'ds-1',
  datasetName: 'qa-regression',
  input: { question: 'How do I reset my password?' },
  expectedOutput: 'Use the reset link.',
  metadata: null,
  sourceTraceId: null,
  sourceObservationId: null,
  status: 'ACTIVE',
  createdAt: '2024-02-01T00:00:00.000Z',
  updatedAt: '2024-02-01T00:00:00.000Z',
};

const meta = { page: 1, limit: 50, totalItems: 1, totalPages: 1 };

function setup(responses: MockResponse[]) {
  const { fetch, requests } = createMockFetch(responses);
  const transport = new HttpTransport({
    endpoint: 'https://ingest.example.com',
    credentials: { type: 'basic', publicKey: 'pk-test', secretKey: 'test-secret' },
    fetch,
  });
  return { datasets: new DatasetClient(transport), requests };
}

describe('DatasetClient', () => {
  it('should create a dataset', async () => {
    const { datasets, requests } = setup([{ body: dataset }]);

    const created = await datasets.createDataset('qa-regression', { description: 'Support questions' });

    expect(requests[0]).toMatchObject({
      url: 'https://ingest.example.com/api/public/v2/datasets',
      method: 'POST',
      body: { name: 'qa-regression', description: 'Support questions' },
    });
    expect(created).toEqual({
      id: 'ds-1',
      name: 'qa-regression',
      description: 'Support questions',
      metadata: null,
      createdAt: '2024-02-01T00:00:00.000Z',
      updatedAt: '2024-02-01T00:00:00.000Z',
    });
  });

  it('should get a dataset by URL-encoded name', async () => {
    const { datasets, requests } = setup([{ body: { ...dataset, name: 'qa/eu' } }]);

    const found = await datasets.getDataset('qa/eu');

    expect(requests[0].url).toBe('https://ingest.example.com/api/public/v2/datasets/qa%2Feu');
    expect(requests[0].method).toBe('GET');
    expect(found.name).toBe('qa/eu');
  });

  it('should surface a missing dataset as ApiError', async () => {
    const { datasets } = setup([{ status: 404, body: '{"message":"Dataset not found"}' }]);

    const error = await datasets.getDataset('missing').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(isNotFound(error)).toBe(true);
  });

  it('should list datasets with paging parameters', async () => {
    const { datasets, requests } = setup([{ body: { data: [dataset], meta } }]);

    const page = await datasets.listDatasets({ page: 2, limit: 10 });

    expect(requests[0].url).toBe('https://ingest.example.com/api/public/v2/datasets?page=2&limit=10');
    expect(page.data.map((entry) => entry.id)).toEqual(['ds-1']);
    expect(page.meta).toEqual(meta);
  });

  it('should list datasets without a query string by default', async () => {
    const { datasets, requests } = setup([{ body: { data: [], meta: { ...meta, totalItems: 0 } } }]);

    await datasets.listDatasets();

    expect(requests[0].url).toBe('https://ingest.example.com/api/public/v2/datasets');
  });

  it('should create a dataset item', async () => {
    const { datasets, requests } = setup([{ body: item }]);

    const created = await datasets.createDatasetItem('qa-regression', {
      input: { question: 'How do I reset my password?' },
      expectedOutput: 'Use the reset link.',
    });

    expect(requests[0]).toMatchObject({
      url: 'https://ingest.example.com/api/public/dataset-items',
      method: 'POST',
      body: {
        datasetName: 'qa-regression',
        input: { question: 'How do I reset my password?' },
        expectedOutput: 'Use the reset link.',
      },
    });
    expect(created.id).toBe('item-1');
    expect(created.status).toBe('ACTIVE');
  });

  it('should page through dataset items', async () => {
    const { datasets, requests } = setup([{ body: { data: [item], meta } }]);

    const page = await datasets.getDatasetItems('qa regression', { limit: 50 });

    expect(requests[0].url).toBe('https://ingest.example.com/api/public/dataset-items?datasetName=qa+regression&limit=50');
    expect(page.data[0].expectedOutput).toBe('Use the reset link.');
  });

  it('should link a trace to a dataset item', async () => {
    const runItem = {
      id: 'run-item-1',
      datasetRunId: 'run-1',
      datasetRunName: 'nightly',
      datasetItemId: 'item-1',
      traceId: 'trace-1',
      observationId: null,
      createdAt: '2024-02-02T00:00:00.000Z',
    };
    const { datasets, requests } = setup([{ body: runItem }]);

    const linked = await datasets.linkTraceToDatasetItem({ datasetItemId: 'item-1', traceId: 'trace-1', runName: 'nightly' });

    expect(requests[0]).toMatchObject({
      url: 'https://ingest.example.com/api/public/dataset-run-items',
      method: 'POST',
      body: { datasetItemId: 'item-1', traceId: 'trace-1', runName: 'nightly' },
    });
    expect(linked).toEqual(runItem);
  });

  it('should list the runs of a dataset', async () => {
    const run = {
      id: 'run-1',
      name: 'nightly',
      description: null,
      datasetId: 'ds-1',
      datasetName: 'qa/eu',
      metadata: { model: 'gpt-4o-mini' },
      createdAt: '2024-02-02T00:00:00.000Z',
      updatedAt: '2024-02-02T00:00:00.000Z',
    };
    const { datasets, requests } = setup([{ body: { data: [run], meta } }]);

    const page = await datasets.getDatasetRuns('qa/eu', { page: 1, limit: 20 });

    expect(requests[0].url).toBe('https://ingest.example.com/api/public/datasets/qa%2Feu/runs?page=1&limit=20');
    expect(requests[0].method).toBe('GET');
    expect(page.data).toEqual([run]);
    expect(page.meta).toEqual(meta);
  });

  it('should reject a run page without its meta block', async () => {
    const { datasets } = setup([{ body: { data: [] } }]);

    await expect(datasets.getDatasetRuns('qa-regression')).rejects.toThrow(/^Unexpected dataset run page response/);
  });

  it('should reject responses that do not match the expected shape', async () => {
    const { datasets } = setup([{ body: { id: 42 } }]);

    await expect(datasets.getDataset('broken')).rejects.toBeInstanceOf(TransportError);
  });
});

describe('createDatasetClient', () => {
  it('should use the same credentials as the ingestion client', async () => {
    const { fetch, requests } = createMockFetch([{ body: dataset }]);
    const datasets = createDatasetClient({ apiKey: 'test-key', endpoint: 'https://ingest.example.com', fetch });

    await datasets.getDataset('qa-regression');

    expect(requests[0].headers['authorization']).toBe('Bearer test-key');
  });

  it('should ignore the disabled flag', () => {
    expect(createDatasetClient({ apiKey: 'test-key', disabled: true })).toBeInstanceOf(DatasetClient);
  });
});
