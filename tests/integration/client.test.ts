import { describe, it, expect, vi } from 'vitest';
import { createClient } from '../../src/core/client';
import { ApiError, isUnauthorized } from '../../src/core/errors';
import type { ClientConfig } from '../../src/core/types';
import { createMockFetch } from '../helpers/mock-fetch';
import type { MockResponse } from '../helpers/mock-fetch';

function setup(responses: MockResponse[] = [], overrides: ClientConfig = {}) {
  const { fetch, requests } = createMockFetch(responses);
  const client = createClient({
    publicKey: 'pk-test',
    secretKey: 'test-secret',
    endpoint: 'https://ingest.example.com',
    fetch,
    ...overrides,
  });
  return { client, fetch, requests };
}

describe('Client over HTTP', () => {
  it('should deliver a full trace tree in one batch', async () => {
    const { client, requests } = setup();

    const trace = client.startTrace('support-chat', { userId: 'user-1', input: 'Where is my order?' });
    const span = trace.span('retrieval', { input: { query: 'order status' } });
    span.end({ output: ['doc-1'] });
    const generation = trace.generation('answer', { model: 'gpt-4o-mini' });
    generation.end({ output: 'It ships tomorrow.', usage: { promptTokens: 12, completionTokens: 5 } });
    trace.end({ output: 'It ships tomorrow.' });
    await client.flush();

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://ingest.example.com/api/public/ingestion');
    expect(requests[0].method).toBe('POST');
    expect(requests[0].headers['authorization']).toBe(
      `Basic ${Buffer.from('pk-test:test-secret').toString('base64')}`
    );
    expect(requests[0].body).toMatchObject({
      batch: [
        { type: 'trace-create', body: { id: trace.id, name: 'support-chat', userId: 'user-1' } },
        { type: 'span-create', body: { id: span.id, traceId: trace.id, name: 'retrieval' } },
        { type: 'span-update', body: { id: span.id, output: ['doc-1'] } },
        { type: 'generation-create', body: { id: generation.id, model: 'gpt-4o-mini' } },
        {
          type: 'generation-update',
          body: { id: generation.id, usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 } },
        },
        { type: 'trace-create', body: { id: trace.id, output: 'It ships tomorrow.' } },
      ],
    });
    await client.close();
  });

  it('should attach SDK and service telemetry to each batch', async () => {
    const { client, requests } = setup([], { service: { name: 'checkout', environment: 'staging' } });

    client.startTrace('chat');
    await client.flush();

    expect(requests[0].body).toMatchObject({
      metadata: {
        'telemetry.sdk.name': '@tracebatch/sdk',
        'telemetry.sdk.version': '0.1.0',
        'service.name': 'checkout',
        'deployment.environment': 'staging',
      },
    });
    await client.close();
  });

  it('should reject flush() with the classified API error', async () => {
    const { client } = setup([{ status: 401, body: 'bad credentials' }]);

    client.startTrace('chat');
    const error = await client.flush().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(isUnauthorized(error)).toBe(true);
    expect(client.getPendingCount()).toBe(0);
    await client.close();
  });

  it('should hand background failures to onError', async () => {
    const onError = vi.fn();
    const { client } = setup([{ status: 503, body: 'unavailable' }], { batchSize: 2, onError });

    const trace = client.startTrace('chat');
    trace.end();
    await client.close();

    expect(onError).toHaveBeenCalledOnce();
    const [error, events] = onError.mock.calls[0];
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 503 });
    expect(events).toHaveLength(2);
  });

  it('should split large workloads into batchSize requests', async () => {
    const { client, requests } = setup([], { batchSize: 3 });

    for (let i = 0; i < 7; i++) {
      client.startTrace(`trace-${i}`);
    }
    await client.close();

    expect(requests.map((request) => request.body)).toMatchObject([
      { batch: [{}, {}, {}] },
      { batch: [{}, {}, {}] },
      { batch: [{}] },
    ]);
  });

  it('should send nothing when disabled', async () => {
    const { client, fetch } = setup([], { disabled: true });

    const trace = client.startTrace('chat');
    trace.generation('llm').end({ output: 'x' });
    trace.end();
    await client.flush();
    await client.close();

    expect(fetch).not.toHaveBeenCalled();
  });
});
