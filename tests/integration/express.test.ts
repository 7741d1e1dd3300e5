import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMiddleware } from '../../src/integrations/express';
import type { ExpressRequest, ExpressResponse } from '../../src/integrations/express';
import { createClient } from '../../src/core/client';
import { init, shutdown } from '../../src/core/config';
import { activeContext, clientFromContext, currentTraceId, withSpan } from '../../src/core/context';
import type { Client } from '../../src/core/types';
import { RecordingTransport } from '../helpers/mock-transport';

type Listener = () => void;

function createResponse(statusCode = 200) {
  const listeners = new Map<string, Listener[]>();
  const res: ExpressResponse = {
    statusCode,
    on(event, listener) {
      listeners.set(event, [...(listeners.get(event) ?? []), listener]);
      return this;
    },
  };
  const emit = (event: string): void => {
    for (const listener of listeners.get(event) ?? []) listener();
  };
  return { res, emit };
}

describe('Express middleware', () => {
  let transport: RecordingTransport;
  let client: Client;

  function setup(): void {
    transport = new RecordingTransport();
    client = createClient({ apiKey: 'test-key', transport });
  }

  afterEach(async () => {
    await client.close();
    await shutdown();
  });

  it('should trace the request and flush when the response finishes', async () => {
    setup();
    const middleware = createMiddleware({ client });
    const req: ExpressRequest = { method: 'POST', path: '/chat' };
    const { res, emit } = createResponse(201);
    const next = vi.fn();

    middleware(req, res, next);
    expect(next).toHaveBeenCalledOnce();
    expect(transport.getSendCount()).toBe(0);

    emit('finish');
    await vi.waitFor(() => expect(transport.getSendCount()).toBe(1));

    expect(transport.events).toMatchObject([
      { type: 'trace-create', body: { name: 'POST /chat', metadata: { method: 'POST', path: '/chat' } } },
      { type: 'trace-create', body: { name: 'POST /chat', metadata: { statusCode: 201 } } },
    ]);
  });

  it('should run downstream handlers inside the request trace', async () => {
    setup();
    const middleware = createMiddleware({ client, flushOnFinish: false });
    const { res, emit } = createResponse();
    let seenTraceId = '';
    let seenClient: Client | undefined;
    let work: Promise<void> = Promise.resolve();

    middleware({ method: 'GET', url: '/health' }, res, () => {
      seenTraceId = currentTraceId(activeContext());
      seenClient = clientFromContext(activeContext());
      work = withSpan('check', async () => undefined);
    });
    await work;
    emit('finish');
    await client.flush();

    const traceId = transport.events[0].body.id;
    expect(seenTraceId).toBe(traceId);
    expect(seenClient).toBe(client);
    expect(transport.events.map((event) => event.type)).toEqual([
      'trace-create',
      'span-create',
      'span-update',
      'trace-create',
    ]);
    expect(transport.events[0]).toMatchObject({ body: { name: 'GET /health' } });
  });

  it('should mark a disconnected client as aborted and end only once', async () => {
    setup();
    const middleware = createMiddleware({ client, name: 'stream' });
    const { res, emit } = createResponse();

    middleware({ method: 'GET', path: '/stream' }, res, () => undefined);
    emit('close');
    emit('finish');
    await client.flush();

    expect(transport.events).toHaveLength(2);
    expect(transport.events[1]).toMatchObject({
      body: { name: 'stream', metadata: { statusCode: 200, aborted: true } },
    });
  });

  it('should fall back to the global client', async () => {
    setup();
    const globalTransport = new RecordingTransport();
    init({ apiKey: 'test-key', transport: globalTransport });
    const { res } = createResponse();

    createMiddleware()({ method: 'DELETE', path: '/session' }, res, () => undefined);
    await shutdown();

    expect(globalTransport.events[0]).toMatchObject({ body: { name: 'DELETE /session' } });
    expect(transport.events).toHaveLength(0);
  });
});
