import { describe, it, expect, vi, afterEach } from 'vitest';
import { flush, getClient, init, isEnabled, isInitialized, shutdown } from '../../src/core/config';
import { NoopClient } from '../../src/core/noop';
import { IngestionClient } from '../../src/core/client';
import { ConfigError } from '../../src/core/errors';
import { RecordingTransport } from '../helpers/mock-transport';

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Global Configuration', () => {
  afterEach(async () => {
    await shutdown();
    vi.unstubAllEnvs();
  });

  it('should hand out a no-op client before init()', () => {
    expect(isInitialized()).toBe(false);
    expect(isEnabled()).toBe(false);
    expect(getClient()).toBeInstanceOf(NoopClient);
  });

  it('should install the client created by init()', () => {
    const transport = new RecordingTransport();

    const client = init({ publicKey: 'pk-test', secretKey: 'test-secret', transport });

    expect(client).toBeInstanceOf(IngestionClient);
    expect(getClient()).toBe(client);
    expect(isInitialized()).toBe(true);
    expect(isEnabled()).toBe(true);
  });

  it('should install a no-op client when disabled', () => {
    const client = init({ disabled: true });

    expect(client).toBeInstanceOf(NoopClient);
    expect(isInitialized()).toBe(true);
    expect(isEnabled()).toBe(false);
  });

  it('should throw ConfigError without credentials', () => {
    vi.stubEnv('TRACEBATCH_PUBLIC_KEY', '');
    vi.stubEnv('TRACEBATCH_SECRET_KEY', '');
    vi.stubEnv('TRACEBATCH_API_KEY', '');
    vi.stubEnv('TRACEBATCH_DISABLED', '');

    expect(() => init()).toThrow(ConfigError);
    expect(isInitialized()).toBe(false);
  });

  it('should flush the global client', async () => {
    const transport = new RecordingTransport();
    init({ apiKey: 'test-key', transport });
    getClient().startTrace('chat');

    await flush();

    expect(transport.getSendCount()).toBe(1);
    expect(transport.events[0]).toMatchObject({ type: 'trace-create', body: { name: 'chat' } });
  });

  it('should close the previous client when re-initialized', async () => {
    const first = new RecordingTransport();
    init({ apiKey: 'test-key', transport: first });
    getClient().startTrace('before-reinit');

    init({ apiKey: 'test-key', transport: new RecordingTransport() });
    await nextTurn();

    expect(first.events).toHaveLength(1);
    expect(first.events[0]).toMatchObject({ body: { name: 'before-reinit' } });
  });

  it('should deliver pending events and reset on shutdown()', async () => {
    const transport = new RecordingTransport();
    init({ apiKey: 'test-key', transport });
    getClient().startTrace('last-words');

    await shutdown();

    expect(transport.getSendCount()).toBe(1);
    expect(isInitialized()).toBe(false);
    expect(getClient()).toBeInstanceOf(NoopClient);
  });
});
