/**
 * Global Configuration
 *
 * Holds the process-wide client created by init().
 */

import type { Client, ClientConfig } from './types';
import { createClient } from './client';
import { NoopClient } from './noop';
import { info, debug, error as logError } from './logger';

// ─────────────────────────────────────────────────────────────
// Global State
// ─────────────────────────────────────────────────────────────

let globalClient: Client | null = null;
const disabledClient = new NoopClient();

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

/**
 * Initialize the SDK
 * Call once at app startup. A previous client is closed in the background.
 * @throws ConfigError
 */
export function init(config: ClientConfig = {}): Client {
  const client = createClient(config);
  const previous = globalClient;
  globalClient = client;

  if (previous) {
    previous.close().catch((err: unknown) => logError('Failed to close previous client', err));
  }

  if (client.enabled) {
    info('SDK initialized - tracing enabled');
  } else {
    debug('SDK initialized - tracing disabled');
  }
  return client;
}

/**
 * Get the client created by init(), or a no-op client before that
 */
export function getClient(): Client {
  return globalClient ?? disabledClient;
}

/**
 * Check if SDK is initialized
 */
export function isInitialized(): boolean {
  return globalClient !== null;
}

/**
 * Check if SDK is enabled
 */
export function isEnabled(): boolean {
  return getClient().enabled;
}

/**
 * Flush all pending events
 */
export async function flush(): Promise<void> {
  if (globalClient) {
    await globalClient.flush();
  }
}

/**
 * Close the global client, delivering everything still queued
 */
export async function shutdown(): Promise<void> {
  const client = globalClient;
  globalClient = null;
  if (client) {
    await client.close();
  }
}
