/**
 * Shared types for framework integrations
 */

import type { Client } from '../core/types';

export interface IntegrationOptions {
  /** Client to trace with (default: the global client from init()) */
  client?: Client;
  /** Trace name override */
  name?: string;
}
