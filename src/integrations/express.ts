/**
 * Express Integration
 *
 * Middleware that opens one trace per request, runs downstream handlers
 * inside it, and flushes when the response finishes.
 *
 * @example
 * import express from 'express';
 * import { withSpan } from '@tracebatch/sdk';
 * import { createMiddleware } from '@tracebatch/sdk/express';
 *
 * const app = express();
 * app.use(createMiddleware());
 * app.post('/chat', async (req, res) => {
 *   const answer = await withSpan('answer', async () => reply(req.body));
 *   res.json(answer);
 * });
 */

import type { IntegrationOptions } from './types';
import { getClient } from '../core/config';
import { activeContext, contextWithClient, contextWithTrace, runWithContext } from '../core/context';
import { error as logError } from '../core/logger';

// ─────────────────────────────────────────────────────────────
// Types (minimal to avoid requiring express as dependency)
// ─────────────────────────────────────────────────────────────

export interface ExpressRequest {
  method?: string;
  path?: string;
  url?: string;
  [key: string]: unknown;
}

export interface ExpressResponse {
  statusCode?: number;
  on(event: 'finish' | 'close' | 'error', listener: () => void): this;
  [key: string]: unknown;
}

export type NextFunction = (error?: unknown) => void;

export type ExpressMiddleware = (req: ExpressRequest, res: ExpressResponse, next: NextFunction) => void;

export interface MiddlewareOptions extends IntegrationOptions {
  /** Flush the client once the response is sent (default: true) */
  flushOnFinish?: boolean;
}

// ─────────────────────────────────────────────────────────────
// Middleware
// ─────────────────────────────────────────────────────────────

/**
 * Create Express middleware that traces each request.
 *
 * The trace is named "{METHOD} {path}" unless `name` is given and ends with
 * the response status code. The flush is fire-and-forget and doesn't block
 * the response.
 *
 * @example
 * // Per-route middleware with a dedicated client
 * app.post('/chat', createMiddleware({ client, name: 'chat' }), handler);
 */
export function createMiddleware(options: MiddlewareOptions = {}): ExpressMiddleware {
  const flushOnFinish = options.flushOnFinish ?? true;

  return (req, res, next) => {
    const client = options.client ?? getClient();
    const method = req.method ?? 'GET';
    const path = req.path ?? req.url ?? '/';
    const trace = client.startTrace(options.name ?? `${method} ${path}`, {
      metadata: { method, path },
    });

    res.on('finish', () => {
      trace.end({ metadata: { statusCode: res.statusCode } });
      if (flushOnFinish) {
        client.flush().catch((err: unknown) => logError('Flush after response failed', err));
      }
    });
    // Client disconnected before the response finished
    res.on('close', () => {
      trace.end({ metadata: { statusCode: res.statusCode, aborted: true } });
    });

    runWithContext(contextWithTrace(contextWithClient(activeContext(), client), trace), () => next());
  };
}
