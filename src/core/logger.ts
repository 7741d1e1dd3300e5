/**
 * Logger
 *
 * Prefixed console output. debug/info lines only appear once a client is
 * created with `debug: true` (or TRACEBATCH_DEBUG=true); warnings and
 * errors always do.
 */

type Level = 'debug' | 'info' | 'warn' | 'error';

const PREFIX = '[TraceBatch]';

let debugEnabled = false;

/**
 * Set by createClient() from the resolved config
 */
export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debug(message: string, data?: unknown): void {
  write('debug', message, data);
}

export function info(message: string, data?: unknown): void {
  write('info', message, data);
}

export function warn(message: string, data?: unknown): void {
  write('warn', message, data);
}

export function error(message: string, data?: unknown): void {
  write('error', message, data);
}

// ─────────────────────────────────────────────────────────────
// Queue / transport events
// ─────────────────────────────────────────────────────────────

export function queueEvent(type: string, pending: number): void {
  write('debug', `Queued event: type=${type} pending=${pending}`);
}

export function batchSend(count: number, endpoint: string): void {
  write('debug', `Sending batch: count=${count} endpoint=${endpoint}`);
}

export function batchSuccess(count: number, durationMs: number): void {
  write('debug', `Batch sent successfully: count=${count} duration=${durationMs}ms`);
}

/**
 * Dropped batch. Always shown.
 */
export function batchError(count: number, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  write('error', `Batch send failed: count=${count} error=${message}`);
}

export function requestDetails(method: string, url: string, bodySize: number): void {
  write('debug', `Request: ${method} ${url} (${bodySize} bytes)`);
}

export function responseDetails(status: number, durationMs: number): void {
  write('debug', `Response: status=${status} duration=${durationMs}ms`);
}

function write(level: Level, message: string, data?: unknown): void {
  if ((level === 'debug' || level === 'info') && !debugEnabled) return;

  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (data === undefined) {
    sink(`${PREFIX} ${message}`);
  } else {
    sink(`${PREFIX} ${message}`, data);
  }
}
