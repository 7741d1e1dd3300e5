/**
 * Event Encoder
 *
 * Turns an entity mutation into a typed, timestamped wire envelope.
 * Envelopes are frozen: a later mutation of the entity produces a new
 * envelope and never touches one already queued.
 */

import { randomUUID } from 'crypto';
import type { ClientScoreOptions, EventBodies, EventType, IngestionEventOf, ScoreBody } from './types';

/**
 * Generate a unique trace/span/envelope ID (UUID v4)
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Encode a body into an envelope with its own ID and encoding timestamp
 */
export function encodeEvent<T extends EventType>(type: T, body: EventBodies[T]): IngestionEventOf<T> {
  return Object.freeze({
    id: generateId(),
    type,
    timestamp: new Date().toISOString(),
    body: deepFreeze(body),
  });
}

/**
 * Encode a detached score annotation. Numbers are NUMERIC, strings
 * CATEGORICAL, booleans BOOLEAN (sent as 1 / 0) unless dataType says otherwise.
 */
export function encodeScore(options: ClientScoreOptions): IngestionEventOf<'score-create'> {
  const body: ScoreBody = {
    id: generateId(),
    traceId: options.traceId,
    observationId: options.observationId || undefined,
    name: options.name,
    dataType: 'NUMERIC',
    comment: options.comment,
    source: options.source,
  };

  if (typeof options.value === 'string') {
    body.stringValue = options.value;
    body.dataType = 'CATEGORICAL';
  } else if (typeof options.value === 'boolean') {
    body.value = options.value ? 1 : 0;
    body.dataType = 'BOOLEAN';
  } else {
    body.value = options.value;
  }

  if (options.dataType) {
    body.dataType = options.dataType;
  }

  return encodeEvent('score-create', body);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
