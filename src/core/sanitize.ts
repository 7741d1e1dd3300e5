/**
 * Payload Sanitization
 *
 * Deep-copies caller payloads before they are frozen into an envelope.
 * - Truncates large strings
 * - Redacts sensitive keys
 * - Applies PII redaction patterns
 */

import type { Metadata, RedactionConfig } from './types';

const MAX_STRING_LENGTH = 100_000; // 100KB per field
const MAX_DEPTH = 10;

// Keys that should be redacted (authentication-related)
// Note: We use specific patterns to avoid false positives with LLM token counts
const SENSITIVE_KEYS = ['api_key', 'apikey', 'password', 'secret', 'authorization'];
const SENSITIVE_TOKEN_PATTERNS = ['access_token', 'auth_token', 'bearer_token', 'refresh_token', 'id_token', 'session_token'];

// Keys that contain "token" but are safe (LLM token counts)
const SAFE_TOKEN_KEYS = ['inputtokens', 'outputtokens', 'totaltokens', 'prompttokens', 'completiontokens', 'cachereadtokens', 'cachewritetokens', 'reasoningtokens'];

// Built-in PII patterns
const BUILTIN_PATTERNS = {
  emails: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phones: /\b\d{9,}\b/g,
};

export interface Sanitizer {
  value(value: unknown): unknown;
  metadata(metadata: Metadata | undefined): Metadata | undefined;
}

/**
 * Build a sanitizer bound to one client's redaction rules
 */
export function createSanitizer(config: RedactionConfig = {}): Sanitizer {
  const customKeys = (config.keys ?? []).map((k) => k.toLowerCase());

  function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();

    if (SAFE_TOKEN_KEYS.includes(lowerKey)) {
      return false;
    }
    if (SENSITIVE_KEYS.some((k) => lowerKey.includes(k))) {
      return true;
    }
    if (SENSITIVE_TOKEN_PATTERNS.some((k) => lowerKey.includes(k))) {
      return true;
    }
    return customKeys.some((k) => lowerKey.includes(k));
  }

  function redactString(value: string): string {
    let result = value;

    // Custom patterns first
    for (const pattern of config.patterns ?? []) {
      pattern.lastIndex = 0;
      result = result.replace(pattern, '[REDACTED]');
    }
    if (config.emails) {
      result = result.replace(BUILTIN_PATTERNS.emails, '[EMAIL]');
    }
    if (config.phones) {
      result = result.replace(BUILTIN_PATTERNS.phones, '[PHONE]');
    }

    return result;
  }

  function sanitizeObject(value: object, depth: number): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, val] of Object.entries(value)) {
      if (isSensitiveKey(key)) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitize(val, depth + 1);
      }
    }

    return sanitized;
  }

  function sanitize(value: unknown, depth: number): unknown {
    if (depth > MAX_DEPTH) return '[max depth exceeded]';

    if (value === null || value === undefined) return value;

    if (typeof value === 'string') {
      let result = redactString(value);
      if (result.length > MAX_STRING_LENGTH) {
        result = result.slice(0, MAX_STRING_LENGTH) + '...[truncated]';
      }
      return result;
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (Array.isArray(value)) {
      return value.map((item) => sanitize(item, depth + 1));
    }

    if (typeof value === 'object') {
      return sanitizeObject(value, depth);
    }

    // Functions, symbols, bigints, etc.
    return String(value);
  }

  return {
    value: (value) => sanitize(value, 0),
    metadata: (metadata) => (metadata === undefined ? undefined : sanitizeObject(metadata, 0)),
  };
}
