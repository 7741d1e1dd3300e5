import { describe, it, expect } from 'vitest';
import { createSanitizer } from '../../src/core/sanitize';

describe('Sanitizer', () => {
  describe('sensitive keys', () => {
    it('should redact authentication keys at any depth', () => {
      const sanitizer = createSanitizer();

      expect(
        sanitizer.value({
          headers: { Authorization: 'Bearer test-key', accept: 'json' },
          user: { password: 'test-secret', name: 'jo' },
          apiKey: 'test-key',
          refresh_token: 'test-token',
        })
      ).toEqual({
        headers: { Authorization: '[REDACTED]', accept: 'json' },
        user: { password: '[REDACTED]', name: 'jo' },
        apiKey: '[REDACTED]',
        refresh_token: '[REDACTED]',
      });
    });

    it('should keep LLM token counts', () => {
      const sanitizer = createSanitizer();

      expect(sanitizer.value({ promptTokens: 10, completionTokens: 5, totalTokens: 15 })).toEqual({
        promptTokens: 10,
        completionTokens: 5,
        totalTokens: 15,
      });
    });

    it('should redact custom keys', () => {
      const sanitizer = createSanitizer({ keys: ['SSN'] });

      expect(sanitizer.metadata({ customer_ssn: '000-00-0000', plan: 'pro' })).toEqual({
        customer_ssn: '[REDACTED]',
        plan: 'pro',
      });
    });
  });

  describe('PII patterns', () => {
    it('should replace emails and long digit runs when enabled', () => {
      const sanitizer = createSanitizer({ emails: true, phones: true });

      expect(sanitizer.value('call 5551234567 or mail jo@example.com')).toBe('call [PHONE] or mail [EMAIL]');
    });

    it('should leave PII alone by default', () => {
      const sanitizer = createSanitizer();

      expect(sanitizer.value('mail jo@example.com')).toBe('mail jo@example.com');
    });

    it('should apply custom patterns', () => {
      const sanitizer = createSanitizer({ patterns: [/order-\d+/g] });

      expect(sanitizer.value(['see order-42', 'and order-7'])).toEqual(['see [REDACTED]', 'and [REDACTED]']);
    });
  });

  describe('limits', () => {
    it('should truncate long strings', () => {
      const sanitizer = createSanitizer();
      const result = sanitizer.value('x'.repeat(100_005));

      expect(result).toBe(`${'x'.repeat(100_000)}...[truncated]`);
    });

    it('should cap nesting depth', () => {
      const sanitizer = createSanitizer();
      let nested: Record<string, unknown> = { leaf: 'value' };
      for (let i = 0; i < 12; i++) {
        nested = { child: nested };
      }

      let cursor: unknown = sanitizer.value(nested);
      let depth = 0;
      while (typeof cursor === 'object' && cursor !== null && 'child' in cursor) {
        cursor = cursor.child;
        depth++;
      }

      expect(depth).toBe(11);
      expect(cursor).toBe('[max depth exceeded]');
    });
  });

  describe('value types', () => {
    it('should convert dates to ISO strings and stringify functions', () => {
      const sanitizer = createSanitizer();

      expect(sanitizer.value({ at: new Date('2024-01-02T03:04:05.000Z'), n: 1, ok: true, none: null })).toEqual({
        at: '2024-01-02T03:04:05.000Z',
        n: 1,
        ok: true,
        none: null,
      });
      expect(sanitizer.value(BigInt(7))).toBe('7');
    });

    it('should return a copy', () => {
      const sanitizer = createSanitizer();
      const input = { list: [1, 2] };

      const result = sanitizer.value(input);

      expect(result).toEqual(input);
      expect(result).not.toBe(input);
    });

    it('should pass undefined metadata through', () => {
      expect(createSanitizer().metadata(undefined)).toBeUndefined();
    });
  });
});
