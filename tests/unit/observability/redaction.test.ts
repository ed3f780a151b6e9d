import { describe, expect, it } from 'vitest';
import { redactAddress, redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('masks an address down to its domain', () => {
    expect(redactAddress('john@example.com')).toBe('***@example.com');
    expect(redactAddress('not-an-address')).toBe('***');
  });

  it('redacts secrets, content and address fields', () => {
    const input = {
      from: 'john@example.com',
      apiKey: 'test-secret',
      emailContent: 'Quarterly numbers attached',
      nested: {
        to: 'alice@example.org',
        client_secret: 'test-secret',
      },
    };

    expect(redactSecrets(input)).toEqual({
      from: '***@example.com',
      apiKey: '[REDACTED]',
      emailContent: `[REDACTED_TEXT len=${input.emailContent.length}]`,
      nested: {
        to: '***@example.org',
        client_secret: '[REDACTED]',
      },
    });
  });

  it('masks addresses inside free text', () => {
    const redacted = redactSecrets({
      reason: 'From address mismatch: User specified john@example.com but action uses attacker@evil.com',
    });

    expect(redacted.reason).toBe('From address mismatch: User specified ***@example.com but action uses ***@evil.com');
  });

  it('summarizes content arrays by length', () => {
    expect(redactSecrets({ prompts: ['a', 'b', 'c'] })).toEqual({ prompts: '[REDACTED_ARRAY len=3]' });
  });

  it('truncates long snippets safely', () => {
    expect(safeSnippet('x'.repeat(200), 20)).toBe(`${'x'.repeat(20)}...(truncated)`);
  });
});
