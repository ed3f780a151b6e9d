const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential)/i;
const ADDRESS_KEY_PATTERN = /^(from|to|cc|bcc|sender|recipient|address)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|prompt|template|userPrompt|emailContent|proposedResponse|prompts)$/i;

const EMAIL_PATTERN = /[^\s@,<>"'()]+@([^\s@,<>"'()]+)/g;

const MAX_DEPTH = 6;

/**
 * Mask an email address down to its domain: `john@example.com` -> `***@example.com`.
 */
export function redactAddress(address: string): string {
  const at = address.lastIndexOf('@');
  if (at === -1) return '***';
  return `***@${address.slice(at + 1).trim()}`;
}

function redactStringByKey(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  if (key && ADDRESS_KEY_PATTERN.test(key)) {
    return redactAddress(value);
  }
  return value.replace(EMAIL_PATTERN, (_match, domain: string) => `***@${domain}`);
}

function redactUnknown(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';

  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringByKey(undefined, value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string') {
    return redactStringByKey(key, value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, depth + 1));
  }

  if (typeof value === 'object') {
    return redactRecord(Object.entries(value), depth + 1);
  }

  return String(value);
}

function redactRecord(entries: Array<[string, unknown]>, depth: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [childKey, childValue] of entries) {
    if (SECRET_KEY_PATTERN.test(childKey)) {
      result[childKey] = '[REDACTED]';
      continue;
    }
    result[childKey] = redactUnknown(childValue, childKey, depth);
  }
  return result;
}

/**
 * Redact a log payload: secrets dropped, free text reduced to its length,
 * email addresses reduced to their domain.
 */
export function redactSecrets(data: Record<string, unknown>): Record<string, unknown> {
  return redactRecord(Object.entries(data), 0);
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
