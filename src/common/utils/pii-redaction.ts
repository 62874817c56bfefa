import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_hash',
  'accesshash',
  'access_token',
  'accesstoken',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
  'password',
  'secret',
  'token',
]);

const REDACTED_LITERAL = '[REDACTED]';

/**
 * Deep-copies `value` with credentials and opaque correlation tokens replaced.
 * Cycles become `[CIRCULAR]`; bearer tokens inside free text are masked.
 */
export function redactSensitiveData(value: unknown): unknown {
  const visited = new WeakSet<object>();
  return redactRecursive(value, undefined, visited);
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return value === null || value === undefined ? value : REDACTED_LITERAL;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactBearerToken(value);
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  if (HARD_REDACT_KEYS.has(normalizedKey)) {
    return true;
  }

  return normalizedKey.includes('secret') || normalizedKey.includes('password');
}

function redactBearerToken(value: string): string {
  return value.replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi, 'Bearer [REDACTED]');
}
