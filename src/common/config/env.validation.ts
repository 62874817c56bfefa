export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  ALLOWED_ORIGINS: string[];
  BODY_LIMIT: string;
  THROTTLE_TTL_MS: number;
  THROTTLE_LIMIT: number;
}

const BODY_LIMIT_PATTERN = /^\d+(?:b|kb|mb)$/i;

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseOrigins(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

/** Shared with the logger so both read the same default. */
export function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'info' ||
    value === 'log' ||
    value === 'warn' ||
    value === 'error'
  ) {
    return value;
  }

  return 'log';
}

function parseBodyLimit(value: unknown): string {
  const raw = String(value ?? '').trim();
  if (raw.length === 0) {
    return '1mb';
  }

  if (!BODY_LIMIT_PATTERN.test(raw)) {
    throw new Error(`Invalid BODY_LIMIT value: ${raw}`);
  }

  return raw.toLowerCase();
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const ALLOWED_ORIGINS = parseOrigins(config.ALLOWED_ORIGINS);

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, 3000),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ALLOWED_ORIGINS,
    BODY_LIMIT: parseBodyLimit(config.BODY_LIMIT),
    THROTTLE_TTL_MS: Math.max(1000, parseNumber(config.THROTTLE_TTL_MS, 60_000)),
    THROTTLE_LIMIT: Math.max(1, parseNumber(config.THROTTLE_LIMIT, 120)),
  };
}
