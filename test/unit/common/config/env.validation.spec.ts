import { validateEnv } from '@/common/config/env.validation';

describe('env.validation', () => {
  it('applies defaults for an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      LOG_LEVEL: 'log',
      ALLOWED_ORIGINS: [],
      BODY_LIMIT: '1mb',
      THROTTLE_TTL_MS: 60_000,
      THROTTLE_LIMIT: 120,
    });
  });

  it('allows empty ALLOWED_ORIGINS in development', () => {
    const result = validateEnv({
      NODE_ENV: 'development',
      ALLOWED_ORIGINS: '',
    });

    expect(result.ALLOWED_ORIGINS).toEqual([]);
  });

  it('requires ALLOWED_ORIGINS in production', () => {
    expect(() =>
      validateEnv({
        NODE_ENV: 'production',
        ALLOWED_ORIGINS: '',
      }),
    ).toThrow('ALLOWED_ORIGINS is required in production');
  });

  it('accepts ALLOWED_ORIGINS in production', () => {
    const result = validateEnv({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: 'https://maps.example.com, http://localhost:5173',
    });

    expect(result.ALLOWED_ORIGINS).toEqual([
      'https://maps.example.com',
      'http://localhost:5173',
    ]);
  });

  it('parses numeric settings and enforces throttle floors', () => {
    const result = validateEnv({
      PORT: '8080',
      THROTTLE_TTL_MS: '10',
      THROTTLE_LIMIT: '0',
    });

    expect(result.PORT).toBe(8080);
    expect(result.THROTTLE_TTL_MS).toBe(1000);
    expect(result.THROTTLE_LIMIT).toBe(1);
  });

  it('rejects non-numeric values', () => {
    expect(() => validateEnv({ THROTTLE_LIMIT: 'lots' })).toThrow('Invalid number value: lots');
  });

  it('normalizes BODY_LIMIT and rejects unknown units', () => {
    expect(validateEnv({ BODY_LIMIT: '512KB' }).BODY_LIMIT).toBe('512kb');
    expect(() => validateEnv({ BODY_LIMIT: '1gb' })).toThrow('Invalid BODY_LIMIT value: 1gb');
  });

  it('falls back to log for unknown log levels', () => {
    expect(validateEnv({ LOG_LEVEL: 'warn' }).LOG_LEVEL).toBe('warn');
    expect(validateEnv({ LOG_LEVEL: 'verbose' }).LOG_LEVEL).toBe('log');
  });
});
