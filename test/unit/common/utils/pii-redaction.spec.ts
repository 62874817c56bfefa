import { redactSensitiveData } from '@/common/utils/pii-redaction';

describe('pii-redaction', () => {
  it('redacts credentials and access hashes', () => {
    const redacted = redactSensitiveData({
      access_hash: '12345',
      accessHash: 67890n,
      authorization: 'Bearer token-value',
      api_key: 'test-secret',
      client_secret: 'test-secret',
      metadata: {
        password: 'test-password',
      },
    });

    expect(redacted).toEqual({
      access_hash: '[REDACTED]',
      accessHash: '[REDACTED]',
      authorization: '[REDACTED]',
      api_key: '[REDACTED]',
      client_secret: '[REDACTED]',
      metadata: {
        password: '[REDACTED]',
      },
    });
  });

  it('keeps absent sensitive values as they are', () => {
    expect(redactSensitiveData({ access_hash: undefined, token: null })).toEqual({
      access_hash: undefined,
      token: null,
    });
  });

  it('masks bearer tokens inside free text', () => {
    expect(redactSensitiveData({ note: 'sent Bearer abc.def-123 upstream' })).toEqual({
      note: 'sent Bearer [REDACTED] upstream',
    });
  });

  it('stringifies bigint values and marks cycles', () => {
    const payload: Record<string, unknown> = { hash_count: 3n };
    payload.self = payload;

    expect(redactSensitiveData(payload)).toEqual({
      hash_count: '3',
      self: '[CIRCULAR]',
    });
  });

  it('keeps non-sensitive values intact', () => {
    const redacted = redactSensitiveData({
      event: 'venue_validated',
      request_id: 'req-1',
      is_valid_map_point: true,
      details: {
        provider: 'foursquare',
      },
    });

    expect(redacted).toEqual({
      event: 'venue_validated',
      request_id: 'req-1',
      is_valid_map_point: true,
      details: {
        provider: 'foursquare',
      },
    });
  });
});
