import {
  buildCorsOptions,
  normalizeOrigin,
  originAllowlist,
} from '@/common/http/configure-app';

describe('configure-app CORS', () => {
  it('normalizes origins removing trailing slash and lowercasing host', () => {
    expect(normalizeOrigin('http://127.0.0.1:5173/')).toBe('http://127.0.0.1:5173');
    expect(normalizeOrigin('https://Maps.Example.com')).toBe('https://maps.example.com');
    expect(normalizeOrigin(' not a url/ ')).toBe('not a url');
  });

  it('reflects any origin outside production', () => {
    expect(buildCorsOptions({ NODE_ENV: 'development', ALLOWED_ORIGINS: [] }).origin).toBe(true);
    expect(buildCorsOptions({ NODE_ENV: 'test', ALLOWED_ORIGINS: [] }).origin).toBe(true);
  });

  it('uses an allowlist handler in production', () => {
    const options = buildCorsOptions({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://maps.example.com'],
    });

    expect(typeof options.origin).toBe('function');
    expect(options.exposedHeaders).toEqual(['x-request-id']);
  });

  it('rejects origins outside the allowlist', () => {
    const handler = originAllowlist(['https://maps.example.com']);

    const callback = jest.fn<void, [Error | null, boolean?]>();
    handler('https://evil.example', callback);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(callback.mock.calls[0]?.[1]).toBeUndefined();
  });

  it('allows allowlisted and origin-less requests', () => {
    const handler = originAllowlist(['https://maps.example.com/']);

    const allowlisted = jest.fn<void, [Error | null, boolean?]>();
    handler('https://MAPS.example.com', allowlisted);
    const withoutOrigin = jest.fn<void, [Error | null, boolean?]>();
    handler(undefined, withoutOrigin);

    expect(allowlisted).toHaveBeenCalledWith(null, true);
    expect(withoutOrigin).toHaveBeenCalledWith(null, true);
  });
});
