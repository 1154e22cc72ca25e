import { DEFAULT_SERVICE_CONFIG, loadServiceConfig } from '../../src/config/serviceConfig';
import { ConfigurationError } from '../../src/errors';

describe('loadServiceConfig', () => {
  test('should fall back to defaults', () => {
    expect(loadServiceConfig({})).toEqual(DEFAULT_SERVICE_CONFIG);
    expect(DEFAULT_SERVICE_CONFIG).toEqual({
      timeoutMs: 30000,
      method: 'GET',
      logRequests: false,
      userAgent: 'xml-rest-mapper',
    });
  });

  test('should read every setting from the environment', () => {
    const config = loadServiceConfig({
      API_TIMEOUT_MS: '5000',
      API_HTTP_METHOD: 'post',
      API_LOG_REQUESTS: 'true',
      API_USER_AGENT: 'demo-client/1.0',
    });

    expect(config).toEqual({
      timeoutMs: 5000,
      method: 'POST',
      logRequests: true,
      userAgent: 'demo-client/1.0',
    });
  });

  test('should only enable logging for "true"', () => {
    expect(loadServiceConfig({ API_LOG_REQUESTS: 'yes' }).logRequests).toBe(false);
  });

  test('should reject invalid values', () => {
    expect(() => loadServiceConfig({ API_TIMEOUT_MS: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadServiceConfig({ API_TIMEOUT_MS: '0' })).toThrow(
      'API_TIMEOUT_MS must be a positive integer, got "0"',
    );
    expect(() => loadServiceConfig({ API_HTTP_METHOD: 'PUT' })).toThrow('API_HTTP_METHOD must be GET or POST, got "PUT"');
  });
});
