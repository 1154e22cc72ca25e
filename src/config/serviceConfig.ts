import { ConfigurationError } from '../errors';

export type HttpMethod = 'GET' | 'POST';

export interface ServiceConfig {
  timeoutMs: number;
  method: HttpMethod;
  logRequests: boolean;
  userAgent: string;
}

export const DEFAULT_SERVICE_CONFIG: Readonly<ServiceConfig> = {
  timeoutMs: 30000,
  method: 'GET',
  logRequests: false,
  userAgent: 'xml-rest-mapper',
};

/**
 * Reads service settings from the environment:
 *
 * - API_TIMEOUT_MS (default 30000)
 * - API_HTTP_METHOD, GET or POST (default GET)
 * - API_LOG_REQUESTS, "true" to log each call (default false)
 * - API_USER_AGENT
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const timeoutMs = parseInt(env.API_TIMEOUT_MS || String(DEFAULT_SERVICE_CONFIG.timeoutMs), 10);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`API_TIMEOUT_MS must be a positive integer, got "${env.API_TIMEOUT_MS}"`);
  }

  const method = (env.API_HTTP_METHOD || DEFAULT_SERVICE_CONFIG.method).toUpperCase();
  if (method !== 'GET' && method !== 'POST') {
    throw new ConfigurationError(`API_HTTP_METHOD must be GET or POST, got "${env.API_HTTP_METHOD}"`);
  }

  return {
    timeoutMs,
    method,
    logRequests: env.API_LOG_REQUESTS === 'true',
    userAgent: env.API_USER_AGENT || DEFAULT_SERVICE_CONFIG.userAgent,
  };
}
