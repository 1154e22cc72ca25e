/**
 * Base class for every error raised while declaring, rendering or parsing.
 */
export class MappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MappingError';
  }
}

/**
 * A declaration or a value the library cannot work with. Raised as soon as it
 * is detected, never deferred.
 */
export class ConfigurationError extends MappingError {
  constructor(
    message: string,
    public readonly parameter?: string,
  ) {
    super(parameter ? `[${parameter}] ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

export class CoercionError extends MappingError {
  constructor(
    public readonly parameter: string,
    public readonly type: string,
    public readonly raw: string,
  ) {
    super(`[${parameter}] Cannot read ${JSON.stringify(clip(raw))} as ${type}`);
    this.name = 'CoercionError';
  }
}

export class MissingParameterError extends MappingError {
  constructor(
    public readonly parameter: string,
    public readonly path: string,
  ) {
    super(`[${parameter}] Required value not found at "${path}"`);
    this.name = 'MissingParameterError';
  }
}

export class DocumentParseError extends MappingError {
  constructor(message: string) {
    super(`Failed to parse XML document: ${message}`);
    this.name = 'DocumentParseError';
  }
}

/**
 * Raised by transports. Kept apart from MappingError: the core never
 * produces one, it only lets them through.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly reason?: unknown,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class HttpStatusError extends TransportError {
  constructor(
    url: string,
    public readonly status: number,
    public readonly bodySnippet: string,
  ) {
    super(formatStatusMessage(url, status, bodySnippet), url);
    this.name = 'HttpStatusError';
  }
}

function formatStatusMessage(url: string, status: number, bodySnippet: string): string {
  const context = `HTTP ${status} from ${url}`;
  return bodySnippet ? `${context}: ${bodySnippet}` : context;
}

export function clip(str: string, max = 400): string {
  if (str.length <= max) return str;
  return str.slice(0, max) + `...[truncated ${str.length - max} chars]`;
}
