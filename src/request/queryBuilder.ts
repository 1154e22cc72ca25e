import { ConfigurationError } from '../errors';
import { isAbsent } from '../mapping/absent';
import { formatValue } from '../mapping/coercion';
import type { QuerySource } from '../types/param';

export type QueryPair = readonly [key: string, value: string];

export function isQuerySource(value: unknown): value is QuerySource {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Date) &&
    'declarations' in value &&
    typeof value.declarations === 'function' &&
    'get' in value &&
    typeof value.get === 'function'
  );
}

/**
 * Key/value pairs of a request, in declaration order.
 *
 * A nested request is flattened in place of the parameter holding it: its
 * pairs are emitted under their own names, each prefixed by the holding
 * parameter's `prefix` when one is declared. The holding parameter's name is
 * never emitted. Every key may appear only once per rendering.
 */
export function buildQueryPairs(source: QuerySource): QueryPair[] {
  const pairs: QueryPair[] = [];
  collect(source, '', pairs, new Map(), [source]);
  return pairs;
}

function collect(
  source: QuerySource,
  keyPrefix: string,
  pairs: QueryPair[],
  producers: Map<string, string>,
  ancestry: QuerySource[],
): void {
  for (const declaration of source.declarations().values()) {
    const value = source.get(declaration.name);
    if (isAbsent(value)) continue;

    if (isQuerySource(value)) {
      if (ancestry.includes(value)) {
        throw new ConfigurationError('Request is nested inside itself', declaration.name);
      }
      collect(value, keyPrefix + (declaration.prefix ?? ''), pairs, producers, [...ancestry, value]);
      continue;
    }

    const key = keyPrefix + declaration.name;
    const previous = producers.get(key);
    if (previous !== undefined) {
      throw new ConfigurationError(`Query key "${key}" is already produced by "${previous}"`, declaration.name);
    }
    producers.set(key, declaration.name);
    pairs.push([key, formatValue(declaration.name, declaration.type, value)]);
  }
}

export function encodePairs(pairs: readonly QueryPair[]): string {
  return pairs.map(([key, value]) => `${encodeComponent(key, key)}=${encodeComponent(key, value)}`).join('&');
}

function encodeComponent(key: string, text: string): string {
  try {
    return encodeURIComponent(text);
  } catch (err) {
    if (err instanceof URIError) {
      throw new ConfigurationError(`Cannot URL-encode ${JSON.stringify(text)}: ${err.message}`, key);
    }
    throw err;
  }
}

export function renderQuery(source: QuerySource): string {
  return encodePairs(buildQueryPairs(source));
}

export function appendQuery(endpoint: string, query: string): string {
  if (!query) return endpoint;
  if (!endpoint.includes('?')) return `${endpoint}?${query}`;
  return endpoint.endsWith('?') || endpoint.endsWith('&') ? endpoint + query : `${endpoint}&${query}`;
}
