import { ConfigurationError } from '../errors';
import { ABSENT, Absent } from '../mapping/absent';
import { assertParamType } from '../mapping/coercion';
import { ClassRegistry } from '../mapping/registry';
import { DefaultValueProvider, TemplateDefaults } from '../mapping/template';
import type {
  QuerySource,
  RequestParamDeclaration,
  RequestParamOptions,
  RequestValue,
  RequestValues,
} from '../types/param';
import { QueryPair, appendQuery, buildQueryPairs, encodePairs } from './queryBuilder';

/**
 * Base class for request descriptions.
 *
 * ```ts
 * class PhotoSearch extends ApiRequest {}
 * PhotoSearch.param('method').param('tags').param('per_page', { type: 'integer' });
 * PhotoSearch.setTemplate('method', 'flickr.photos.search');
 *
 * new PhotoSearch({ tags: 'relax', per_page: 10 }).render();
 * ```
 */
export class ApiRequest implements QuerySource {
  private readonly values = new Map<string, RequestValue>();

  /**
   * @param overrides values for this instance; `undefined` entries are ignored
   * @param defaults where template values come from, `requestTemplates` unless given
   */
  constructor(overrides: RequestValues = {}, defaults: DefaultValueProvider = requestTemplates) {
    for (const [name, value] of defaults.defaultsFor(new.target)) {
      this.values.set(name, value);
    }
    for (const [name, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        this.values.set(name, value);
      }
    }
  }

  static param<C extends typeof ApiRequest>(this: C, name: string, options: RequestParamOptions = {}): C {
    requestRegistry.declare(this, declareRequestParam(name, options));
    return this;
  }

  /**
   * Sets a default every request of this class (and its subclasses) built
   * from now on starts with. Process-wide: configure before requests are
   * built concurrently.
   */
  static setTemplate<C extends typeof ApiRequest>(this: C, name: string, value: RequestValue): C {
    requestTemplates.set(this, name, value);
    return this;
  }

  static clearTemplate<C extends typeof ApiRequest>(this: C, name?: string): C {
    requestTemplates.clear(this, name);
    return this;
  }

  static declarations(): ReadonlyMap<string, RequestParamDeclaration> {
    return requestRegistry.effective(this);
  }

  declarations(): ReadonlyMap<string, RequestParamDeclaration> {
    return requestRegistry.effective(this.constructor);
  }

  get(name: string): RequestValue | Absent {
    return this.values.get(name) ?? ABSENT;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: RequestValue): this {
    this.values.set(name, value);
    return this;
  }

  unset(name: string): this {
    this.values.delete(name);
    return this;
  }

  pairs(): QueryPair[] {
    return buildQueryPairs(this);
  }

  render(): string {
    return encodePairs(this.pairs());
  }

  toUrl(endpoint: string): string {
    return appendQuery(endpoint, this.render());
  }
}

function declareRequestParam(name: string, options: RequestParamOptions): RequestParamDeclaration {
  if (!name) {
    throw new ConfigurationError('Parameter name must not be empty');
  }
  const type = assertParamType(options.type, name);
  if (options.prefix !== undefined && typeof options.prefix !== 'string') {
    throw new ConfigurationError('Prefix must be a string', name);
  }
  return options.prefix === undefined ? { name, type } : { name, type, prefix: options.prefix };
}

const requestRegistry = new ClassRegistry<RequestParamDeclaration>(ApiRequest);

/** The process-wide template store behind `setTemplate`. */
export const requestTemplates = new TemplateDefaults(ApiRequest);
