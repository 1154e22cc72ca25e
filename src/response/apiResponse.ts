import { ConfigurationError } from '../errors';
import { ABSENT, Absent, isAbsent } from '../mapping/absent';
import { assertParamType } from '../mapping/coercion';
import { ClassRegistry } from '../mapping/registry';
import { parseXmlDocument } from '../parsers/xmlParser';
import type { DocumentNode, DocumentParser } from '../types/node';
import type {
  ParamType,
  ResolvedValue,
  ResponseClass,
  ResponseObject,
  ResponseParamDeclaration,
  ResponseParamOptions,
  ScalarValue,
  SourceKind,
} from '../types/param';
import { resolveParameter } from './resolver';

type ScalarOptions = Omit<ResponseParamOptions, 'kind' | 'collectionOf'>;

/**
 * Base class for response descriptions. An instance wraps one element of a
 * parsed document and reads declared parameters from it on demand.
 *
 * ```ts
 * class Photo extends ApiResponse {}
 * Photo.attribute('id', { type: 'integer' }).attribute('title');
 *
 * class PhotoList extends ApiResponse {}
 * PhotoList.attribute('stat', { required: true }).collection('photos', Photo, { path: 'photo' });
 * ```
 */
export class ApiResponse {
  private readonly cache = new Map<string, ResolvedValue>();

  /**
   * @param root element this response reads from
   * @param document root of the whole document, for paths starting with `/`
   */
  constructor(
    public readonly root: DocumentNode,
    public readonly document: DocumentNode = root,
  ) {}

  static declare<C extends typeof ApiResponse>(this: C, name: string, options: ResponseParamOptions = {}): C {
    responseRegistry.declare(this, declareResponseParam(name, options));
    return this;
  }

  static attribute<C extends typeof ApiResponse>(this: C, name: string, options: ScalarOptions = {}): C {
    return this.declare(name, { ...options, kind: 'attribute' });
  }

  static element<C extends typeof ApiResponse>(this: C, name: string, options: ScalarOptions = {}): C {
    return this.declare(name, { ...options, kind: 'element' });
  }

  static collection<C extends typeof ApiResponse>(
    this: C,
    name: string,
    of: ResponseClass,
    options: Pick<ResponseParamOptions, 'path'> = {},
  ): C {
    return this.declare(name, { ...options, kind: 'element', collectionOf: of });
  }

  static declarations(): ReadonlyMap<string, ResponseParamDeclaration> {
    return responseRegistry.effective(this);
  }

  static parse<T extends ApiResponse>(this: ResponseClass<T>, root: DocumentNode): T {
    return parseResponse(this, root);
  }

  static fromXml<T extends ApiResponse>(
    this: ResponseClass<T>,
    raw: string,
    parseDocument: DocumentParser = parseXmlDocument,
  ): T {
    return parseResponse(this, parseDocument(raw));
  }

  declarations(): ReadonlyMap<string, ResponseParamDeclaration> {
    return responseRegistry.effective(this.constructor);
  }

  /** Resolved value of a parameter; ABSENT for names that are not declared. */
  get(name: string): ResolvedValue {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const declaration = this.declarations().get(name);
    if (!declaration) return ABSENT;

    const value = resolveParameter(declaration, this.root, this.document);
    this.cache.set(name, value);
    return value;
  }

  string(name: string): string | Absent {
    return this.scalar(name, 'string', (value): value is string => typeof value === 'string');
  }

  integer(name: string): number | Absent {
    return this.scalar(name, 'integer', (value): value is number => typeof value === 'number');
  }

  float(name: string): number | Absent {
    return this.scalar(name, 'float', (value): value is number => typeof value === 'number');
  }

  boolean(name: string): boolean | Absent {
    return this.scalar(name, 'boolean', (value): value is boolean => typeof value === 'boolean');
  }

  date(name: string): Date | Absent {
    return this.scalar(name, 'date', (value): value is Date => value instanceof Date);
  }

  collection<T extends ApiResponse>(name: string, of: ResponseClass<T>): readonly T[] {
    const declaration = this.declarations().get(name);
    if (!declaration || declaration.collectionOf !== of) {
      throw new ConfigurationError(`Not declared as a collection of ${of.name} on ${this.constructor.name}`, name);
    }
    const value = this.get(name);
    return isCollection(value) ? value.filter((member): member is T => member instanceof of) : [];
  }

  /**
   * Whether the API reported success. Subclasses override this with the
   * API's own status convention.
   */
  successful(): boolean {
    return true;
  }

  /** Plain-object view of every parameter that has a value. */
  toObject(): ResponseObject {
    const result: ResponseObject = {};
    for (const name of this.declarations().keys()) {
      const value = this.get(name);
      if (isAbsent(value)) continue;
      result[name] = isCollection(value) ? value.map((member) => member.toObject()) : value;
    }
    return result;
  }

  private scalar<T extends ScalarValue>(
    name: string,
    type: ParamType,
    matches: (value: ResolvedValue) => value is T,
  ): T | Absent {
    const declaration = this.declarations().get(name);
    if (!declaration) {
      throw new ConfigurationError(`Not declared on ${this.constructor.name}`, name);
    }
    if (declaration.collectionOf || declaration.type !== type) {
      const declared = declaration.collectionOf ? `collection of ${declaration.collectionOf.name}` : declaration.type;
      throw new ConfigurationError(`Declared as ${declared}, read as ${type}`, name);
    }
    const value = this.get(name);
    if (isAbsent(value)) return ABSENT;
    if (!matches(value)) {
      throw new ConfigurationError(`Resolved to a value that is not ${type}`, name);
    }
    return value;
  }
}

export function parseResponse<T extends ApiResponse>(responseClass: ResponseClass<T>, root: DocumentNode): T {
  return new responseClass(root);
}

export function isResponseClass(value: unknown): value is ResponseClass {
  return typeof value === 'function' && (value === ApiResponse || value.prototype instanceof ApiResponse);
}

function isCollection(value: ResolvedValue): value is readonly ApiResponse[] {
  return Array.isArray(value);
}

const SOURCE_KINDS: readonly SourceKind[] = ['element', 'attribute'];

function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === 'string' && SOURCE_KINDS.some((kind) => kind === value);
}

function declareResponseParam(name: string, options: ResponseParamOptions): ResponseParamDeclaration {
  if (!name) {
    throw new ConfigurationError('Parameter name must not be empty');
  }
  const type = assertParamType(options.type, name);
  const kind = options.kind ?? 'element';
  if (!isSourceKind(kind)) {
    throw new ConfigurationError(`Unknown source kind ${JSON.stringify(kind)}`, name);
  }
  const path = options.path ?? name;
  if (typeof path !== 'string' || path.length === 0) {
    throw new ConfigurationError('Path must be a non-empty string', name);
  }

  const declaration = { name, type, kind, path, required: options.required === true };
  if (options.collectionOf === undefined) return declaration;

  if (!isResponseClass(options.collectionOf)) {
    throw new ConfigurationError('Collection target must be ApiResponse or a subclass of it', name);
  }
  if (kind === 'attribute') {
    throw new ConfigurationError('A collection reads elements, not attributes', name);
  }
  return { ...declaration, collectionOf: options.collectionOf };
}

const responseRegistry = new ClassRegistry<ResponseParamDeclaration>(ApiResponse);
