import type { Absent } from '../mapping/absent';
import type { ApiResponse } from '../response/apiResponse';
import type { DocumentNode } from './node';

export type ParamType = 'string' | 'integer' | 'float' | 'boolean' | 'date';

export type SourceKind = 'element' | 'attribute';

export type ScalarValue = string | number | boolean | Date;

export interface RequestParamOptions {
  type?: ParamType;
  /** Prepended to every key of a nested request stored under this parameter. */
  prefix?: string;
}

export interface RequestParamDeclaration {
  readonly name: string;
  readonly type: ParamType;
  readonly prefix?: string;
}

/**
 * Anything the query builder can flatten: a request, or a stand-in exposing
 * the same two reads.
 */
export interface QuerySource {
  declarations(): ReadonlyMap<string, RequestParamDeclaration>;
  get(name: string): RequestValue | Absent;
}

export type RequestValue = ScalarValue | QuerySource;

export type RequestValues = Record<string, RequestValue | undefined>;

export type ResponseClass<T extends ApiResponse = ApiResponse> = new (
  root: DocumentNode,
  document?: DocumentNode,
) => T;

export interface ResponseParamOptions {
  type?: ParamType;
  kind?: SourceKind;
  /** Slash-separated location; defaults to the parameter name. */
  path?: string;
  collectionOf?: ResponseClass;
  required?: boolean;
}

export interface ResponseParamDeclaration {
  readonly name: string;
  readonly type: ParamType;
  readonly kind: SourceKind;
  readonly path: string;
  readonly collectionOf?: ResponseClass;
  readonly required: boolean;
}

export type ResolvedValue = ScalarValue | Absent | readonly ApiResponse[];

export interface ResponseObject {
  [name: string]: ScalarValue | ResponseObject[];
}
