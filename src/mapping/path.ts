import type { DocumentNode } from '../types/node';

export interface DocumentPath {
  /** True for paths starting with `/`, resolved from the document root. */
  readonly fromDocument: boolean;
  readonly segments: readonly string[];
}

export function parsePath(path: string): DocumentPath {
  return {
    fromDocument: path.startsWith('/'),
    segments: path.split('/').filter((segment) => segment.length > 0 && segment !== '.'),
  };
}

/**
 * Elements a path points at. For a document path the first segment names
 * the document root itself, as in `/rsp/photos`.
 */
export function locate(path: DocumentPath, root: DocumentNode, document: DocumentNode): readonly DocumentNode[] {
  let base = root;
  let segments = path.segments;

  if (path.fromDocument) {
    if (segments.length > 0 && segments[0] !== document.name) return [];
    base = document;
    segments = segments.slice(1);
  }

  if (segments.length === 0) return [base];
  return base.children(segments.join('/'));
}
