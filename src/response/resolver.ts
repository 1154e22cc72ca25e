import { MissingParameterError } from '../errors';
import { ABSENT } from '../mapping/absent';
import { coerce } from '../mapping/coercion';
import { locate, parsePath } from '../mapping/path';
import type { DocumentNode } from '../types/node';
import type { ResolvedValue, ResponseParamDeclaration } from '../types/param';

/**
 * Reads one declared parameter from a response root.
 *
 * Collections become a frozen array of member responses in document order
 * (possibly empty). Scalars are coerced to their declared type; a missing
 * value is ABSENT unless the parameter is required.
 */
export function resolveParameter(
  declaration: ResponseParamDeclaration,
  root: DocumentNode,
  document: DocumentNode,
): ResolvedValue {
  const target = declaration.collectionOf;
  if (target) {
    const nodes = locate(parsePath(declaration.path), root, document);
    return Object.freeze(nodes.map((node) => new target(node, document)));
  }

  const raw = readRaw(declaration, root, document);
  if (raw === undefined) {
    if (declaration.required) {
      throw new MissingParameterError(declaration.name, declaration.path);
    }
    return ABSENT;
  }
  return coerce(declaration.name, declaration.type, raw);
}

function readRaw(declaration: ResponseParamDeclaration, root: DocumentNode, document: DocumentNode): string | undefined {
  const path = parsePath(declaration.path);

  if (declaration.kind === 'attribute') {
    const last = path.segments[path.segments.length - 1];
    if (last === undefined) return undefined;
    const owner = locate({ ...path, segments: path.segments.slice(0, -1) }, root, document)[0];
    return owner?.attribute(last.replace(/^@/, ''));
  }

  return locate(path, root, document)[0]?.text();
}
