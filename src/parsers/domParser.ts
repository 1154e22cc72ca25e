import { DOMParser } from '@xmldom/xmldom';
import * as xpath from 'xpath';
import { DocumentParseError } from '../errors';
import type { DocumentNode } from '../types/node';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(value: unknown): value is Element {
  return typeof value === 'object' && value !== null && 'nodeType' in value && value.nodeType === ELEMENT_NODE;
}

/**
 * XPath step matching child elements by their name as written, prefix
 * included, whatever namespace they are bound to.
 */
function nameStep(segment: string): string | undefined {
  if (!segment.includes("'")) return `*[name()='${segment}']`;
  if (!segment.includes('"')) return `*[name()="${segment}"]`;
  return undefined;
}

/**
 * DocumentNode over an xmldom element. Names are matched as written, the same
 * way XmlElement matches them, so a default namespace needs no prefix and a
 * prefixed element is selected by its prefixed name.
 */
export class DomNode implements DocumentNode {
  constructor(private readonly element: Element) {}

  get name(): string {
    return this.element.nodeName;
  }

  attribute(name: string): string | undefined {
    return this.element.hasAttribute(name) ? this.element.getAttribute(name) ?? undefined : undefined;
  }

  children(path: string): readonly DomNode[] {
    const segments = path.split('/').filter((segment) => segment.length > 0 && segment !== '.');
    if (segments.length === 0) return [this];

    const steps: string[] = [];
    for (const segment of segments) {
      const step = nameStep(segment);
      if (step === undefined) return [];
      steps.push(step);
    }

    const selected: unknown = xpath.select(steps.join('/'), this.element);
    if (!Array.isArray(selected)) return [];

    const nodes: DomNode[] = [];
    for (const item of selected) {
      if (isElement(item)) nodes.push(new DomNode(item));
    }
    return nodes;
  }

  text(): string | undefined {
    let content = '';
    const childNodes = this.element.childNodes;
    for (let i = 0; i < childNodes.length; i++) {
      const child = childNodes[i];
      if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
        content += child.nodeValue ?? '';
      }
    }
    const trimmed = content.trim();
    return trimmed ? trimmed : undefined;
  }
}

/**
 * Parses XML text with xmldom. Interchangeable with parseXmlDocument.
 */
export function parseDomDocument(raw: string): DomNode {
  const problems: string[] = [];
  const doc = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => {
        problems.push(String(msg));
      },
      error: (msg: unknown) => {
        problems.push(String(msg));
      },
      fatalError: (msg: unknown) => {
        problems.push(String(msg));
      },
    },
  }).parseFromString(raw, 'text/xml');

  if (problems.length > 0) {
    throw new DocumentParseError(problems[0].split('\n')[0]);
  }

  const root: unknown = doc.documentElement;
  if (!isElement(root)) {
    throw new DocumentParseError('document has no root element');
  }
  return new DomNode(root);
}
