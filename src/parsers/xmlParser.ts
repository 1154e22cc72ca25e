import * as sax from 'sax';
import { DocumentParseError } from '../errors';
import type { DocumentNode } from '../types/node';

/**
 * Element of a document built by parseXmlDocument. Children are grouped by
 * name, each group in document order.
 */
export class XmlElement implements DocumentNode {
  private content = '';
  private readonly childGroups = new Map<string, XmlElement[]>();

  constructor(
    public readonly name: string,
    private readonly attributes: Readonly<Record<string, string>>,
    public readonly parent?: XmlElement,
  ) {}

  attribute(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.attributes, name) ? this.attributes[name] : undefined;
  }

  children(path: string): readonly XmlElement[] {
    let current: XmlElement[] = [this];
    for (const segment of path.split('/')) {
      if (!segment || segment === '.') continue;
      const next: XmlElement[] = [];
      for (const element of current) {
        next.push(...(element.childGroups.get(segment) ?? []));
      }
      current = next;
    }
    return current;
  }

  text(): string | undefined {
    const trimmed = this.content.trim();
    return trimmed ? trimmed : undefined;
  }

  appendText(text: string): void {
    this.content += text;
  }

  appendChild(child: XmlElement): void {
    const group = this.childGroups.get(child.name);
    if (group) {
      group.push(child);
    } else {
      this.childGroups.set(child.name, [child]);
    }
  }
}

/**
 * Builds an element tree from XML text with sax in strict mode. Names are
 * kept as written, namespace prefixes included.
 */
export function parseXmlDocument(raw: string): XmlElement {
  const parser = sax.parser(true);
  const roots: XmlElement[] = [];
  let currentElement: XmlElement | undefined;

  parser.onopentag = (node: sax.Tag | sax.QualifiedTag) => {
    const attrs: Record<string, string> = {};
    for (const [key, value] of Object.entries(node.attributes)) {
      attrs[key] = typeof value === 'string' ? value : value.value;
    }
    const element = new XmlElement(node.name, attrs, currentElement);

    if (currentElement) {
      currentElement.appendChild(element);
    } else if (roots.length > 0) {
      throw new DocumentParseError('multiple root elements');
    } else {
      roots.push(element);
    }
    currentElement = element;
  };

  parser.ontext = (text: string) => {
    currentElement?.appendText(text);
  };

  parser.oncdata = (cdata: string) => {
    currentElement?.appendText(cdata);
  };

  parser.onclosetag = () => {
    currentElement = currentElement?.parent;
  };

  parser.onerror = (err: Error) => {
    throw new DocumentParseError(err.message.split('\n').join(', '));
  };

  parser.write(raw).close();

  const root = roots[0];
  if (!root) {
    throw new DocumentParseError('document has no root element');
  }
  return root;
}
