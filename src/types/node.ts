/**
 * Minimal view of a parsed XML element. Parser adapters implement this and
 * nothing else is assumed about the underlying tree.
 */
export interface DocumentNode {
  readonly name: string;
  /** Value of the attribute, or undefined when the element does not carry it. */
  attribute(name: string): string | undefined;
  /**
   * Elements at a slash-separated path below this node, in document order.
   * A `.` segment stands for the current node.
   */
  children(path: string): readonly DocumentNode[];
  /** Trimmed direct text content; undefined when there is none. */
  text(): string | undefined;
}

export type DocumentParser = (raw: string) => DocumentNode;
