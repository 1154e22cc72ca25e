import type { RequestValue } from '../types/param';
import { ClassRegistry } from './registry';

/**
 * Supplies the default values a request class starts from.
 */
export interface DefaultValueProvider {
  defaultsFor(owner: object): ReadonlyMap<string, RequestValue>;
}

interface TemplateEntry {
  readonly name: string;
  readonly value: RequestValue;
}

/**
 * Class-scoped default values. A subclass inherits its ancestors' values and
 * may shadow them. Values are read once, when a request is constructed.
 */
export class TemplateDefaults implements DefaultValueProvider {
  private readonly registry: ClassRegistry<TemplateEntry>;

  constructor(root: object) {
    this.registry = new ClassRegistry<TemplateEntry>(root);
  }

  set(owner: object, name: string, value: RequestValue): void {
    this.registry.declare(owner, { name, value });
  }

  clear(owner: object, name?: string): void {
    this.registry.remove(owner, name);
  }

  defaultsFor(owner: object): ReadonlyMap<string, RequestValue> {
    const values = new Map<string, RequestValue>();
    for (const [name, entry] of this.registry.effective(owner)) {
      values.set(name, entry.value);
    }
    return values;
  }
}
