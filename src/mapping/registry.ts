interface Named {
  readonly name: string;
}

/**
 * Entries attached to classes rather than instances, inherited along the
 * constructor prototype chain.
 *
 * Each class keeps its own map. The effective view of a class folds the maps
 * of its ancestors (up to `root`) child over parent: an overriding entry keeps
 * its parent's position, new names are appended in declaration order.
 */
export class ClassRegistry<E extends Named> {
  private readonly entries = new WeakMap<object, Map<string, E>>();

  constructor(private readonly root: object) {}

  declare(owner: object, entry: E): void {
    let own = this.entries.get(owner);
    if (!own) {
      own = new Map();
      this.entries.set(owner, own);
    }
    own.set(entry.name, entry);
  }

  remove(owner: object, name?: string): void {
    const own = this.entries.get(owner);
    if (!own) return;
    if (name === undefined) {
      own.clear();
    } else {
      own.delete(name);
    }
  }

  own(owner: object): ReadonlyMap<string, E> {
    return new Map(this.entries.get(owner) ?? []);
  }

  effective(owner: object): ReadonlyMap<string, E> {
    const merged = new Map<string, E>();
    for (const cls of this.lineage(owner)) {
      const own = this.entries.get(cls);
      if (!own) continue;
      for (const [name, entry] of own) {
        merged.set(name, entry);
      }
    }
    return merged;
  }

  /** Ancestors of `owner`, topmost first, ending with `owner` itself. */
  private lineage(owner: object): object[] {
    const chain: object[] = [];
    let current: object | null = owner;
    while (current && current !== Function.prototype) {
      chain.unshift(current);
      if (current === this.root) break;
      current = Object.getPrototypeOf(current);
    }
    return chain;
  }
}
