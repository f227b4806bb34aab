import { MissingItemError } from '@cratedoc/core';
import type { Crate } from '@cratedoc/rustdoc';
import { CachedItem } from './cached-item.js';
import { ItemId } from './item-id.js';

/**
 * Owns the loaded rustdoc documents and memoizes CachedItems
 *
 * At most one CachedItem exists per ItemId for the pool's lifetime; the table
 * only grows. Not safe for concurrent mutation.
 */
export class ItemPool {
  private readonly crates: Map<string, Crate>;
  private readonly cachedItems = new Map<string, CachedItem>();

  /**
   * @param crates - Parsed documents keyed by package name
   */
  constructor(crates: Iterable<[string, Crate]>) {
    this.crates = new Map(crates);
  }

  /** Number of memoized items */
  get size(): number {
    return this.cachedItems.size;
  }

  packageNames(): string[] {
    return Array.from(this.crates.keys());
  }

  hasPackage(packageName: string): boolean {
    return this.crates.has(packageName);
  }

  /**
   * Finds the loaded package a crate name refers to
   *
   * Crate names use underscores where package names may use hyphens.
   */
  findPackage(crateName: string): string | undefined {
    return this.packageNames().find(
      (name) => name === crateName || name.replace(/-/g, '_') === crateName
    );
  }

  /**
   * @throws MissingItemError if the package is not loaded
   */
  crate(packageName: string): Crate {
    const crate = this.crates.get(packageName);
    if (!crate) {
      throw new MissingItemError(packageName, '*', 'belongs to a package that is not loaded');
    }
    return crate;
  }

  /**
   * Returns the memoized item, constructing it on first access
   *
   * @throws MissingItemError if the item is absent from the documents
   */
  get(id: ItemId): CachedItem {
    return this.getWithPath(id);
  }

  /**
   * Like {@link get}, with a path for items the document has no path entry for
   *
   * The path is only used when the item is constructed; a memoized item keeps
   * the path it was created with.
   */
  getWithPath(id: ItemId, syntheticPath?: readonly string[]): CachedItem {
    const cached = this.cachedItems.get(id.key);
    if (cached) {
      return cached;
    }

    const crate = this.crates.get(id.packageName);
    if (!crate) {
      throw new MissingItemError(id.packageName, id.id, 'belongs to a package that is not loaded');
    }

    const item = new CachedItem(this, id, crate, syntheticPath);
    this.cachedItems.set(id.key, item);
    return item;
  }

  /**
   * Like {@link get}, returning undefined for missing items
   */
  tryGet(id: ItemId): CachedItem | undefined {
    try {
      return this.get(id);
    } catch (error) {
      if (error instanceof MissingItemError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Resolves every member of a struct's inherent (trait-free) impl blocks
   *
   * Members have no path entry of their own, so each one gets the struct's
   * path followed by its own name, e.g. `demo::shapes::Circle::area`.
   *
   * @returns Members in impl order, empty for anything but a struct
   */
  resolveAssociatedMethods(item: CachedItem): CachedItem[] {
    const inner = item.item?.inner;
    if (!inner || inner.kind !== 'struct') {
      return [];
    }

    const crate = this.crate(item.id.packageName);
    const methods: CachedItem[] = [];

    for (const implId of inner.impls) {
      const impl = crate.index.get(implId)?.inner;
      if (!impl || impl.kind !== 'impl' || impl.trait) {
        continue;
      }

      for (const memberId of impl.items) {
        const name = crate.index.get(memberId)?.name;
        if (!name) {
          continue;
        }
        const id = new ItemId(item.id.packageName, memberId);
        methods.push(this.getWithPath(id, [...item.path, name]));
      }
    }

    return methods;
  }
}
