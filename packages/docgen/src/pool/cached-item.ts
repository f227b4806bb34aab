import { MissingItemError, UnsupportedInputError } from '@cratedoc/core';
import { parseItemKind, urlTagForKind } from '@cratedoc/rustdoc';
import type { Crate, Item, ItemInner, ItemKind, ItemSummary } from '@cratedoc/rustdoc';
import type { ItemId } from './item-id.js';
import type { ItemPool } from './item-pool.js';
import { itemRelativePath } from '../links/relative-path.js';

const DOCS_RS = 'https://docs.rs';

function kindOfInner(inner: ItemInner): ItemKind | undefined {
  switch (inner.kind) {
    case 'function':
    case 'struct':
    case 'impl':
      return inner.kind;
    case 'other':
      return parseItemKind(inner.variant);
  }
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Root of a package's documentation on docs.rs
 * @example docsRsRoot('serde', '1.0.200') // 'https://docs.rs/serde/1.0.200/'
 */
export function docsRsRoot(packageName: string, version?: string): string {
  return `${DOCS_RS}/${packageName}/${version ?? 'latest'}/`;
}

/**
 * A memoized, path-resolved handle on one documentation item
 *
 * Instances are created by {@link ItemPool} only, at most once per {@link ItemId}.
 */
export class CachedItem {
  readonly id: ItemId;
  readonly pool: ItemPool;
  /** Full definition; absent for items of crates that are not indexed locally */
  readonly item: Item | undefined;
  /** Public path entry; absent for inherent-impl methods */
  readonly summary: ItemSummary | undefined;
  readonly name: string;
  /** Module path including the item's own name as the last segment */
  readonly path: readonly string[];
  readonly kind: ItemKind;

  /**
   * @param syntheticPath - Path used when the document has no path entry for the item
   * @throws MissingItemError if the item, its name or its path cannot be found
   * @throws UnsupportedInputError if the item's kind is unknown
   */
  constructor(pool: ItemPool, id: ItemId, crate: Crate, syntheticPath?: readonly string[]) {
    this.pool = pool;
    this.id = id;
    this.item = crate.index.get(id.id);
    this.summary = crate.paths.get(id.id);

    if (!this.item && !this.summary) {
      throw new MissingItemError(id.packageName, id.id);
    }

    const path = this.summary?.path ?? syntheticPath;
    if (!path || path.length === 0) {
      throw new MissingItemError(id.packageName, id.id, 'has no module path');
    }
    this.path = path;

    const summaryPath = this.summary?.path ?? [];
    const name = this.item?.name ?? summaryPath[summaryPath.length - 1];
    if (!name) {
      throw new MissingItemError(id.packageName, id.id, 'has no name');
    }
    this.name = name;

    const kind = this.summary?.kind ?? (this.item ? kindOfInner(this.item.inner) : undefined);
    if (!kind) {
      throw new UnsupportedInputError(
        `item kind ${this.summary?.rawKind ?? 'unknown'}`,
        `${this.path.join('::')} (${id.toString()})`
      );
    }
    this.kind = kind;
  }

  /** Crate id within the owning document; 0 is the document's own crate */
  get crateId(): number {
    return this.item?.crateId ?? this.summary?.crateId ?? 0;
  }

  get isLocal(): boolean {
    return this.crateId === 0;
  }

  /** Module path without the item's own name */
  get moduleDirs(): readonly string[] {
    return this.path.slice(0, -1);
  }

  /** Raw documentation text, empty when the item has none */
  get docs(): string {
    return this.item?.docs ?? '';
  }

  /**
   * Methods of the struct's inherent impl blocks
   */
  associatedMethods(): CachedItem[] {
    return this.pool.resolveAssociatedMethods(this);
  }

  /**
   * Path segments leading from this item's directory to the other's
   */
  relativeTo(other: CachedItem): string[] {
    return itemRelativePath(this.path, other.path);
  }

  /**
   * URL of the item's page on its documentation host
   *
   * Local items link to docs.rs at the package's version. Foreign items use the
   * `html_root_url` their crate records, or docs.rs when the crate is one of the
   * loaded packages, and an empty link otherwise.
   */
  externalLink(): string {
    const page = this.hostPagePath();

    if (this.isLocal) {
      const crate = this.pool.crate(this.id.packageName);
      return docsRsRoot(this.id.packageName, crate.crateVersion) + page;
    }

    const external = this.pool.crate(this.id.packageName).externalCrates.get(this.crateId);
    if (!external) {
      return '';
    }

    if (external.htmlRootUrl) {
      return withTrailingSlash(external.htmlRootUrl) + page;
    }

    const loaded = this.pool.findPackage(external.name);
    if (loaded) {
      return docsRsRoot(loaded, this.pool.crate(loaded).crateVersion) + page;
    }

    return '';
  }

  // e.g. `demo/shapes/struct.Circle.html`, or `demo/shapes/index.html` for a module
  private hostPagePath(): string {
    if (this.kind === 'module') {
      return [...this.path, 'index.html'].join('/');
    }
    return [...this.moduleDirs, `${urlTagForKind(this.kind)}.${this.name}.html`].join('/');
  }
}
