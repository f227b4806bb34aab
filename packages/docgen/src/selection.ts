/**
 * Selection of the items to extract
 */

import { ConfigError } from '@cratedoc/core';
import type { CratedocConfig } from '@cratedoc/core';
import { parseItemKind } from '@cratedoc/rustdoc';
import type { CachedItem } from './pool/cached-item.js';
import { ItemId } from './pool/item-id.js';
import type { ItemPool } from './pool/item-pool.js';
import type { ExportSelection } from './types.js';

/**
 * Check if a configured kind name is known
 */
export function isSelectableKind(kind: string): boolean {
  return parseItemKind(kind) !== undefined;
}

/**
 * Resolve configured packages into export selections
 *
 * @throws ConfigError for an unknown item kind
 */
export function resolveExportSelections(config: CratedocConfig): ExportSelection[] {
  return config.packages.map((pkg, index) => {
    const kind = parseItemKind(pkg.kind);
    if (!kind) {
      throw new ConfigError(`Unknown item kind '${pkg.kind}' in packages[${index}] (${pkg.name})`);
    }

    const selection: ExportSelection = { packageName: pkg.name, kind };
    if (pkg.modulePath) {
      selection.modulePath = pkg.modulePath.split('::');
    }
    return selection;
  });
}

/**
 * Check if a path starts with a prefix, segment by segment
 * @example hasPathPrefix(['demo', 'shapes', 'Circle'], ['demo', 'shapes']) // true
 * @example hasPathPrefix(['demo', 'shapesx'], ['demo', 'shapes']) // false
 */
export function hasPathPrefix(path: readonly string[], prefix: readonly string[]): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => path[i] === segment);
}

/**
 * Enumerate the items a set of selections covers
 *
 * Each public item of the selected kind under the module filter contributes
 * its inherent methods, then itself. An item selected twice is kept once.
 */
export function selectItems(pool: ItemPool, selections: ExportSelection[]): CachedItem[] {
  const selected = new Set<CachedItem>();

  for (const selection of selections) {
    const crate = pool.crate(selection.packageName);

    for (const [id, item] of crate.index) {
      const summary = crate.paths.get(id);
      if (!summary || summary.kind !== selection.kind || item.visibility !== 'public') {
        continue;
      }
      if (selection.modulePath && !hasPathPrefix(summary.path, selection.modulePath)) {
        continue;
      }

      const cached = pool.get(new ItemId(selection.packageName, id));
      for (const method of cached.associatedMethods()) {
        selected.add(method);
      }
      selected.add(cached);
    }
  }

  return Array.from(selected);
}
