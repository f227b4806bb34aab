/**
 * Shared fixture for documentation generator tests
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { parseCrate } from '@cratedoc/rustdoc';
import type { Crate } from '@cratedoc/rustdoc';
import { ItemPool } from '../src/pool/item-pool.js';
import { ItemId } from '../src/pool/item-id.js';
import type { CachedItem } from '../src/pool/cached-item.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEMO_JSON = join(__dirname, '..', '..', 'rustdoc', 'test', 'fixtures', 'demo.json');

export function loadDemoCrate(): Crate {
  const json: unknown = JSON.parse(readFileSync(DEMO_JSON, 'utf-8'));
  return parseCrate(json);
}

export function demoPool(): ItemPool {
  return new ItemPool([['demo', loadDemoCrate()]]);
}

export function demoItem(pool: ItemPool, id: string): CachedItem {
  return pool.get(new ItemId('demo', id));
}

/**
 * Circle's inherent methods, which have no path entry of their own
 */
export function circleMethod(pool: ItemPool, name: string): CachedItem {
  const method = demoItem(pool, '1')
    .associatedMethods()
    .find((m) => m.name === name);
  if (!method) {
    throw new Error(`Circle has no method ${name}`);
  }
  return method;
}
