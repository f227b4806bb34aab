/**
 * Item kind lookups
 * Kind names, their aliases across rustdoc format versions, and documentation URL prefixes
 */

import type { ItemKind } from './types.js'

////////////////////////////////////////////////////////////////////////////////
// Lookup Maps
////////////////////////////////////////////////////////////////////////////////

export const ITEM_KINDS: readonly ItemKind[] = [
  'module',
  'extern_crate',
  'import',
  'struct',
  'struct_field',
  'union',
  'enum',
  'variant',
  'function',
  'type_alias',
  'opaque_ty',
  'constant',
  'trait',
  'trait_alias',
  'impl',
  'static',
  'foreign_type',
  'macro',
  'proc_attribute',
  'proc_derive',
  'assoc_const',
  'assoc_type',
  'primitive',
  'keyword',
] as const

// Older and newer format versions spell a few kinds differently
const KIND_ALIASES: Readonly<Record<string, ItemKind>> = {
  typedef: 'type_alias',
  use: 'import',
  extern_type: 'foreign_type',
}

// Prefix of the generated HTML file name, e.g. `fn.parse.html`
const URL_TAGS: Partial<Record<ItemKind, string>> = {
  function: 'fn',
  struct: 'struct',
  enum: 'enum',
  union: 'union',
  trait: 'trait',
  trait_alias: 'traitalias',
  type_alias: 'type',
  constant: 'constant',
  static: 'static',
  macro: 'macro',
  primitive: 'primitive',
  keyword: 'keyword',
  proc_attribute: 'attr',
  proc_derive: 'derive',
}

Object.freeze(ITEM_KINDS)
Object.freeze(URL_TAGS)

////////////////////////////////////////////////////////////////////////////////
// Type Guards
////////////////////////////////////////////////////////////////////////////////

/**
 * Checks if a value is a canonical item kind name.
 * @example isItemKind('function') // true
 * @example isItemKind('typedef') // false (alias, see parseItemKind)
 */
export function isItemKind(value: unknown): value is ItemKind {
  if (typeof value !== 'string') {
    return false
  }
  return ITEM_KINDS.some((kind) => kind === value)
}

////////////////////////////////////////////////////////////////////////////////
// Conversions
////////////////////////////////////////////////////////////////////////////////

/**
 * Converts a kind name, canonical or alias, to its ItemKind.
 * @example parseItemKind('typedef') // 'type_alias'
 * @example parseItemKind('functions') // undefined
 */
export function parseItemKind(value: string): ItemKind | undefined {
  if (isItemKind(value)) {
    return value
  }
  return KIND_ALIASES[value]
}

/**
 * Returns the file name prefix rustdoc uses for an item kind's page.
 * Kinds without a page of their own fall back to the kind name.
 * @example urlTagForKind('function') // 'fn'
 * @example urlTagForKind('type_alias') // 'type'
 */
export function urlTagForKind(kind: ItemKind): string {
  return URL_TAGS[kind] ?? kind
}
