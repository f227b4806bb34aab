/**
 * Rustdoc JSON Parser
 * Parses a rustdoc JSON document into the normalized Crate model
 */

import { RustdocFormatError } from '@cratedoc/core'
import { parseItemKind } from './kinds.js'
import type {
  Crate,
  ExternalCrate,
  FunctionSignature,
  GenericArg,
  GenericArgs,
  GenericBound,
  GenericParamDef,
  Id,
  Item,
  ItemInner,
  ItemSummary,
  Path,
  PolyTrait,
  Term,
  TraitBoundModifier,
  Type,
  TypeBinding,
  TypeBindingKind,
  Visibility,
} from './types.js'

type JsonObject = Record<string, unknown>

////////////////////////////////////////////////////////////////////////////////
// JSON helpers
////////////////////////////////////////////////////////////////////////////////

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expectObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new RustdocFormatError(where, 'an object')
  }
  return value
}

function expectArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new RustdocFormatError(where, 'an array')
  }
  return value
}

function expectString(value: unknown, where: string): string {
  if (typeof value !== 'string') {
    throw new RustdocFormatError(where, 'a string')
  }
  return value
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }
  return expectString(value, where)
}

function expectNumber(value: unknown, where: string): number {
  if (typeof value !== 'number') {
    throw new RustdocFormatError(where, 'a number')
  }
  return value
}

// Ids are strings like "0:12:345" in older formats and plain integers in newer ones
function parseId(value: unknown, where: string): Id {
  if (typeof value === 'number') {
    return String(value)
  }
  return expectString(value, where)
}

/**
 * Splits an externally tagged enum value into its variant name and payload.
 * Unit variants are serialized as a bare string.
 * @example untag({ slice: { primitive: 'u8' } }) // ['slice', { primitive: 'u8' }]
 * @example untag('infer') // ['infer', undefined]
 */
function untag(value: unknown, where: string): [string, unknown] {
  if (typeof value === 'string') {
    return [value, undefined]
  }
  const object = expectObject(value, where)
  const keys = Object.keys(object)
  if (keys.length !== 1) {
    throw new RustdocFormatError(where, 'a single-variant object')
  }
  const [variant] = keys
  return [variant, object[variant]]
}

////////////////////////////////////////////////////////////////////////////////
// Types
////////////////////////////////////////////////////////////////////////////////

function parsePath(value: unknown, where: string): Path {
  const object = expectObject(value, where)
  // Newer formats renamed `name` to `path`
  const name = object.name ?? object.path
  const path: Path = {
    name: expectString(name, `${where}.name`),
    id: parseId(object.id, `${where}.id`),
  }

  if (object.args !== undefined && object.args !== null) {
    path.args = parseGenericArgs(object.args, `${where}.args`)
  }

  return path
}

function parseGenericParams(value: unknown, where: string): GenericParamDef[] {
  if (value === undefined || value === null) {
    return []
  }
  return expectArray(value, where).map((param, i) => {
    const object = expectObject(param, `${where}[${i}]`)
    return { name: expectString(object.name, `${where}[${i}].name`) }
  })
}

function parsePolyTrait(value: unknown, where: string): PolyTrait {
  const object = expectObject(value, where)
  return {
    trait: parsePath(object.trait, `${where}.trait`),
    genericParams: parseGenericParams(object.generic_params, `${where}.generic_params`),
  }
}

/**
 * Parse a type expression
 * Variants the renderer does not support are kept as `unsupported` nodes
 */
export function parseType(value: unknown, where: string): Type {
  const [variant, payload] = untag(value, where)
  const at = `${where}.${variant}`

  switch (variant) {
    case 'primitive':
      return { kind: 'primitive', name: expectString(payload, at) }

    case 'generic':
      return { kind: 'generic', name: expectString(payload, at) }

    case 'resolved_path':
      return { kind: 'resolved_path', path: parsePath(payload, at) }

    case 'dyn_trait': {
      const object = expectObject(payload, at)
      const type: Type = {
        kind: 'dyn_trait',
        traits: expectArray(object.traits, `${at}.traits`).map((t, i) =>
          parsePolyTrait(t, `${at}.traits[${i}]`)
        ),
      }
      const lifetime = optionalString(object.lifetime, `${at}.lifetime`)
      if (lifetime !== undefined) {
        type.lifetime = lifetime
      }
      return type
    }

    case 'borrowed_ref': {
      const object = expectObject(payload, at)
      const type: Type = {
        kind: 'borrowed_ref',
        // `mutable` was renamed `is_mutable` in newer formats
        mutable: (object.mutable ?? object.is_mutable) === true,
        type: parseType(object.type, `${at}.type`),
      }
      const lifetime = optionalString(object.lifetime, `${at}.lifetime`)
      if (lifetime !== undefined) {
        type.lifetime = lifetime
      }
      return type
    }

    case 'tuple':
      return {
        kind: 'tuple',
        types: expectArray(payload, at).map((t, i) => parseType(t, `${at}[${i}]`)),
      }

    case 'slice':
      return { kind: 'slice', type: parseType(payload, at) }

    case 'array': {
      const object = expectObject(payload, at)
      return {
        kind: 'array',
        type: parseType(object.type, `${at}.type`),
        len: expectString(object.len, `${at}.len`),
      }
    }

    case 'impl_trait':
      return {
        kind: 'impl_trait',
        bounds: expectArray(payload, at).map((b, i) => parseGenericBound(b, `${at}[${i}]`)),
      }

    default:
      return { kind: 'unsupported', variant }
  }
}

/**
 * Parse generic arguments attached to a path or a binding
 */
export function parseGenericArgs(value: unknown, where: string): GenericArgs {
  const [variant, payload] = untag(value, where)
  const at = `${where}.${variant}`

  if (variant !== 'angle_bracketed') {
    return { kind: 'unsupported', variant }
  }

  const object = expectObject(payload, at)
  // `bindings` became `constraints` in newer formats
  const bindings = object.bindings ?? object.constraints ?? []

  return {
    kind: 'angle_bracketed',
    args: expectArray(object.args, `${at}.args`).map((arg, i) =>
      parseGenericArg(arg, `${at}.args[${i}]`)
    ),
    bindings: expectArray(bindings, `${at}.bindings`).map((binding, i) =>
      parseTypeBinding(binding, `${at}.bindings[${i}]`)
    ),
  }
}

function parseGenericArg(value: unknown, where: string): GenericArg {
  const [variant, payload] = untag(value, where)
  const at = `${where}.${variant}`

  switch (variant) {
    case 'lifetime':
      return { kind: 'lifetime', name: expectString(payload, at) }
    case 'type':
      return { kind: 'type', type: parseType(payload, at) }
    default:
      return { kind: 'unsupported', variant }
  }
}

function parseTerm(value: unknown, where: string): Term {
  const [variant, payload] = untag(value, where)
  const at = `${where}.${variant}`

  switch (variant) {
    case 'type':
      return { kind: 'type', type: parseType(payload, at) }
    case 'constant': {
      const object = expectObject(payload, at)
      return { kind: 'constant', expr: expectString(object.expr, `${at}.expr`) }
    }
    default:
      throw new RustdocFormatError(where, 'a type or constant term')
  }
}

function parseTypeBinding(value: unknown, where: string): TypeBinding {
  const object = expectObject(value, where)
  const bindingValue = object.binding
  const [variant, payload] = untag(bindingValue, `${where}.binding`)
  const at = `${where}.binding.${variant}`

  let binding: TypeBindingKind
  switch (variant) {
    case 'equality':
      binding = { kind: 'equality', term: parseTerm(payload, at) }
      break
    case 'constraint':
      binding = {
        kind: 'constraint',
        bounds: expectArray(payload, at).map((b, i) => parseGenericBound(b, `${at}[${i}]`)),
      }
      break
    default:
      throw new RustdocFormatError(`${where}.binding`, 'an equality or constraint binding')
  }

  return {
    name: expectString(object.name, `${where}.name`),
    args:
      object.args === undefined || object.args === null
        ? { kind: 'angle_bracketed', args: [], bindings: [] }
        : parseGenericArgs(object.args, `${where}.args`),
    binding,
  }
}

function parseModifier(value: unknown, where: string): TraitBoundModifier {
  switch (value) {
    case 'none':
    case 'maybe':
    case 'maybe_const':
      return value
    default:
      throw new RustdocFormatError(where, "'none', 'maybe' or 'maybe_const'")
  }
}

/**
 * Parse a generic bound from `impl Trait` or a binding constraint
 */
export function parseGenericBound(value: unknown, where: string): GenericBound {
  const [variant, payload] = untag(value, where)
  const at = `${where}.${variant}`

  switch (variant) {
    case 'trait_bound': {
      const object = expectObject(payload, at)
      return {
        kind: 'trait_bound',
        trait: parsePath(object.trait, `${at}.trait`),
        genericParams: parseGenericParams(object.generic_params, `${at}.generic_params`),
        modifier: parseModifier(object.modifier ?? 'none', `${at}.modifier`),
      }
    }
    case 'outlives':
      return { kind: 'outlives', lifetime: expectString(payload, at) }
    default:
      return { kind: 'unsupported', variant }
  }
}

////////////////////////////////////////////////////////////////////////////////
// Items
////////////////////////////////////////////////////////////////////////////////

function parseSignature(value: unknown, where: string): FunctionSignature {
  const object = expectObject(value, where)
  const inputs = expectArray(object.inputs, `${where}.inputs`).map(
    (input, i): [string, Type] => {
      const pair = expectArray(input, `${where}.inputs[${i}]`)
      return [
        expectString(pair[0], `${where}.inputs[${i}][0]`),
        parseType(pair[1], `${where}.inputs[${i}][1]`),
      ]
    }
  )

  const signature: FunctionSignature = { inputs }
  if (object.output !== undefined && object.output !== null) {
    signature.output = parseType(object.output, `${where}.output`)
  }
  return signature
}

function parseIds(value: unknown, where: string): Id[] {
  return expectArray(value, where).map((id, i) => parseId(id, `${where}[${i}]`))
}

function parseInner(variant: string, payload: unknown, where: string): ItemInner {
  switch (variant) {
    case 'function': {
      const object = expectObject(payload, where)
      // `decl` was renamed `sig` in newer formats
      const sig = object.sig ?? object.decl
      return { kind: 'function', sig: parseSignature(sig, `${where}.sig`) }
    }
    case 'struct': {
      const object = expectObject(payload, where)
      return { kind: 'struct', impls: parseIds(object.impls ?? [], `${where}.impls`) }
    }
    case 'impl': {
      const object = expectObject(payload, where)
      const inner: ItemInner = { kind: 'impl', items: parseIds(object.items, `${where}.items`) }
      if (object.trait !== undefined && object.trait !== null) {
        inner.trait = parsePath(object.trait, `${where}.trait`)
      }
      return inner
    }
    default:
      return { kind: 'other', variant }
  }
}

function parseVisibility(value: unknown, where: string): Visibility {
  const [variant] = untag(value, where)
  switch (variant) {
    case 'public':
    case 'default':
    case 'crate':
    case 'restricted':
      return variant
    default:
      throw new RustdocFormatError(where, 'a visibility')
  }
}

function parseItem(value: unknown, where: string): Item {
  const object = expectObject(value, where)

  // Legacy documents carry the variant name in `kind` next to an untagged `inner`
  const legacyKind = object.kind
  const [variant, payload]: [string, unknown] =
    typeof legacyKind === 'string'
      ? [legacyKind, object.inner]
      : untag(object.inner, `${where}.inner`)

  const item: Item = {
    id: parseId(object.id, `${where}.id`),
    crateId: expectNumber(object.crate_id, `${where}.crate_id`),
    visibility: parseVisibility(object.visibility, `${where}.visibility`),
    inner: parseInner(variant, payload, `${where}.inner.${variant}`),
  }

  const name = optionalString(object.name, `${where}.name`)
  if (name !== undefined) {
    item.name = name
  }

  const docs = optionalString(object.docs, `${where}.docs`)
  if (docs !== undefined) {
    item.docs = docs
  }

  return item
}

function parseSummary(value: unknown, where: string): ItemSummary {
  const object = expectObject(value, where)
  const rawKind = expectString(object.kind, `${where}.kind`)

  const summary: ItemSummary = {
    crateId: expectNumber(object.crate_id, `${where}.crate_id`),
    path: expectArray(object.path, `${where}.path`).map((segment, i) =>
      expectString(segment, `${where}.path[${i}]`)
    ),
    rawKind,
  }

  // Kinds from newer formats are kept raw and only rejected when the item is used
  const kind = parseItemKind(rawKind)
  if (kind) {
    summary.kind = kind
  }
  return summary
}

function parseExternalCrate(value: unknown, where: string): ExternalCrate {
  const object = expectObject(value, where)
  const external: ExternalCrate = { name: expectString(object.name, `${where}.name`) }
  const htmlRootUrl = optionalString(object.html_root_url, `${where}.html_root_url`)
  if (htmlRootUrl !== undefined) {
    external.htmlRootUrl = htmlRootUrl
  }
  return external
}

/**
 * Parse a rustdoc JSON document into a Crate
 *
 * @param json - The value of `JSON.parse` applied to the document
 * @throws RustdocFormatError when the document does not have the expected shape
 */
export function parseCrate(json: unknown): Crate {
  const object = expectObject(json, 'crate')

  const index = new Map<Id, Item>()
  for (const [id, value] of Object.entries(expectObject(object.index, 'index'))) {
    index.set(id, parseItem(value, `index["${id}"]`))
  }

  const paths = new Map<Id, ItemSummary>()
  for (const [id, value] of Object.entries(expectObject(object.paths, 'paths'))) {
    paths.set(id, parseSummary(value, `paths["${id}"]`))
  }

  const externalCrates = new Map<number, ExternalCrate>()
  for (const [key, value] of Object.entries(expectObject(object.external_crates ?? {}, 'external_crates'))) {
    const crateId = Number(key)
    if (!Number.isInteger(crateId)) {
      throw new RustdocFormatError(`external_crates["${key}"]`, 'an integer key')
    }
    externalCrates.set(crateId, parseExternalCrate(value, `external_crates["${key}"]`))
  }

  const crate: Crate = {
    root: parseId(object.root, 'root'),
    formatVersion: expectNumber(object.format_version, 'format_version'),
    includesPrivate: object.includes_private === true,
    index,
    paths,
    externalCrates,
  }

  const crateVersion = optionalString(object.crate_version, 'crate_version')
  if (crateVersion !== undefined) {
    crate.crateVersion = crateVersion
  }

  return crate
}
