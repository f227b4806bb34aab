/**
 * Types for the rustdoc JSON document model
 * Normalized from the externally tagged JSON emitted by `rustdoc --output-format json`
 */

/**
 * Item kinds as written in the `paths` table of a rustdoc document
 */
export type ItemKind =
  | 'module'
  | 'extern_crate'
  | 'import'
  | 'struct'
  | 'struct_field'
  | 'union'
  | 'enum'
  | 'variant'
  | 'function'
  | 'type_alias'
  | 'opaque_ty'
  | 'constant'
  | 'trait'
  | 'trait_alias'
  | 'impl'
  | 'static'
  | 'foreign_type'
  | 'macro'
  | 'proc_attribute'
  | 'proc_derive'
  | 'assoc_const'
  | 'assoc_type'
  | 'primitive'
  | 'keyword'

/**
 * Opaque item identifier, unique within one crate document
 */
export type Id = string

export type Visibility = 'public' | 'default' | 'crate' | 'restricted'

/**
 * Parsed rustdoc document for one package
 */
export interface Crate {
  root: Id
  crateVersion?: string
  formatVersion: number
  includesPrivate: boolean
  /** Full definitions of the items local to this crate */
  index: Map<Id, Item>
  /** Canonical public paths, including items of external crates */
  paths: Map<Id, ItemSummary>
  externalCrates: Map<number, ExternalCrate>
}

export interface ExternalCrate {
  name: string
  htmlRootUrl?: string
}

export interface ItemSummary {
  /** 0 for the local crate, otherwise a key of `externalCrates` */
  crateId: number
  path: string[]
  /** Absent when the document uses a kind this model does not know */
  kind?: ItemKind
  /** Kind as written in the document */
  rawKind: string
}

export interface Item {
  id: Id
  crateId: number
  name?: string
  visibility: Visibility
  docs?: string
  inner: ItemInner
}

export interface FunctionSignature {
  inputs: Array<[string, Type]>
  output?: Type
}

export type ItemInner =
  | { kind: 'function'; sig: FunctionSignature }
  | { kind: 'struct'; impls: Id[] }
  | { kind: 'impl'; trait?: Path; items: Id[] }
  | { kind: 'other'; variant: string }

/**
 * A path to another item, as used by resolved types and trait bounds
 */
export interface Path {
  name: string
  id: Id
  args?: GenericArgs
}

export interface GenericParamDef {
  name: string
}

export interface PolyTrait {
  trait: Path
  genericParams: GenericParamDef[]
}

export type Type =
  | { kind: 'primitive'; name: string }
  | { kind: 'resolved_path'; path: Path }
  | { kind: 'dyn_trait'; traits: PolyTrait[]; lifetime?: string }
  | { kind: 'generic'; name: string }
  | { kind: 'borrowed_ref'; lifetime?: string; mutable: boolean; type: Type }
  | { kind: 'tuple'; types: Type[] }
  | { kind: 'slice'; type: Type }
  | { kind: 'array'; type: Type; len: string }
  | { kind: 'impl_trait'; bounds: GenericBound[] }
  | { kind: 'unsupported'; variant: string }

export type GenericArgs =
  | { kind: 'angle_bracketed'; args: GenericArg[]; bindings: TypeBinding[] }
  | { kind: 'unsupported'; variant: string }

export type GenericArg =
  | { kind: 'lifetime'; name: string }
  | { kind: 'type'; type: Type }
  | { kind: 'unsupported'; variant: string }

export type Term =
  | { kind: 'type'; type: Type }
  | { kind: 'constant'; expr: string }

export type TypeBindingKind =
  | { kind: 'equality'; term: Term }
  | { kind: 'constraint'; bounds: GenericBound[] }

export interface TypeBinding {
  name: string
  args: GenericArgs
  binding: TypeBindingKind
}

export type TraitBoundModifier = 'none' | 'maybe' | 'maybe_const'

export type GenericBound =
  | {
      kind: 'trait_bound'
      trait: Path
      genericParams: GenericParamDef[]
      modifier: TraitBoundModifier
    }
  | { kind: 'outlives'; lifetime: string }
  | { kind: 'unsupported'; variant: string }
