/**
 * Renders type expressions and function signatures to inline HTML
 *
 * Every function switches over a closed union. The `unsupported` members carry
 * variants the parser kept but the renderer refuses to approximate.
 */

import { MissingItemError, UnsupportedInputError } from '@cratedoc/core';
import type {
  FunctionSignature,
  GenericArg,
  GenericArgs,
  GenericBound,
  Path,
  Type,
  TypeBinding,
} from '@cratedoc/rustdoc';
import type { CachedItem } from '../pool/cached-item.js';
import { ItemId } from '../pool/item-id.js';

const PRIMITIVE_DOCS = 'https://doc.rust-lang.org/std/primitive.';

function unreachable(value: never): never {
  throw new UnsupportedInputError('node', JSON.stringify(value));
}

function isUnit(type: Type): boolean {
  return type.kind === 'tuple' && type.types.length === 0;
}

/**
 * Render a type expression
 *
 * @param root - Item whose page is being rendered; referenced ids are looked up in its package
 */
export function renderType(type: Type, root: CachedItem): string {
  switch (type.kind) {
    case 'primitive':
      return `<a href="${PRIMITIVE_DOCS}${type.name}.html">${type.name}</a>`;

    case 'resolved_path':
      return renderPath(type.path, root);

    case 'dyn_trait': {
      const parts = type.traits.map((poly) => {
        if (poly.genericParams.length > 0) {
          throw new UnsupportedInputError('higher-rank trait bound', poly.trait.name);
        }
        return renderPath(poly.trait, root);
      });
      if (type.lifetime !== undefined) {
        parts.push(type.lifetime);
      }
      return `dyn ${parts.join(' + ')}`;
    }

    case 'generic':
      return type.name;

    case 'borrowed_ref': {
      const lifetime = type.lifetime !== undefined ? `${type.lifetime} ` : '';
      const mutability = type.mutable ? 'mut ' : '';
      return `&${lifetime}${mutability}${renderType(type.type, root)}`;
    }

    case 'tuple':
      return `(${type.types.map((t) => renderType(t, root)).join(', ')})`;

    case 'slice':
      return `[${renderType(type.type, root)}]`;

    case 'array':
      return `[${renderType(type.type, root)}; ${type.len}]`;

    case 'impl_trait':
      return `impl ${type.bounds.map((b) => renderGenericBound(b, root)).join(' + ')}`;

    case 'unsupported':
      throw new UnsupportedInputError(`type ${type.variant}`);

    default:
      return unreachable(type);
  }
}

/**
 * Render a link to the item a path refers to, followed by its generic arguments
 *
 * An item missing from the documents still renders, with an empty link and
 * the path's own name.
 */
export function renderPath(path: Path, root: CachedItem): string {
  const target = root.pool.tryGet(new ItemId(root.id.packageName, path.id));
  const href = target ? target.externalLink() : '';
  const name = target ? target.name : path.name;
  const args = path.args ? renderGenericArgs(path.args, root) : '';
  return `<a href="${href}">${name}</a>${args}`;
}

/**
 * Render generic arguments; empty argument lists render as nothing
 */
export function renderGenericArgs(args: GenericArgs, root: CachedItem): string {
  switch (args.kind) {
    case 'angle_bracketed': {
      if (args.args.length === 0 && args.bindings.length === 0) {
        return '';
      }
      const parts = [
        ...args.args.map((arg) => renderGenericArg(arg, root)),
        ...args.bindings.map((binding) => renderTypeBinding(binding, root)),
      ];
      return `&lt;${parts.join(', ')}&gt;`;
    }

    case 'unsupported':
      throw new UnsupportedInputError(`generic arguments ${args.variant}`);

    default:
      return unreachable(args);
  }
}

function renderGenericArg(arg: GenericArg, root: CachedItem): string {
  switch (arg.kind) {
    case 'lifetime':
      return arg.name;
    case 'type':
      return renderType(arg.type, root);
    case 'unsupported':
      throw new UnsupportedInputError(`generic argument ${arg.variant}`);
    default:
      return unreachable(arg);
  }
}

/**
 * Render an associated type binding as `Name<args>=Type`
 */
export function renderTypeBinding(binding: TypeBinding, root: CachedItem): string {
  const head = `${binding.name}${renderGenericArgs(binding.args, root)}`;

  switch (binding.binding.kind) {
    case 'equality': {
      const term = binding.binding.term;
      if (term.kind === 'constant') {
        throw new UnsupportedInputError('constant binding', `${binding.name} = ${term.expr}`);
      }
      return `${head}=${renderType(term.type, root)}`;
    }

    case 'constraint':
      throw new UnsupportedInputError('constraint binding', binding.name);

    default:
      return unreachable(binding.binding);
  }
}

/**
 * Render a trait or lifetime bound
 */
export function renderGenericBound(bound: GenericBound, root: CachedItem): string {
  switch (bound.kind) {
    case 'trait_bound': {
      if (bound.genericParams.length > 0) {
        throw new UnsupportedInputError('higher-rank trait bound', bound.trait.name);
      }

      let prefix: string;
      switch (bound.modifier) {
        case 'none':
          prefix = '';
          break;
        case 'maybe':
          prefix = '?';
          break;
        case 'maybe_const':
          throw new UnsupportedInputError('trait bound modifier maybe_const', bound.trait.name);
        default:
          return unreachable(bound.modifier);
      }

      return `${prefix}${renderPath(bound.trait, root)}`;
    }

    case 'outlives':
      return bound.lifetime;

    case 'unsupported':
      throw new UnsupportedInputError(`generic bound ${bound.variant}`);

    default:
      return unreachable(bound);
  }
}

/**
 * Render a function's parameter list and return type
 *
 * The return arrow is left out for functions returning `()`.
 */
export function renderFunctionSignature(signature: FunctionSignature, root: CachedItem): string {
  const params = signature.inputs
    .map(
      ([name, type]) =>
        `<em class="sig-param n">\n    <span class="pre">${name}</span>: <span class="pre">${renderType(type, root)}</span>\n</em>`
    )
    .join(', ');

  const output =
    signature.output && !isUnit(signature.output) ? ` → ${renderType(signature.output, root)}` : '';

  return `<span class="sig-paren">(</span>\n${params}\n<span class="sig-paren">)</span>\n${output}`;
}

/**
 * Render the signature of a function item
 *
 * @throws UnsupportedInputError for any item that is not a function
 */
export function renderItemSignature(item: CachedItem): string {
  if (!item.item) {
    throw new MissingItemError(item.id.packageName, item.id.id, 'has no definition to render');
  }

  const inner = item.item.inner;
  if (inner.kind !== 'function') {
    const variant = inner.kind === 'other' ? inner.variant : inner.kind;
    throw new UnsupportedInputError(`item ${variant}`, item.path.join('::'));
  }

  return renderFunctionSignature(inner.sig, item);
}
