/**
 * Tests for type and signature rendering
 */

import { test } from 'node:test';
import assert from 'node:assert';
import { MissingItemError, UnsupportedInputError } from '@cratedoc/core';
import type { GenericBound, Path, Type } from '@cratedoc/rustdoc';
import {
  renderFunctionSignature,
  renderGenericArgs,
  renderGenericBound,
  renderItemSignature,
  renderPath,
  renderType,
  renderTypeBinding,
} from '../src/render/type-renderer.js';
import { circleMethod, demoItem, demoPool } from './fixture.js';

const U8 = '<a href="https://doc.rust-lang.org/std/primitive.u8.html">u8</a>';
const F64 = '<a href="https://doc.rust-lang.org/std/primitive.f64.html">f64</a>';
const STR = '<a href="https://doc.rust-lang.org/std/primitive.str.html">str</a>';
const CIRCLE = '<a href="https://docs.rs/demo/0.3.1/demo/shapes/struct.Circle.html">Circle</a>';
const CLONE = '<a href="https://doc.rust-lang.org/nightly/core/clone/trait.Clone.html">Clone</a>';
const OPTION = '<a href="https://doc.rust-lang.org/nightly/core/option/enum.Option.html">Option</a>';

const u8: Type = { kind: 'primitive', name: 'u8' };
const circlePath: Path = { name: 'Circle', id: '1' };
const clonePath: Path = { name: 'Clone', id: '20' };

function root() {
  return demoItem(demoPool(), '7');
}

test('renderType links primitives to the standard library', () => {
  assert.strictEqual(renderType(u8, root()), U8);
});

test('renderType renders generics by name', () => {
  assert.strictEqual(renderType({ kind: 'generic', name: 'T' }, root()), 'T');
});

test('renderType renders references', () => {
  const parse = root();

  assert.strictEqual(renderType({ kind: 'borrowed_ref', mutable: false, type: u8 }, parse), `&${U8}`);
  assert.strictEqual(
    renderType({ kind: 'borrowed_ref', lifetime: "'a", mutable: true, type: { kind: 'generic', name: 'T' } }, parse),
    "&'a mut T"
  );
});

test('renderType renders tuples, slices and arrays', () => {
  const parse = root();

  assert.strictEqual(renderType({ kind: 'tuple', types: [u8, { kind: 'generic', name: 'T' }] }, parse), `(${U8}, T)`);
  assert.strictEqual(renderType({ kind: 'tuple', types: [] }, parse), '()');
  assert.strictEqual(renderType({ kind: 'slice', type: u8 }, parse), `[${U8}]`);
  assert.strictEqual(renderType({ kind: 'array', type: u8, len: '32' }, parse), `[${U8}; 32]`);
});

test('renderType links resolved paths with their arguments', () => {
  const type: Type = {
    kind: 'resolved_path',
    path: {
      name: 'Option',
      id: '21',
      args: { kind: 'angle_bracketed', args: [{ kind: 'type', type: { kind: 'resolved_path', path: circlePath } }], bindings: [] },
    },
  };

  assert.strictEqual(renderType(type, root()), `${OPTION}&lt;${CIRCLE}&gt;`);
});

test('renderType renders dyn and impl traits', () => {
  const parse = root();

  assert.strictEqual(
    renderType({ kind: 'dyn_trait', traits: [{ trait: clonePath, genericParams: [] }], lifetime: "'static" }, parse),
    `dyn ${CLONE} + 'static`
  );
  assert.strictEqual(
    renderType(
      {
        kind: 'impl_trait',
        bounds: [
          { kind: 'trait_bound', trait: clonePath, genericParams: [], modifier: 'none' },
          { kind: 'outlives', lifetime: "'a" },
        ],
      },
      parse
    ),
    `impl ${CLONE} + 'a`
  );
});

test('renderType rejects unsupported variants', () => {
  assert.throws(
    () => renderType({ kind: 'unsupported', variant: 'qualified_path' }, root()),
    (error: unknown) => {
      assert.ok(error instanceof UnsupportedInputError);
      assert.strictEqual(error.construct, 'type qualified_path');
      return true;
    }
  );
});

test('renderType rejects higher-rank dyn traits', () => {
  assert.throws(
    () => renderType({ kind: 'dyn_trait', traits: [{ trait: clonePath, genericParams: [{ name: "'a" }] }] }, root()),
    UnsupportedInputError
  );
});

test('renderPath keeps the name of items missing from the documents', () => {
  assert.strictEqual(renderPath({ name: 'Gone', id: '999' }, root()), '<a href="">Gone</a>');
});

test('renderGenericArgs renders nothing for empty lists', () => {
  assert.strictEqual(renderGenericArgs({ kind: 'angle_bracketed', args: [], bindings: [] }, root()), '');
});

test('renderGenericArgs joins arguments and bindings', () => {
  const rendered = renderGenericArgs(
    {
      kind: 'angle_bracketed',
      args: [{ kind: 'lifetime', name: "'a" }, { kind: 'type', type: u8 }],
      bindings: [
        {
          name: 'Item',
          args: { kind: 'angle_bracketed', args: [], bindings: [] },
          binding: { kind: 'equality', term: { kind: 'type', type: u8 } },
        },
      ],
    },
    root()
  );

  assert.strictEqual(rendered, `&lt;'a, ${U8}, Item=${U8}&gt;`);
});

test('renderGenericArgs rejects unsupported arguments', () => {
  const parse = root();

  assert.throws(() => renderGenericArgs({ kind: 'unsupported', variant: 'parenthesized' }, parse), UnsupportedInputError);
  assert.throws(
    () => renderGenericArgs({ kind: 'angle_bracketed', args: [{ kind: 'unsupported', variant: 'const' }], bindings: [] }, parse),
    UnsupportedInputError
  );
});

test('renderTypeBinding rejects constants and constraints', () => {
  const parse = root();
  const noArgs = { kind: 'angle_bracketed' as const, args: [], bindings: [] };

  assert.throws(
    () => renderTypeBinding({ name: 'N', args: noArgs, binding: { kind: 'equality', term: { kind: 'constant', expr: '3' } } }, parse),
    /Unsupported constant binding: N = 3/
  );
  assert.throws(
    () => renderTypeBinding({ name: 'Item', args: noArgs, binding: { kind: 'constraint', bounds: [] } }, parse),
    UnsupportedInputError
  );
});

test('renderGenericBound renders maybe bounds with a question mark', () => {
  const bound: GenericBound = { kind: 'trait_bound', trait: clonePath, genericParams: [], modifier: 'maybe' };

  assert.strictEqual(renderGenericBound(bound, root()), `?${CLONE}`);
});

test('renderGenericBound rejects maybe-const bounds and unknown variants', () => {
  const parse = root();

  assert.throws(
    () => renderGenericBound({ kind: 'trait_bound', trait: clonePath, genericParams: [], modifier: 'maybe_const' }, parse),
    UnsupportedInputError
  );
  assert.throws(() => renderGenericBound({ kind: 'unsupported', variant: 'use' }, parse), UnsupportedInputError);
});

test('renderFunctionSignature renders parameters and return type', () => {
  const rendered = renderFunctionSignature(
    {
      inputs: [
        ['radius', { kind: 'primitive', name: 'f64' }],
        ['label', { kind: 'borrowed_ref', mutable: false, type: { kind: 'primitive', name: 'str' } }],
      ],
      output: { kind: 'resolved_path', path: circlePath },
    },
    root()
  );

  assert.strictEqual(
    rendered,
    '<span class="sig-paren">(</span>\n' +
      `<em class="sig-param n">\n    <span class="pre">radius</span>: <span class="pre">${F64}</span>\n</em>, ` +
      `<em class="sig-param n">\n    <span class="pre">label</span>: <span class="pre">&${STR}</span>\n</em>\n` +
      '<span class="sig-paren">)</span>\n' +
      ` → ${CIRCLE}`
  );
});

test('renderFunctionSignature leaves out unit return types', () => {
  const parse = root();
  const empty = '<span class="sig-paren">(</span>\n\n<span class="sig-paren">)</span>\n';

  assert.strictEqual(renderFunctionSignature({ inputs: [] }, parse), empty);
  assert.strictEqual(renderFunctionSignature({ inputs: [], output: { kind: 'tuple', types: [] } }, parse), empty);
});

test('renderItemSignature renders a method looked up through its struct', () => {
  const area = circleMethod(demoPool(), 'area');

  assert.strictEqual(
    renderItemSignature(area),
    '<span class="sig-paren">(</span>\n' +
      '<em class="sig-param n">\n    <span class="pre">self</span>: <span class="pre">&Self</span>\n</em>\n' +
      '<span class="sig-paren">)</span>\n' +
      ` → ${F64}`
  );
});

test('renderItemSignature rejects items that are not functions', () => {
  const pool = demoPool();

  assert.throws(() => renderItemSignature(demoItem(pool, '1')), /Unsupported item struct: demo::shapes::Circle/);
  assert.throws(() => renderItemSignature(demoItem(pool, '21')), MissingItemError);
});
