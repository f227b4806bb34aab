/**
 * Rustdoc Parser Tests
 */

import { describe, it } from 'node:test'
import assert from 'node:assert'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { RustdocFormatError } from '@cratedoc/core'
import { parseCrate, parseGenericArgs, parseGenericBound, parseType } from '../src/parser.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

function loadFixture(): unknown {
  const content = readFileSync(join(__dirname, 'fixtures', 'demo.json'), 'utf-8')
  const json: unknown = JSON.parse(content)
  return json
}

describe('Crate parser', () => {
  it('should parse the document header', () => {
    const crate = parseCrate(loadFixture())

    assert.strictEqual(crate.root, '0')
    assert.strictEqual(crate.crateVersion, '0.3.1')
    assert.strictEqual(crate.formatVersion, 37)
    assert.strictEqual(crate.includesPrivate, false)
    assert.strictEqual(crate.index.size, 10)
    assert.strictEqual(crate.paths.size, 7)
  })

  it('should parse external crates', () => {
    const crate = parseCrate(loadFixture())

    assert.deepStrictEqual(crate.externalCrates.get(1), {
      name: 'core',
      htmlRootUrl: 'https://doc.rust-lang.org/nightly/',
    })
  })

  it('should parse path summaries with their kinds', () => {
    const crate = parseCrate(loadFixture())

    assert.deepStrictEqual(crate.paths.get('1'), {
      crateId: 0,
      path: ['demo', 'shapes', 'Circle'],
      kind: 'struct',
      rawKind: 'struct',
    })
    assert.strictEqual(crate.paths.get('21')?.crateId, 1)
  })

  it('should parse a struct with its impls', () => {
    const circle = parseCrate(loadFixture()).index.get('1')

    assert.ok(circle, 'Circle should exist')
    assert.strictEqual(circle.name, 'Circle')
    assert.strictEqual(circle.visibility, 'public')
    assert.strictEqual(circle.docs, 'A circle.\n\nMore text.')
    assert.deepStrictEqual(circle.inner, { kind: 'struct', impls: ['2', '5'] })
  })

  it('should parse inherent and trait impls', () => {
    const crate = parseCrate(loadFixture())

    assert.deepStrictEqual(crate.index.get('2')?.inner, { kind: 'impl', items: ['3', '4'] })
    assert.deepStrictEqual(crate.index.get('5')?.inner, {
      kind: 'impl',
      trait: { name: 'Clone', id: '20' },
      items: ['6'],
    })
    assert.strictEqual(crate.index.get('2')?.name, undefined, 'A null name is omitted')
  })

  it('should parse a function signature', () => {
    const area = parseCrate(loadFixture()).index.get('4')

    assert.deepStrictEqual(area?.inner, {
      kind: 'function',
      sig: {
        inputs: [['self', { kind: 'borrowed_ref', mutable: false, type: { kind: 'generic', name: 'Self' } }]],
        output: { kind: 'primitive', name: 'f64' },
      },
    })
  })

  it('should omit a missing return type', () => {
    const helper = parseCrate(loadFixture()).index.get('8')

    assert.deepStrictEqual(helper?.inner, { kind: 'function', sig: { inputs: [] } })
    assert.strictEqual(helper?.visibility, 'crate')
  })

  it('should keep unknown item variants', () => {
    const root = parseCrate(loadFixture()).index.get('0')

    assert.deepStrictEqual(root?.inner, { kind: 'other', variant: 'module' })
  })

  it('should accept legacy items with string ids and a separate kind', () => {
    const crate = parseCrate({
      root: '0:0',
      format_version: 21,
      index: {
        '0:3': {
          id: '0:3',
          crate_id: 0,
          name: 'run',
          visibility: 'public',
          kind: 'function',
          inner: { decl: { inputs: [], output: null } },
        },
      },
      paths: {
        '0:3': { crate_id: 0, path: ['legacy', 'run'], kind: 'function' },
        '0:4': { crate_id: 0, path: ['legacy', 'Alias'], kind: 'typedef' },
      },
    })

    assert.deepStrictEqual(crate.index.get('0:3')?.inner, { kind: 'function', sig: { inputs: [] } })
    assert.strictEqual(crate.paths.get('0:4')?.kind, 'type_alias')
    assert.strictEqual(crate.paths.get('0:4')?.rawKind, 'typedef')
    assert.strictEqual(crate.externalCrates.size, 0)
  })

  it('should keep path entries of unknown kinds', () => {
    const crate = parseCrate({
      root: 0,
      format_version: 99,
      index: {},
      paths: { '3': { crate_id: 0, path: ['demo', 'x'], kind: 'gadget' } },
    })

    assert.deepStrictEqual(crate.paths.get('3'), { crateId: 0, path: ['demo', 'x'], rawKind: 'gadget' })
  })

  it('should name the location of a malformed value', () => {
    assert.throws(
      () =>
        parseCrate({
          root: 0,
          format_version: 37,
          index: {},
          paths: { '3': { crate_id: 0, path: 'demo::x', kind: 'function' } },
        }),
      (error: unknown) => {
        assert.ok(error instanceof RustdocFormatError)
        assert.strictEqual(error.location, 'paths["3"].path')
        assert.strictEqual(error.message, 'Invalid rustdoc JSON at paths["3"].path: expected an array')
        return true
      }
    )
  })

  it('should reject a document that is not an object', () => {
    assert.throws(() => parseCrate([]), RustdocFormatError)
  })
})

describe('Type parser', () => {
  it('should parse nested types', () => {
    const type = parseType(
      { array: { type: { slice: { primitive: 'u8' } }, len: '4' } },
      'type'
    )

    assert.deepStrictEqual(type, {
      kind: 'array',
      type: { kind: 'slice', type: { kind: 'primitive', name: 'u8' } },
      len: '4',
    })
  })

  it('should keep the lifetime and mutability of references', () => {
    const type = parseType(
      { borrowed_ref: { lifetime: "'a", mutable: true, type: { generic: 'T' } } },
      'type'
    )

    assert.deepStrictEqual(type, {
      kind: 'borrowed_ref',
      mutable: true,
      type: { kind: 'generic', name: 'T' },
      lifetime: "'a",
    })
  })

  it('should keep unknown variants as unsupported nodes', () => {
    assert.deepStrictEqual(parseType({ raw_pointer: { is_mutable: false, type: { primitive: 'u8' } } }, 'type'), {
      kind: 'unsupported',
      variant: 'raw_pointer',
    })
    assert.deepStrictEqual(parseType('infer', 'type'), { kind: 'unsupported', variant: 'infer' })
  })

  it('should reject objects with several variants', () => {
    assert.throws(
      () => parseType({ primitive: 'u8', generic: 'T' }, 'type'),
      /Invalid rustdoc JSON at type: expected a single-variant object/
    )
  })

  it('should read bindings from either field name', () => {
    const binding = {
      name: 'Item',
      args: null,
      binding: { equality: { type: { primitive: 'u32' } } },
    }
    const expected = {
      kind: 'angle_bracketed',
      args: [],
      bindings: [
        {
          name: 'Item',
          args: { kind: 'angle_bracketed', args: [], bindings: [] },
          binding: { kind: 'equality', term: { kind: 'type', type: { kind: 'primitive', name: 'u32' } } },
        },
      ],
    }

    assert.deepStrictEqual(parseGenericArgs({ angle_bracketed: { args: [], bindings: [binding] } }, 'args'), expected)
    assert.deepStrictEqual(parseGenericArgs({ angle_bracketed: { args: [], constraints: [binding] } }, 'args'), expected)
  })

  it('should keep parenthesized generic args as unsupported', () => {
    assert.deepStrictEqual(parseGenericArgs({ parenthesized: { inputs: [], output: null } }, 'args'), {
      kind: 'unsupported',
      variant: 'parenthesized',
    })
  })

  it('should default the trait bound modifier', () => {
    const bound = parseGenericBound(
      { trait_bound: { trait: { path: 'Display', id: 30, args: null }, generic_params: [] } },
      'bound'
    )

    assert.deepStrictEqual(bound, {
      kind: 'trait_bound',
      trait: { name: 'Display', id: '30' },
      genericParams: [],
      modifier: 'none',
    })
  })

  it('should reject an unknown trait bound modifier', () => {
    assert.throws(
      () =>
        parseGenericBound(
          { trait_bound: { trait: { path: 'Sized', id: 31 }, generic_params: [], modifier: 'sometimes' } },
          'bound'
        ),
      RustdocFormatError
    )
  })
})
