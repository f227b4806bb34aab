/**
 * Documentation text helpers, also registered as Handlebars helpers
 */

import type Handlebars from 'handlebars';

const FENCE_OPEN = /^```(.*)$/;
const FENCE_CLOSE = /^```\s*$/;

// Code block attributes that rustdoc treats as Rust even without a `rust` tag
const RUST_CODE_ATTRIBUTES = new Set([
  'ignore',
  'no_run',
  'should_panic',
  'compile_fail',
  'test_harness',
  'standalone_crate',
]);

type CodeBlock = 'rust' | 'other' | 'none';

/**
 * Check if a fence info string opens a Rust code block
 * @example isRustFence('') // true
 * @example isRustFence('rust,no_run') // true
 * @example isRustFence('toml') // false
 */
export function isRustFence(info: string): boolean {
  const [label = ''] = info.trim().split(/[\s,]+/);
  return (
    label === '' ||
    label === 'rust' ||
    RUST_CODE_ATTRIBUTES.has(label) ||
    /^edition\d+$/.test(label)
  );
}

/**
 * Remove hidden lines from Rust code blocks
 *
 * Lines starting with `#` are setup code hidden by rustdoc, except attributes
 * (`#[...]`). Rust fences are rewritten to a bare ```` ```rust ````; blocks in
 * other languages are kept verbatim.
 */
export function hideCodeBlockLines(docs: string): string {
  const filtered: string[] = [];
  let state: CodeBlock = 'none';

  for (const line of docs.split(/\r?\n/)) {
    if (state === 'none') {
      const fence = FENCE_OPEN.exec(line);
      if (!fence) {
        filtered.push(line);
      } else if (isRustFence(fence[1])) {
        filtered.push('```rust');
        state = 'rust';
      } else {
        filtered.push(line);
        state = 'other';
      }
      continue;
    }

    if (FENCE_CLOSE.test(line)) {
      filtered.push(line);
      state = 'none';
      continue;
    }

    if (state === 'rust' && line.startsWith('#') && !line.startsWith('#[')) {
      continue;
    }

    filtered.push(line);
  }

  return filtered.join('\n');
}

/**
 * First non-blank line of the documentation
 */
export function caption(docs: string): string {
  const line = docs.split(/\r?\n/).find((l) => l.trim() !== '');
  return line ? line.trimEnd() : '';
}

/**
 * Escape text for a Markdown table cell
 */
export function tableCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Register all helpers with a Handlebars environment
 */
export function registerHelpers(handlebars: typeof Handlebars): void {
  handlebars.registerHelper('cleanDocs', (docs: unknown) => hideCodeBlockLines(asText(docs)));
  handlebars.registerHelper('caption', (docs: unknown) => caption(asText(docs)));
  handlebars.registerHelper('tableCell', (text: unknown) => tableCell(asText(text)));
}
