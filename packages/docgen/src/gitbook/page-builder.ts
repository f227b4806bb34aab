/**
 * Item page builder using Handlebars templates
 */

import Handlebars from 'handlebars';
import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { UnsupportedInputError } from '@cratedoc/core';
import type { CachedItem } from '../pool/cached-item.js';
import type { GeneratedPage } from '../types.js';
import { crossRefMarkdown } from '../links/cross-ref.js';
import { renderItemSignature } from '../render/type-renderer.js';
import { registerHelpers } from '../templates/helpers.js';

// Get __dirname equivalent in ESM
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface CompiledTemplates {
  function: HandlebarsTemplateDelegate;
  struct: HandlebarsTemplateDelegate;
}

let compiledTemplates: CompiledTemplates | null = null;

/**
 * Initialize Handlebars templates
 */
async function initializeTemplates(): Promise<CompiledTemplates> {
  if (compiledTemplates) {
    return compiledTemplates;
  }

  // Signatures and docs carry raw HTML, so nothing is escaped
  const handlebars = Handlebars.create();
  registerHelpers(handlebars);

  const load = async (name: string): Promise<HandlebarsTemplateDelegate> => {
    const source = await readFile(join(__dirname, '..', 'templates', `${name}.hbs`), 'utf-8');
    return handlebars.compile(source, { noEscape: true });
  };

  compiledTemplates = {
    function: await load('function-page'),
    struct: await load('struct-page'),
  };

  return compiledTemplates;
}

/**
 * Render an item to a Markdown page
 *
 * Functions get a signature block, structs a table of their inherent methods.
 * A struct whose methods were never resolved adds them to the pool here;
 * {@link selectItems} resolves them before rendering starts.
 *
 * @throws UnsupportedInputError for any other item kind
 */
export async function renderItem(item: CachedItem): Promise<string> {
  const templates = await initializeTemplates();

  switch (item.kind) {
    case 'function':
      return templates.function({
        name: item.name,
        signature: renderItemSignature(item),
        docs: item.docs,
      });

    case 'struct':
      return templates.struct({
        name: item.name,
        docs: item.docs,
        methods: item.associatedMethods().map((method) => ({
          link: crossRefMarkdown(item, method),
          docs: method.docs,
        })),
      });

    default:
      throw new UnsupportedInputError(`item kind ${item.kind}`, item.path.join('::'));
  }
}

/**
 * Output path of an item's page, relative to the output directory
 * @example pagePath(circle) // 'demo/shapes/Circle.md'
 */
export function pagePath(item: CachedItem): string {
  return [...item.moduleDirs, `${item.name}.md`].join('/');
}

/**
 * Build an item's documentation page
 */
export async function buildItemPage(item: CachedItem): Promise<GeneratedPage> {
  return {
    path: pagePath(item),
    title: item.name,
    content: await renderItem(item),
  };
}
