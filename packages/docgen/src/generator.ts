/**
 * Main documentation generator
 */

import { writeFile, mkdir } from 'fs/promises';
import { join, dirname } from 'path';
import type { CratedocConfig } from '@cratedoc/core';
import { buildRustdocJson, loadCrate } from '@cratedoc/rustdoc';
import type { Crate } from '@cratedoc/rustdoc';
import type { ExportSelection, GenerateOptions, GeneratedPage } from './types.js';
import { ItemPool } from './pool/item-pool.js';
import { resolveExportSelections, selectItems } from './selection.js';
import { buildItemPage } from './gitbook/page-builder.js';
import { buildSummary } from './gitbook/summary-builder.js';

/**
 * Load the rustdoc document of every configured package, once per package
 *
 * A package with a `json` path is read from disk; otherwise it is built with cargo.
 */
export async function loadPackages(
  config: CratedocConfig,
  onProgress?: (message: string) => void
): Promise<Map<string, Crate>> {
  const crates = new Map<string, Crate>();

  for (const pkg of config.packages) {
    if (crates.has(pkg.name)) {
      continue;
    }

    const prebuilt = config.packages.find((p) => p.name === pkg.name && p.json)?.json;
    let jsonPath: string;
    if (prebuilt) {
      jsonPath = prebuilt;
    } else {
      onProgress?.(`Building rustdoc JSON for ${pkg.name}...`);
      jsonPath = await buildRustdocJson({
        packageName: pkg.name,
        manifestPath: config.manifestPath,
        toolchain: config.toolchain,
        allFeatures: config.allFeatures,
      });
    }

    onProgress?.(`Loading ${jsonPath}`);
    crates.set(pkg.name, await loadCrate(jsonPath));
  }

  return crates;
}

/**
 * Render the selected items of already loaded documents
 *
 * Every page is rendered before anything is written, so a failure leaves the
 * output directory untouched.
 */
export async function renderPages(
  crates: Map<string, Crate>,
  selections: ExportSelection[],
  config: CratedocConfig,
  onProgress?: (message: string) => void
): Promise<GeneratedPage[]> {
  const pool = new ItemPool(crates);
  const items = selectItems(pool, selections);

  onProgress?.(`Rendering ${items.length} page${items.length !== 1 ? 's' : ''}...`);

  const pages: GeneratedPage[] = [];
  for (const item of items) {
    pages.push(await buildItemPage(item));
  }

  if (config.summary) {
    pages.push({ path: 'SUMMARY.md', title: 'Summary', content: buildSummary(pages) });
  }

  return pages;
}

/**
 * Write pages below the output directory, creating directories on demand
 */
export async function writePages(outputDir: string, pages: GeneratedPage[]): Promise<void> {
  for (const page of pages) {
    const pagePath = join(outputDir, ...page.path.split('/'));
    await mkdir(dirname(pagePath), { recursive: true });
    await writeFile(pagePath, page.content, 'utf-8');
  }
}

/**
 * Generate Markdown documentation for the configured packages
 *
 * @returns The generated pages, written to `config.outputPath` unless `dryRun` is set
 * @throws ConfigError for an unknown item kind, before any package is loaded
 */
export async function generateDocs(
  config: CratedocConfig,
  options: GenerateOptions = {}
): Promise<GeneratedPage[]> {
  // Configuration errors surface before any document is read or built
  const selections = resolveExportSelections(config);
  const crates = await loadPackages(config, options.onProgress);
  const pages = await renderPages(crates, selections, config, options.onProgress);

  if (!options.dryRun) {
    options.onProgress?.(`Writing ${pages.length} file${pages.length !== 1 ? 's' : ''} to ${config.outputPath}`);
    await writePages(config.outputPath, pages);
  }

  return pages;
}
