/**
 * cratedoc Documentation Generator
 * Cross-linked Markdown pages from rustdoc JSON
 */

export { generateDocs, loadPackages, renderPages, writePages } from './generator.js';
export { ItemPool } from './pool/item-pool.js';
export { CachedItem, docsRsRoot } from './pool/cached-item.js';
export { ItemId } from './pool/item-id.js';
export { relativePath, itemRelativePath, commonPrefixLength } from './links/relative-path.js';
export { crossRef, crossRefMarkdown } from './links/cross-ref.js';
export type { Linkable } from './links/cross-ref.js';
export {
  renderType,
  renderPath,
  renderGenericArgs,
  renderGenericBound,
  renderTypeBinding,
  renderFunctionSignature,
  renderItemSignature,
} from './render/type-renderer.js';
export { renderItem, buildItemPage, pagePath } from './gitbook/page-builder.js';
export { buildSummary, buildSummaryTree, renderSummaryItems } from './gitbook/summary-builder.js';
export { hideCodeBlockLines, caption } from './templates/helpers.js';
export {
  resolveExportSelections,
  selectItems,
  isSelectableKind,
  hasPathPrefix,
} from './selection.js';
export type { ExportSelection, GenerateOptions, GeneratedPage, SummaryItem } from './types.js';
