/**
 * SUMMARY.md builder for GitBook navigation
 */

import type { GeneratedPage, SummaryItem } from '../types.js';

/**
 * Build the navigation tree of a set of pages
 *
 * Directories become items without a link; a page and the directory of the
 * same name (a struct and its methods) merge into one item. Children are
 * sorted by title.
 */
export function buildSummaryTree(pages: GeneratedPage[]): SummaryItem[] {
  const root: SummaryItem = { title: '', children: [] };

  for (const page of pages) {
    const segments = page.path.split('/');
    let node = root;

    segments.forEach((segment, index) => {
      const isPage = index === segments.length - 1;
      const title = isPage ? segment.replace(/\.md$/, '') : segment;

      let child = node.children.find((c) => c.title === title);
      if (!child) {
        child = { title, children: [] };
        node.children.push(child);
      }
      if (isPage) {
        child.path = page.path;
      }
      node = child;
    });
  }

  sortItems(root.children);
  return root.children;
}

function sortItems(items: SummaryItem[]): void {
  items.sort((a, b) => a.title.localeCompare(b.title));
  for (const item of items) {
    sortItems(item.children);
  }
}

/**
 * Render summary items as markdown
 */
export function renderSummaryItems(items: SummaryItem[], indent = 0): string {
  let content = '';
  const indentStr = '  '.repeat(indent);

  for (const item of items) {
    if (item.path) {
      content += `${indentStr}- [${item.title}](${item.path})\n`;
    } else {
      content += `${indentStr}- ${item.title}\n`;
    }

    if (item.children.length > 0) {
      content += renderSummaryItems(item.children, indent + 1);
    }
  }

  return content;
}

/**
 * Build SUMMARY.md content for the generated pages
 */
export function buildSummary(pages: GeneratedPage[]): string {
  return `# Summary\n\n${renderSummaryItems(buildSummaryTree(pages))}`;
}
