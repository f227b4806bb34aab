import { itemRelativePath } from './relative-path.js';

/**
 * Anything with a page in the generated tree
 */
export interface Linkable {
  name: string;
  path: readonly string[];
}

/**
 * Link target of `to`'s page, relative to the page of `from`
 * @example crossRef(circle, area) // 'Circle/area.md'
 */
export function crossRef(from: Linkable, to: Linkable): string {
  return [...itemRelativePath(from.path, to.path), `${to.name}.md`].join('/');
}

/**
 * Markdown link to `to`'s page from the page of `from`
 * @example crossRefMarkdown(circle, area) // '[area](Circle/area.md)'
 */
export function crossRefMarkdown(from: Linkable, to: Linkable): string {
  return `[${to.name}](${crossRef(from, to)})`;
}
