/**
 * Relative paths between pages of the generated tree
 */

/**
 * Number of leading segments two paths share, compared exactly
 */
export function commonPrefixLength(left: readonly string[], right: readonly string[]): number {
  const limit = Math.min(left.length, right.length);
  let length = 0;
  while (length < limit && left[length] === right[length]) {
    length++;
  }
  return length;
}

/**
 * Shortest relative path from one directory to another
 *
 * Both directories are segment lists under the same output root. Segments are
 * not normalized, so a literal `..` in the input is treated as a name.
 *
 * @example relativePath(['pkg', 'mod_a', 'sub'], ['pkg', 'mod_b']) // ['..', '..', 'mod_b']
 */
export function relativePath(fromDir: readonly string[], toDir: readonly string[]): string[] {
  const shared = commonPrefixLength(fromDir, toDir);
  const up: string[] = new Array<string>(fromDir.length - shared).fill('..');
  return [...up, ...toDir.slice(shared)];
}

/**
 * Relative path between the directories of two item paths
 *
 * Each path ends with its item's own name, which is dropped first.
 */
export function itemRelativePath(fromPath: readonly string[], toPath: readonly string[]): string[] {
  return relativePath(fromPath.slice(0, -1), toPath.slice(0, -1));
}
