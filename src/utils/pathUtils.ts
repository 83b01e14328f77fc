/**
 * Path utilities for navigation.
 *
 * Comparison is component-wise on resolved paths, so `/a/bc` is not
 * considered inside `/a/b`.
 */

import * as path from "path";

/** Split a path into components, dropping empty segments. */
export function splitPathComponents(p: string): string[] {
  return p.split(/[/\\]/).filter((s) => s.length > 0);
}

/** Path of `target` relative to `root`, or null when it is not strictly inside. */
function relativeInside(root: string, target: string): string | null {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  if (rel.length === 0 || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return rel;
}

/** Whether `target` lies strictly below `root`. */
export function isWithin(root: string, target: string): boolean {
  return relativeInside(root, target) !== null;
}

/**
 * Every path from the first level under `root` down to `target`, inclusive.
 * Empty when `target` is not strictly below `root`.
 *
 *   ancestorChain('/r', '/r/a/b/c.txt') → ['/r/a', '/r/a/b', '/r/a/b/c.txt']
 */
export function ancestorChain(root: string, target: string): string[] {
  const rel = relativeInside(root, target);
  if (rel === null) return [];

  const chain: string[] = [];
  let current = path.resolve(root);
  for (const segment of splitPathComponents(rel)) {
    current = path.join(current, segment);
    chain.push(current);
  }
  return chain;
}
