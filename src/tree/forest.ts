/**
 * Read-only walks over a built forest.
 */

import type { DisplayNode, VisibleRow } from "../types";

/** Pre-order rows; every child of a directory node is visible */
export function flattenForest(forest: readonly DisplayNode[]): VisibleRow[] {
  const rows: VisibleRow[] = [];

  const visit = (nodes: readonly DisplayNode[], depth: number, parentPath: string | null): void => {
    for (const node of nodes) {
      if (node.kind === "directory") {
        rows.push({
          path: node.path,
          label: node.label,
          depth,
          isDirectory: true,
          isExpanded: true,
          parentPath,
        });
        visit(node.children, depth + 1, node.path);
      } else {
        rows.push({
          path: node.path,
          label: node.label,
          depth,
          isDirectory: node.isDirectory,
          isExpanded: false,
          parentPath,
        });
      }
    }
  };

  visit(forest, 0, null);
  return rows;
}

/** Every path in the forest, in pre-order */
export function collectPaths(forest: readonly DisplayNode[]): string[] {
  return flattenForest(forest).map((row) => row.path);
}

/** Index of the row for `target`, or -1 */
export function findRowIndex(rows: readonly VisibleRow[], target: string | null): number {
  if (target === null) return -1;
  return rows.findIndex((row) => row.path === target);
}
