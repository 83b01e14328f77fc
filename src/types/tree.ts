/**
 * Display forest types.
 *
 * A forest is rebuilt wholesale after every state change; nodes are never
 * patched in place. Paths are absolute and unique within a forest.
 */

import type { ErrorCategory } from "../shared/errors";

/**
 * A file, a collapsed directory, or an entry of a flat view.
 * A collapsed directory is a leaf: it was not read.
 */
export interface LeafNode {
  readonly kind: "leaf";
  readonly path: string;
  readonly label: string;
  readonly isDirectory: boolean;
}

/**
 * An expanded directory. `children` is empty both for an empty directory
 * and for one whose listing failed; `error` tells them apart.
 */
export interface DirectoryNode {
  readonly kind: "directory";
  readonly path: string;
  readonly label: string;
  readonly children: readonly DisplayNode[];
  readonly error?: ErrorCategory;
}

export type DisplayNode = LeafNode | DirectoryNode;

/** One visible line of a forest, in pre-order. */
export interface VisibleRow {
  readonly path: string;
  readonly label: string;
  readonly depth: number;
  readonly isDirectory: boolean;
  readonly isExpanded: boolean;
  readonly parentPath: string | null;
}

/** Size computation state for one directory; absence means never requested. */
export type SizeEntry = { readonly status: "pending" } | { readonly status: "resolved"; readonly bytes: number };

export type SizeCache = ReadonlyMap<string, SizeEntry>;
