/**
 * Barrel export for all shared types.
 */
export type { Bookmark, PersistentState } from "./state";

export type { DirectoryNode, DisplayNode, LeafNode, SizeCache, SizeEntry, VisibleRow } from "./tree";
