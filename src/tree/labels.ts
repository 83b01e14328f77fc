/**
 * Node labels: icon, name, star marker and size annotation.
 */

import type { ErrorCategory } from "../shared/errors";
import type { SizeEntry } from "../types";

export const STAR_MARKER = "★";
export const PENDING_SIZE = "...";

export const ERROR_LABELS: Record<ErrorCategory, string> = {
  "permission-denied": "Permission denied",
  "not-found": "Not found",
  other: "Error",
};

// ─── Icons ──────────────────────────────────────────────────────────────────

/** Map file extensions to icon characters. */
function iconForExtension(ext: string): string {
  switch (ext.toLowerCase()) {
    case "pdf":
      return "📕"; // closed book
    case "doc":
    case "docx":
      return "📘"; // blue book
    case "xls":
    case "xlsx":
    case "csv":
      return "📊"; // bar chart
    case "jpg":
    case "jpeg":
    case "png":
    case "gif":
    case "svg":
    case "ico":
    case "webp":
      return "🖼"; // framed picture
    case "mp3":
    case "wav":
    case "flac":
    case "ogg":
      return "🎵"; // musical note
    case "mp4":
    case "mov":
    case "avi":
    case "mkv":
      return "🎬"; // clapper board
    case "zip":
    case "tar":
    case "gz":
    case "rar":
    case "7z":
      return "📦"; // package
    case "js":
    case "ts":
    case "tsx":
    case "jsx":
    case "py":
    case "rs":
    case "go":
    case "java":
    case "c":
    case "cpp":
    case "h":
      return "📝"; // memo
    case "sh":
    case "bash":
    case "zsh":
      return "💻"; // computer
    case "json":
    case "yaml":
    case "yml":
    case "toml":
    case "xml":
      return "⚙"; // gear
    case "md":
    case "txt":
    case "rtf":
      return "📃"; // page with curl
    case "html":
    case "css":
      return "🌐"; // globe
    case "lock":
      return "🔒"; // lock
    case "git":
    case "gitignore":
      return "🔀"; // twisted arrows
    default:
      return "📄"; // page facing up (generic file)
  }
}

/** Icon for an entry; directories show open/closed folders. */
export function getIcon(name: string, isDirectory: boolean, isExpanded: boolean): string {
  if (isDirectory) {
    return isExpanded ? "📂" : "📁";
  }
  const dotIndex = name.lastIndexOf(".");
  if (dotIndex < 0) {
    return "📄";
  }
  return iconForExtension(name.slice(dotIndex + 1));
}

// ─── Sizes ──────────────────────────────────────────────────────────────────

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/** Format a byte count: `512B`, `1.5K`, `2.0M`, `3.1G` */
export function formatSize(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)}G`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)}M`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)}K`;
  return `${bytes}B`;
}

function sizeAnnotation(entry: SizeEntry | undefined): string {
  if (entry === undefined) return "";
  return entry.status === "pending" ? ` [${PENDING_SIZE}]` : ` [${formatSize(entry.bytes)}]`;
}

// ─── Labels ─────────────────────────────────────────────────────────────────

export interface EntryLabelParts {
  name: string;
  isDirectory: boolean;
  isExpanded: boolean;
  isStarred: boolean;
  /** Only consulted for expanded directories */
  size?: SizeEntry;
}

export function formatEntryLabel(parts: EntryLabelParts): string {
  const icon = getIcon(parts.name, parts.isDirectory, parts.isExpanded);
  const star = parts.isStarred ? ` ${STAR_MARKER}` : "";
  const size = parts.isDirectory && parts.isExpanded ? sizeAnnotation(parts.size) : "";
  return `${icon} ${parts.name}${star}${size}`;
}

/** Flat label for a search result: icon and basename only */
export function formatMatchLabel(name: string, isDirectory: boolean): string {
  return `${getIcon(name, isDirectory, false)} ${name}`;
}

export function withErrorLabel(label: string, category: ErrorCategory): string {
  return `${label} [${ERROR_LABELS[category]}]`;
}
