/**
 * Error types shared across treenav.
 *
 * Three classes of failure exist:
 *   - fatal: unresolvable root or no usable terminal; the CLI exits with a message
 *   - contained: a directory that cannot be read becomes an annotated node in the forest
 *   - absorbed: persistence, theme and size-walk failures; logged, never surfaced
 */

// ─── Codes ──────────────────────────────────────────────────────────────────

export const ErrorCodes = {
  ROOT_NOT_FOUND: "ROOT_NOT_FOUND",
  NOT_A_DIRECTORY: "NOT_A_DIRECTORY",
  TERMINAL_UNAVAILABLE: "TERMINAL_UNAVAILABLE",
  READ_FAILED: "READ_FAILED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ─── Error Classes ──────────────────────────────────────────────────────────

/** Base error carrying a machine-readable code */
export class TreenavError extends Error {
  code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "TreenavError";
  }
}

/** Aborts the process: printed to stderr, exit code 1 */
export class FatalError extends TreenavError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "FatalError";
  }
}

/** The root of a build could not be listed */
export class TreeBuildError extends TreenavError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.READ_FAILED, message, options);
    this.name = "TreeBuildError";
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Coarse category attached to a directory node whose listing failed */
export type ErrorCategory = "permission-denied" | "not-found" | "other";

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

/** Map a filesystem error onto its display category */
export function categorizeError(err: unknown): ErrorCategory {
  switch (errnoCode(err)) {
    case "EACCES":
    case "EPERM":
      return "permission-denied";
    case "ENOENT":
    case "ENOTDIR":
      return "not-found";
    default:
      return "other";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
