import * as path from "path";

/**
 * Resolve a blob key or file name beneath a root directory.
 * Returns the absolute path; throws if it would escape the root.
 */
export function resolveWithin(root: string, name: string, label: string): string {
  assertSafeFilename(name, label);
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, name);

  if (!resolved.startsWith(resolvedRoot + path.sep)) {
    throw new PathEscapeError(
      `${label} resolves outside its allowed directory. ` +
        `Resolved: ${resolved}, Anchor: ${resolvedRoot}`
    );
  }

  return resolved;
}

/**
 * Validate that a name is a simple basename (no directory separators,
 * no traversal components).
 */
export function assertSafeFilename(filename: string, label: string): void {
  if (
    filename.length === 0 ||
    filename.includes("/") ||
    filename.includes("\\") ||
    filename.includes("\0") ||
    filename.includes("..") ||
    filename === "."
  ) {
    throw new PathEscapeError(
      `${label} contains invalid path components: "${filename}"`
    );
  }
}

/**
 * Reduce a client-supplied filename to a safe ASCII basename.
 * Drops any directory part and non-ASCII, turns whitespace into "_", drops
 * other unsafe characters and strips leading dots and underscores.
 * May return "" for hopeless input.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  return base
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/\.{2,}/g, ".")
    .replace(/^[._]+/, "");
}

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}
