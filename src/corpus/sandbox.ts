import { isAbsolute, relative, resolve, sep } from "node:path";
import { AccessDeniedError } from "../errors.js";

/**
 * Resolve a caller-supplied path against the data root.
 *
 * Lexical containment only: `.` and `..` are normalized, symlinks are not
 * followed. Throws AccessDeniedError when the result is outside `root`.
 */
export function resolveWithinRoot(root: string, userPath: string): string {
  const base = resolve(root);
  const target = resolve(base, userPath);
  if (!isWithinRoot(base, target)) {
    throw new AccessDeniedError(userPath);
  }
  return target;
}

/**
 * True when `target` equals `root` or is nested beneath it.
 * Both arguments must already be absolute and normalized.
 */
export function isWithinRoot(root: string, target: string): boolean {
  if (target === root) return true;
  const rel = relative(root, target);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** Convert a host path under `root` into a forward-slash relative path. */
export function toRelativePath(root: string, absolutePath: string): string {
  return relative(root, absolutePath).split(sep).join("/");
}
