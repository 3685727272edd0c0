import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import { POLICY_EXTENSIONS } from "../types.js";

/**
 * Enumerate regular files under `root`, recursively, as forward-slash
 * relative paths. Directory entries are visited depth-first in name order.
 * A missing root yields an empty list; symlinks are not followed.
 */
export async function listCorpusFiles(root: string): Promise<string[]> {
  const results: string[] = [];
  await walk(root, "", results);
  return results;
}

async function walk(dir: string, prefix: string, results: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingDirectory(err)) return;
    throw err;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await walk(join(dir, entry.name), rel, results);
    } else if (entry.isFile()) {
      results.push(rel);
    }
  }
}

function isMissingDirectory(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

/** True for `.yaml`/`.yml` files, case-insensitively. */
export function hasPolicyExtension(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return POLICY_EXTENSIONS.some((candidate) => candidate === ext);
}

const MIME_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".json": "application/json",
  ".csv": "text/csv",
  ".yaml": "application/yaml",
  ".yml": "application/yaml",
};

/**
 * Guess a MIME type from the file extension, for resource listings.
 */
export function guessMimeType(path: string): string | undefined {
  return MIME_TYPES[extname(path).toLowerCase()];
}
