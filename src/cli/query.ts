import chalk from "chalk";
import type { PolicyWorkspace } from "../workspace/workspace.js";

export interface QueryCommandOptions {
  workspace: PolicyWorkspace;
  print?: (line: string) => void;
}

/**
 * List files under the data directory, optionally filtered by glob.
 */
export async function runList(
  pattern: string | undefined,
  options: QueryCommandOptions & { policiesOnly?: boolean },
): Promise<number> {
  const { workspace, policiesOnly = false } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  const files = policiesOnly
    ? await workspace.listPolicyLikeFiles(pattern)
    : await workspace.list(pattern);
  for (const file of files) print(file);
  return 0;
}

/**
 * Grep-style search: one `path:line: text` line per hit.
 */
export async function runSearch(
  query: string,
  options: QueryCommandOptions & { glob?: string },
): Promise<number> {
  const { workspace, glob } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  const hits = await workspace.search(query, glob);
  for (const hit of hits) {
    print(`${chalk.blue(hit.path)}:${chalk.gray(String(hit.line_no))}: ${hit.line}`);
  }
  return hits.length > 0 ? 0 : 1;
}
