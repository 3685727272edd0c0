import chalk from "chalk";
import Table from "cli-table3";
import type { PolicyWorkspace } from "../workspace/workspace.js";
import { formatPostureSummary } from "./formatters.js";

export interface ChecklistCommandOptions {
  workspace: PolicyWorkspace;
  json?: boolean;
  print?: (line: string) => void;
}

/**
 * Scan policies and show a per-file posture table plus totals.
 */
export async function runChecklist(
  pathGlob: string,
  options: ChecklistCommandOptions,
): Promise<number> {
  const { workspace, json = false } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  const { stats, details } = await workspace.scanPosture(pathGlob);

  if (json) {
    print(JSON.stringify({ stats, details }, null, 2));
    return 0;
  }

  if (details.length === 0) {
    print(chalk.yellow("No Cilium policies found."));
    return 0;
  }

  const table = new Table({
    head: ["Policy", "Kind", "L4/L7", "DNS"],
    style: { head: ["cyan"] },
  });

  for (const row of details) {
    table.push([
      row.path,
      row.kind === "CiliumNetworkPolicy" ? "CNP" : "CCNP",
      row.has_l7 ? chalk.green("yes") : chalk.yellow("no"),
      row.dns_handled ? chalk.green("ok") : chalk.red("missing"),
    ]);
  }

  print(table.toString());
  print("");
  print(formatPostureSummary(stats));

  const coarse = stats.total - stats.with_l7_count;
  const noDns = stats.total - stats.dns_ok_count;
  if (coarse > 0) {
    print(chalk.yellow(`${coarse} polic${coarse === 1 ? "y" : "ies"} without L4/L7 ports.`));
  }
  if (noDns > 0) {
    print(chalk.red(`${noDns} polic${noDns === 1 ? "y" : "ies"} without explicit DNS handling.`));
  }
  if (coarse === 0 && noDns === 0) {
    print(chalk.green("All policies scope ports and handle DNS."));
  }

  return 0;
}
