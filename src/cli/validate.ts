import chalk from "chalk";
import { isWorkspaceError } from "../errors.js";
import type { ValidationReport } from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { PolicyWorkspace } from "../workspace/workspace.js";
import { formatKind, formatReportMarkdown } from "./formatters.js";

export interface ValidateCommandOptions {
  workspace: PolicyWorkspace;
  logger: Logger;
  format?: "text" | "json" | "markdown";
  print?: (line: string) => void;
}

/**
 * Validate one policy file and print the findings.
 * Returns the process exit code: 1 when the report has errors or the file
 * could not be read or parsed.
 */
export async function runValidate(
  path: string,
  options: ValidateCommandOptions,
): Promise<number> {
  const { workspace, logger, format = "text" } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  let report: ValidationReport;
  try {
    report = await workspace.validate(path);
  } catch (error) {
    if (!isWorkspaceError(error)) throw error;
    logger.error(`${error.code}: ${error.message}`);
    return 1;
  }

  if (format === "json") {
    print(JSON.stringify(report, null, 2));
  } else if (format === "markdown") {
    print(formatReportMarkdown(report));
  } else {
    const status = report.errors.length > 0 ? chalk.red("INVALID") : chalk.green("OK");
    print(`${chalk.blue(report.path)} ${status}`);
    print(chalk.gray(`  kind: ${formatKind(report.kind, "(none)")}`));
    for (const err of report.errors) {
      print(`  ${chalk.red("error")} ${err}`);
    }
    for (const warning of report.warnings) {
      print(`  ${chalk.yellow("warning")} ${warning}`);
    }
    if (report.errors.length === 0 && report.warnings.length === 0) {
      print(chalk.green("  No findings."));
    }
  }

  return report.errors.length > 0 ? 1 : 0;
}
