import type { PlainValue, PostureStats, ValidationReport } from "../types.js";

/** Render a raw `kind` value for display; non-strings are shown as JSON. */
export function formatKind(kind: PlainValue, missing: string): string {
  if (kind === null) return missing;
  return typeof kind === "string" ? kind : JSON.stringify(kind);
}

/**
 * Format a validation report as markdown, for pasting into reviews.
 */
export function formatReportMarkdown(report: ValidationReport): string {
  const status = report.errors.length > 0 ? ":red_circle: invalid" : ":white_check_mark: valid";
  const lines = [`### \`${report.path}\` (${status})`, "", `**Kind:** \`${formatKind(report.kind, "none")}\``];

  if (report.summary.has_ingress !== undefined) {
    lines.push(`**Ingress rules:** ${report.summary.has_ingress ? "yes" : "no"}`);
  }
  if (report.summary.has_egress !== undefined) {
    lines.push(`**Egress rules:** ${report.summary.has_egress ? "yes" : "no"}`);
  }
  if (report.errors.length > 0 || report.warnings.length > 0) {
    lines.push("");
    lines.push(...report.errors.map((e) => `- **Error:** ${e}`));
    lines.push(...report.warnings.map((w) => `- **Warning:** ${w}`));
  }

  return lines.join("\n");
}

/**
 * One-paragraph posture summary with percentages of the total.
 */
export function formatPostureSummary(stats: PostureStats): string {
  if (stats.total === 0) return "No Cilium policies found.";

  const pct = (n: number) => `${Math.round((n / stats.total) * 100)}%`;
  return [
    `Scanned ${stats.total} polic${stats.total === 1 ? "y" : "ies"} (${stats.cnp_count} CNP, ${stats.ccnp_count} CCNP)`,
    `  L4/L7 ports: ${stats.with_l7_count}/${stats.total} (${pct(stats.with_l7_count)})`,
    `  DNS handled: ${stats.dns_ok_count}/${stats.total} (${pct(stats.dns_ok_count)})`,
  ].join("\n");
}
