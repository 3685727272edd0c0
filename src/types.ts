/**
 * Core types for policy queries, validation reports and posture checklists.
 * Field names on reports match the JSON the tool server returns.
 */

export const POLICY_KINDS = [
  "CiliumNetworkPolicy",
  "CiliumClusterwideNetworkPolicy",
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

export function isPolicyKind(value: unknown): value is PolicyKind {
  return POLICY_KINDS.some((kind) => kind === value);
}

/** Extensions the policy scanners will parse */
export const POLICY_EXTENSIONS = [".yaml", ".yml"] as const;

/** Default glob for policy-oriented operations */
export const DEFAULT_POLICY_GLOB = "**/*.{yml,yaml}";

/** JSON-compatible value, as copied out of a parsed document */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

export interface ReportMetadata {
  name?: PlainValue;
  namespace?: PlainValue;
  labels?: PlainValue;
}

export interface ReportSummary {
  has_ingress?: boolean;
  has_egress?: boolean;
}

export interface ValidationReport {
  /** Relative path of the validated file */
  path: string;
  /** Raw `kind` value as written, null when absent */
  kind: PlainValue;
  /** Structural problems, in the order the checks ran */
  errors: string[];
  /** Heuristic findings; never stop validation */
  warnings: string[];
  metadata: ReportMetadata;
  /** Empty when validation stopped before rule inspection */
  summary: ReportSummary;
}

export interface PostureStats {
  total: number;
  cnp_count: number;
  ccnp_count: number;
  with_l7_count: number;
  dns_ok_count: number;
}

export interface PostureDetail {
  path: string;
  kind: PolicyKind;
  has_l7: boolean;
  dns_handled: boolean;
}

export interface PostureChecklist {
  stats: PostureStats;
  details: PostureDetail[];
}

export interface SearchHit {
  path: string;
  /** 1-based line number */
  line_no: number;
  line: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type ResourceMode = "on" | "off";

export interface NetpolLensConfig {
  /** Absolute root directory all file identifiers are relative to */
  dataDir: string;
  /** Minimum level written by the console logger */
  logLevel: LogLevel;
  /** Whether files are advertised as tool-server resources */
  resources: ResourceMode;
}
