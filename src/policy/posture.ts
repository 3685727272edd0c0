import { asMapping, asString, getField } from "../document/node.js";
import type { DocNode } from "../document/node.js";
import { selectsPath } from "../corpus/glob.js";
import { hasPolicyExtension } from "../corpus/files.js";
import { isPolicyKind } from "../types.js";
import type { PostureChecklist, PostureDetail, PostureStats } from "../types.js";
import { directionRules, ruleHandlesDns, ruleHasL7Ports } from "./rules.js";

/**
 * One file offered to the posture scan: either its parsed document or the
 * reason it could not be read or parsed.
 */
export type CorpusEntry =
  | { path: string; document: DocNode }
  | { path: string; error: unknown };

export function emptyPostureStats(): PostureStats {
  return {
    total: 0,
    cnp_count: 0,
    ccnp_count: 0,
    with_l7_count: 0,
    dns_ok_count: 0,
  };
}

/**
 * Reduce a corpus into a zero-trust posture checklist.
 *
 * Best-effort over whatever parses: entries outside the glob, without a
 * YAML extension, that failed to parse, or whose kind is not a Cilium
 * policy are skipped without being reported. Unlike the validator, the L7
 * signal is taken over ingress and egress together.
 *
 * Stats and detail rows are allocated per call.
 */
export function scanPosture(entries: Iterable<CorpusEntry>, pattern: string): PostureChecklist {
  const stats = emptyPostureStats();
  const details: PostureDetail[] = [];

  for (const entry of entries) {
    if (!selectsPath(entry.path, pattern)) continue;
    if (!hasPolicyExtension(entry.path)) continue;
    if (!("document" in entry)) continue;

    const detail = assessPolicy(entry.path, entry.document);
    if (!detail) continue;

    stats.total += 1;
    if (detail.kind === "CiliumNetworkPolicy") {
      stats.cnp_count += 1;
    } else {
      stats.ccnp_count += 1;
    }
    if (detail.has_l7) stats.with_l7_count += 1;
    if (detail.dns_handled) stats.dns_ok_count += 1;
    details.push(detail);
  }

  return { stats, details };
}

/**
 * Posture row for a single document, or null when it is not a recognized
 * Cilium policy.
 */
export function assessPolicy(path: string, doc: DocNode): PostureDetail | null {
  if (!asMapping(doc)) return null;
  const kind = asString(getField(doc, "kind"));
  if (!isPolicyKind(kind)) return null;

  const spec = getField(doc, "spec");
  const rules = [...directionRules(spec, "ingress"), ...directionRules(spec, "egress")];

  return {
    path,
    kind,
    has_l7: rules.some(ruleHasL7Ports),
    dns_handled: rules.some(ruleHandlesDns),
  };
}
