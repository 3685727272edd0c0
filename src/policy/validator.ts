import {
  asMapping,
  asString,
  getField,
  hasField,
  isTruthy,
  toPlain,
} from "../document/node.js";
import type { DocNode } from "../document/node.js";
import { isPolicyKind } from "../types.js";
import type { ReportMetadata, ValidationReport } from "../types.js";
import { renderYaml } from "../utils/yaml.js";
import { anyRuleHasL7Ports, directionRules } from "./rules.js";

export const VALIDATION_MESSAGES = {
  rootNotMapping: "YAML root must be a mapping",
  unrecognizedKind: "Not a Cilium {CNP|CCNP} kind",
  missingName: "metadata.name is required",
  missingSpec: "spec is required",
  specNotMapping: "spec must be a mapping",
  noRules: "No ingress/egress rules present (might not enforce anything)",
  ingressNoPorts: "Ingress has no L4/L7 ports (coarse allow?)",
  egressNoPorts: "Egress has no L4/L7 ports (coarse allow?)",
  noDnsEgress: "No explicit DNS egress (add kube-dns:53 or toFQDNs)",
} as const;

const METADATA_KEYS = ["name", "namespace", "labels"] as const;

/**
 * Validate one parsed policy document.
 *
 * Checks run in a fixed order. Structural failures (root shape, kind, spec)
 * stop further checks; a missing name and every warning do not. Nothing is
 * thrown: findings are returned in the report.
 */
export function validatePolicy(doc: DocNode, path: string): ValidationReport {
  const report: ValidationReport = {
    path,
    kind: null,
    errors: [],
    warnings: [],
    metadata: {},
    summary: {},
  };

  if (!asMapping(doc)) {
    report.errors.push(VALIDATION_MESSAGES.rootNotMapping);
    return report;
  }

  const kindNode = getField(doc, "kind");
  report.kind = kindNode ? toPlain(kindNode) : null;
  const kind = asString(kindNode);
  if (!isPolicyKind(kind)) {
    report.errors.push(VALIDATION_MESSAGES.unrecognizedKind);
    return report;
  }

  const metadata = getField(doc, "metadata");
  if (!hasField(metadata, "name")) {
    report.errors.push(VALIDATION_MESSAGES.missingName);
  }
  report.metadata = copyMetadata(metadata);

  const spec = getField(doc, "spec");
  if (!isTruthy(spec)) {
    report.errors.push(VALIDATION_MESSAGES.missingSpec);
    return report;
  }
  const specMapping = asMapping(spec);
  if (!specMapping) {
    report.errors.push(VALIDATION_MESSAGES.specNotMapping);
    return report;
  }

  const ingress = getField(specMapping, "ingress");
  const egress = getField(specMapping, "egress");
  const hasIngress = isTruthy(ingress);
  const hasEgress = isTruthy(egress);
  report.summary = { has_ingress: hasIngress, has_egress: hasEgress };

  if (!hasIngress && !hasEgress) {
    report.warnings.push(VALIDATION_MESSAGES.noRules);
  }

  // Directional L4/L7 feedback: each direction is judged on its own rules.
  if (hasIngress && !anyRuleHasL7Ports(directionRules(specMapping, "ingress"))) {
    report.warnings.push(VALIDATION_MESSAGES.ingressNoPorts);
  }
  if (hasEgress && !anyRuleHasL7Ports(directionRules(specMapping, "egress"))) {
    report.warnings.push(VALIDATION_MESSAGES.egressNoPorts);
  }

  if (hasEgress && egress) {
    const text = renderYaml(egress);
    if (!text.includes("53") && !text.includes("toFQDNs")) {
      report.warnings.push(VALIDATION_MESSAGES.noDnsEgress);
    }
  }

  return report;
}

function copyMetadata(metadata: DocNode | undefined): ReportMetadata {
  const out: ReportMetadata = {};
  for (const key of METADATA_KEYS) {
    const value = getField(metadata, key);
    if (value) out[key] = toPlain(value);
  }
  return out;
}
