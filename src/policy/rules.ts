import { getField, isTruthy, sequenceItems } from "../document/node.js";
import type { DocNode } from "../document/node.js";
import { renderYaml } from "../utils/yaml.js";

export type RuleDirection = "ingress" | "egress";

/**
 * True when the rule has a `toPorts` entry whose `ports` or `rules` field is
 * populated. Non-mapping rules and entries are ignored.
 */
export function ruleHasL7Ports(rule: DocNode): boolean {
  return sequenceItems(getField(rule, "toPorts")).some(
    (toPort) => isTruthy(getField(toPort, "ports")) || isTruthy(getField(toPort, "rules")),
  );
}

export function anyRuleHasL7Ports(rules: DocNode[]): boolean {
  return rules.some(ruleHasL7Ports);
}

/** Rules listed under one direction of a policy spec. */
export function directionRules(spec: DocNode | undefined, direction: RuleDirection): DocNode[] {
  return sequenceItems(getField(spec, direction));
}

/**
 * DNS heuristic for a single rule: FQDN-scoped, or its YAML rendering
 * contains a literal port 53 (quoted or bare).
 *
 * Substring matching on the rendering also hits `port: 53` inside unrelated
 * nested structures; kept for compatibility with existing checklists.
 */
export function ruleHandlesDns(rule: DocNode): boolean {
  if (isTruthy(getField(rule, "toFQDNs"))) return true;
  const text = renderYaml(rule);
  return text.includes("port: '53'") || text.includes("port: 53");
}
