export interface PromptDefinition {
  name: string;
  description: string;
  text: string;
}

export const PROMPTS: PromptDefinition[] = [
  {
    name: "hardening-review",
    description: "Review Cilium policies for zero-trust hardening",
    text: [
      "You are a senior platform engineer reviewing Cilium policies for zero-trust.",
      "Checklist: default-deny posture, least-privilege, L7 toPorts, DNS egress, health & kube-dns, FQDN pinning, auditability.",
      "Provide findings and prioritized fixes (P0/P1/P2).",
    ].join("\n"),
  },
  {
    name: "write-cilium-policy",
    description: "Draft a CiliumNetworkPolicy for a new app",
    text: [
      "Draft a CiliumNetworkPolicy for a new app. Collect: app, namespace, ingress ports, egress FQDNs.",
      "Emit YAML only, with comments explaining key choices.",
    ].join("\n"),
  },
];

export interface PromptMessage {
  role: "user";
  content: { type: "text"; text: string };
}

/**
 * Prompt listing entries, without their bodies.
 */
export function listPrompts(): Array<{ name: string; description: string }> {
  return PROMPTS.map(({ name, description }) => ({ name, description }));
}

/**
 * Resolve a prompt by name into a single user message.
 * Throws for unknown names.
 */
export function getPrompt(name: string): { description: string; messages: PromptMessage[] } {
  const prompt = PROMPTS.find((p) => p.name === name);
  if (!prompt) {
    throw new Error(`Unknown prompt: ${name}`);
  }
  return {
    description: prompt.description,
    messages: [{ role: "user", content: { type: "text", text: prompt.text } }],
  };
}
