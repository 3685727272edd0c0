import { serializeDocument } from "../utils/yaml.js";

export const DEFAULT_INGRESS_PORTS = ["80/TCP", "443/TCP"];
export const DEFAULT_EGRESS_FQDNS = ["*.amazonaws.com"];

const NAMESPACE_LABEL = "k8s:io.kubernetes.pod.namespace";

export interface PortProtocol {
  port: string;
  protocol: string;
}

export interface PortRule {
  ports: PortProtocol[];
}

export interface EndpointSelector {
  matchLabels: Record<string, string>;
}

export interface IngressRule {
  fromEndpoints: EndpointSelector[];
  toPorts: PortRule[];
}

export type EgressRule =
  | { toFQDNs: Array<{ matchName: string }> }
  | { toEndpoints: EndpointSelector[]; toPorts: PortRule[] };

export interface CiliumNetworkPolicyTemplate {
  apiVersion: "cilium.io/v2";
  kind: "CiliumNetworkPolicy";
  metadata: { name: string; namespace: string };
  spec: {
    endpointSelector: EndpointSelector;
    ingress: IngressRule[];
    egress: EgressRule[];
  };
}

/**
 * Split a `port/protocol` string. Without a `/` the protocol is TCP.
 */
export function parsePortSpec(value: string): PortProtocol {
  const slash = value.indexOf("/");
  if (slash === -1) return { port: value, protocol: "TCP" };
  return { port: value.slice(0, slash), protocol: value.slice(slash + 1) };
}

/**
 * Build a zero-trust CiliumNetworkPolicy skeleton for an app.
 *
 * Ingress admits same-app endpoints on the given ports. Egress grants the
 * given FQDNs plus UDP/53 to kube-dns, which is always included.
 * Empty port or FQDN lists fall back to the defaults.
 */
export function generatePolicyTemplate(
  app: string,
  namespace: string,
  ingressPorts: string[] = [],
  egressFQDNs: string[] = [],
): CiliumNetworkPolicyTemplate {
  const ports = ingressPorts.length > 0 ? ingressPorts : DEFAULT_INGRESS_PORTS;
  const fqdns = egressFQDNs.length > 0 ? egressFQDNs : DEFAULT_EGRESS_FQDNS;

  return {
    apiVersion: "cilium.io/v2",
    kind: "CiliumNetworkPolicy",
    metadata: { name: `${app}-ztp`, namespace },
    spec: {
      endpointSelector: {
        matchLabels: { [NAMESPACE_LABEL]: namespace, app },
      },
      ingress: [
        {
          fromEndpoints: [{ matchLabels: { app } }],
          toPorts: ports.map((p) => ({ ports: [parsePortSpec(p)] })),
        },
      ],
      egress: [
        { toFQDNs: fqdns.map((matchName) => ({ matchName })) },
        {
          toEndpoints: [
            {
              matchLabels: {
                [NAMESPACE_LABEL]: "kube-system",
                "k8s-app": "kube-dns",
              },
            },
          ],
          toPorts: [{ ports: [{ port: "53", protocol: "UDP" }] }],
        },
      ],
    },
  };
}

/** YAML rendering of a generated template, keys in declaration order. */
export function renderPolicyTemplate(template: CiliumNetworkPolicyTemplate): string {
  return serializeDocument(template);
}
