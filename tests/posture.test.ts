import { describe, it, expect } from "vitest";
import { assessPolicy, scanPosture } from "../src/policy/posture.js";
import type { CorpusEntry } from "../src/policy/posture.js";
import { parsePolicyText } from "../src/utils/yaml.js";
import { DEFAULT_POLICY_GLOB } from "../src/types.js";

function entry(path: string, text: string): CorpusEntry {
  return { path, document: parsePolicyText(text, path) };
}

const FQDN_POLICY = (name: string) =>
  [
    "kind: CiliumNetworkPolicy",
    `metadata: {name: ${name}}`,
    "spec:",
    "  egress:",
    "    - toFQDNs: [{matchName: api.example.com}]",
  ].join("\n");

const PORTS_POLICY = [
  "kind: CiliumNetworkPolicy",
  "metadata: {name: ports}",
  "spec:",
  "  ingress:",
  "    - toPorts: [{ports: [{port: '8080', protocol: TCP}]}]",
].join("\n");

describe("scanPosture", () => {
  it("counts L7 and DNS coverage across a corpus", () => {
    const entries = [
      entry("a.yaml", FQDN_POLICY("a")),
      entry("b.yaml", FQDN_POLICY("b")),
      entry("c.yaml", PORTS_POLICY),
    ];

    const { stats, details } = scanPosture(entries, DEFAULT_POLICY_GLOB);

    expect(stats).toEqual({
      total: 3,
      cnp_count: 3,
      ccnp_count: 0,
      with_l7_count: 1,
      dns_ok_count: 2,
    });
    expect(details).toEqual([
      { path: "a.yaml", kind: "CiliumNetworkPolicy", has_l7: false, dns_handled: true },
      { path: "b.yaml", kind: "CiliumNetworkPolicy", has_l7: false, dns_handled: true },
      { path: "c.yaml", kind: "CiliumNetworkPolicy", has_l7: true, dns_handled: false },
    ]);
  });

  it("skips non-matching paths, other extensions, parse failures and other kinds", () => {
    const entries: CorpusEntry[] = [
      entry("other/a.yaml", PORTS_POLICY),
      entry("policies/a.json", PORTS_POLICY),
      { path: "policies/broken.yaml", error: new Error("bad yaml") },
      entry("policies/pod.yaml", "kind: Pod\n"),
      entry("policies/list.yaml", "- a\n- b\n"),
      entry("policies/ok.YML", PORTS_POLICY),
    ];

    const { stats, details } = scanPosture(entries, "policies/*");

    expect(stats.total).toBe(1);
    expect(details.map((d) => d.path)).toEqual(["policies/ok.YML"]);
  });

  it("treats an empty pattern as match-all", () => {
    const { stats } = scanPosture([entry("deep/dir/a.yml", PORTS_POLICY)], "");
    expect(stats.total).toBe(1);
  });

  it("splits counts by kind", () => {
    const { stats } = scanPosture(
      [
        entry("cnp.yaml", PORTS_POLICY),
        entry("ccnp.yaml", "kind: CiliumClusterwideNetworkPolicy\nspec: {}\n"),
      ],
      DEFAULT_POLICY_GLOB,
    );
    expect(stats).toEqual({
      total: 2,
      cnp_count: 1,
      ccnp_count: 1,
      with_l7_count: 1,
      dns_ok_count: 0,
    });
  });

  it("allocates fresh results on every call", () => {
    const entries = [entry("c.yaml", PORTS_POLICY)];
    const first = scanPosture(entries, DEFAULT_POLICY_GLOB);
    const second = scanPosture(entries, DEFAULT_POLICY_GLOB);
    expect(second).toEqual(first);
    expect(second.stats).not.toBe(first.stats);
    expect(second.stats.total).toBe(1);
  });
});

describe("assessPolicy", () => {
  it("takes the L7 signal from either direction", () => {
    const detail = assessPolicy(
      "egress-only.yaml",
      parsePolicyText(
        [
          "kind: CiliumNetworkPolicy",
          "spec:",
          "  egress:",
          "    - toPorts: [{rules: {dns: [{matchPattern: '*'}]}}]",
        ].join("\n"),
        "egress-only.yaml",
      ),
    );
    expect(detail?.has_l7).toBe(true);
  });

  it("recognizes DNS by quoted or bare port 53", () => {
    const quoted = assessPolicy(
      "q.yaml",
      parsePolicyText(
        "kind: CiliumNetworkPolicy\nspec:\n  egress:\n    - toPorts: [{ports: [{port: '53', protocol: UDP}]}]\n",
        "q.yaml",
      ),
    );
    const bare = assessPolicy(
      "b.yaml",
      parsePolicyText(
        "kind: CiliumNetworkPolicy\nspec:\n  egress:\n    - toPorts: [{ports: [{port: 53, protocol: UDP}]}]\n",
        "b.yaml",
      ),
    );
    expect(quoted?.dns_handled).toBe(true);
    expect(bare?.dns_handled).toBe(true);
  });

  it("ignores an empty toFQDNs list", () => {
    const detail = assessPolicy(
      "e.yaml",
      parsePolicyText("kind: CiliumNetworkPolicy\nspec:\n  egress:\n    - toFQDNs: []\n", "e.yaml"),
    );
    expect(detail?.dns_handled).toBe(false);
  });

  it("returns null for unrecognized documents", () => {
    expect(assessPolicy("p.yaml", parsePolicyText("kind: Pod\n", "p.yaml"))).toBeNull();
  });
});
