import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { isWorkspaceError } from "../errors.js";
import { buildHubbleFilters } from "../policy/hubble.js";
import { renderPolicyTemplate } from "../policy/template.js";
import { DEFAULT_POLICY_GLOB } from "../types.js";
import type { PolicyWorkspace } from "../workspace/workspace.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(data: unknown): ToolResult {
  return textResult(JSON.stringify(data));
}

function errorResult(code: string, message: string): ToolResult {
  return { ...jsonResult({ error: { code, message } }), isError: true };
}

const listFilesArgs = z.object({ pattern: z.string().optional() });
const readTextArgs = z.object({ path: z.string() });
const searchTextArgs = z.object({
  query: z.string(),
  path_glob: z.string().default("**/*"),
});
const policyGlobArgs = z.object({
  path_glob: z.string().default(DEFAULT_POLICY_GLOB),
});
const validateArgs = z.object({ path: z.string() });
const templateArgs = z.object({
  app: z.string().min(1),
  namespace: z.string().min(1),
  ingress_ports: z.array(z.string()).optional(),
  egress_fqdns: z.array(z.string()).optional(),
});
const hubbleArgs = z.object({
  src: z.string().default(""),
  dst: z.string().default(""),
  verdict: z.string().default(""),
});

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "list_files",
    description: "List files under the data directory, optionally filtered by a glob such as **/*.{yml,yaml}.",
    inputSchema: {
      type: "object",
      properties: {
        pattern: { type: "string", description: "Glob pattern (brace alternatives allowed)" },
      },
    },
  },
  {
    name: "read_text",
    description: "Read a file under the data directory as UTF-8 text.",
    inputSchema: {
      type: "object",
      properties: { path: { type: "string", description: "Path relative to the data directory" } },
      required: ["path"],
    },
  },
  {
    name: "search_text",
    description: "Case-insensitive substring search across files matching a glob.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string" },
        path_glob: { type: "string", default: "**/*" },
      },
      required: ["query"],
    },
  },
  {
    name: "healthcheck",
    description: "Report the data directory the server is bound to.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "list_cilium_policies",
    description: "List YAML files that look like Cilium policies (CNP/CCNP).",
    inputSchema: {
      type: "object",
      properties: { path_glob: { type: "string", default: DEFAULT_POLICY_GLOB } },
    },
  },
  {
    name: "validate_cilium_policy",
    description: "Basic validation and hardening hints for a single Cilium policy file.",
    inputSchema: {
      type: "object",
      properties: { path: { type: "string" } },
      required: ["path"],
    },
  },
  {
    name: "generate_policy_template",
    description: "Generate a CiliumNetworkPolicy skeleton (YAML) for an app.",
    inputSchema: {
      type: "object",
      properties: {
        app: { type: "string" },
        namespace: { type: "string" },
        ingress_ports: {
          type: "array",
          items: { type: "string" },
          description: 'Entries like "8080/TCP"; defaults to 80/TCP and 443/TCP',
        },
        egress_fqdns: {
          type: "array",
          items: { type: "string" },
          description: "FQDNs to allow; defaults to *.amazonaws.com",
        },
      },
      required: ["app", "namespace"],
    },
  },
  {
    name: "hubble_filters",
    description: "Return a hubble observe command line and filter object for a flow query.",
    inputSchema: {
      type: "object",
      properties: {
        src: { type: "string" },
        dst: { type: "string" },
        verdict: { type: "string" },
      },
    },
  },
  {
    name: "zero_trust_checklist",
    description: "Scan policies and produce a summarized zero-trust posture checklist.",
    inputSchema: {
      type: "object",
      properties: { path_glob: { type: "string", default: DEFAULT_POLICY_GLOB } },
    },
  },
];

/**
 * Dispatch a tool call against a workspace. Argument problems and
 * workspace errors come back as `isError` results; anything else is
 * rethrown to the transport.
 */
export async function dispatchTool(
  workspace: PolicyWorkspace,
  name: string,
  args: Record<string, unknown>,
): Promise<ToolResult> {
  try {
    return await runTool(workspace, name, args);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const detail = err.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join(", ");
      return errorResult("INVALID_ARGUMENTS", detail);
    }
    if (isWorkspaceError(err)) {
      return errorResult(err.code, err.message);
    }
    throw err;
  }
}

async function runTool(
  workspace: PolicyWorkspace,
  name: string,
  args: Record<string, unknown>,
): Promise<ToolResult> {
  switch (name) {
    case "list_files": {
      const { pattern } = listFilesArgs.parse(args);
      return jsonResult(await workspace.list(pattern));
    }
    case "read_text": {
      const { path } = readTextArgs.parse(args);
      return textResult(await workspace.readText(path));
    }
    case "search_text": {
      const { query, path_glob } = searchTextArgs.parse(args);
      return jsonResult(await workspace.search(query, path_glob));
    }
    case "healthcheck":
      return textResult(workspace.healthcheck());
    case "list_cilium_policies": {
      const { path_glob } = policyGlobArgs.parse(args);
      return jsonResult(await workspace.listPolicyLikeFiles(path_glob));
    }
    case "validate_cilium_policy": {
      const { path } = validateArgs.parse(args);
      return jsonResult(await workspace.validate(path));
    }
    case "generate_policy_template": {
      const { app, namespace, ingress_ports, egress_fqdns } = templateArgs.parse(args);
      const template = workspace.generateTemplate(app, namespace, ingress_ports, egress_fqdns);
      return textResult(renderPolicyTemplate(template));
    }
    case "hubble_filters":
      return jsonResult(buildHubbleFilters(hubbleArgs.parse(args)));
    case "zero_trust_checklist": {
      const { path_glob } = policyGlobArgs.parse(args);
      return jsonResult(await workspace.scanPosture(path_glob));
    }
    default:
      return errorResult("UNKNOWN_TOOL", `Unknown tool: ${name}`);
  }
}
