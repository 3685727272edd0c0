import { fileURLToPath, pathToFileURL } from "node:url";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { guessMimeType } from "../corpus/files.js";
import { resolveWithinRoot, toRelativePath } from "../corpus/sandbox.js";
import type { ResourceMode } from "../types.js";
import type { PolicyWorkspace } from "../workspace/workspace.js";

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType?: string;
}

export interface ResourceContent {
  uri: string;
  mimeType?: string;
  text: string;
}

/**
 * How data files are exposed as server resources. One strategy is picked
 * at startup; handlers never re-check the mode per request.
 */
export interface ResourceStrategy {
  /** Capability entry merged into the server's declared capabilities */
  readonly capabilities: { resources?: Record<string, never> };
  register(server: Server): void;
  listResources(): Promise<ResourceDescriptor[]>;
  readResource(uri: string): Promise<ResourceContent[]>;
}

/**
 * Every file under the data directory becomes a `file://` resource.
 * Reads go through the same sandbox as the read_text tool.
 */
export function fileResourceStrategy(workspace: PolicyWorkspace): ResourceStrategy {
  const strategy: ResourceStrategy = {
    capabilities: { resources: {} },

    register(server) {
      server.setRequestHandler(ListResourcesRequestSchema, async () => ({
        resources: await strategy.listResources(),
      }));
      server.setRequestHandler(ReadResourceRequestSchema, async (request) => ({
        contents: await strategy.readResource(request.params.uri),
      }));
    },

    async listResources() {
      const files = await workspace.list();
      return files.map((rel) => {
        const descriptor: ResourceDescriptor = {
          uri: pathToFileURL(resolveWithinRoot(workspace.root, rel)).href,
          name: rel,
          description: `Static file '${rel}' from ${workspace.root}`,
        };
        const mimeType = guessMimeType(rel);
        if (mimeType) descriptor.mimeType = mimeType;
        return descriptor;
      });
    },

    async readResource(uri) {
      if (!uri.startsWith("file://")) {
        throw new Error("Only file:// URIs are supported");
      }
      const absolute = resolveWithinRoot(workspace.root, fileURLToPath(uri));
      const rel = toRelativePath(workspace.root, absolute);
      const text = await workspace.readText(rel);
      const content: ResourceContent = { uri, text };
      const mimeType = guessMimeType(rel);
      if (mimeType) content.mimeType = mimeType;
      return [content];
    },
  };
  return strategy;
}

/**
 * No resources capability: clients only see tools and prompts.
 */
export const disabledResourceStrategy: ResourceStrategy = {
  capabilities: {},
  register() {},
  async listResources() {
    return [];
  },
  async readResource(uri) {
    throw new Error(`Resources are disabled: ${uri}`);
  },
};

export function selectResourceStrategy(
  mode: ResourceMode,
  workspace: PolicyWorkspace,
): ResourceStrategy {
  return mode === "on" ? fileResourceStrategy(workspace) : disabledResourceStrategy;
}
