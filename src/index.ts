// Re-export all public modules
export * from "./types.js";
export * from "./errors.js";
export { PolicyWorkspace } from "./workspace/workspace.js";
export type { PolicyWorkspaceOptions } from "./workspace/workspace.js";
export {
  expandBraces,
  expandGlobPattern,
  matchesGlob,
  pathMatchesAny,
} from "./corpus/glob.js";
export { resolveWithinRoot, isWithinRoot } from "./corpus/sandbox.js";
export { listCorpusFiles, guessMimeType } from "./corpus/files.js";
export { ingestZip } from "./corpus/ingest.js";
export type { IngestResult } from "./corpus/ingest.js";
export {
  fromPlain,
  toPlain,
  getField,
  isTruthy,
} from "./document/node.js";
export type { DocNode } from "./document/node.js";
export { validatePolicy, VALIDATION_MESSAGES } from "./policy/validator.js";
export { scanPosture, assessPolicy } from "./policy/posture.js";
export type { CorpusEntry } from "./policy/posture.js";
export {
  generatePolicyTemplate,
  renderPolicyTemplate,
  parsePortSpec,
} from "./policy/template.js";
export type { CiliumNetworkPolicyTemplate } from "./policy/template.js";
export { buildHubbleFilters } from "./policy/hubble.js";
export { parsePolicyText, renderYaml } from "./utils/yaml.js";
export { loadConfig } from "./utils/config.js";
export { createConsoleLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { createServer, startStdioServer } from "./server/index.js";
export { createSseApp, parseHostPort, startHttpServer } from "./server/http.js";
export { dispatchTool, TOOL_DEFINITIONS } from "./server/tools.js";
