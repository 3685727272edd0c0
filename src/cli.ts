#!/usr/bin/env node
import { Command, Option } from "commander";
import { startStdioServer, SERVER_VERSION } from "./server/index.js";
import { parseHostPort, startHttpServer } from "./server/http.js";
import { loadConfig } from "./utils/config.js";
import type { ConfigOverrides } from "./utils/config.js";
import { createConsoleLogger } from "./utils/logger.js";
import { PolicyWorkspace } from "./workspace/workspace.js";
import { runChecklist } from "./cli/checklist.js";
import { runIngest } from "./cli/ingest.js";
import { runList, runSearch } from "./cli/query.js";
import { runTemplate } from "./cli/template.js";
import { runValidate } from "./cli/validate.js";
import { DEFAULT_POLICY_GLOB } from "./types.js";
import type { LogLevel } from "./types.js";

type GlobalOptions = {
  dataDir?: string;
  logLevel?: LogLevel;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("netpol-lens")
  .description("Query, validate and score Cilium network policies in a data directory")
  .version(SERVER_VERSION)
  .option("-d, --data-dir <dir>", "data directory (default: $NETPOL_LENS_DATA_DIR or ./data)")
  .addOption(
    new Option("--log-level <level>", "log level").choices(["debug", "info", "warn", "error", "silent"]),
  );

function context(overrides: ConfigOverrides = {}) {
  const globals = program.opts<GlobalOptions>();
  const config = loadConfig(process.env, {
    ...(globals.dataDir !== undefined && { dataDir: globals.dataDir }),
    ...(globals.logLevel !== undefined && { logLevel: globals.logLevel }),
    ...overrides,
  });
  const logger = createConsoleLogger({ level: config.logLevel });
  const workspace = new PolicyWorkspace({ root: config.dataDir, logger });
  return { config, logger, workspace };
}

program
  .command("serve")
  .description("Serve tools, prompts and resources over stdio, or HTTP/SSE with --http")
  .option("--http <host:port>", "listen for SSE clients instead of using stdio (e.g. 0.0.0.0:8765)")
  .option("--no-resources", "do not expose data files as resources")
  .action(async (opts: { http?: string; resources: boolean }) => {
    const { config, logger } = context(opts.resources ? {} : { resources: "off" });
    if (opts.http) {
      await startHttpServer(config, logger, parseHostPort(opts.http));
    } else {
      await startStdioServer(config, logger);
    }
  });

program
  .command("ingest")
  .description("Unzip a policy archive into the data directory")
  .requiredOption("--zip <file>", "ZIP archive to import")
  .option("--dest <dir>", "destination directory (default: the data directory)")
  .action(async (opts: { zip: string; dest?: string }) => {
    const { config, logger } = context();
    process.exitCode = await runIngest({ zip: opts.zip, dest: opts.dest ?? config.dataDir, logger });
  });

program
  .command("list [pattern]")
  .description("List files, optionally filtered by a glob")
  .option("--policies", "only YAML files declaring a Cilium policy kind")
  .action(async (pattern: string | undefined, opts: { policies?: boolean }) => {
    const { workspace } = context();
    process.exitCode = await runList(pattern, { workspace, policiesOnly: opts.policies });
  });

program
  .command("search <query>")
  .description("Case-insensitive text search")
  .option("-g, --glob <pattern>", "restrict to files matching a glob", "**/*")
  .action(async (query: string, opts: { glob: string }) => {
    const { workspace } = context();
    process.exitCode = await runSearch(query, { workspace, glob: opts.glob });
  });

program
  .command("validate <path>")
  .description("Validate a Cilium policy file and print hardening hints")
  .addOption(new Option("-f, --format <format>", "output format").choices(["text", "json", "markdown"]).default("text"))
  .action(async (path: string, opts: { format: "text" | "json" | "markdown" }) => {
    const { workspace, logger } = context();
    process.exitCode = await runValidate(path, { workspace, logger, format: opts.format });
  });

program
  .command("checklist [glob]")
  .description("Zero-trust posture checklist across policy files")
  .option("--json", "print raw stats and details")
  .action(async (glob: string | undefined, opts: { json?: boolean }) => {
    const { workspace } = context();
    process.exitCode = await runChecklist(glob ?? DEFAULT_POLICY_GLOB, { workspace, json: opts.json });
  });

program
  .command("template <app> <namespace>")
  .description("Print a CiliumNetworkPolicy skeleton")
  .option("-p, --port <port/protocol>", "ingress port, repeatable (default 80/TCP, 443/TCP)", collect, [])
  .option("--fqdn <name>", "egress FQDN, repeatable (default *.amazonaws.com)", collect, [])
  .action((app: string, namespace: string, opts: { port: string[]; fqdn: string[] }) => {
    process.exitCode = runTemplate(app, namespace, { ports: opts.port, fqdns: opts.fqdn });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
