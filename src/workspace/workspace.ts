import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { resolveWithinRoot } from "../corpus/sandbox.js";
import { selectsPath } from "../corpus/glob.js";
import { hasPolicyExtension, listCorpusFiles } from "../corpus/files.js";
import { asString, getField } from "../document/node.js";
import type { DocNode } from "../document/node.js";
import { NotFoundError, ReadError } from "../errors.js";
import { scanPosture } from "../policy/posture.js";
import type { CorpusEntry } from "../policy/posture.js";
import { validatePolicy } from "../policy/validator.js";
import { generatePolicyTemplate } from "../policy/template.js";
import type { CiliumNetworkPolicyTemplate } from "../policy/template.js";
import { DEFAULT_POLICY_GLOB, isPolicyKind } from "../types.js";
import type { PostureChecklist, SearchHit, ValidationReport } from "../types.js";
import { parsePolicyText } from "../utils/yaml.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

const UTF8 = new TextDecoder("utf-8", { fatal: true });

export interface PolicyWorkspaceOptions {
  /** Data directory; resolved to an absolute path once */
  root: string;
  logger?: Logger;
}

/**
 * PolicyWorkspace is the query surface over one data directory: file
 * listing, sandboxed reads, text search, and the Cilium policy checks.
 *
 * The root never changes for an instance. Reloading against another
 * directory means constructing a new workspace. Every call allocates its
 * own results, so concurrent calls do not interfere.
 */
export class PolicyWorkspace {
  readonly root: string;
  private logger: Logger;

  constructor(options: PolicyWorkspaceOptions) {
    this.root = resolve(options.root);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * List files under the root, optionally filtered by a glob.
   */
  async list(pattern?: string): Promise<string[]> {
    const files = await listCorpusFiles(this.root);
    return files.filter((file) => selectsPath(file, pattern));
  }

  /**
   * Read a file as UTF-8 text after the sandbox check. Bytes that are not
   * valid UTF-8 fail with ReadError instead of being replaced.
   */
  async readText(path: string): Promise<string> {
    const absolute = resolveWithinRoot(this.root, path);
    let bytes: Buffer;
    try {
      bytes = await readFile(absolute);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        throw new NotFoundError(path);
      }
      throw new ReadError(path, err);
    }
    try {
      return UTF8.decode(bytes);
    } catch (err) {
      throw new ReadError(path, err);
    }
  }

  /**
   * Case-insensitive substring search over every file matching `pathGlob`.
   * Unreadable files are skipped.
   */
  async search(query: string, pathGlob = "**/*"): Promise<SearchHit[]> {
    const needle = query.toLowerCase();
    const hits: SearchHit[] = [];

    for (const path of await this.list(pathGlob)) {
      let text: string;
      try {
        text = await this.readText(path);
      } catch (err) {
        this.logger.debug(`search: skipping ${path}: ${describe(err)}`);
        continue;
      }
      splitLines(text).forEach((line, index) => {
        if (line.toLowerCase().includes(needle)) {
          hits.push({ path, line_no: index + 1, line });
        }
      });
    }

    return hits;
  }

  /**
   * List YAML files whose parsed root declares a Cilium policy kind.
   */
  async listPolicyLikeFiles(pathGlob = DEFAULT_POLICY_GLOB): Promise<string[]> {
    const hits: string[] = [];
    for (const entry of await this.loadPolicyEntries(pathGlob)) {
      if (!("document" in entry)) continue;
      if (isPolicyKind(asString(getField(entry.document, "kind")))) {
        hits.push(entry.path);
      }
    }
    return hits;
  }

  /**
   * Validate a single named policy file. Read and parse failures are
   * thrown; findings come back in the report.
   */
  async validate(path: string): Promise<ValidationReport> {
    const text = await this.readText(path);
    const doc = parsePolicyText(text, path);
    const report = validatePolicy(doc, path);
    this.logger.debug(
      `validate ${path}: ${report.errors.length} error(s), ${report.warnings.length} warning(s)`,
    );
    return report;
  }

  generateTemplate(
    app: string,
    namespace: string,
    ingressPorts?: string[],
    egressFQDNs?: string[],
  ): CiliumNetworkPolicyTemplate {
    return generatePolicyTemplate(app, namespace, ingressPorts, egressFQDNs);
  }

  /**
   * Zero-trust posture checklist over every policy matching `pathGlob`.
   */
  async scanPosture(pathGlob = DEFAULT_POLICY_GLOB): Promise<PostureChecklist> {
    const entries = await this.loadPolicyEntries(pathGlob);
    const checklist = scanPosture(entries, pathGlob);
    this.logger.debug(
      `posture scan: ${entries.length} candidate file(s), ${checklist.stats.total} policy document(s)`,
    );
    return checklist;
  }

  healthcheck(): string {
    return `OK: data_dir=${this.root}`;
  }

  /**
   * Read and parse every YAML file selected by `pathGlob`. Failures become
   * error entries so scans can skip them.
   */
  private async loadPolicyEntries(pathGlob: string): Promise<CorpusEntry[]> {
    const entries: CorpusEntry[] = [];
    for (const path of await this.list(pathGlob)) {
      if (!hasPolicyExtension(path)) continue;
      let document: DocNode;
      try {
        document = parsePolicyText(await this.readText(path), path);
      } catch (err) {
        this.logger.debug(`skipping ${path}: ${describe(err)}`);
        entries.push({ path, error: err });
        continue;
      }
      entries.push({ path, document });
    }
    return entries;
  }
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
