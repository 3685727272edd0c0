import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import AdmZip from "adm-zip";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ingestZip } from "../src/corpus/ingest.js";
import { runIngest } from "../src/cli/ingest.js";
import { PolicyWorkspace } from "../src/workspace/workspace.js";
import type { Logger } from "../src/utils/logger.js";

const WEB_POLICY = "kind: CiliumNetworkPolicy\nmetadata: {name: web}\nspec: {endpointSelector: {}}\n";

let work: string;

function writeArchive(path: string) {
  const zip = new AdmZip();
  zip.addFile("policies/web.yaml", Buffer.from(WEB_POLICY));
  zip.addFile("notes/readme.md", Buffer.from("notes\n"));
  zip.writeZip(path);
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(async () => {
  work = await mkdtemp(join(tmpdir(), "netpol-lens-ingest-"));
});

afterEach(async () => {
  await rm(work, { recursive: true, force: true });
});

describe("ingestZip", () => {
  it("extracts an archive into a new data directory", async () => {
    const archive = join(work, "policies.zip");
    writeArchive(archive);
    const dest = join(work, "data", "nested");

    const result = await ingestZip(archive, dest);

    expect(result).toEqual({
      zipPath: archive,
      dest,
      files: ["policies/web.yaml", "notes/readme.md"],
    });
    expect(await readFile(join(dest, "policies/web.yaml"), "utf-8")).toBe(WEB_POLICY);
  });

  it("produces a directory the workspace can scan", async () => {
    const archive = join(work, "policies.zip");
    writeArchive(archive);
    const dest = join(work, "data");
    await ingestZip(archive, dest);

    const workspace = new PolicyWorkspace({ root: dest });
    expect(await workspace.listPolicyLikeFiles()).toEqual(["policies/web.yaml"]);
  });

  it("rejects a missing archive", async () => {
    const missing = join(work, "missing.zip");
    await expect(ingestZip(missing, join(work, "data"))).rejects.toThrow(`ZIP not found: ${missing}`);
  });
});

describe("runIngest", () => {
  function mockLogger(): Logger {
    return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  }

  it("prints the source and destination", async () => {
    const archive = join(work, "policies.zip");
    writeArchive(archive);
    const dest = join(work, "data");
    const lines: string[] = [];

    const code = await runIngest({ zip: archive, dest, logger: mockLogger(), print: (l) => lines.push(l) });

    expect(code).toBe(0);
    expect(lines).toEqual([`Unzipped ${archive} -> ${dest}`]);
  });

  it("logs and fails when the archive is missing", async () => {
    const logger = mockLogger();
    const missing = join(work, "missing.zip");
    const code = await runIngest({ zip: missing, dest: join(work, "data"), logger, print: () => {} });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(`ZIP not found: ${missing}`);
  });
});
