import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { loadConfig } from "../src/utils/config.js";
import { createConsoleLogger, silentLogger } from "../src/utils/logger.js";

describe("loadConfig", () => {
  it("applies defaults relative to the working directory", () => {
    expect(loadConfig({}, {}, "/work")).toEqual({
      dataDir: "/work/data",
      logLevel: "info",
      resources: "on",
    });
  });

  it("reads the environment", () => {
    const config = loadConfig(
      {
        NETPOL_LENS_DATA_DIR: "/srv/policies",
        NETPOL_LENS_LOG_LEVEL: "debug",
        NETPOL_LENS_RESOURCES: "off",
      },
      {},
      "/work",
    );
    expect(config).toEqual({ dataDir: "/srv/policies", logLevel: "debug", resources: "off" });
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { NETPOL_LENS_DATA_DIR: "/srv/policies", NETPOL_LENS_RESOURCES: "on" },
      { dataDir: "local", resources: "off" },
      "/work",
    );
    expect(config.dataDir).toBe("/work/local");
    expect(config.resources).toBe("off");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ NETPOL_LENS_LOG_LEVEL: "loud" }, {}, "/work")).toThrow(
      /^CONFIG_VALIDATION_FAILED: NETPOL_LENS_LOG_LEVEL: /,
    );
    expect(() => loadConfig({ NETPOL_LENS_RESOURCES: "yes" }, {}, "/work")).toThrow(
      "CONFIG_VALIDATION_FAILED",
    );
  });
});

describe("createConsoleLogger", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("prefixes lines with the name and level", () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ write: (line) => lines.push(line) });
    logger.info("serving", { tools: 9 });
    expect(lines).toEqual(['[netpol-lens] info serving {"tools":9}']);
  });

  it("drops lines below the threshold", () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ level: "warn", name: "test", write: (line) => lines.push(line) });
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(lines).toEqual(["[test] warn c", "[test] error d"]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ level: "silent", write: (line) => lines.push(line) });
    logger.error("boom");
    expect(lines).toEqual([]);
  });

  it("has a no-op default", () => {
    expect(() => silentLogger.error("ignored")).not.toThrow();
  });
});
