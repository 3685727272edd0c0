import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { createSseApp, parseHostPort } from "../src/server/http.js";
import { PolicyWorkspace } from "../src/workspace/workspace.js";
import { silentLogger } from "../src/utils/logger.js";

const FIXTURE_ROOT = fileURLToPath(new URL("./fixtures/corpus", import.meta.url));

describe("parseHostPort", () => {
  it("splits host and port", () => {
    expect(parseHostPort("0.0.0.0:8765")).toEqual({ host: "0.0.0.0", port: 8765 });
    expect(parseHostPort("localhost:80")).toEqual({ host: "localhost", port: 80 });
  });

  it.each(["8765", ":8765", "localhost:", "localhost:abc", "localhost:0", "localhost:70000"])(
    "rejects %s",
    (value) => {
      expect(() => parseHostPort(value)).toThrow(
        `Invalid listen address (expected host:port): ${value}`,
      );
    },
  );
});

describe("createSseApp", () => {
  it("builds an app with no open sessions", () => {
    const workspace = new PolicyWorkspace({ root: FIXTURE_ROOT });
    const { app, sessions } = createSseApp(
      workspace,
      { dataDir: FIXTURE_ROOT, logLevel: "silent", resources: "on" },
      silentLogger,
    );
    expect(typeof app.listen).toBe("function");
    expect(sessions.size).toBe(0);
  });
});
