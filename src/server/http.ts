import type { Server as HttpServer } from "node:http";
import express from "express";
import type { Express, Request, Response } from "express";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { NetpolLensConfig } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { PolicyWorkspace } from "../workspace/workspace.js";
import { SERVER_NAME, SERVER_VERSION, createServer } from "./index.js";

export const SSE_PATH = "/sse";
export const MESSAGES_PATH = "/messages";

export interface HttpAddress {
  host: string;
  port: number;
}

/**
 * Parse a `host:port` listen address. The host is everything before the
 * first colon.
 */
export function parseHostPort(value: string): HttpAddress {
  const colon = value.indexOf(":");
  const host = colon > 0 ? value.slice(0, colon) : "";
  const portText = colon > 0 ? value.slice(colon + 1) : "";
  const port = Number(portText);
  if (!host || !/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new Error(`Invalid listen address (expected host:port): ${value}`);
  }
  return { host, port };
}

export interface SseApp {
  app: Express;
  /** Open SSE sessions by session id */
  sessions: Map<string, SSEServerTransport>;
}

/**
 * Express app serving the tool server over SSE. Each `GET /sse` stream gets
 * its own server instance bound to the shared workspace; clients post
 * messages to `/messages?sessionId=...`.
 */
export function createSseApp(
  workspace: PolicyWorkspace,
  config: NetpolLensConfig,
  logger: Logger,
): SseApp {
  const app = express();
  const sessions = new Map<string, SSEServerTransport>();

  app.get(SSE_PATH, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    sessions.set(transport.sessionId, transport);
    res.on("close", () => {
      sessions.delete(transport.sessionId);
      logger.debug(`sse session ${transport.sessionId} closed`);
    });

    try {
      await createServer(workspace, config).connect(transport);
      logger.debug(`sse session ${transport.sessionId} opened`);
    } catch (err) {
      sessions.delete(transport.sessionId);
      logger.error("sse connect failed:", err);
    }
  });

  app.post(MESSAGES_PATH, async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
    const transport = sessions.get(sessionId);
    if (!transport) {
      res.status(400).send(`Unknown session: ${sessionId}`);
      return;
    }
    try {
      await transport.handlePostMessage(req, res);
    } catch (err) {
      logger.error(`sse message for ${sessionId} failed:`, err);
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      service: SERVER_NAME,
      version: SERVER_VERSION,
      data_dir: workspace.root,
    });
  });

  return { app, sessions };
}

/**
 * Serve the workspace over HTTP/SSE until SIGINT/SIGTERM.
 */
export async function startHttpServer(
  config: NetpolLensConfig,
  logger: Logger,
  address: HttpAddress,
): Promise<HttpServer> {
  const workspace = new PolicyWorkspace({ root: config.dataDir, logger });
  const { app, sessions } = createSseApp(workspace, config, logger);

  const httpServer = await new Promise<HttpServer>((resolveListen, reject) => {
    const listener = app.listen(address.port, address.host, () => resolveListen(listener));
    listener.once("error", reject);
  });
  logger.info(
    `serving ${workspace.healthcheck()} at http://${address.host}:${address.port}${SSE_PATH} (resources ${config.resources})`,
  );

  const shutdown = async (signal: string) => {
    logger.info(`received ${signal}, shutting down`);
    for (const transport of sessions.values()) {
      try {
        await transport.close();
      } catch (err) {
        logger.error("error closing sse session:", err);
      }
    }
    httpServer.close(() => process.exit(0));
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  return httpServer;
}
