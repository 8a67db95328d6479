import express from "express";
import { createServer, type Server } from "node:http";

import type { ObservationEngine } from "../engine/engine.js";
import { openEngine } from "../engine/session.js";
import type { Logger } from "../logging.js";
import { createLogger } from "../logging.js";
import { createDashboardApiRouter } from "./api.js";
import { DashboardWebSocketHub } from "./websocket.js";

export interface DashboardServerOptions {
  port?: number;
  sessionId?: string;
  configPath?: string;
}

export interface DashboardApp {
  server: Server;
  wsHub: DashboardWebSocketHub;
}

/** Express app plus websocket hub, not yet listening. */
export function createDashboardApp(engine: ObservationEngine, logger?: Logger): DashboardApp {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const server = createServer(app);
  const wsHub = new DashboardWebSocketHub(
    server,
    (sessionId) => sessionId === engine.sessionId,
  );

  engine.on("cycle-complete", (summary) => {
    wsHub.broadcast({ type: "cycle-complete", sessionId: summary.sessionId, payload: summary });
  });
  engine.on("observations-updated", (sessionId) => {
    wsHub.broadcast({
      type: "observations-updated",
      sessionId,
      payload: { at: new Date().toISOString() },
    });
  });

  app.use("/api", createDashboardApiRouter(engine, wsHub, logger));
  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "API route not found" });
  });

  return { server, wsHub };
}

export async function startDashboardServer(
  options: DashboardServerOptions = {},
): Promise<void> {
  const logger = createLogger("vigil:dashboard");
  const engine = await openEngine({
    sessionId: options.sessionId,
    configPath: options.configPath,
    logger,
  });
  const { server } = createDashboardApp(engine, logger);

  const port = options.port ?? 3333;
  await new Promise<void>((resolve, reject) => {
    server.listen(port, () => {
      process.stdout.write(
        `Vigil dashboard for session ${engine.sessionId} running at http://localhost:${port}\n`,
      );
      resolve();
    });

    server.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(
          new Error(`Failed to start vigil dashboard: port ${port} is already in use.`),
        );
      } else {
        reject(err);
      }
    });
  });
}
