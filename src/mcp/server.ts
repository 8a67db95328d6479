import { createServer } from "node:http";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";

import { openCycleLog, openObservationStore, resolveSessionId } from "../engine/session.js";
import { describeError } from "../errors.js";
import { SEVERITIES, SOURCE_TYPES, VALID_STATUSES } from "../types/observation.js";
import type { ObservationToolContext } from "./tools.js";
import {
  toolAcknowledgeObservation,
  toolClearResolved,
  toolCreateObservation,
  toolGetObservation,
  toolLatestCycle,
  toolListObservations,
  toolResolveObservation,
} from "./tools.js";

type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

async function respond(run: () => Promise<string>): Promise<ToolResponse> {
  try {
    return { content: [{ type: "text", text: await run() }] };
  } catch (error) {
    return { content: [{ type: "text", text: describeError(error) }], isError: true };
  }
}

function registerObservationTools(server: McpServer, context: ObservationToolContext): void {
  server.registerTool(
    "vigil_list_observations",
    {
      description: "List observations, most severe first (open and acknowledged by default)",
      inputSchema: {
        status: z.array(z.enum(VALID_STATUSES)).optional().describe("Statuses to include"),
        severity: z.array(z.enum(SEVERITIES)).optional().describe("Severities to include"),
        observer: z.string().optional().describe("Only observations from this observer"),
        limit: z.number().int().positive().optional().describe("Maximum number to return"),
      },
    },
    async (args) => respond(() => toolListObservations(context, args)),
  );

  server.registerTool(
    "vigil_get_observation",
    {
      description: "Get one observation by id",
      inputSchema: { id: z.string().describe("Observation id") },
    },
    async ({ id }) => respond(() => toolGetObservation(context, id)),
  );

  server.registerTool(
    "vigil_create_observation",
    {
      description: "Record an observation manually",
      inputSchema: {
        observer: z.string().min(1).describe("Name to record as the observer"),
        content: z.string().min(1).describe("Description of the issue"),
        severity: z.enum(SEVERITIES).describe("Severity"),
        sourceType: z.enum(SOURCE_TYPES).optional().describe("What the issue was found in"),
        sourceRef: z.string().optional().describe("File:line or other reference"),
        category: z.string().optional().describe("Category"),
        suggestion: z.string().optional().describe("How to fix it"),
      },
    },
    async (args) => respond(() => toolCreateObservation(context, args)),
  );

  server.registerTool(
    "vigil_acknowledge_observation",
    {
      description: "Mark an open observation as acknowledged",
      inputSchema: { id: z.string().describe("Observation id") },
    },
    async ({ id }) => respond(() => toolAcknowledgeObservation(context, id)),
  );

  server.registerTool(
    "vigil_resolve_observation",
    {
      description: "Resolve an observation",
      inputSchema: {
        id: z.string().describe("Observation id"),
        note: z.string().optional().describe("Resolution note"),
      },
    },
    async ({ id, note }) => respond(() => toolResolveObservation(context, id, note)),
  );

  server.registerTool(
    "vigil_clear_resolved",
    { description: "Delete every resolved observation" },
    async () => respond(() => toolClearResolved(context)),
  );

  server.registerTool(
    "vigil_latest_cycle",
    { description: "Summary of the most recent observation cycle" },
    async () => respond(() => toolLatestCycle(context)),
  );
}

export function createVigilMcpServer(sessionId?: string): McpServer {
  const session = resolveSessionId(sessionId);
  const server = new McpServer({
    name: "vigil-mcp",
    version: "0.1.0",
  });
  registerObservationTools(server, {
    openStore: () => openObservationStore(session),
    cycles: openCycleLog(session),
  });
  return server;
}

export interface McpServerOptions {
  transport?: "stdio" | "sse";
  port?: number;
  sessionId?: string;
}

export async function startMcpServer(options: McpServerOptions = {}): Promise<void> {
  const transport = options.transport ?? "stdio";
  const port = options.port ?? 3001;

  if (transport === "stdio") {
    const server = createVigilMcpServer(options.sessionId);
    const stdio = new StdioServerTransport();
    await server.connect(stdio);
    process.stderr.write("Vigil MCP server running on stdio\n");
    return;
  }

  const MAX_BODY_BYTES = 1 * 1024 * 1024; // 1 MiB
  const sharedServer = createVigilMcpServer(options.sessionId);

  const httpServer = createServer((req, res) => {
    if (!req.url || req.url !== "/mcp") {
      res.statusCode = 404;
      res.end("Not found");
      return;
    }

    if (req.method !== "POST") {
      res.statusCode = 405;
      res.end("Method not allowed");
      return;
    }

    let raw = "";
    let overflow = false;
    req.on("data", (chunk: Buffer) => {
      if (overflow) {
        return;
      }

      raw += chunk.toString();
      if (raw.length > MAX_BODY_BYTES) {
        overflow = true;
        res.statusCode = 413;
        res.end("Request body too large");
      }
    });

    req.on("end", () => {
      if (overflow) {
        return;
      }

      void (async () => {
        try {
          const parsed: unknown = raw.trim().length > 0 ? JSON.parse(raw) : undefined;
          const streamable = new StreamableHTTPServerTransport({
            sessionIdGenerator: undefined,
          });

          await sharedServer.connect(streamable);
          await streamable.handleRequest(req, res, parsed);

          res.on("close", () => {
            void streamable.close();
          });
        } catch (error) {
          res.statusCode = 500;
          res.end(`MCP request failed: ${describeError(error)}`);
        }
      })();
    });
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(port, () => resolve());
  });

  httpServer.on("close", () => {
    void sharedServer.close();
  });

  process.stderr.write(`Vigil MCP server running on http://localhost:${port}/mcp\n`);
}
