import { startMcpServer } from "../../mcp/server.js";
import { toPositiveInt } from "../flags.js";

export async function runMcpCommand(
  transportArg?: string,
  portArg?: string,
  sessionId?: string,
): Promise<void> {
  const transport = transportArg === "sse" ? "sse" : "stdio";
  const port = toPositiveInt(portArg, "--port") ?? 3001;
  await startMcpServer({ transport, port, sessionId });
}
