import type { Server } from "node:http";

import { WebSocket, WebSocketServer } from "ws";

export interface DashboardWsEvent {
  type: "cycle-complete" | "observations-updated";
  sessionId: string;
  payload: unknown;
}

interface SubscriptionMessage {
  type: "subscribe";
  sessionId: string;
}

interface ClientState {
  socket: WebSocket;
  subscriptions: Set<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseSubscription(raw: string): SubscriptionMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed["type"] !== "subscribe") {
    return null;
  }
  const sessionId = parsed["sessionId"];
  return typeof sessionId === "string" ? { type: "subscribe", sessionId } : null;
}

/** Pushes engine events to clients subscribed to the event's session. */
export class DashboardWebSocketHub {
  private readonly clients = new Set<ClientState>();
  private readonly wss: WebSocketServer;

  constructor(
    server: Server,
    private readonly isKnownSession: (sessionId: string) => boolean,
  ) {
    this.wss = new WebSocketServer({ server, path: "/ws", maxPayload: 64 * 1024 });
    this.wss.on("connection", (socket) => {
      const state: ClientState = { socket, subscriptions: new Set() };
      this.clients.add(state);

      socket.on("message", (raw) => {
        const msg = parseSubscription(raw.toString());
        if (!msg || !this.isKnownSession(msg.sessionId)) {
          return;
        }
        state.subscriptions.add(msg.sessionId);
      });

      socket.on("close", () => {
        this.clients.delete(state);
      });
    });
  }

  get clientCount(): number {
    return this.clients.size;
  }

  broadcast(event: DashboardWsEvent): void {
    const text = JSON.stringify(event);
    for (const state of this.clients) {
      if (!state.subscriptions.has(event.sessionId)) {
        continue;
      }
      if (state.socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      state.socket.send(text);
    }
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
