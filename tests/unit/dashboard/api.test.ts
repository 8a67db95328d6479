import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { z } from "zod";

import { statusForError } from "../../../src/dashboard/api.js";
import { createDashboardApp } from "../../../src/dashboard/server.js";
import type { DashboardApp } from "../../../src/dashboard/server.js";
import { parseSubscription } from "../../../src/dashboard/websocket.js";
import { ObservationEngine } from "../../../src/engine/engine.js";
import {
  ConfigError,
  ObservationNotFoundError,
  ObservationStateError,
} from "../../../src/errors.js";
import { MemorySessionStorage } from "../../../src/storage/session-storage.js";
import {
  ScriptedInvoker,
  makeExecution,
  makeObserver,
  makeTempDir,
  removeTempDir,
} from "../../helpers/fixtures.js";

describe("statusForError", () => {
  it("maps domain errors to HTTP statuses", () => {
    expect(statusForError(new ObservationNotFoundError("x"))).toBe(404);
    expect(statusForError(new ObservationStateError("x", "resolved"))).toBe(409);
    expect(statusForError(new ConfigError("bad"))).toBe(400);
    expect(statusForError(new z.ZodError([]))).toBe(400);
    expect(statusForError(new Error("boom"))).toBe(500);
  });
});

describe("parseSubscription", () => {
  it("accepts subscribe messages only", () => {
    expect(parseSubscription('{"type":"subscribe","sessionId":"s1"}')).toEqual({
      type: "subscribe",
      sessionId: "s1",
    });
    expect(parseSubscription('{"type":"unsubscribe","sessionId":"s1"}')).toBeNull();
    expect(parseSubscription('{"type":"subscribe"}')).toBeNull();
    expect(parseSubscription("not json")).toBeNull();
  });
});

describe("dashboard api", () => {
  let rootDir: string;
  let app: DashboardApp;
  let baseUrl: string;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    const engine = await ObservationEngine.open({
      sessionId: "dashboard-test",
      storage: new MemorySessionStorage(),
      config: {
        hooks: [{ trigger: "orchestrator:complete", priority: 5 }],
        execution: makeExecution(),
        observers: [
          makeObserver({
            name: "intent-checker",
            watch: [{ type: "conversation", includeToolCalls: false, includeReasoning: true }],
          }),
        ],
        retention: { cycles: 20 },
      },
      invoker: new ScriptedInvoker({
        "intent-checker": () => ({
          observations: [{ content: "Scope drifted from the request", severity: "medium" }],
          resolved: [],
        }),
      }),
      rootDir,
    });
    app = createDashboardApp(engine);
    await new Promise<void>((resolve) => app.server.listen(0, "127.0.0.1", resolve));
    const address = app.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("dashboard server is not listening on a port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await app.wsHub.close();
    app.server.closeAllConnections();
    await new Promise<void>((resolve) => app.server.close(() => resolve()));
    await removeTempDir(rootDir);
  });

  async function readJson<T extends z.ZodTypeAny>(
    response: Response,
    schema: T,
  ): Promise<z.infer<T>> {
    return schema.parse(await response.json());
  }

  function send(method: string, route: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api${route}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("creates, acknowledges and resolves an observation", async () => {
    const created = await send("POST", "/observations", {
      observer: "reviewer",
      content: "Missing input validation",
      severity: "high",
    });
    expect(created.status).toBe(201);
    const { id } = await readJson(created, z.object({ id: z.string() }));

    const acknowledged = await send("POST", `/observations/${id}/acknowledge`);
    expect(await acknowledged.json()).toMatchObject({ status: "acknowledged" });

    const resolved = await send("POST", `/observations/${id}/resolve`, { note: "validated" });
    expect(await resolved.json()).toMatchObject({ status: "resolved", resolutionNote: "validated" });

    const again = await send("POST", `/observations/${id}/resolve`, {});
    expect(again.status).toBe(409);
  });

  it("validates request bodies and query strings", async () => {
    const badBody = await send("POST", "/observations", {
      observer: "reviewer",
      content: "x",
      severity: "urgent",
    });
    expect(badBody.status).toBe(400);

    const badQuery = await send("GET", "/observations?status=pending");
    expect(badQuery.status).toBe(400);
  });

  it("returns 404 for unknown observations and cycles", async () => {
    expect((await send("GET", "/observations/missing")).status).toBe(404);
    expect((await send("GET", "/cycles/latest")).status).toBe(404);
    expect((await send("GET", "/nothing-here")).status).toBe(404);
  });

  it("runs a cycle and exposes its summary", async () => {
    const triggered = await send("POST", "/trigger", {
      event: "orchestrator:complete",
      transcript: [{ role: "user", content: "add search" }],
    });
    const summary = await readJson(
      triggered,
      z.object({ cycleId: z.string(), created: z.array(z.string()) }),
    );
    expect(summary.created).toHaveLength(1);

    expect(await (await send("GET", "/cycles/latest")).json()).toMatchObject({
      cycleId: summary.cycleId,
    });
    expect(await (await send("GET", "/observations?status=open")).json()).toMatchObject({
      count: 1,
    });
    expect(await (await send("GET", "/session")).json()).toMatchObject({
      sessionId: "dashboard-test",
      open: { medium: 1 },
    });
  });

  it("pushes cycle events to subscribed websocket clients", async () => {
    const socket = new WebSocket(`${baseUrl.replace("http", "ws")}/ws`);
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => resolve());
      socket.once("error", reject);
    });
    const received = new Promise<string>((resolve) => {
      socket.on("message", (data) => {
        const event = z.object({ type: z.string() }).parse(JSON.parse(data.toString()));
        if (event.type === "cycle-complete") {
          resolve(event.type);
        }
      });
    });
    socket.send(JSON.stringify({ type: "subscribe", sessionId: "dashboard-test" }));
    await new Promise((resolve) => setTimeout(resolve, 50));

    await send("POST", "/trigger", {
      transcript: [{ role: "user", content: "add search" }],
    });

    expect(await received).toBe("cycle-complete");
    socket.close();
  });
});
