import { describe, expect, it } from "vitest";

import { HookRegistry } from "../../../src/engine/hooks.js";
import { recordingLogger } from "../../helpers/fixtures.js";

describe("HookRegistry", () => {
  it("runs handlers by ascending priority, then registration order", async () => {
    const registry = new HookRegistry();
    const order: string[] = [];
    registry.register("tool:after", () => void order.push("late"), { priority: 20, name: "late" });
    registry.register("tool:after", () => void order.push("first"), { priority: 1, name: "first" });
    registry.register("tool:after", () => void order.push("default-a"), { name: "default-a" });
    registry.register("tool:after", () => void order.push("default-b"), { name: "default-b" });

    await registry.fire("tool:after");

    expect(order).toEqual(["first", "default-a", "default-b", "late"]);
    expect(registry.handlers("tool:after")).toEqual(["first", "default-a", "default-b", "late"]);
  });

  it("only runs handlers for the fired event", async () => {
    const registry = new HookRegistry();
    let calls = 0;
    registry.register("a", () => {
      calls++;
    });

    expect(await registry.fire("b")).toEqual([]);
    expect(calls).toBe(0);
  });

  it("passes event data and collects results", async () => {
    const registry = new HookRegistry();
    registry.register("prompt:submit", (event, data) => ({
      action: "inject_context",
      context: `${event}:${data.sessionId ?? "none"}`,
      role: "system",
    }));
    registry.register("prompt:submit", () => undefined);

    expect(await registry.fire("prompt:submit", { sessionId: "s1" })).toEqual([
      { action: "inject_context", context: "prompt:submit:s1", role: "system" },
      { action: "continue" },
    ]);
  });

  it("keeps going after a handler throws", async () => {
    const { logger, entries } = recordingLogger();
    const registry = new HookRegistry(logger);
    let reached = false;
    registry.register(
      "x",
      async () => {
        throw new Error("handler broke");
      },
      { name: "broken" },
    );
    registry.register("x", () => {
      reached = true;
    });

    const results = await registry.fire("x");

    expect(reached).toBe(true);
    expect(results).toEqual([{ action: "continue" }, { action: "continue" }]);
    expect(entries[0]).toMatchObject({
      level: "error",
      message: "Hook handler failed",
      error: "handler broke",
      context: { event: "x", hook: "broken" },
    });
  });

  it("unregisters a handler", async () => {
    const registry = new HookRegistry();
    const remove = registry.register("x", () => undefined, { name: "temp" });

    remove();
    remove();

    expect(registry.handlers("x")).toEqual([]);
  });
});
