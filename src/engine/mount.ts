import type { ObservationEngine } from "./engine.js";
import type { HookRegistry } from "./hooks.js";
import { formatObservationReminder } from "./reminder.js";

export const REMINDER_TRIGGER = "prompt:submit";
export const REMINDER_PRIORITY = 10;

/**
 * Wires an engine into a host's hook registry: a cycle on every configured
 * trigger, and the open-observation reminder ahead of each prompt.
 * Returns a function that removes every registration.
 */
export function mountObservationHooks(
  registry: HookRegistry,
  engine: ObservationEngine,
): () => void {
  const unregister: Array<() => void> = [];

  for (const hook of engine.config.hooks) {
    unregister.push(
      registry.register(
        hook.trigger,
        async (event, data) => {
          await engine.runCycle({ event, transcript: data.messages });
          return { action: "continue" };
        },
        { priority: hook.priority, name: "observations" },
      ),
    );
  }

  unregister.push(
    registry.register(
      REMINDER_TRIGGER,
      async () => {
        const open = await engine.store.list({ status: "open", sortBy: "severity" });
        const context = formatObservationReminder(open);
        return context === null
          ? { action: "continue" }
          : { action: "inject_context", context, role: "system" };
      },
      { priority: REMINDER_PRIORITY, name: "observations-reminder" },
    ),
  );

  return () => {
    for (const remove of unregister) {
      remove();
    }
  };
}
