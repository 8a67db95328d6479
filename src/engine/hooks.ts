import type { Logger } from "../logging.js";
import type { TranscriptMessage } from "../types/observer.js";

export interface HookEventData {
  sessionId?: string;
  messages?: TranscriptMessage[];
  [key: string]: unknown;
}

export type HookResult =
  | { action: "continue" }
  | { action: "inject_context"; context: string; role: "system" };

export type HookHandler = (
  event: string,
  data: HookEventData,
) => Promise<HookResult | void> | HookResult | void;

export interface HookRegistration {
  priority?: number;
  name?: string;
}

interface RegisteredHook {
  trigger: string;
  handler: HookHandler;
  priority: number;
  name: string;
  order: number;
}

export const DEFAULT_HOOK_PRIORITY = 5;

/**
 * Event name to handler list. Lower priority numbers run first; handlers
 * with equal priority run in registration order.
 */
export class HookRegistry {
  private readonly hooks: RegisteredHook[] = [];
  private registrations = 0;

  constructor(private readonly logger?: Logger) {}

  register(
    trigger: string,
    handler: HookHandler,
    options: HookRegistration = {},
  ): () => void {
    const hook: RegisteredHook = {
      trigger,
      handler,
      priority: options.priority ?? DEFAULT_HOOK_PRIORITY,
      name: options.name ?? `hook-${this.registrations + 1}`,
      order: this.registrations++,
    };
    this.hooks.push(hook);

    return () => {
      const index = this.hooks.indexOf(hook);
      if (index >= 0) {
        this.hooks.splice(index, 1);
      }
    };
  }

  handlers(trigger: string): string[] {
    return this.sorted(trigger).map((hook) => hook.name);
  }

  async fire(event: string, data: HookEventData = {}): Promise<HookResult[]> {
    const results: HookResult[] = [];
    for (const hook of this.sorted(event)) {
      try {
        const result = await hook.handler(event, data);
        results.push(result ?? { action: "continue" });
      } catch (error) {
        this.logger?.error("Hook handler failed", error, { event, hook: hook.name });
        results.push({ action: "continue" });
      }
    }
    return results;
  }

  private sorted(trigger: string): RegisteredHook[] {
    return this.hooks
      .filter((hook) => hook.trigger === trigger)
      .sort((left, right) => left.priority - right.priority || left.order - right.order);
  }
}
