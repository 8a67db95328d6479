import { z } from "zod";

import { ConfigError } from "../errors.js";
import type {
  ExecutionConfig,
  HookConfig,
  ObserverReference,
  ObserversModuleConfig,
  WatchTarget,
} from "../types/observer.js";

export const DEFAULT_MODEL = "claude-3-5-haiku-latest";
export const DEFAULT_OBSERVER_TIMEOUT_SECONDS = 30;
export const DEFAULT_HOOK_TRIGGER = "orchestrator:complete";
export const DEFAULT_CYCLE_RETENTION = 20;

export const DEFAULT_EXECUTION: ExecutionConfig = {
  mode: "parallel_sync",
  maxConcurrent: 10,
  timeoutPerObserverSeconds: 30,
  onTimeout: "skip",
};

const positiveInt = z.number().int().positive();

const watchSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("files"),
    paths: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    type: z.literal("conversation"),
    include_tool_calls: z.boolean().default(true),
    include_reasoning: z.boolean().default(true),
  }),
]);

const hookSchema = z.object({
  trigger: z.string().min(1),
  priority: z.number().int().default(5),
});

const executionSchema = z.object({
  mode: z.literal("parallel_sync").default("parallel_sync"),
  max_concurrent: positiveInt.default(DEFAULT_EXECUTION.maxConcurrent),
  timeout_per_observer: z
    .number()
    .positive()
    .default(DEFAULT_EXECUTION.timeoutPerObserverSeconds),
  on_timeout: z.enum(["skip", "fail"]).default(DEFAULT_EXECUTION.onTimeout),
});

const referenceSchema = z.object({
  observer: z.string().min(1),
  watch: z.array(watchSchema).min(1),
  model: z.string().min(1).optional(),
  timeout: z.number().positive().optional(),
  enabled: z.boolean().default(true),
});

const moduleSchema = z.object({
  hooks: z.array(hookSchema).default([]),
  execution: executionSchema.default({}),
  observers: z.array(referenceSchema).default([]),
  retention: z
    .object({ cycles: positiveInt.default(DEFAULT_CYCLE_RETENTION) })
    .default({}),
});

/** Frontmatter of a markdown observer definition. */
export const observerDefinitionSchema = z.object({
  observer: z
    .object({
      name: z.string().min(1).optional(),
      description: z.string().default(""),
      model: z.string().min(1).optional(),
      timeout: z.number().positive().optional(),
    })
    .default({}),
  tools: z.array(z.string()).default([]),
});

export type ObserverDefinitionFrontmatter = z.infer<typeof observerDefinitionSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function toWatchTarget(raw: z.infer<typeof watchSchema>): WatchTarget {
  if (raw.type === "files") {
    return { type: "files", paths: raw.paths };
  }
  return {
    type: "conversation",
    includeToolCalls: raw.include_tool_calls,
    includeReasoning: raw.include_reasoning,
  };
}

export function normalizeModuleConfig(value: unknown): ObserversModuleConfig {
  const parsed = moduleSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid observers config: ${describeIssues(parsed.error)}`);
  }

  const raw = parsed.data;
  const hooks: HookConfig[] =
    raw.hooks.length > 0
      ? raw.hooks
      : [{ trigger: DEFAULT_HOOK_TRIGGER, priority: 5 }];

  const observers: ObserverReference[] = raw.observers.map((reference) => ({
    observer: reference.observer,
    watch: reference.watch.map(toWatchTarget),
    model: reference.model,
    timeout: reference.timeout,
    enabled: reference.enabled,
  }));

  return {
    hooks,
    execution: {
      mode: raw.execution.mode,
      maxConcurrent: raw.execution.max_concurrent,
      timeoutPerObserverSeconds: raw.execution.timeout_per_observer,
      onTimeout: raw.execution.on_timeout,
    },
    observers,
    retention: { cycles: raw.retention.cycles },
  };
}

export function normalizeObserverDefinition(
  value: unknown,
  source: string,
): ObserverDefinitionFrontmatter {
  const parsed = observerDefinitionSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid observer definition ${source}: ${describeIssues(parsed.error)}`,
      { source },
    );
  }
  return parsed.data;
}
