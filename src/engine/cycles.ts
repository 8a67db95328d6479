import { z } from "zod";

import { DEFAULT_CYCLE_RETENTION } from "../config/schema.js";
import { StorageError } from "../errors.js";
import type { SessionStorage } from "../storage/session-storage.js";
import type { SeverityCounts } from "../types/observation.js";

export const CYCLES_PREFIX = "cycles";

export type ObserverOutcomeStatus = "success" | "skipped" | "failed";

export interface ObserverOutcome {
  observer: string;
  status: ObserverOutcomeStatus;
  reason?: "timeout" | "invocation" | "reconciliation";
  error?: string;
  durationMs: number;
  created: string[];
  resolved: string[];
  ignored: string[];
}

export interface CycleSummary {
  cycleId: string;
  sessionId: string;
  event: string;
  startedAt: string;
  finishedAt: string;
  dispatched: string[];
  notDispatched: string[];
  outcomes: ObserverOutcome[];
  created: string[];
  resolved: string[];
  newBySeverity: SeverityCounts;
  openBySeverity: SeverityCounts;
  detectionErrors: string[];
  committedKeys: string[];
  withheldKeys: string[];
  failed: boolean;
}

const severityCountsSchema = z.object({
  critical: z.number(),
  high: z.number(),
  medium: z.number(),
  low: z.number(),
  info: z.number(),
}) satisfies z.ZodType<SeverityCounts>;

const outcomeSchema = z.object({
  observer: z.string(),
  status: z.enum(["success", "skipped", "failed"]),
  reason: z.enum(["timeout", "invocation", "reconciliation"]).optional(),
  error: z.string().optional(),
  durationMs: z.number(),
  created: z.array(z.string()),
  resolved: z.array(z.string()),
  ignored: z.array(z.string()),
});

const summarySchema = z.object({
  cycleId: z.string(),
  sessionId: z.string(),
  event: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  dispatched: z.array(z.string()),
  notDispatched: z.array(z.string()),
  outcomes: z.array(outcomeSchema),
  created: z.array(z.string()),
  resolved: z.array(z.string()),
  newBySeverity: severityCountsSchema,
  openBySeverity: severityCountsSchema,
  detectionErrors: z.array(z.string()),
  committedKeys: z.array(z.string()),
  withheldKeys: z.array(z.string()),
  failed: z.boolean(),
});

/** Sortable id that is also a valid storage key segment. */
export function createCycleId(startedAt: Date, suffix: string): string {
  return `${startedAt.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

function cycleKey(cycleId: string): string {
  return `${CYCLES_PREFIX}/${cycleId}`;
}

function toKeepCount(keep: number): number {
  return Number.isFinite(keep) && keep > 0 ? Math.floor(keep) : 1;
}

export class CycleLog {
  constructor(
    private readonly storage: SessionStorage,
    private readonly sessionId: string,
  ) {}

  async save(summary: CycleSummary): Promise<void> {
    await this.storage.write(this.sessionId, cycleKey(summary.cycleId), summary);
  }

  /** Newest first. */
  async listIds(): Promise<string[]> {
    const keys = await this.storage.list(this.sessionId, CYCLES_PREFIX);
    return keys
      .map((key) => key.slice(CYCLES_PREFIX.length + 1))
      .sort((left, right) => right.localeCompare(left));
  }

  async get(cycleId: string): Promise<CycleSummary | null> {
    const raw = await this.storage.read(this.sessionId, cycleKey(cycleId));
    if (raw === null) {
      return null;
    }
    const parsed = summarySchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError(`Stored cycle summary ${cycleId} is invalid`);
    }
    return parsed.data;
  }

  async latest(): Promise<CycleSummary | null> {
    const [newest] = await this.listIds();
    return newest === undefined ? null : this.get(newest);
  }

  /** Removes all but the newest `keep` summaries; returns removed ids. */
  async prune(keep: number = DEFAULT_CYCLE_RETENTION): Promise<string[]> {
    const ids = await this.listIds();
    const toDelete = ids.slice(toKeepCount(keep));
    await Promise.all(
      toDelete.map((cycleId) => this.storage.remove(this.sessionId, cycleKey(cycleId))),
    );
    return toDelete;
  }
}
