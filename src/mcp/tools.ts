import type { CycleLog } from "../engine/cycles.js";
import type { ObservationStore } from "../observations/store.js";
import type {
  ObservationSeverity,
  ObservationStatus,
  SourceType,
} from "../types/observation.js";

export interface ObservationToolContext {
  /** Re-read per call so writes from other processes are visible. */
  openStore: () => Promise<ObservationStore>;
  cycles: CycleLog;
}

export interface ListObservationsArgs {
  status?: ObservationStatus[];
  severity?: ObservationSeverity[];
  observer?: string;
  limit?: number;
}

export interface CreateObservationArgs {
  observer: string;
  content: string;
  severity: ObservationSeverity;
  sourceType?: SourceType;
  sourceRef?: string;
  category?: string;
  suggestion?: string;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export async function toolListObservations(
  context: ObservationToolContext,
  args: ListObservationsArgs,
): Promise<string> {
  const store = await context.openStore();
  const observations = await store.list({
    status: args.status ?? ["open", "acknowledged"],
    severity: args.severity,
    observerName: args.observer,
    sortBy: "severity",
    limit: args.limit,
  });
  return toJson({ count: observations.length, observations });
}

export async function toolGetObservation(
  context: ObservationToolContext,
  id: string,
): Promise<string> {
  const store = await context.openStore();
  return toJson(await store.get(id));
}

export async function toolCreateObservation(
  context: ObservationToolContext,
  args: CreateObservationArgs,
): Promise<string> {
  const store = await context.openStore();
  const observation = await store.create({
    observerName: args.observer,
    content: args.content,
    severity: args.severity,
    sourceType: args.sourceType,
    sourceRef: args.sourceRef,
    category: args.category,
    suggestion: args.suggestion,
  });
  return toJson(observation);
}

export async function toolAcknowledgeObservation(
  context: ObservationToolContext,
  id: string,
): Promise<string> {
  const store = await context.openStore();
  return toJson(await store.acknowledge(id));
}

export async function toolResolveObservation(
  context: ObservationToolContext,
  id: string,
  note?: string,
): Promise<string> {
  const store = await context.openStore();
  return toJson(await store.resolve(id, note));
}

export async function toolClearResolved(context: ObservationToolContext): Promise<string> {
  const store = await context.openStore();
  const removed = await store.clearResolved();
  return toJson({ removed });
}

export async function toolLatestCycle(context: ObservationToolContext): Promise<string> {
  const latest = await context.cycles.latest();
  return latest ? toJson(latest) : "No observation cycles recorded yet.";
}
