import { openObservationStore } from "../../engine/session.js";
import type {
  ObservationQuery,
  ObservationSeverity,
  ObservationStatus,
} from "../../types/observation.js";
import { isSeverity, isStatus } from "../../types/observation.js";
import {
  formatObservationDetail,
  formatObservationLine,
} from "../format.js";

export interface ListCommandOptions {
  sessionId?: string;
  status?: string[];
  severity?: string[];
  observer?: string;
  sort?: string;
  limit?: number;
  json: boolean;
}

function toStatuses(values: string[] | undefined): ObservationStatus[] | undefined {
  if (!values) {
    return undefined;
  }
  return values.map((value) => {
    if (!isStatus(value)) {
      throw new Error(`Invalid status: ${value}`);
    }
    return value;
  });
}

function toSeverities(values: string[] | undefined): ObservationSeverity[] | undefined {
  if (!values) {
    return undefined;
  }
  return values.map((value) => {
    if (!isSeverity(value)) {
      throw new Error(`Invalid severity: ${value}`);
    }
    return value;
  });
}

function toSort(value: string | undefined): ObservationQuery["sortBy"] {
  if (value === undefined || value === "severity" || value === "createdAt") {
    return value ?? "severity";
  }
  throw new Error(`Invalid --sort value: ${value}. Expected severity or createdAt.`);
}

export async function runListCommand(options: ListCommandOptions): Promise<void> {
  const store = await openObservationStore(options.sessionId);
  const observations = await store.list({
    status: toStatuses(options.status),
    severity: toSeverities(options.severity),
    observerName: options.observer,
    sortBy: toSort(options.sort),
    limit: options.limit,
  });

  if (options.json) {
    process.stdout.write(`${JSON.stringify(observations, null, 2)}\n`);
    return;
  }

  if (observations.length === 0) {
    process.stdout.write("No observations.\n");
    return;
  }
  for (const observation of observations) {
    process.stdout.write(`${formatObservationLine(observation)}\n`);
  }
}

export async function runShowCommand(
  id: string,
  sessionId: string | undefined,
  json: boolean,
): Promise<void> {
  const store = await openObservationStore(sessionId);
  const observation = await store.get(id);
  process.stdout.write(
    json
      ? `${JSON.stringify(observation, null, 2)}\n`
      : `${formatObservationDetail(observation)}\n`,
  );
}

export async function runAckCommand(id: string, sessionId?: string): Promise<void> {
  const store = await openObservationStore(sessionId);
  const observation = await store.acknowledge(id);
  process.stdout.write(`Acknowledged ${observation.id}\n`);
}

export async function runResolveCommand(
  id: string,
  sessionId?: string,
  note?: string,
): Promise<void> {
  const store = await openObservationStore(sessionId);
  const observation = await store.resolve(id, note);
  process.stdout.write(`Resolved ${observation.id}\n`);
}

export async function runClearCommand(sessionId?: string): Promise<void> {
  const store = await openObservationStore(sessionId);
  const removed = await store.clearResolved();
  process.stdout.write(`Cleared ${removed} resolved observation(s)\n`);
}
