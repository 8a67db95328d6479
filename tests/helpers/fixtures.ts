/**
 * Shared builders for unit tests.
 */

import { mkdtemp, mkdir, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { ModelInvoker } from "../../src/dispatch/dispatcher.js";
import type { LogEntry, Logger } from "../../src/logging.js";
import { createLogger } from "../../src/logging.js";
import type { Observation } from "../../src/types/observation.js";
import type {
  ExecutionConfig,
  ObserverConfig,
  ObserverInvocation,
  ObserverPayload,
} from "../../src/types/observer.js";

export function makeObserver(overrides: Partial<ObserverConfig> = {}): ObserverConfig {
  return {
    name: "security-auditor",
    description: "Looks for security issues",
    focus: "Report injection and secrets.",
    model: "test-model",
    timeoutSeconds: 30,
    watch: [{ type: "files", paths: ["src/**/*.ts"] }],
    tools: [],
    enabled: true,
    ...overrides,
  };
}

export function makeExecution(overrides: Partial<ExecutionConfig> = {}): ExecutionConfig {
  return {
    mode: "parallel_sync",
    maxConcurrent: 10,
    timeoutPerObserverSeconds: 30,
    onTimeout: "skip",
    ...overrides,
  };
}

export function makeObservation(overrides: Partial<Observation> = {}): Observation {
  return {
    id: "obs-1",
    observerName: "security-auditor",
    content: "Hardcoded credential in config loader",
    severity: "high",
    status: "open",
    sourceType: "file",
    sourceRef: "src/config.ts:8",
    metadata: {},
    createdAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function emptyPayload(): ObserverPayload {
  return { observations: [], resolved: [] };
}

export interface RecordingLogger {
  logger: Logger;
  entries: LogEntry[];
}

export function recordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  return {
    logger: createLogger("test", { level: "debug", sink: (entry) => entries.push(entry) }),
    entries,
  };
}

type Responder = (
  request: ObserverInvocation,
  signal: AbortSignal,
) => ObserverPayload | Promise<ObserverPayload>;

/** Invoker that answers per observer name and records every request. */
export class ScriptedInvoker implements ModelInvoker {
  readonly requests: ObserverInvocation[] = [];

  constructor(private readonly responders: Record<string, Responder> = {}) {}

  async invoke(request: ObserverInvocation, signal: AbortSignal): Promise<ObserverPayload> {
    this.requests.push(request);
    const responder = this.responders[request.observer.name];
    return responder ? responder(request, signal) : emptyPayload();
  }
}

export async function makeTempDir(prefix = "vigil-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Writes a file and pins its mtime so fingerprints are deterministic. */
export async function writeProjectFile(
  rootDir: string,
  relativePath: string,
  content: string,
  mtimeSeconds = 1_700_000_000,
): Promise<void> {
  const filePath = path.join(rootDir, relativePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf8");
  await utimes(filePath, mtimeSeconds, mtimeSeconds);
}

/** Clock that advances one second per call. */
export function steppingClock(start = "2026-01-01T00:00:00.000Z"): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

export function sequentialIds(prefix = "obs"): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}
