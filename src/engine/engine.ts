import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import path from "node:path";

import { ChangeDetector } from "../detection/change-detector.js";
import type { ChangeSet } from "../detection/change-detector.js";
import { FingerprintStore } from "../detection/fingerprint.js";
import { normalizePath } from "../detection/glob.js";
import type {
  DispatchOutcome,
  ModelInvoker,
  ObserverResult,
} from "../dispatch/dispatcher.js";
import { dispatchObservers } from "../dispatch/dispatcher.js";
import { describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import { ObservationStore } from "../observations/store.js";
import { Reconciler } from "../reconcile/reconciler.js";
import type { SessionStorage } from "../storage/session-storage.js";
import { validateSessionId } from "../storage/session-storage.js";
import type { Observation } from "../types/observation.js";
import { emptySeverityCounts } from "../types/observation.js";
import type {
  ResolvedObserversConfig,
  TranscriptMessage,
  WatchTarget,
} from "../types/observer.js";
import { Mutex } from "../util/semaphore.js";
import type { CycleSummary, ObserverOutcome } from "./cycles.js";
import { CycleLog, createCycleId } from "./cycles.js";

export interface CycleTrigger {
  event: string;
  transcript?: TranscriptMessage[];
}

export interface ObservationEngineOptions {
  sessionId: string;
  storage: SessionStorage;
  config: ResolvedObserversConfig;
  invoker: ModelInvoker;
  /** Directory file watch globs are relative to. */
  rootDir: string;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export interface ObservationEngineEvents {
  "cycle-complete": (summary: CycleSummary) => void;
  "observations-updated": (sessionId: string) => void;
}

const ACTIVE_STATUSES: Observation["status"][] = ["open", "acknowledged"];

const sessionLocks = new Map<string, Mutex>();

function sessionLock(sessionId: string): Mutex {
  let lock = sessionLocks.get(sessionId);
  if (!lock) {
    lock = new Mutex();
    sessionLocks.set(sessionId, lock);
  }
  return lock;
}

function watchTargets(config: ResolvedObserversConfig): WatchTarget[] {
  return config.observers
    .filter((observer) => observer.enabled)
    .flatMap((observer) => observer.watch);
}

/** Glob covering the storage directory when it sits inside the project. */
export function stateIgnoreGlobs(rootDir: string, storage: SessionStorage): string[] {
  if (!storage.directory) {
    return [];
  }
  const relative = path.relative(rootDir, storage.directory);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return [];
  }
  return [`${normalizePath(relative)}/**`];
}

/**
 * Keys that must stay unreviewed: changed keys matched by an observer that
 * did not complete, so the next trigger sees them as changed again.
 */
export function withheldKeys(outcomes: Array<{ result: ObserverResult; applied: boolean }>): Set<string> {
  const withheld = new Set<string>();
  for (const { result, applied } of outcomes) {
    if (result.status !== "success" || !applied) {
      for (const key of result.matchedKeys) {
        withheld.add(key);
      }
    }
  }
  return withheld;
}

/**
 * Runs observation cycles for one session: detect, dispatch, reconcile,
 * then commit fingerprints and record the cycle.
 */
export class ObservationEngine extends EventEmitter {
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly reconciler: Reconciler;
  private readonly cycles: CycleLog;

  private constructor(
    private readonly options: ObservationEngineOptions,
    readonly store: ObservationStore,
  ) {
    super();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.reconciler = new Reconciler(store, options.logger?.child("reconcile"));
    this.cycles = new CycleLog(options.storage, options.sessionId);
  }

  static async open(options: ObservationEngineOptions): Promise<ObservationEngine> {
    validateSessionId(options.sessionId);
    const store = await ObservationStore.load({
      storage: options.storage,
      sessionId: options.sessionId,
      now: options.now,
    });
    return new ObservationEngine(options, store);
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  get config(): ResolvedObserversConfig {
    return this.options.config;
  }

  get cycleLog(): CycleLog {
    return this.cycles;
  }

  override on<K extends keyof ObservationEngineEvents>(
    event: K,
    listener: ObservationEngineEvents[K],
  ): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof ObservationEngineEvents>(
    event: K,
    ...args: Parameters<ObservationEngineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /** Open and acknowledged observations, most urgent first. */
  activeObservations(): Promise<Observation[]> {
    return this.store.list({ status: ACTIVE_STATUSES, sortBy: "severity" });
  }

  runCycle(trigger: CycleTrigger): Promise<CycleSummary> {
    return sessionLock(this.options.sessionId).runExclusive(() => this.cycle(trigger));
  }

  private async cycle(trigger: CycleTrigger): Promise<CycleSummary> {
    const { config, logger } = this.options;
    const startedAt = this.now();
    const cycleId = createCycleId(startedAt, this.generateId().slice(0, 8));
    const log = logger?.child("cycle");

    const fingerprints = await FingerprintStore.load(
      this.options.storage,
      this.options.sessionId,
    );
    const detector = new ChangeDetector(fingerprints, {
      now: this.now,
      logger: logger?.child("detect"),
    });
    const changes = await detector.detectChanges(watchTargets(config), {
      rootDir: this.options.rootDir,
      transcript: trigger.transcript,
      ignore: stateIgnoreGlobs(this.options.rootDir, this.options.storage),
    });

    const outcomes: ObserverOutcome[] = [];
    const settled: Array<{ result: ObserverResult; applied: boolean }> = [];
    const newBySeverity = emptySeverityCounts();

    let dispatch: DispatchOutcome;
    try {
      dispatch = await dispatchObservers({
        observers: config.observers,
        execution: config.execution,
        source: {
          rootDir: this.options.rootDir,
          changedKeys: changes.changedKeys,
          deletedFiles: changes.deletedFiles,
          conversationDelta: changes.conversationDelta,
        },
        invoker: this.options.invoker,
        openObservations: () => this.activeObservations(),
        onResult: async (result) => {
          const outcome = await this.reconcile(result, newBySeverity);
          settled.push({ result, applied: outcome.status === "success" });
          outcomes.push(outcome);
        },
        logger: logger?.child("dispatch"),
        generateResultId: this.generateId,
      });
    } finally {
      this.reconciler.forgetApplied();
    }

    const withheld = withheldKeys(settled);
    const committedKeys = await detector.commit(
      changes,
      [...changes.inspectedKeys].filter((key) => !withheld.has(key)),
    );

    const summary = await this.summarize({
      cycleId,
      trigger,
      startedAt,
      changes,
      dispatched: dispatch.dispatched,
      notDispatched: dispatch.notDispatched,
      outcomes: dispatch.dispatched.flatMap((name) =>
        outcomes.filter((outcome) => outcome.observer === name),
      ),
      newBySeverity,
      committedKeys,
      withheldKeys: [...withheld].sort(),
    });

    if (summary.dispatched.length > 0) {
      await this.cycles.save(summary);
      await this.cycles.prune(config.retention.cycles);
    }

    log?.info("Observation cycle finished", {
      event: trigger.event,
      dispatched: summary.dispatched.length,
      created: summary.created.length,
      resolved: summary.resolved.length,
      failed: summary.failed,
    });

    this.emit("cycle-complete", summary);
    if (summary.created.length > 0 || summary.resolved.length > 0) {
      this.emit("observations-updated", this.options.sessionId);
    }
    return summary;
  }

  private async reconcile(
    result: ObserverResult,
    newBySeverity: CycleSummary["newBySeverity"],
  ): Promise<ObserverOutcome> {
    const base = {
      observer: result.observerName,
      durationMs: result.durationMs,
      created: [],
      resolved: [],
      ignored: [],
    };

    if (result.status !== "success") {
      return {
        ...base,
        status: result.status,
        reason: result.reason,
        error: result.error.message,
      };
    }

    try {
      const applied = await this.reconciler.apply(result);
      if (applied.applied) {
        for (const draft of result.payload.observations) {
          newBySeverity[draft.severity]++;
        }
      }
      return {
        ...base,
        status: "success",
        created: applied.created,
        resolved: applied.resolved,
        ignored: applied.ignored.map((ignored) => ignored.id),
      };
    } catch (error) {
      this.options.logger?.error("Could not apply observer result", error, {
        observer: result.observerName,
      });
      return {
        ...base,
        status: "failed",
        reason: "reconciliation",
        error: describeError(error),
      };
    }
  }

  private async summarize(input: {
    cycleId: string;
    trigger: CycleTrigger;
    startedAt: Date;
    changes: ChangeSet;
    dispatched: string[];
    notDispatched: string[];
    outcomes: ObserverOutcome[];
    newBySeverity: CycleSummary["newBySeverity"];
    committedKeys: string[];
    withheldKeys: string[];
  }): Promise<CycleSummary> {
    return {
      cycleId: input.cycleId,
      sessionId: this.options.sessionId,
      event: input.trigger.event,
      startedAt: input.startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      dispatched: input.dispatched,
      notDispatched: input.notDispatched,
      outcomes: input.outcomes,
      created: input.outcomes.flatMap((outcome) => outcome.created),
      resolved: input.outcomes.flatMap((outcome) => outcome.resolved),
      newBySeverity: input.newBySeverity,
      openBySeverity: await this.store.countBySeverity({ status: "open" }),
      detectionErrors: input.changes.errors.map((error) => error.message),
      committedKeys: [...input.committedKeys].sort(),
      withheldKeys: input.withheldKeys,
      failed: input.outcomes.some((outcome) => outcome.status === "failed"),
    };
  }
}
