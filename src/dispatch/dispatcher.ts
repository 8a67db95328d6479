import { randomUUID } from "node:crypto";

import type { VigilError } from "../errors.js";
import {
  ObserverInvocationError,
  ObserverTimeoutError,
  describeError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import type { Observation } from "../types/observation.js";
import type {
  ExecutionConfig,
  ObserverConfig,
  ObserverInvocation,
  ObserverPayload,
} from "../types/observer.js";
import { matchingKeys } from "../detection/glob.js";
import { Semaphore } from "../util/semaphore.js";
import type { ReviewSource } from "./review-content.js";
import { buildReviewContent, formatConversation } from "./review-content.js";

/** Runs one observer against its review content. Must honour `signal`. */
export interface ModelInvoker {
  invoke(request: ObserverInvocation, signal: AbortSignal): Promise<ObserverPayload>;
}

export type FailureReason = "timeout" | "invocation";

interface ResultBase {
  observerName: string;
  /** Changed keys that caused this observer to run. */
  matchedKeys: string[];
  durationMs: number;
}

export interface ObserverSuccess extends ResultBase {
  status: "success";
  resultId: string;
  payload: ObserverPayload;
}

export interface ObserverFailure extends ResultBase {
  status: "skipped" | "failed";
  reason: FailureReason;
  error: VigilError;
}

export type ObserverResult = ObserverSuccess | ObserverFailure;

export interface DispatchRequest {
  observers: ObserverConfig[];
  execution: ExecutionConfig;
  source: ReviewSource;
  invoker: ModelInvoker;
  /** Read when each unit starts so later units see earlier reconciliations. */
  openObservations: () => Promise<Observation[]>;
  /** Called as each unit settles, outside the concurrency slot. */
  onResult?: (result: ObserverResult) => Promise<void> | void;
  logger?: Logger;
  generateResultId?: () => string;
  now?: () => number;
}

export interface DispatchOutcome {
  dispatched: string[];
  notDispatched: string[];
  results: ObserverResult[];
}

export function effectiveTimeoutMs(
  observer: Pick<ObserverConfig, "timeoutSeconds">,
  execution: Pick<ExecutionConfig, "timeoutPerObserverSeconds">,
): number {
  return Math.min(observer.timeoutSeconds, execution.timeoutPerObserverSeconds) * 1000;
}

/**
 * Changed keys an observer would actually be shown. A conversation change
 * counts only when something survives the target's message filters.
 */
export function reviewableKeys(
  observer: Pick<ObserverConfig, "watch">,
  source: Pick<ReviewSource, "changedKeys"> & Partial<Pick<ReviewSource, "conversationDelta">>,
): string[] {
  const keys = new Set<string>();
  for (const target of observer.watch) {
    if (
      target.type === "conversation" &&
      source.conversationDelta &&
      formatConversation(source.conversationDelta, target) === ""
    ) {
      continue;
    }
    for (const key of matchingKeys(target, source.changedKeys)) {
      keys.add(key);
    }
  }
  return [...keys];
}

export function selectObservers(
  observers: ObserverConfig[],
  source: Pick<ReviewSource, "changedKeys"> & Partial<Pick<ReviewSource, "conversationDelta">>,
): { work: Array<{ observer: ObserverConfig; matchedKeys: string[] }>; notDispatched: string[] } {
  const work: Array<{ observer: ObserverConfig; matchedKeys: string[] }> = [];
  const notDispatched: string[] = [];

  for (const observer of observers) {
    const matchedKeys = observer.enabled ? reviewableKeys(observer, source) : [];
    if (matchedKeys.length === 0) {
      notDispatched.push(observer.name);
    } else {
      work.push({ observer, matchedKeys });
    }
  }

  return { work, notDispatched };
}

async function withTimeout<T>(
  observerName: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  logger?: Logger,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ObserverTimeoutError(observerName, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  const pending = task(controller.signal);
  pending.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger?.debug("Abandoned observer call settled after timeout", {
        observer: observerName,
        reason: describeError(error),
      });
    }
  });

  try {
    return await Promise.race([pending, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs every observer whose watch targets match the change set, at most
 * `maxConcurrent` at a time, in configuration order. Each unit produces
 * exactly one result; failures are contained to the unit.
 */
export async function dispatchObservers(
  request: DispatchRequest,
): Promise<DispatchOutcome> {
  const { execution, logger } = request;
  const generateResultId = request.generateResultId ?? randomUUID;
  const now = request.now ?? Date.now;
  const semaphore = new Semaphore(execution.maxConcurrent);
  const { work, notDispatched } = selectObservers(request.observers, request.source);

  async function runUnit(
    observer: ObserverConfig,
    matchedKeys: string[],
  ): Promise<ObserverResult> {
    const startedAt = now();
    const timeoutMs = effectiveTimeoutMs(observer, execution);
    logger?.debug("Dispatching observer", { observer: observer.name, timeoutMs });

    try {
      const payload = await withTimeout(
        observer.name,
        timeoutMs,
        async (signal) => {
          const content = await buildReviewContent(observer, request.source, logger);
          const openObservations = await request.openObservations();
          return request.invoker.invoke({ observer, content, openObservations }, signal);
        },
        logger,
      );

      return {
        status: "success",
        observerName: observer.name,
        matchedKeys,
        durationMs: now() - startedAt,
        resultId: generateResultId(),
        payload,
      };
    } catch (error) {
      const reason: FailureReason =
        error instanceof ObserverTimeoutError ? "timeout" : "invocation";
      const failure: VigilError =
        error instanceof ObserverTimeoutError || error instanceof ObserverInvocationError
          ? error
          : new ObserverInvocationError(observer.name, describeError(error), error);
      const status = execution.onTimeout === "fail" ? "failed" : "skipped";

      if (status === "failed") {
        logger?.error("Observer failed", failure, { observer: observer.name, reason });
      } else {
        logger?.warn("Observer skipped", {
          observer: observer.name,
          reason,
          error: failure.message,
        });
      }

      return {
        status,
        observerName: observer.name,
        matchedKeys,
        durationMs: now() - startedAt,
        reason,
        error: failure,
      };
    }
  }

  const results = await Promise.all(
    work.map(async ({ observer, matchedKeys }) => {
      const result = await semaphore.run(() => runUnit(observer, matchedKeys));
      if (request.onResult) {
        try {
          await request.onResult(result);
        } catch (error) {
          logger?.error("Result handler failed", error, {
            observer: result.observerName,
          });
        }
      }
      return result;
    }),
  );

  return {
    dispatched: work.map(({ observer }) => observer.name),
    notDispatched,
    results,
  };
}
