import { ReconciliationReferenceError } from "../errors.js";
import type { Logger } from "../logging.js";
import type {
  ObservationStore,
  ObservationTransaction,
} from "../observations/store.js";
import type { ObserverPayload } from "../types/observer.js";

export const DEFAULT_RESOLUTION_NOTE = "Issue no longer detected by observer";

export interface ReconcilableResult {
  resultId: string;
  observerName: string;
  payload: ObserverPayload;
}

export interface IgnoredResolution {
  id: string;
  reason: ReconciliationReferenceError["reason"];
}

export interface ReconcileOutcome {
  resultId: string;
  observerName: string;
  /** False when the result had already been applied. */
  applied: boolean;
  created: string[];
  resolved: string[];
  ignored: IgnoredResolution[];
}

/**
 * Applies observer results to the store. Each result is written in one
 * transaction, so it lands completely or not at all.
 */
export class Reconciler {
  private readonly appliedResults = new Set<string>();

  constructor(
    private readonly store: ObservationStore,
    private readonly logger?: Logger,
  ) {}

  hasApplied(resultId: string): boolean {
    return this.appliedResults.has(resultId);
  }

  /** Drops the applied-result ids once their cycle has settled. */
  forgetApplied(): void {
    this.appliedResults.clear();
  }

  async apply(result: ReconcilableResult): Promise<ReconcileOutcome> {
    const outcome: ReconcileOutcome = {
      resultId: result.resultId,
      observerName: result.observerName,
      applied: false,
      created: [],
      resolved: [],
      ignored: [],
    };

    if (this.appliedResults.has(result.resultId)) {
      this.logger?.debug("Result already applied", { resultId: result.resultId });
      return outcome;
    }

    const referenceErrors: ReconciliationReferenceError[] = [];

    let written: { created: string[]; resolved: string[] } | null;
    try {
      written = await this.store.transaction((tx) => this.write(tx, result, referenceErrors));
    } catch (error) {
      this.appliedResults.delete(result.resultId);
      throw error;
    }

    if (!written) {
      return outcome;
    }

    for (const error of referenceErrors) {
      this.logger?.warn("Ignoring resolution", {
        observer: result.observerName,
        observationId: error.observationId,
        reason: error.reason,
      });
    }

    outcome.applied = true;
    outcome.created = written.created;
    outcome.resolved = written.resolved;
    outcome.ignored = referenceErrors.map((error) => ({
      id: error.observationId,
      reason: error.reason,
    }));
    return outcome;
  }

  /** Runs under the store lock, so the applied check cannot race. */
  private write(
    tx: ObservationTransaction,
    result: ReconcilableResult,
    referenceErrors: ReconciliationReferenceError[],
  ): { created: string[]; resolved: string[] } | null {
    if (this.appliedResults.has(result.resultId)) {
      return null;
    }

    const createdIds = result.payload.observations.map(
      (draft) =>
        tx.create({
          observerName: result.observerName,
          content: draft.content,
          severity: draft.severity,
          sourceType: draft.sourceType ?? "mixed",
          sourceRef: draft.sourceRef,
          category: draft.category,
          suggestion: draft.suggestion,
          metadata: draft.metadata,
        }).id,
    );

    const resolvedIds: string[] = [];
    const seen = new Set<string>();
    for (const resolution of result.payload.resolved) {
      if (seen.has(resolution.id)) {
        continue;
      }
      seen.add(resolution.id);

      const existing = tx.get(resolution.id);
      if (!existing) {
        referenceErrors.push(new ReconciliationReferenceError(resolution.id, "not-found"));
        continue;
      }
      if (existing.status === "resolved") {
        referenceErrors.push(
          new ReconciliationReferenceError(resolution.id, "already-resolved"),
        );
        continue;
      }

      tx.resolve(resolution.id, resolution.reason || DEFAULT_RESOLUTION_NOTE);
      resolvedIds.push(resolution.id);
    }

    this.appliedResults.add(result.resultId);
    return { created: createdIds, resolved: resolvedIds };
  }
}
