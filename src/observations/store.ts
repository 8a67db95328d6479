import { randomUUID } from "node:crypto";

import { z } from "zod";

import {
  ObservationNotFoundError,
  ObservationStateError,
  StorageError,
} from "../errors.js";
import type { SessionStorage } from "../storage/session-storage.js";
import type {
  Observation,
  ObservationFilters,
  ObservationInput,
  ObservationQuery,
  SeverityCounts,
} from "../types/observation.js";
import {
  SEVERITIES,
  SEVERITY_RANK,
  SOURCE_TYPES,
  VALID_STATUSES,
  emptySeverityCounts,
} from "../types/observation.js";
import { Mutex } from "../util/semaphore.js";

export const OBSERVATIONS_KEY = "observations";

const observationSchema = z.object({
  id: z.string().min(1),
  observerName: z.string(),
  content: z.string(),
  severity: z.enum(SEVERITIES),
  status: z.enum(VALID_STATUSES),
  sourceType: z.enum(SOURCE_TYPES),
  sourceRef: z.string().optional(),
  category: z.string().optional(),
  suggestion: z.string().optional(),
  metadata: z.record(z.unknown()),
  createdAt: z.string(),
  acknowledgedAt: z.string().optional(),
  resolvedAt: z.string().optional(),
  resolutionNote: z.string().optional(),
});

const documentSchema = z.object({
  version: z.literal(1),
  observations: z.array(observationSchema),
});

type ObservationDocument = z.infer<typeof documentSchema>;

export interface ObservationTransaction {
  create(input: ObservationInput): Observation;
  get(id: string): Observation | undefined;
  acknowledge(id: string): Observation;
  resolve(id: string, note?: string): Observation;
  remove(id: string): boolean;
  all(): Observation[];
}

export interface ObservationStoreOptions {
  storage: SessionStorage;
  sessionId: string;
  generateId?: () => string;
  now?: () => Date;
}

function matchesFilters(
  observation: Observation,
  filters: ObservationFilters,
): boolean {
  if (filters.status !== undefined) {
    const statuses = Array.isArray(filters.status)
      ? filters.status
      : [filters.status];
    if (!statuses.includes(observation.status)) {
      return false;
    }
  }

  if (filters.severity && !filters.severity.includes(observation.severity)) {
    return false;
  }

  if (
    filters.observerName !== undefined &&
    observation.observerName !== filters.observerName
  ) {
    return false;
  }

  return true;
}

class DraftTransaction implements ObservationTransaction {
  dirty = false;

  constructor(
    private readonly draft: Map<string, Observation>,
    private readonly generateId: () => string,
    private readonly now: () => Date,
  ) {}

  create(input: ObservationInput): Observation {
    let id = this.generateId();
    while (this.draft.has(id)) {
      id = this.generateId();
    }

    const observation: Observation = {
      id,
      observerName: input.observerName,
      content: input.content,
      severity: input.severity,
      status: "open",
      sourceType: input.sourceType ?? "unknown",
      sourceRef: input.sourceRef,
      category: input.category,
      suggestion: input.suggestion,
      metadata: input.metadata ? { ...input.metadata } : {},
      createdAt: this.now().toISOString(),
    };
    this.draft.set(id, observation);
    this.dirty = true;
    return structuredClone(observation);
  }

  get(id: string): Observation | undefined {
    const observation = this.draft.get(id);
    return observation ? structuredClone(observation) : undefined;
  }

  acknowledge(id: string): Observation {
    const observation = this.require(id);
    if (observation.status === "resolved") {
      throw new ObservationStateError(
        id,
        `Observation ${id} is resolved and cannot be acknowledged`,
      );
    }

    if (observation.status === "open") {
      observation.status = "acknowledged";
      observation.acknowledgedAt = this.now().toISOString();
      this.dirty = true;
    }
    return structuredClone(observation);
  }

  resolve(id: string, note?: string): Observation {
    const observation = this.require(id);
    if (observation.status === "resolved") {
      throw new ObservationStateError(
        id,
        `Observation ${id} is already resolved`,
      );
    }

    observation.status = "resolved";
    observation.resolvedAt = this.now().toISOString();
    if (note) {
      observation.resolutionNote = note;
    }
    this.dirty = true;
    return structuredClone(observation);
  }

  remove(id: string): boolean {
    const removed = this.draft.delete(id);
    if (removed) {
      this.dirty = true;
    }
    return removed;
  }

  all(): Observation[] {
    return [...this.draft.values()].map((observation) =>
      structuredClone(observation),
    );
  }

  private require(id: string): Observation {
    const observation = this.draft.get(id);
    if (!observation) {
      throw new ObservationNotFoundError(id);
    }
    return observation;
  }
}

/**
 * Session-scoped observation collection.
 *
 * Every mutation runs under a single mutex against a draft copy; the draft
 * replaces the live collection only after it has been persisted.
 */
export class ObservationStore {
  private observations = new Map<string, Observation>();
  private readonly mutex = new Mutex();
  private readonly generateId: () => string;
  private readonly now: () => Date;

  private constructor(private readonly options: ObservationStoreOptions) {
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  static async load(options: ObservationStoreOptions): Promise<ObservationStore> {
    const store = new ObservationStore(options);
    const raw = await options.storage.read(
      options.sessionId,
      OBSERVATIONS_KEY,
    );

    if (raw !== null) {
      const parsed = documentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new StorageError(
          `Stored observations for session ${options.sessionId} are invalid: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
        );
      }
      for (const observation of parsed.data.observations) {
        store.observations.set(observation.id, observation);
      }
    }

    return store;
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  async transaction<T>(
    apply: (tx: ObservationTransaction) => T | Promise<T>,
  ): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const draft = new Map(
        [...this.observations].map(([id, observation]) => [
          id,
          structuredClone(observation),
        ]),
      );
      const tx = new DraftTransaction(draft, this.generateId, this.now);
      const result = await apply(tx);

      if (tx.dirty) {
        const document: ObservationDocument = {
          version: 1,
          observations: [...draft.values()],
        };
        await this.options.storage.write(
          this.options.sessionId,
          OBSERVATIONS_KEY,
          document,
        );
        this.observations = draft;
      }

      return result;
    });
  }

  create(input: ObservationInput): Promise<Observation> {
    return this.transaction((tx) => tx.create(input));
  }

  createBatch(inputs: ObservationInput[]): Promise<Observation[]> {
    return this.transaction((tx) => inputs.map((input) => tx.create(input)));
  }

  async get(id: string): Promise<Observation> {
    const observation = this.observations.get(id);
    if (!observation) {
      throw new ObservationNotFoundError(id);
    }
    return structuredClone(observation);
  }

  async list(query: ObservationQuery = {}): Promise<Observation[]> {
    const matching = [...this.observations.values()].filter((observation) =>
      matchesFilters(observation, query),
    );

    if (query.sortBy === "severity") {
      matching.sort(
        (left, right) =>
          SEVERITY_RANK[left.severity] - SEVERITY_RANK[right.severity] ||
          left.createdAt.localeCompare(right.createdAt),
      );
    } else if (query.sortBy === "createdAt") {
      matching.sort((left, right) =>
        left.createdAt.localeCompare(right.createdAt),
      );
    }

    const limited =
      query.limit !== undefined && query.limit >= 0
        ? matching.slice(0, query.limit)
        : matching;
    return limited.map((observation) => structuredClone(observation));
  }

  async count(filters: ObservationFilters = {}): Promise<number> {
    let total = 0;
    for (const observation of this.observations.values()) {
      if (matchesFilters(observation, filters)) {
        total++;
      }
    }
    return total;
  }

  async countBySeverity(filters: ObservationFilters = {}): Promise<SeverityCounts> {
    const counts = emptySeverityCounts();
    for (const observation of this.observations.values()) {
      if (matchesFilters(observation, filters)) {
        counts[observation.severity]++;
      }
    }
    return counts;
  }

  acknowledge(id: string): Promise<Observation> {
    return this.transaction((tx) => tx.acknowledge(id));
  }

  resolve(id: string, note?: string): Promise<Observation> {
    return this.transaction((tx) => tx.resolve(id, note));
  }

  clearResolved(): Promise<number> {
    return this.transaction((tx) => {
      let removed = 0;
      for (const observation of tx.all()) {
        if (observation.status === "resolved" && tx.remove(observation.id)) {
          removed++;
        }
      }
      return removed;
    });
  }
}
