import { createHash } from "node:crypto";

import { z } from "zod";

import { StorageError } from "../errors.js";
import type { SessionStorage } from "../storage/session-storage.js";
import type { TranscriptMessage } from "../types/observer.js";

export const FINGERPRINTS_KEY = "fingerprints";

export interface Fingerprint {
  hash: string;
  /** Conversation only: length of the transcript prefix already reviewed. */
  messageCount?: number;
  recordedAt: string;
}

const fingerprintSchema = z.object({
  hash: z.string(),
  messageCount: z.number().int().nonnegative().optional(),
  recordedAt: z.string(),
});

const documentSchema = z.object({
  version: z.literal(1),
  fingerprints: z.record(fingerprintSchema),
});

function sha256(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

export function fingerprintFile(
  relativePath: string,
  mtimeMs: number,
  size: number,
): string {
  return sha256(JSON.stringify([relativePath, mtimeMs, size]));
}

export function fingerprintMessages(messages: TranscriptMessage[]): string {
  return sha256(
    JSON.stringify(
      messages.map((message) => [
        message.role,
        message.content,
        message.reasoning ?? null,
      ]),
    ),
  );
}

/**
 * Session-scoped map of watch key to last committed fingerprint.
 * Read during detection and written once per cycle after dispatch.
 */
export class FingerprintStore {
  private readonly entries = new Map<string, Fingerprint>();

  private constructor(
    private readonly storage: SessionStorage,
    private readonly sessionId: string,
  ) {}

  static async load(
    storage: SessionStorage,
    sessionId: string,
  ): Promise<FingerprintStore> {
    const store = new FingerprintStore(storage, sessionId);
    const raw = await storage.read(sessionId, FINGERPRINTS_KEY);
    if (raw !== null) {
      const parsed = documentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new StorageError(
          `Stored fingerprints for session ${sessionId} are invalid`,
        );
      }
      for (const [key, fingerprint] of Object.entries(parsed.data.fingerprints)) {
        store.entries.set(key, fingerprint);
      }
    }
    return store;
  }

  get(key: string): Fingerprint | undefined {
    return this.entries.get(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** `null` removes the key. Persists only when something was given. */
  async commit(updates: ReadonlyMap<string, Fingerprint | null>): Promise<void> {
    if (updates.size === 0) {
      return;
    }

    const next = new Map(this.entries);
    for (const [key, fingerprint] of updates) {
      if (fingerprint === null) {
        next.delete(key);
      } else {
        next.set(key, fingerprint);
      }
    }

    await this.storage.write(this.sessionId, FINGERPRINTS_KEY, {
      version: 1,
      fingerprints: Object.fromEntries(next),
    });

    this.entries.clear();
    for (const [key, fingerprint] of next) {
      this.entries.set(key, fingerprint);
    }
  }
}
