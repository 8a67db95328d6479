import { stat } from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import { ChangeDetectionError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { TranscriptMessage, WatchTarget } from "../types/observer.js";
import type { Fingerprint, FingerprintStore } from "./fingerprint.js";
import { fingerprintFile, fingerprintMessages } from "./fingerprint.js";
import {
  CONVERSATION_KEY,
  fileKey,
  isFileKey,
  matchesAnyGlob,
  normalizePath,
  pathFromFileKey,
} from "./glob.js";

export const DEFAULT_IGNORE = ["**/node_modules/**", "**/.git/**"];

export interface DetectionInput {
  rootDir: string;
  transcript?: TranscriptMessage[];
  /** Globs relative to `rootDir` that are never inspected, added to the defaults. */
  ignore?: string[];
}

export interface ChangeSet {
  changedKeys: Set<string>;
  inspectedKeys: Set<string>;
  /** New fingerprint per changed key; `null` marks a file that disappeared. */
  pending: Map<string, Fingerprint | null>;
  deletedFiles: Set<string>;
  conversationDelta: TranscriptMessage[];
  errors: ChangeDetectionError[];
}

export interface ChangeDetectorOptions {
  now?: () => Date;
  logger?: Logger;
}

export function emptyChangeSet(): ChangeSet {
  return {
    changedKeys: new Set(),
    inspectedKeys: new Set(),
    pending: new Map(),
    deletedFiles: new Set(),
    conversationDelta: [],
    errors: [],
  };
}

function collectFilePatterns(targets: WatchTarget[]): string[] {
  const patterns = new Set<string>();
  for (const target of targets) {
    if (target.type === "files") {
      for (const pattern of target.paths) {
        const trimmed = pattern.trim();
        if (trimmed.length > 0) {
          patterns.add(normalizePath(trimmed));
        }
      }
    }
  }
  return [...patterns];
}

export class ChangeDetector {
  private readonly now: () => Date;

  constructor(
    private readonly fingerprints: FingerprintStore,
    private readonly options: ChangeDetectorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async detectChanges(
    targets: WatchTarget[],
    input: DetectionInput,
  ): Promise<ChangeSet> {
    const changes = emptyChangeSet();
    const recordedAt = this.now().toISOString();

    const patterns = collectFilePatterns(targets);
    if (patterns.length > 0) {
      await this.detectFileChanges(patterns, input, changes, recordedAt);
    }

    const watchesConversation = targets.some(
      (target) => target.type === "conversation",
    );
    if (watchesConversation && input.transcript) {
      this.detectConversationChange(input.transcript, changes, recordedAt);
    }

    this.options.logger?.debug("Change detection finished", {
      inspected: changes.inspectedKeys.size,
      changed: changes.changedKeys.size,
      errors: changes.errors.length,
    });
    return changes;
  }

  /** Persists pending fingerprints for the given keys that were inspected. */
  async commit(changes: ChangeSet, keys: Iterable<string>): Promise<string[]> {
    const updates = new Map<string, Fingerprint | null>();
    for (const key of keys) {
      if (!changes.inspectedKeys.has(key)) {
        continue;
      }
      const pending = changes.pending.get(key);
      if (pending !== undefined) {
        updates.set(key, pending);
      }
    }

    await this.fingerprints.commit(updates);
    return [...updates.keys()];
  }

  private async detectFileChanges(
    patterns: string[],
    input: DetectionInput,
    changes: ChangeSet,
    recordedAt: string,
  ): Promise<void> {
    const ignore = [...DEFAULT_IGNORE, ...(input.ignore ?? [])];
    const files = await fg(patterns, {
      cwd: input.rootDir,
      onlyFiles: true,
      dot: true,
      unique: true,
      followSymbolicLinks: false,
      ignore,
    });
    files.sort((left, right) => left.localeCompare(right));

    const present = new Set<string>();
    for (const file of files) {
      const relativePath = normalizePath(file);
      const key = fileKey(relativePath);
      present.add(key);

      let hash: string;
      try {
        const stats = await stat(path.join(input.rootDir, relativePath));
        hash = fingerprintFile(relativePath, stats.mtimeMs, stats.size);
      } catch (error) {
        const detectionError = new ChangeDetectionError(key, error);
        changes.errors.push(detectionError);
        this.options.logger?.warn("Skipping target that could not be fingerprinted", {
          key,
          reason: detectionError.message,
        });
        continue;
      }

      changes.inspectedKeys.add(key);
      if (this.fingerprints.get(key)?.hash !== hash) {
        changes.changedKeys.add(key);
        changes.pending.set(key, { hash, recordedAt });
      }
    }

    for (const key of this.fingerprints.keys()) {
      if (!isFileKey(key) || present.has(key)) {
        continue;
      }
      const relativePath = pathFromFileKey(key);
      if (!matchesAnyGlob(relativePath, patterns) || matchesAnyGlob(relativePath, ignore)) {
        continue;
      }
      changes.inspectedKeys.add(key);
      changes.changedKeys.add(key);
      changes.deletedFiles.add(relativePath);
      changes.pending.set(key, null);
    }
  }

  private detectConversationChange(
    transcript: TranscriptMessage[],
    changes: ChangeSet,
    recordedAt: string,
  ): void {
    changes.inspectedKeys.add(CONVERSATION_KEY);
    const previous = this.fingerprints.get(CONVERSATION_KEY);

    let start = 0;
    const reviewedCount = previous?.messageCount;
    if (
      previous &&
      reviewedCount !== undefined &&
      reviewedCount <= transcript.length &&
      fingerprintMessages(transcript.slice(0, reviewedCount)) === previous.hash
    ) {
      start = reviewedCount;
    }

    const delta = transcript.slice(start);
    if (delta.length === 0) {
      return;
    }

    changes.changedKeys.add(CONVERSATION_KEY);
    changes.conversationDelta = delta;
    changes.pending.set(CONVERSATION_KEY, {
      hash: fingerprintMessages(transcript),
      messageCount: transcript.length,
      recordedAt,
    });
  }
}
