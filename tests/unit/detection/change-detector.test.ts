import { rm, stat } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ChangeDetector } from "../../../src/detection/change-detector.js";
import { FingerprintStore } from "../../../src/detection/fingerprint.js";
import { CONVERSATION_KEY } from "../../../src/detection/glob.js";
import { ChangeDetectionError } from "../../../src/errors.js";
import { MemorySessionStorage } from "../../../src/storage/session-storage.js";
import type { TranscriptMessage, WatchTarget } from "../../../src/types/observer.js";
import { makeTempDir, removeTempDir, writeProjectFile } from "../../helpers/fixtures.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, stat: vi.fn(actual.stat) };
});

const SOURCES: WatchTarget[] = [{ type: "files", paths: ["src/**/*.ts"] }];
const CONVERSATION: WatchTarget[] = [
  { type: "conversation", includeToolCalls: false, includeReasoning: true },
];
const NOW = () => new Date("2026-02-01T12:00:00.000Z");

describe("ChangeDetector", () => {
  let rootDir: string;
  let fingerprints: FingerprintStore;
  let detector: ChangeDetector;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    await writeProjectFile(rootDir, "src/a.ts", "export const a = 1;\n");
    await writeProjectFile(rootDir, "src/nested/b.ts", "export const b = 2;\n");
    await writeProjectFile(rootDir, "README.md", "# readme\n");
    await writeProjectFile(rootDir, "node_modules/pkg/src/index.ts", "export {};\n");

    fingerprints = await FingerprintStore.load(new MemorySessionStorage(), "s1");
    detector = new ChangeDetector(fingerprints, { now: NOW });
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  describe("files", () => {
    it("reports every matching file on first sight", async () => {
      const changes = await detector.detectChanges(SOURCES, { rootDir });

      expect([...changes.changedKeys]).toEqual(["file:src/a.ts", "file:src/nested/b.ts"]);
      expect([...changes.inspectedKeys]).toEqual(["file:src/a.ts", "file:src/nested/b.ts"]);
      expect(changes.pending.get("file:src/a.ts")?.recordedAt).toBe(
        "2026-02-01T12:00:00.000Z",
      );
      expect(changes.errors).toEqual([]);
    });

    it("reports nothing once fingerprints are committed", async () => {
      const first = await detector.detectChanges(SOURCES, { rootDir });
      await detector.commit(first, first.inspectedKeys);

      const second = await detector.detectChanges(SOURCES, { rootDir });

      expect(second.changedKeys.size).toBe(0);
      expect(second.inspectedKeys.size).toBe(2);
      expect(second.pending.size).toBe(0);
    });

    it("reports a file whose modification time changed", async () => {
      const first = await detector.detectChanges(SOURCES, { rootDir });
      await detector.commit(first, first.inspectedKeys);

      await writeProjectFile(rootDir, "src/a.ts", "export const a = 1;\n", 1_700_000_500);
      const second = await detector.detectChanges(SOURCES, { rootDir });

      expect([...second.changedKeys]).toEqual(["file:src/a.ts"]);
    });

    it("reports deleted files and removes their fingerprint on commit", async () => {
      const first = await detector.detectChanges(SOURCES, { rootDir });
      await detector.commit(first, first.inspectedKeys);

      await rm(path.join(rootDir, "src/nested/b.ts"));
      const second = await detector.detectChanges(SOURCES, { rootDir });

      expect([...second.changedKeys]).toEqual(["file:src/nested/b.ts"]);
      expect([...second.deletedFiles]).toEqual(["src/nested/b.ts"]);
      expect(second.pending.get("file:src/nested/b.ts")).toBeNull();

      await detector.commit(second, second.inspectedKeys);
      expect(fingerprints.keys()).toEqual(["file:src/a.ts"]);
    });

    it("ignores stored keys outside the watched patterns", async () => {
      const first = await detector.detectChanges(
        [{ type: "files", paths: ["README.md"] }],
        { rootDir },
      );
      await detector.commit(first, first.inspectedKeys);

      const second = await detector.detectChanges(SOURCES, { rootDir });

      expect(second.inspectedKeys.has("file:README.md")).toBe(false);
      expect(second.deletedFiles.size).toBe(0);
    });

    it("honours extra ignore patterns", async () => {
      const changes = await detector.detectChanges(SOURCES, {
        rootDir,
        ignore: ["src/nested/**"],
      });

      expect([...changes.changedKeys]).toEqual(["file:src/a.ts"]);
    });

    it("does not report files under an ignored directory as deleted", async () => {
      const first = await detector.detectChanges(SOURCES, { rootDir });
      await detector.commit(first, first.inspectedKeys);

      const second = await detector.detectChanges(SOURCES, {
        rootDir,
        ignore: ["src/nested/**"],
      });

      expect(second.changedKeys.size).toBe(0);
      expect(second.deletedFiles.size).toBe(0);
    });

    it("records a detection error and skips a file it cannot stat", async () => {
      vi.mocked(stat).mockRejectedValueOnce(new Error("permission denied"));

      const changes = await detector.detectChanges(SOURCES, { rootDir });

      expect(changes.errors).toHaveLength(1);
      expect(changes.errors[0]).toBeInstanceOf(ChangeDetectionError);
      expect(changes.errors[0]?.targetKey).toBe("file:src/a.ts");
      expect(changes.inspectedKeys.has("file:src/a.ts")).toBe(false);
      expect([...changes.changedKeys]).toEqual(["file:src/nested/b.ts"]);
    });
  });

  describe("conversation", () => {
    const opening: TranscriptMessage[] = [
      { role: "user", content: "add a login form" },
      { role: "assistant", content: "added src/login.ts" },
    ];

    it("is not inspected without a transcript", async () => {
      const changes = await detector.detectChanges(CONVERSATION, { rootDir });

      expect(changes.inspectedKeys.size).toBe(0);
    });

    it("delivers the whole transcript on first sight", async () => {
      const changes = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: opening,
      });

      expect([...changes.changedKeys]).toEqual([CONVERSATION_KEY]);
      expect(changes.conversationDelta).toEqual(opening);
      expect(changes.pending.get(CONVERSATION_KEY)?.messageCount).toBe(2);
    });

    it("delivers only messages after the reviewed prefix", async () => {
      const first = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: opening,
      });
      await detector.commit(first, [CONVERSATION_KEY]);

      const followUp: TranscriptMessage = { role: "user", content: "now add tests" };
      const second = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: [...opening, followUp],
      });

      expect(second.conversationDelta).toEqual([followUp]);
    });

    it("reports no change for an identical transcript", async () => {
      const first = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: opening,
      });
      await detector.commit(first, [CONVERSATION_KEY]);

      const second = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: opening,
      });

      expect(second.inspectedKeys.has(CONVERSATION_KEY)).toBe(true);
      expect(second.changedKeys.size).toBe(0);
      expect(second.conversationDelta).toEqual([]);
    });

    it("falls back to the whole transcript when history was rewritten", async () => {
      const first = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: opening,
      });
      await detector.commit(first, [CONVERSATION_KEY]);

      const rewritten: TranscriptMessage[] = [
        { role: "user", content: "add a signup form" },
        { role: "assistant", content: "added src/signup.ts" },
        { role: "user", content: "thanks" },
      ];
      const second = await detector.detectChanges(CONVERSATION, {
        rootDir,
        transcript: rewritten,
      });

      expect(second.conversationDelta).toEqual(rewritten);
    });
  });

  describe("commit", () => {
    it("commits only inspected keys with pending fingerprints", async () => {
      const changes = await detector.detectChanges(SOURCES, { rootDir });

      const committed = await detector.commit(changes, [
        "file:src/a.ts",
        "file:src/unknown.ts",
      ]);

      expect(committed).toEqual(["file:src/a.ts"]);
      expect(fingerprints.keys()).toEqual(["file:src/a.ts"]);
    });
  });
});
