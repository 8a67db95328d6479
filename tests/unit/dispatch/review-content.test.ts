import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  MAX_MESSAGE_CHARS,
  buildReviewContent,
  formatConversation,
} from "../../../src/dispatch/review-content.js";
import type { ReviewSource } from "../../../src/dispatch/review-content.js";
import type { TranscriptMessage } from "../../../src/types/observer.js";
import {
  makeObserver,
  makeTempDir,
  removeTempDir,
  writeProjectFile,
} from "../../helpers/fixtures.js";

const WITH_REASONING = { includeToolCalls: false, includeReasoning: true };

describe("formatConversation", () => {
  it("drops tool messages unless asked and appends reasoning", () => {
    const messages: TranscriptMessage[] = [
      { role: "user", content: "hi" },
      { role: "tool", content: "ran ls" },
      { role: "assistant", content: "done", reasoning: "checked the tree" },
    ];

    expect(formatConversation(messages, WITH_REASONING)).toBe(
      "**user**: hi\n\n**assistant**: done\n_reasoning_: checked the tree",
    );
    expect(
      formatConversation(messages, { includeToolCalls: true, includeReasoning: false }),
    ).toBe("**user**: hi\n\n**tool**: ran ls\n\n**assistant**: done");
  });

  it("keeps the last twenty messages", () => {
    const messages: TranscriptMessage[] = Array.from({ length: 25 }, (_, index) => ({
      role: "user",
      content: `m${index}`,
    }));

    const text = formatConversation(messages, WITH_REASONING);

    expect(text.startsWith("**user**: m5\n\n")).toBe(true);
    expect(text.endsWith("**user**: m24")).toBe(true);
  });

  it("truncates long messages", () => {
    const text = formatConversation(
      [{ role: "assistant", content: "x".repeat(MAX_MESSAGE_CHARS + 500) }],
      WITH_REASONING,
    );

    expect(text).toBe(`**assistant**: ${"x".repeat(MAX_MESSAGE_CHARS)}... [truncated]`);
  });
});

describe("buildReviewContent", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  function source(overrides: Partial<ReviewSource>): ReviewSource {
    return {
      rootDir,
      changedKeys: new Set(),
      deletedFiles: new Set(),
      conversationDelta: [],
      ...overrides,
    };
  }

  it("renders matched files, deletions and the conversation", async () => {
    await writeProjectFile(rootDir, "src/a.ts", "const a = 1;");
    await writeProjectFile(rootDir, "docs/guide.md", "# guide");
    const observer = makeObserver({
      watch: [
        { type: "files", paths: ["src/**/*.ts"] },
        { type: "conversation", ...WITH_REASONING },
      ],
    });

    const content = await buildReviewContent(
      observer,
      source({
        changedKeys: new Set([
          "file:src/gone.ts",
          "file:src/a.ts",
          "file:docs/guide.md",
          "conversation",
        ]),
        deletedFiles: new Set(["src/gone.ts"]),
        conversationDelta: [{ role: "user", content: "please harden auth" }],
      }),
    );

    expect(content.files).toEqual(["src/a.ts", "src/gone.ts"]);
    expect(content.text).toBe(
      [
        "## Files\n\n### src/a.ts\n```\nconst a = 1;\n```\n\n### src/gone.ts\n(deleted)",
        "## Conversation\n\n**user**: please harden auth",
      ].join("\n\n---\n\n"),
    );
  });

  it("lists a file once when several targets match it", async () => {
    await writeProjectFile(rootDir, "src/a.ts", "const a = 1;");
    const observer = makeObserver({
      watch: [
        { type: "files", paths: ["src/**/*.ts"] },
        { type: "files", paths: ["src/a.ts"] },
      ],
    });

    const content = await buildReviewContent(
      observer,
      source({ changedKeys: new Set(["file:src/a.ts"]) }),
    );

    expect(content.files).toEqual(["src/a.ts"]);
    expect(content.text).toBe("## Files\n\n### src/a.ts\n```\nconst a = 1;\n```");
  });

  it("shares one character budget across all files", async () => {
    await writeProjectFile(rootDir, "src/a.ts", "a".repeat(30_000));
    await writeProjectFile(rootDir, "src/b.ts", "b".repeat(30_000));
    await writeProjectFile(rootDir, "src/c.ts", "c");
    const observer = makeObserver();

    const content = await buildReviewContent(
      observer,
      source({ changedKeys: new Set(["file:src/a.ts", "file:src/b.ts", "file:src/c.ts"]) }),
    );

    expect(content.text).toContain(`### src/b.ts\n\`\`\`\n${"b".repeat(20_000)}\n... [truncated]\n\`\`\``);
    expect(content.text).not.toContain("### src/c.ts");
  });

  it("skips files that cannot be read", async () => {
    const content = await buildReviewContent(
      makeObserver(),
      source({ changedKeys: new Set(["file:src/missing.ts"]) }),
    );

    expect(content).toEqual({ files: ["src/missing.ts"], text: "" });
  });
});
