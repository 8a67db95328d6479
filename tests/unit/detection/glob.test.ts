import { describe, expect, it } from "vitest";

import {
  CONVERSATION_KEY,
  fileKey,
  matchesGlob,
  matchingKeys,
  normalizePath,
  pathFromFileKey,
} from "../../../src/detection/glob.js";

describe("matchesGlob", () => {
  it("matches nested paths through a double star", () => {
    expect(matchesGlob("src/a.ts", "src/**/*.ts")).toBe(true);
    expect(matchesGlob("src/deep/er/a.ts", "src/**/*.ts")).toBe(true);
    expect(matchesGlob("lib/a.ts", "src/**/*.ts")).toBe(false);
    expect(matchesGlob("src/a.tsx", "src/**/*.ts")).toBe(false);
  });

  it("keeps a single star within one segment", () => {
    expect(matchesGlob("a.ts", "*.ts")).toBe(true);
    expect(matchesGlob("dir/a.ts", "*.ts")).toBe(false);
  });

  it("supports brace alternatives and single-character wildcards", () => {
    expect(matchesGlob("view.tsx", "*.{ts,tsx}")).toBe(true);
    expect(matchesGlob("file1.ts", "file?.ts")).toBe(true);
    expect(matchesGlob("file12.ts", "file?.ts")).toBe(false);
  });

  it("supports character classes and nested braces", () => {
    expect(matchesGlob("src/app.ts", "src/*.[jt]s")).toBe(true);
    expect(matchesGlob("src/app.js", "src/*.[jt]s")).toBe(true);
    expect(matchesGlob("src/app.cs", "src/*.[jt]s")).toBe(false);
    expect(matchesGlob("lib/a.test.ts", "{src,lib/{a,b}.test}.ts")).toBe(true);
  });

  it("matches dot files like discovery does", () => {
    expect(matchesGlob(".github/workflows/ci.yml", "**/*.yml")).toBe(true);
  });

  it("treats regex metacharacters literally", () => {
    expect(matchesGlob("a+b.ts", "a+b.ts")).toBe(true);
    expect(matchesGlob("aab.ts", "a+b.ts")).toBe(false);
  });
});

describe("keys", () => {
  it("normalizes separators and leading dot segments", () => {
    expect(normalizePath(".\\src\\a.ts")).toBe("src/a.ts");
    expect(fileKey("./src/a.ts")).toBe("file:src/a.ts");
    expect(pathFromFileKey("file:src/a.ts")).toBe("src/a.ts");
  });

  it("matches only the keys a target watches", () => {
    const changed = new Set(["file:src/a.ts", "file:docs/readme.md", CONVERSATION_KEY]);

    expect(matchingKeys({ type: "files", paths: ["src/**"] }, changed)).toEqual([
      "file:src/a.ts",
    ]);
    expect(
      matchingKeys(
        { type: "conversation", includeToolCalls: false, includeReasoning: true },
        changed,
      ),
    ).toEqual([CONVERSATION_KEY]);
  });
});
