import micromatch from "micromatch";

import type { WatchTarget } from "../types/observer.js";

export const CONVERSATION_KEY = "conversation";
const FILE_KEY_PREFIX = "file:";

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}

export function fileKey(relativePath: string): string {
  return `${FILE_KEY_PREFIX}${normalizePath(relativePath)}`;
}

export function isFileKey(key: string): boolean {
  return key.startsWith(FILE_KEY_PREFIX);
}

export function pathFromFileKey(key: string): string {
  return key.slice(FILE_KEY_PREFIX.length);
}

/** Same matcher and options fast-glob applies during discovery. */
export const GLOB_OPTIONS: micromatch.Options = { dot: true };

export function matchesGlob(relativePath: string, pattern: string): boolean {
  const normalized = normalizePath(pattern.trim());
  if (normalized.length === 0) {
    return false;
  }
  return micromatch.isMatch(normalizePath(relativePath), normalized, GLOB_OPTIONS);
}

export function matchesAnyGlob(relativePath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => matchesGlob(relativePath, pattern));
}

/** Changed keys a single watch target cares about. */
export function matchingKeys(
  target: WatchTarget,
  changedKeys: ReadonlySet<string>,
): string[] {
  if (target.type === "conversation") {
    return changedKeys.has(CONVERSATION_KEY) ? [CONVERSATION_KEY] : [];
  }

  const matches: string[] = [];
  for (const key of changedKeys) {
    if (isFileKey(key) && matchesAnyGlob(pathFromFileKey(key), target.paths)) {
      matches.push(key);
    }
  }
  return matches;
}
