import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { StorageError } from "../errors.js";

/**
 * Per-session document storage. Keys may contain `/` to group documents
 * (for example `cycles/<timestamp>`).
 */
export interface SessionStorage {
  /** Resolves `null` when the document does not exist. */
  read(sessionId: string, key: string): Promise<unknown>;
  write(sessionId: string, key: string, value: unknown): Promise<void>;
  list(sessionId: string, prefix: string): Promise<string[]>;
  remove(sessionId: string, key: string): Promise<void>;
  /** Directory the documents live under, for storages backed by the filesystem. */
  readonly directory?: string;
}

const SEGMENT_PATTERN = /^[A-Za-z0-9._-]+$/;

function assertSafeSegment(value: string, field: string): void {
  if (!SEGMENT_PATTERN.test(value) || value === "." || value === "..") {
    throw new StorageError(`Invalid ${field}: ${value}`);
  }
}

export function validateSessionId(sessionId: string): string {
  assertSafeSegment(sessionId, "session id");
  return sessionId;
}

function splitKey(key: string): string[] {
  const segments = key.split("/");
  for (const segment of segments) {
    assertSafeSegment(segment, "storage key");
  }
  return segments;
}

export function defaultDataDir(): string {
  return path.resolve(process.cwd(), "data");
}

export class FileSessionStorage implements SessionStorage {
  constructor(readonly directory: string = defaultDataDir()) {}

  async read(sessionId: string, key: string): Promise<unknown> {
    const filePath = this.documentPath(sessionId, key);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      const errorWithCode = error as NodeJS.ErrnoException;
      if (errorWithCode.code === "ENOENT") {
        return null;
      }
      throw new StorageError(`Failed to read ${filePath}`, error);
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Corrupt document at ${filePath}`, error);
    }
  }

  async write(sessionId: string, key: string, value: unknown): Promise<void> {
    const filePath = this.documentPath(sessionId, key);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      throw new StorageError(`Failed to write ${filePath}`, error);
    }
  }

  async list(sessionId: string, prefix: string): Promise<string[]> {
    const dir = path.join(this.sessionDir(sessionId), ...splitKey(prefix));
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
        .map((entry) => `${prefix}/${entry.name.slice(0, -".json".length)}`)
        .sort((left, right) => left.localeCompare(right));
    } catch (error) {
      const errorWithCode = error as NodeJS.ErrnoException;
      if (errorWithCode.code === "ENOENT") {
        return [];
      }
      throw new StorageError(`Failed to list ${dir}`, error);
    }
  }

  async remove(sessionId: string, key: string): Promise<void> {
    await rm(this.documentPath(sessionId, key), { force: true });
  }

  private sessionDir(sessionId: string): string {
    return path.join(this.directory, validateSessionId(sessionId));
  }

  private documentPath(sessionId: string, key: string): string {
    const segments = splitKey(key);
    const last = segments.pop() ?? key;
    return path.join(this.sessionDir(sessionId), ...segments, `${last}.json`);
  }
}

/** Keeps documents as serialized JSON so callers never share references. */
export class MemorySessionStorage implements SessionStorage {
  private readonly documents = new Map<string, string>();

  async read(sessionId: string, key: string): Promise<unknown> {
    const raw = this.documents.get(this.compositeKey(sessionId, key));
    return raw === undefined ? null : JSON.parse(raw);
  }

  async write(sessionId: string, key: string, value: unknown): Promise<void> {
    this.documents.set(this.compositeKey(sessionId, key), JSON.stringify(value));
  }

  async list(sessionId: string, prefix: string): Promise<string[]> {
    const start = `${this.compositeKey(sessionId, prefix)}/`;
    return [...this.documents.keys()]
      .filter((key) => key.startsWith(start))
      .map((key) => key.slice(`${sessionId}:`.length))
      .filter((key) => !key.slice(prefix.length + 1).includes("/"))
      .sort((left, right) => left.localeCompare(right));
  }

  async remove(sessionId: string, key: string): Promise<void> {
    this.documents.delete(this.compositeKey(sessionId, key));
  }

  private compositeKey(sessionId: string, key: string): string {
    validateSessionId(sessionId);
    splitKey(key);
    return `${sessionId}:${key}`;
  }
}
