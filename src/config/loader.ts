import { readFile, stat } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { ConfigError, describeError } from "../errors.js";
import type {
  ObserverConfig,
  ObserverReference,
  ResolvedObserversConfig,
} from "../types/observer.js";
import {
  DEFAULT_MODEL,
  DEFAULT_OBSERVER_TIMEOUT_SECONDS,
  normalizeModuleConfig,
  normalizeObserverDefinition,
} from "./schema.js";

export const DEFAULT_CONFIG_PATH = path.join("config", "observers.json");

const FRONTMATTER_PATTERN = /^---\s*\n([\s\S]*?)\n---\s*(?:\n|$)/;
const CODE_PATTERN = /```[\s\S]*?```|`[^`]+`/g;
const MENTION_PATTERN = /(?<![\w@])@([\w./-]+)/g;

export interface LoadedObserverDefinition {
  name: string;
  description: string;
  model?: string;
  timeoutSeconds?: number;
  tools: string[];
  instruction: string;
  contextFiles: Array<{ path: string; content: string }>;
}

export function resolveConfigPath(configPath?: string): string {
  return path.resolve(process.cwd(), configPath ?? DEFAULT_CONFIG_PATH);
}

export function parseFrontmatter(text: string): { frontmatter: unknown; body: string } {
  const match = FRONTMATTER_PATTERN.exec(text);
  if (!match) {
    return { frontmatter: {}, body: text };
  }

  let frontmatter: unknown;
  try {
    frontmatter = parseYaml(match[1] ?? "");
  } catch (error) {
    throw new ConfigError(`Invalid observer frontmatter: ${describeError(error)}`);
  }
  return { frontmatter: frontmatter ?? {}, body: text.slice(match[0].length) };
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/** Reference paths are relative to the config directory; `.md` is optional. */
export async function resolveObserverPath(
  reference: string,
  baseDir: string,
): Promise<string> {
  const direct = path.resolve(baseDir, reference);
  if (await isFile(direct)) {
    return direct;
  }
  if (await isFile(`${direct}.md`)) {
    return `${direct}.md`;
  }
  throw new ConfigError(`Observer definition not found: ${reference}`, {
    reference,
    baseDir,
  });
}

/** `@relative/path.md` mentions outside code spans, loaded as extra context. */
async function resolveMentions(
  body: string,
  baseDir: string,
): Promise<Array<{ path: string; content: string }>> {
  const withoutCode = body.replace(CODE_PATTERN, "");
  const seen = new Set<string>();
  const files: Array<{ path: string; content: string }> = [];

  for (const match of withoutCode.matchAll(MENTION_PATTERN)) {
    const mention = (match[1] ?? "").replace(/[.]+$/, "");
    const candidates = [path.resolve(baseDir, mention), path.resolve(baseDir, `${mention}.md`)];
    for (const candidate of candidates) {
      if (seen.has(candidate) || !(await isFile(candidate))) {
        continue;
      }
      seen.add(candidate);
      files.push({ path: mention, content: await readFile(candidate, "utf8") });
      break;
    }
  }

  return files;
}

export async function loadObserverDefinition(
  filePath: string,
): Promise<LoadedObserverDefinition> {
  const text = await readFile(filePath, "utf8");
  const { frontmatter, body } = parseFrontmatter(text);
  const definition = normalizeObserverDefinition(frontmatter, filePath);
  const instruction = body.trim();

  return {
    name: definition.observer.name ?? path.basename(filePath, ".md"),
    description: definition.observer.description,
    model: definition.observer.model,
    timeoutSeconds: definition.observer.timeout,
    tools: definition.tools,
    instruction,
    contextFiles: await resolveMentions(instruction, path.dirname(filePath)),
  };
}

export function buildFocus(definition: LoadedObserverDefinition): string {
  if (definition.contextFiles.length === 0) {
    return definition.instruction;
  }

  const context = definition.contextFiles
    .map((file) => `<context_file path="${file.path}">\n${file.content}\n</context_file>`)
    .join("\n\n");
  return `${definition.instruction}\n\n---\n\n${context}`;
}

export function mergeObserver(
  reference: ObserverReference,
  definition: LoadedObserverDefinition,
): ObserverConfig {
  return {
    name: definition.name,
    description: definition.description,
    focus: buildFocus(definition),
    model: reference.model ?? definition.model ?? DEFAULT_MODEL,
    timeoutSeconds:
      reference.timeout ?? definition.timeoutSeconds ?? DEFAULT_OBSERVER_TIMEOUT_SECONDS,
    watch: reference.watch,
    tools: definition.tools,
    enabled: reference.enabled,
  };
}

async function readModuleConfig(configPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    const errorWithCode = error as NodeJS.ErrnoException;
    if (errorWithCode.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${describeError(error)}`);
  }
}

/**
 * Loads `config/observers.json` and every observer it references. A missing
 * config file yields the defaults with no observers.
 */
export async function loadObserversConfig(
  configPath?: string,
): Promise<ResolvedObserversConfig> {
  const resolvedPath = resolveConfigPath(configPath);
  const moduleConfig = normalizeModuleConfig(await readModuleConfig(resolvedPath));
  const baseDir = path.dirname(resolvedPath);

  const observers: ObserverConfig[] = [];
  const names = new Set<string>();
  for (const reference of moduleConfig.observers) {
    const filePath = await resolveObserverPath(reference.observer, baseDir);
    const observer = mergeObserver(reference, await loadObserverDefinition(filePath));
    if (names.has(observer.name)) {
      throw new ConfigError(`Duplicate observer name: ${observer.name}`, {
        observer: observer.name,
      });
    }
    names.add(observer.name);
    observers.push(observer);
  }

  return {
    hooks: moduleConfig.hooks,
    execution: moduleConfig.execution,
    observers,
    retention: moduleConfig.retention,
  };
}
