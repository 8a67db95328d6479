import { loadObserversConfig } from "../config/loader.js";
import { ProviderModelInvoker } from "../agents/invoker.js";
import type { ModelInvoker } from "../dispatch/dispatcher.js";
import type { Logger } from "../logging.js";
import { createLogger } from "../logging.js";
import type { SessionStorage } from "../storage/session-storage.js";
import { FileSessionStorage, validateSessionId } from "../storage/session-storage.js";
import { ObservationStore } from "../observations/store.js";
import { CycleLog } from "./cycles.js";
import { ObservationEngine } from "./engine.js";

export const DEFAULT_SESSION_ID = "default";

export function resolveSessionId(explicit?: string): string {
  return validateSessionId(explicit ?? process.env["VIGIL_SESSION"] ?? DEFAULT_SESSION_ID);
}

export interface OpenEngineOptions {
  sessionId?: string;
  configPath?: string;
  rootDir?: string;
  storage?: SessionStorage;
  invoker?: ModelInvoker;
  logger?: Logger;
}

/** Builds an engine from `config/observers.json` and the on-disk data directory. */
export async function openEngine(options: OpenEngineOptions = {}): Promise<ObservationEngine> {
  const rootDir = options.rootDir ?? process.cwd();
  const logger = options.logger ?? createLogger();
  const config = await loadObserversConfig(options.configPath);

  return ObservationEngine.open({
    sessionId: resolveSessionId(options.sessionId),
    storage: options.storage ?? new FileSessionStorage(),
    config,
    invoker:
      options.invoker ??
      new ProviderModelInvoker({ rootDir, logger: logger.child("invoke") }),
    rootDir,
    logger,
  });
}

/** Store access for commands that never run observers. */
export async function openObservationStore(
  sessionId?: string,
  storage: SessionStorage = new FileSessionStorage(),
): Promise<ObservationStore> {
  return ObservationStore.load({ storage, sessionId: resolveSessionId(sessionId) });
}

export function openCycleLog(
  sessionId?: string,
  storage: SessionStorage = new FileSessionStorage(),
): CycleLog {
  return new CycleLog(storage, resolveSessionId(sessionId));
}
