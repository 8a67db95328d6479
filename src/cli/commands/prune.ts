import { loadObserversConfig } from "../../config/loader.js";
import { openCycleLog } from "../../engine/session.js";
import { toPositiveInt } from "../flags.js";

export async function runPruneCommand(
  sessionId?: string,
  keepArg?: string,
  configPath?: string,
): Promise<void> {
  const keep =
    toPositiveInt(keepArg, "--keep") ??
    (await loadObserversConfig(configPath)).retention.cycles;

  const cycles = openCycleLog(sessionId);
  const removed = await cycles.prune(keep);
  process.stdout.write(`Pruned ${removed.length} cycle summaries (kept ${keep})\n`);
}
