import { openCycleLog, openObservationStore } from "../../engine/session.js";
import { formatCycleSummary, formatSeverityCounts } from "../format.js";

export async function runSummaryCommand(
  sessionId: string | undefined,
  json: boolean,
): Promise<void> {
  const store = await openObservationStore(sessionId);
  const open = await store.countBySeverity({ status: "open" });
  const acknowledged = await store.count({ status: "acknowledged" });
  const latest = await openCycleLog(sessionId).latest();

  if (json) {
    process.stdout.write(
      `${JSON.stringify({ sessionId: store.sessionId, open, acknowledged, latestCycle: latest }, null, 2)}\n`,
    );
    return;
  }

  process.stdout.write(`Session: ${store.sessionId}\n`);
  process.stdout.write(`Open: ${formatSeverityCounts(open)}\n`);
  process.stdout.write(`Acknowledged: ${acknowledged}\n`);
  process.stdout.write(
    latest ? `\n${formatCycleSummary(latest)}\n` : "\nNo observation cycles recorded yet.\n",
  );
}
