import type { Observation, ObservationSeverity } from "../types/observation.js";
import { SEVERITIES } from "../types/observation.js";

const PER_OBSERVER_LIMIT = 3;
const CONTENT_PREVIEW_CHARS = 100;

export function formatObservationSummary(open: Observation[]): string {
  const bySeverity = new Map<ObservationSeverity, number>();
  for (const observation of open) {
    bySeverity.set(observation.severity, (bySeverity.get(observation.severity) ?? 0) + 1);
  }
  const severityParts = SEVERITIES.filter((severity) => bySeverity.has(severity)).map(
    (severity) => `${severity}: ${bySeverity.get(severity) ?? 0}`,
  );

  const lines = [
    `Active Observations: ${open.length} open`,
    `By Severity: ${severityParts.join(", ")}`,
  ];

  const byObserver = new Map<string, Observation[]>();
  for (const observation of open) {
    const group = byObserver.get(observation.observerName) ?? [];
    group.push(observation);
    byObserver.set(observation.observerName, group);
  }

  for (const [observer, group] of byObserver) {
    lines.push("", `**${observer}** (${group.length} observations):`);
    for (const observation of group.slice(0, PER_OBSERVER_LIMIT)) {
      lines.push(
        `  [${observation.severity}] ${observation.content.slice(0, CONTENT_PREVIEW_CHARS)}`,
      );
    }
    if (group.length > PER_OBSERVER_LIMIT) {
      lines.push(`  ... and ${group.length - PER_OBSERVER_LIMIT} more`);
    }
  }

  return lines.join("\n");
}

/** Context block injected ahead of the next prompt; null when nothing is open. */
export function formatObservationReminder(open: Observation[]): string | null {
  if (open.length === 0) {
    return null;
  }

  return [
    '<system-reminder source="observers">',
    formatObservationSummary(open),
    "",
    "Please review and address these observations in your response.",
    "</system-reminder>",
  ].join("\n");
}
