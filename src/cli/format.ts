import type { CycleSummary } from "../engine/cycles.js";
import type { Observation, SeverityCounts } from "../types/observation.js";
import { SEVERITIES } from "../types/observation.js";

export function formatSeverityCounts(counts: SeverityCounts): string {
  return SEVERITIES.map((severity) => `${severity}: ${counts[severity]}`).join(", ");
}

export function formatObservationLine(observation: Observation): string {
  const ref = observation.sourceRef ? ` ${observation.sourceRef}` : "";
  return `${observation.id}  [${observation.severity}] ${observation.status.padEnd(12)} ${observation.observerName}${ref}: ${observation.content}`;
}

export function formatObservationDetail(observation: Observation): string {
  const lines = [
    `ID:        ${observation.id}`,
    `Observer:  ${observation.observerName}`,
    `Severity:  ${observation.severity}`,
    `Status:    ${observation.status}`,
    `Source:    ${observation.sourceType}${observation.sourceRef ? ` (${observation.sourceRef})` : ""}`,
    `Created:   ${observation.createdAt}`,
  ];
  if (observation.category) {
    lines.push(`Category:  ${observation.category}`);
  }
  if (observation.acknowledgedAt) {
    lines.push(`Acknowledged: ${observation.acknowledgedAt}`);
  }
  if (observation.resolvedAt) {
    lines.push(`Resolved:  ${observation.resolvedAt}`);
  }
  if (observation.resolutionNote) {
    lines.push(`Note:      ${observation.resolutionNote}`);
  }
  lines.push("", observation.content);
  if (observation.suggestion) {
    lines.push("", `Suggestion: ${observation.suggestion}`);
  }
  return lines.join("\n");
}

export function formatCycleSummary(summary: CycleSummary): string {
  const lines = [
    `Cycle ${summary.cycleId} (${summary.event})`,
    `Dispatched: ${summary.dispatched.join(", ") || "none"}`,
  ];

  for (const outcome of summary.outcomes) {
    const detail =
      outcome.status === "success"
        ? `${outcome.created.length} created, ${outcome.resolved.length} resolved`
        : `${outcome.reason ?? "error"}: ${outcome.error ?? "unknown"}`;
    lines.push(`  ${outcome.observer}: ${outcome.status} (${detail})`);
  }

  lines.push(
    `New: ${formatSeverityCounts(summary.newBySeverity)}`,
    `Open: ${formatSeverityCounts(summary.openBySeverity)}`,
  );
  for (const error of summary.detectionErrors) {
    lines.push(`Detection error: ${error}`);
  }
  return lines.join("\n");
}
