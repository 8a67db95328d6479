export type ObservationSeverity = "critical" | "high" | "medium" | "low" | "info";

export type ObservationStatus = "open" | "acknowledged" | "resolved";

export type SourceType = "file" | "conversation" | "mixed" | "unknown";

export const SEVERITIES = [
  "critical",
  "high",
  "medium",
  "low",
  "info",
] as const satisfies readonly ObservationSeverity[];

export const VALID_STATUSES = [
  "open",
  "acknowledged",
  "resolved",
] as const satisfies readonly ObservationStatus[];

export const SOURCE_TYPES = [
  "file",
  "conversation",
  "mixed",
  "unknown",
] as const satisfies readonly SourceType[];

/** Lower rank is more urgent. */
export const SEVERITY_RANK: Record<ObservationSeverity, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
  info: 4,
};

export interface Observation {
  id: string;
  observerName: string;
  content: string;
  severity: ObservationSeverity;
  status: ObservationStatus;
  sourceType: SourceType;
  sourceRef?: string;
  category?: string;
  suggestion?: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  acknowledgedAt?: string;
  resolvedAt?: string;
  resolutionNote?: string;
}

export interface ObservationInput {
  observerName: string;
  content: string;
  severity: ObservationSeverity;
  sourceType?: SourceType;
  sourceRef?: string;
  category?: string;
  suggestion?: string;
  metadata?: Record<string, unknown>;
}

export interface ObservationFilters {
  status?: ObservationStatus | ObservationStatus[];
  severity?: ObservationSeverity[];
  observerName?: string;
}

export interface ObservationQuery extends ObservationFilters {
  sortBy?: "severity" | "createdAt";
  limit?: number;
}

export type SeverityCounts = Record<ObservationSeverity, number>;

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

export function isSeverity(value: string): value is ObservationSeverity {
  return (SEVERITIES as readonly string[]).includes(value);
}

export function isStatus(value: string): value is ObservationStatus {
  return (VALID_STATUSES as readonly string[]).includes(value);
}
