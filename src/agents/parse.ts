import { z } from "zod";

import { ObserverInvocationError } from "../errors.js";
import { SEVERITIES, SOURCE_TYPES } from "../types/observation.js";
import type { ObservationDraft, ObserverPayload } from "../types/observer.js";

const severitySchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(SEVERITIES));

const draftSchema = z.object({
  content: z.string().min(1),
  severity: severitySchema,
  source_ref: z.string().nullish(),
  source_type: z.enum(SOURCE_TYPES).nullish(),
  category: z.string().nullish(),
  suggestion: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

const resolutionSchema = z.object({
  id: z.string().min(1),
  reason: z.string().nullish(),
});

const replySchema = z.object({
  observations: z.array(draftSchema).default([]),
  resolved: z.array(resolutionSchema).default([]),
});

function extractJsonText(reply: string): string {
  const trimmed = reply.trim();

  const fenced = /```json\s*([\s\S]*?)```/.exec(trimmed) ?? /```\s*([\s\S]*?)```/.exec(trimmed);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }

  if (trimmed.startsWith("{")) {
    return trimmed;
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  return start >= 0 && end > start ? trimmed.slice(start, end + 1) : trimmed;
}

function stringField(
  metadata: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Turns a raw model reply into new observations and resolutions. */
export function parseObserverReply(observerName: string, reply: string): ObserverPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonText(reply));
  } catch (error) {
    throw new ObserverInvocationError(observerName, "reply is not valid JSON", error);
  }

  const parsed = replySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ObserverInvocationError(
      observerName,
      `reply does not match the output format${where}: ${issue?.message ?? "invalid"}`,
    );
  }

  const observations = parsed.data.observations.map((item): ObservationDraft => {
    const metadata = item.metadata ?? {};
    return {
      content: item.content,
      severity: item.severity,
      sourceType: item.source_type ?? undefined,
      sourceRef: item.source_ref ?? undefined,
      category: item.category ?? stringField(metadata, "category"),
      suggestion: item.suggestion ?? stringField(metadata, "suggestion"),
      metadata,
    };
  });

  const resolved = parsed.data.resolved.map((item) => ({
    id: item.id,
    reason: item.reason ?? undefined,
  }));

  return { observations, resolved };
}
