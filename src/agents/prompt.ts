import { readFile } from "node:fs/promises";
import path from "node:path";

import type { Observation } from "../types/observation.js";
import type { ObserverConfig, ReviewContent } from "../types/observer.js";

export const PROTOCOL_PATH = path.join("context", "observer-protocol.md");
export const EXISTING_OBSERVATIONS_PLACEHOLDER = "{{existing_observations}}";

const MAX_EXISTING_CONTENT_CHARS = 150;

export const DEFAULT_PROTOCOL = `## Output Format

Respond with valid JSON only:

\`\`\`json
{
  "observations": [
    {
      "content": "Description of the NEW issue",
      "severity": "critical|high|medium|low|info",
      "source_ref": "file:line or context reference",
      "metadata": {
        "category": "security|quality|logic|performance",
        "suggestion": "How to fix (optional)"
      }
    }
  ],
  "resolved": [
    {
      "id": "id of issue that is now fixed",
      "reason": "Brief explanation"
    }
  ]
}
\`\`\`

If no new issues and nothing resolved: \`{"observations": [], "resolved": []}\`
`;

/** Reads a project-level protocol override, if one exists. */
export async function loadProtocol(rootDir: string): Promise<string | null> {
  try {
    return await readFile(path.join(rootDir, PROTOCOL_PATH), "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function buildSystemPrompt(observer: ObserverConfig): string {
  const lines = [
    `You are the "${observer.name}" observer.`,
    observer.description,
  ];
  if (observer.focus.trim().length > 0) {
    lines.push("", observer.focus.trim());
  }
  return lines.join("\n");
}

function buildExistingSection(openObservations: Observation[]): string {
  if (openObservations.length === 0) {
    return "";
  }

  const list = openObservations
    .map(
      (observation) =>
        `- id=\`${observation.id}\` [${observation.severity}] ${observation.sourceRef ?? "unknown"}: ${observation.content.slice(0, MAX_EXISTING_CONTENT_CHARS)}`,
    )
    .join("\n");

  return [
    "",
    "## Previously Reported Issues",
    "",
    "The following issues were previously reported. Review them against the current content:",
    "",
    list,
    "",
    "**Your tasks:**",
    "1. Do NOT report these again if they still exist",
    "2. If an issue has been FIXED (no longer present in the content), mark it as resolved",
    "",
  ].join("\n");
}

export interface ObserverPromptInput {
  content: ReviewContent;
  openObservations: Observation[];
  protocol?: string | null;
}

export function buildObserverPrompt(input: ObserverPromptInput): string {
  const existing = buildExistingSection(input.openObservations);
  let protocol = input.protocol ?? DEFAULT_PROTOCOL;

  if (protocol.includes(EXISTING_OBSERVATIONS_PLACEHOLDER)) {
    protocol = protocol
      .split(EXISTING_OBSERVATIONS_PLACEHOLDER)
      .join(existing || "No previously reported issues.");
  }

  return `## Content to Review\n\n${input.content.text}\n${existing}\n${protocol}\n`;
}
