import { readFile } from "node:fs/promises";

import { z } from "zod";

import { ConfigError, describeError } from "../errors.js";
import type { TranscriptMessage } from "../types/observer.js";

export const transcriptSchema = z.array(
  z.object({
    role: z.enum(["user", "assistant", "tool", "system"]),
    content: z.string(),
    reasoning: z.string().optional(),
  }),
);

export function parseTranscript(value: unknown): TranscriptMessage[] {
  const parsed = transcriptSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid transcript at ${issue?.path.join(".") || "(root)"}: ${issue?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}

export async function readTranscriptFile(filePath: string): Promise<TranscriptMessage[]> {
  const raw = await readFile(filePath, "utf8");
  try {
    return parseTranscript(JSON.parse(raw));
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`${filePath} is not valid JSON: ${describeError(error)}`);
  }
}
