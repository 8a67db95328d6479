import { readFile } from "node:fs/promises";
import path from "node:path";

import { describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import type {
  ConversationWatchTarget,
  ObserverConfig,
  ReviewContent,
  TranscriptMessage,
} from "../types/observer.js";
import { matchingKeys, pathFromFileKey } from "../detection/glob.js";

export const MAX_FILE_CONTENT_CHARS = 50_000;
export const MAX_CONVERSATION_MESSAGES = 20;
export const MAX_MESSAGE_CHARS = 2_000;

const TRUNCATED = "... [truncated]";

export interface ReviewSource {
  rootDir: string;
  changedKeys: ReadonlySet<string>;
  deletedFiles: ReadonlySet<string>;
  conversationDelta: TranscriptMessage[];
}

export function formatConversation(
  messages: TranscriptMessage[],
  target: Pick<ConversationWatchTarget, "includeToolCalls" | "includeReasoning">,
): string {
  const parts: string[] = [];

  for (const message of messages.slice(-MAX_CONVERSATION_MESSAGES)) {
    if (message.role === "tool" && !target.includeToolCalls) {
      continue;
    }

    let text = message.content;
    if (target.includeReasoning && message.reasoning) {
      text = `${text}\n_reasoning_: ${message.reasoning}`;
    }
    if (text.length > MAX_MESSAGE_CHARS) {
      text = `${text.slice(0, MAX_MESSAGE_CHARS)}${TRUNCATED}`;
    }
    parts.push(`**${message.role}**: ${text}`);
  }

  return parts.join("\n\n");
}

interface CharacterBudget {
  used: number;
}

async function formatFiles(
  files: string[],
  source: ReviewSource,
  budget: CharacterBudget,
  logger?: Logger,
): Promise<string> {
  const parts: string[] = [];

  for (const file of files) {
    if (budget.used >= MAX_FILE_CONTENT_CHARS) {
      break;
    }

    if (source.deletedFiles.has(file)) {
      parts.push(`### ${file}\n(deleted)`);
      continue;
    }

    let text: string;
    try {
      text = await readFile(path.join(source.rootDir, file), "utf8");
    } catch (error) {
      logger?.debug("Could not read file for review", {
        file,
        reason: describeError(error),
      });
      continue;
    }

    const remaining = MAX_FILE_CONTENT_CHARS - budget.used;
    if (text.length > remaining) {
      text = `${text.slice(0, remaining)}\n${TRUNCATED}`;
      budget.used = MAX_FILE_CONTENT_CHARS;
    } else {
      budget.used += text.length;
    }
    parts.push(`### ${file}\n\`\`\`\n${text}\n\`\`\``);
  }

  return parts.join("\n\n");
}

/**
 * Renders what one observer should look at: the changed files its globs
 * match and the new part of the conversation, if it watches one.
 */
export async function buildReviewContent(
  observer: ObserverConfig,
  source: ReviewSource,
  logger?: Logger,
): Promise<ReviewContent> {
  const sections: string[] = [];
  const reviewedFiles: string[] = [];
  const budget: CharacterBudget = { used: 0 };

  for (const target of observer.watch) {
    if (target.type === "files") {
      const files = matchingKeys(target, source.changedKeys)
        .map(pathFromFileKey)
        .filter((file) => !reviewedFiles.includes(file))
        .sort((left, right) => left.localeCompare(right));
      if (files.length === 0) {
        continue;
      }
      reviewedFiles.push(...files);
      const text = await formatFiles(files, source, budget, logger);
      if (text) {
        sections.push(`## Files\n\n${text}`);
      }
      continue;
    }

    const text = formatConversation(source.conversationDelta, target);
    if (text) {
      sections.push(`## Conversation\n\n${text}`);
    }
  }

  return { files: reviewedFiles, text: sections.join("\n\n---\n\n") };
}
