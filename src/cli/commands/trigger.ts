import { openEngine } from "../../engine/session.js";
import { readTranscriptFile } from "../../engine/transcript.js";
import { formatCycleSummary } from "../format.js";

export interface TriggerCommandOptions {
  sessionId?: string;
  configPath?: string;
  event?: string;
  transcriptPath?: string;
  json: boolean;
}

export async function runTriggerCommand(options: TriggerCommandOptions): Promise<void> {
  const engine = await openEngine({
    sessionId: options.sessionId,
    configPath: options.configPath,
  });
  const transcript = options.transcriptPath
    ? await readTranscriptFile(options.transcriptPath)
    : undefined;

  const summary = await engine.runCycle({
    event: options.event ?? "manual",
    transcript,
  });

  process.stdout.write(
    options.json
      ? `${JSON.stringify(summary, null, 2)}\n`
      : `${formatCycleSummary(summary)}\n`,
  );

  if (summary.failed) {
    process.exitCode = 1;
  }
}
