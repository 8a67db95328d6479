#!/usr/bin/env node

import { runDashboardCommand } from "./commands/dashboard.js";
import { runHookCommand } from "./commands/hook.js";
import { runMcpCommand } from "./commands/mcp.js";
import {
  runAckCommand,
  runClearCommand,
  runListCommand,
  runResolveCommand,
  runShowCommand,
} from "./commands/observations.js";
import { runPruneCommand } from "./commands/prune.js";
import { runSummaryCommand } from "./commands/summary.js";
import { runTriggerCommand } from "./commands/trigger.js";
import {
  getFlagValue,
  getPositionals,
  hasFlag,
  parseList,
  toPositiveInt,
} from "./flags.js";

const VALUE_FLAGS = [
  "--session",
  "--config",
  "--event",
  "--transcript",
  "--status",
  "--severity",
  "--observer",
  "--sort",
  "--limit",
  "--note",
  "--keep",
  "--repo",
  "--port",
  "--transport",
];

function printHelp(): void {
  process.stdout.write(`Vigil CLI\n\n`);
  process.stdout.write(`Usage:\n`);
  process.stdout.write(
    `  vigil trigger [--event <name>] [--transcript <file.json>] [--json]\n`,
  );
  process.stdout.write(
    `  vigil list [--status <s,...>] [--severity <s,...>] [--observer <name>] [--sort severity|createdAt] [--limit <n>] [--json]\n`,
  );
  process.stdout.write(`  vigil show <id> [--json]\n`);
  process.stdout.write(`  vigil ack <id>\n`);
  process.stdout.write(`  vigil resolve <id> [--note <text>]\n`);
  process.stdout.write(`  vigil clear\n`);
  process.stdout.write(`  vigil summary [--json]\n`);
  process.stdout.write(`  vigil hook install|uninstall [--repo <path>]\n`);
  process.stdout.write(`  vigil prune [--keep <n>]\n`);
  process.stdout.write(`  vigil mcp [--transport stdio|sse] [--port <n>]\n`);
  process.stdout.write(`  vigil dashboard [--port <n>]\n\n`);
  process.stdout.write(
    `Global flags: --session <id> (default $VIGIL_SESSION or "default"), --config <path>\n`,
  );
}

function requireId(rest: string[], usage: string): string {
  const id = getPositionals(rest, VALUE_FLAGS)[0];
  if (!id) {
    throw new Error(`Missing observation id. Usage: ${usage}`);
  }
  return id;
}

function parseHookAction(value: string | undefined): "install" | "uninstall" {
  if (value === "install" || value === "uninstall") {
    return value;
  }

  throw new Error("Unknown hook action. Usage: vigil hook <install|uninstall> [--repo <path>]");
}

type CommandHandler = (rest: string[]) => Promise<void>;

function createCommandHandlers(): Record<string, CommandHandler> {
  return {
    trigger: async (rest) => {
      await runTriggerCommand({
        sessionId: getFlagValue(rest, "--session"),
        configPath: getFlagValue(rest, "--config"),
        event: getFlagValue(rest, "--event"),
        transcriptPath: getFlagValue(rest, "--transcript"),
        json: hasFlag(rest, "--json"),
      });
    },
    list: async (rest) => {
      await runListCommand({
        sessionId: getFlagValue(rest, "--session"),
        status: parseList(getFlagValue(rest, "--status")),
        severity: parseList(getFlagValue(rest, "--severity")),
        observer: getFlagValue(rest, "--observer"),
        sort: getFlagValue(rest, "--sort"),
        limit: toPositiveInt(getFlagValue(rest, "--limit"), "--limit"),
        json: hasFlag(rest, "--json"),
      });
    },
    show: async (rest) => {
      const id = requireId(rest, "vigil show <id>");
      await runShowCommand(id, getFlagValue(rest, "--session"), hasFlag(rest, "--json"));
    },
    ack: async (rest) => {
      const id = requireId(rest, "vigil ack <id>");
      await runAckCommand(id, getFlagValue(rest, "--session"));
    },
    resolve: async (rest) => {
      const id = requireId(rest, "vigil resolve <id> [--note <text>]");
      await runResolveCommand(id, getFlagValue(rest, "--session"), getFlagValue(rest, "--note"));
    },
    clear: async (rest) => {
      await runClearCommand(getFlagValue(rest, "--session"));
    },
    summary: async (rest) => {
      await runSummaryCommand(getFlagValue(rest, "--session"), hasFlag(rest, "--json"));
    },
    hook: async (rest) => {
      const action = parseHookAction(rest[0]);
      await runHookCommand(action, getFlagValue(rest, "--repo"), getFlagValue(rest, "--session"));
    },
    prune: async (rest) => {
      await runPruneCommand(
        getFlagValue(rest, "--session"),
        getFlagValue(rest, "--keep"),
        getFlagValue(rest, "--config"),
      );
    },
    mcp: async (rest) => {
      await runMcpCommand(
        getFlagValue(rest, "--transport"),
        getFlagValue(rest, "--port"),
        getFlagValue(rest, "--session"),
      );
    },
    dashboard: async (rest) => {
      await runDashboardCommand(
        getFlagValue(rest, "--port"),
        getFlagValue(rest, "--session"),
        getFlagValue(rest, "--config"),
      );
    },
  };
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv;

  if (!command || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const handlers = createCommandHandlers();
  const handler = handlers[command];
  if (!handler) {
    throw new Error(`Unknown command: ${command}`);
  }

  await handler(rest);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
});
