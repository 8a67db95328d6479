import { chmod, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";

const HOOK_MARKER_START = "# VIGIL_HOOK_START";
const HOOK_MARKER_END = "# VIGIL_HOOK_END";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export function buildHookBlock(projectRoot: string, sessionId?: string): string {
  const sessionFlag = sessionId ? ` --session "${sessionId}"` : "";
  return [
    HOOK_MARKER_START,
    `cd "${projectRoot}" && npx vigil trigger --event git:post-commit${sessionFlag} >/dev/null 2>&1 || true`,
    HOOK_MARKER_END,
  ].join("\n");
}

export function stripHookBlock(content: string): string {
  const normalized = content.replace(/\r\n/g, "\n");
  const blockPattern = new RegExp(
    `${HOOK_MARKER_START}[\\s\\S]*?${HOOK_MARKER_END}\\n?`,
    "g",
  );
  return normalized.replace(blockPattern, "").trimEnd();
}

async function installHook(projectRoot: string, sessionId?: string): Promise<void> {
  const hooksDir = path.resolve(projectRoot, ".git", "hooks");
  if (!(await fileExists(hooksDir))) {
    throw new Error(`No git hooks directory at ${hooksDir}`);
  }

  const hookPath = path.join(hooksDir, "post-commit");
  const hookBlock = buildHookBlock(projectRoot, sessionId);

  if (!(await fileExists(hookPath))) {
    await writeFile(hookPath, `#!/bin/sh\n\n${hookBlock}\n`, "utf8");
    await chmod(hookPath, 0o755);
    process.stdout.write(`Installed post-commit hook in ${projectRoot}\n`);
    return;
  }

  const currentContent = await readFile(hookPath, "utf8");
  if (currentContent.includes(HOOK_MARKER_START)) {
    process.stdout.write(`Hook already installed in ${projectRoot}\n`);
    return;
  }

  const withNewline = currentContent.endsWith("\n")
    ? currentContent
    : `${currentContent}\n`;
  await writeFile(hookPath, `${withNewline}\n${hookBlock}\n`, "utf8");
  await chmod(hookPath, 0o755);
  process.stdout.write(`Appended post-commit hook in ${projectRoot}\n`);
}

async function uninstallHook(projectRoot: string): Promise<void> {
  const hookPath = path.resolve(projectRoot, ".git", "hooks", "post-commit");
  if (!(await fileExists(hookPath))) {
    process.stdout.write(`No post-commit hook in ${projectRoot}\n`);
    return;
  }

  const content = await readFile(hookPath, "utf8");
  const updated = stripHookBlock(content);
  const finalContent = updated.length > 0 ? `${updated}\n` : "";
  await writeFile(hookPath, finalContent, "utf8");
  if (finalContent.length > 0) {
    await chmod(hookPath, 0o755);
  }
  process.stdout.write(`Removed vigil hook block from ${projectRoot}\n`);
}

export async function runHookCommand(
  action: "install" | "uninstall",
  repoPath?: string,
  sessionId?: string,
): Promise<void> {
  const projectRoot = path.resolve(process.cwd(), repoPath ?? ".");
  if (action === "install") {
    await installHook(projectRoot, sessionId);
  } else {
    await uninstallHook(projectRoot);
  }
}
