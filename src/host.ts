import { spawn, spawnSync } from "node:child_process";
import { createInterface } from "node:readline/promises";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/** `[y/N]` prompt on the terminal; anything but y/yes declines. */
export async function promptConfirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.log("No terminal to confirm on. Re-run with --yes to apply non-interactively.");
    return false;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(`${question} [y/N] `));
  } finally {
    rl.close();
  }
}

/**
 * Start `<this script> check` in its own process group with no stdio, so
 * the invoking shell is ready immediately and never sees its output.
 */
export function spawnDetachedCheck(scriptPath: string, log: Logger): boolean {
  try {
    const child = spawn(
      process.execPath,
      [...process.execArgv, scriptPath, "check"],
      { detached: true, stdio: "ignore" },
    );
    child.on("error", (err) => {
      log.error("background-spawn-failed", { error: toErrorMessage(err) });
    });
    log.info("background-spawned", { pid: child.pid });
    child.unref();
    return true;
  } catch (err) {
    log.error("background-spawn-failed", { error: toErrorMessage(err) });
    return false;
  }
}

function runShell(command: string, cwd?: string): number {
  const result = spawnSync(command, {
    cwd,
    shell: true,
    stdio: "inherit",
  });
  if (result.error) throw result.error;
  return result.status ?? 1;
}

/** Reload hook for the update flow. Without a command, only a hint is printed. */
export function createReload(
  reloadCommand: string | null,
): () => Promise<void> {
  return async () => {
    if (reloadCommand === null) {
      console.log("Restart your shell (exec $SHELL) to load the new configuration.");
      return;
    }
    console.log("Reloading configuration...");
    const code = runShell(reloadCommand);
    if (code !== 0) {
      throw new Error(`reload command exited with ${code}: ${reloadCommand}`);
    }
  };
}

export function runInstaller(
  installCommand: string,
  repoDir: string,
  log: Logger,
): number {
  log.info("installer-start", { command: installCommand, cwd: repoDir });
  const code = runShell(installCommand, repoDir);
  log.info("installer-exit", { code });
  return code;
}
