import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";
import type { ProbeResult } from "./probe.js";

const CHECK_STATE_FILE = "dotfiles-last-update";
const NOTIFICATION_FILE = "dotfiles-update-available";

export type CheckState = {
  /** Epoch seconds of the last completed check. */
  lastCheckedAt: number;
};

export type NotificationRecord = {
  commitsBehind: number;
  filesChanged: number;
};

export type StateStore = {
  readonly checkStatePath: string;
  readonly notificationPath: string;
  readCheckState: () => Promise<CheckState | null>;
  /** Never moves the stored timestamp backwards. */
  writeCheckState: (now: number) => Promise<CheckState>;
  readNotification: () => Promise<NotificationRecord | null>;
  writeNotification: (record: NotificationRecord) => Promise<void>;
  clearNotification: () => Promise<boolean>;
};

export function formatNotificationFile(record: NotificationRecord): string {
  return [
    "Dotfiles update available!",
    `- Commits behind: ${record.commitsBehind}`,
    `- Files changed: ${record.filesChanged}`,
    "Run 'dotfiles-sync update' (dfu) to update.",
    "",
  ].join("\n");
}

function countAfter(label: string, text: string): number {
  const match = new RegExp(`${label}:\\s*(\\d+)`).exec(text);
  return match?.[1] ? Number(match[1]) : 0;
}

export function parseNotificationFile(text: string): NotificationRecord {
  return {
    commitsBehind: countAfter("Commits behind", text),
    filesChanged: countAfter("Files changed", text),
  };
}

function isMissing(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export function createStateStore(cacheDir: string, log: Logger): StateStore {
  const checkStatePath = join(cacheDir, CHECK_STATE_FILE);
  const notificationPath = join(cacheDir, NOTIFICATION_FILE);
  let tmpCounter = 0;

  async function readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async function writeAtomic(path: string, content: string): Promise<void> {
    await mkdir(cacheDir, { recursive: true });
    tmpCounter += 1;
    const tmpPath = `${path}.${process.pid}.${tmpCounter}.tmp`;
    try {
      await writeFile(tmpPath, content, "utf8");
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  async function readCheckState(): Promise<CheckState | null> {
    const text = await readText(checkStatePath);
    if (text === null) return null;
    const value = Number(text.trim());
    if (!Number.isInteger(value) || value < 0) {
      log.warn("check-state-unreadable", { path: checkStatePath, content: text.slice(0, 40) });
      return null;
    }
    return { lastCheckedAt: value };
  }

  async function writeCheckState(now: number): Promise<CheckState> {
    const previous = await readCheckState();
    const lastCheckedAt = Math.max(previous?.lastCheckedAt ?? 0, Math.floor(now));
    await writeAtomic(checkStatePath, `${lastCheckedAt}\n`);
    return { lastCheckedAt };
  }

  async function readNotification(): Promise<NotificationRecord | null> {
    const text = await readText(notificationPath);
    if (text === null) return null;
    return parseNotificationFile(text);
  }

  async function writeNotification(record: NotificationRecord): Promise<void> {
    await writeAtomic(notificationPath, formatNotificationFile(record));
  }

  async function clearNotification(): Promise<boolean> {
    try {
      await rm(notificationPath);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  return {
    checkStatePath,
    notificationPath,
    readCheckState,
    writeCheckState,
    readNotification,
    writeNotification,
    clearNotification,
  };
}

/**
 * Persist what a probe learned. A failed probe leaves any pending
 * notification alone but still counts as a check.
 */
export async function recordProbe(
  store: StateStore,
  result: ProbeResult,
  now: number,
  log: Logger,
): Promise<CheckState> {
  try {
    if (result.ok) {
      const { local, remote, commitsBehind, filesChanged } = result.snapshot;
      if (local !== remote) {
        await store.writeNotification({ commitsBehind, filesChanged });
      } else if (await store.clearNotification()) {
        log.info("notification-cleared", { local });
      }
    }
  } catch (err) {
    log.error("notification-write-failed", {
      path: store.notificationPath,
      error: toErrorMessage(err),
    });
    throw err;
  }
  return store.writeCheckState(now);
}
