import {
  appendFile,
  mkdir,
  rename,
  rm,
  stat,
} from "node:fs/promises";
import { dirname, join } from "node:path";

const LOG_DIR_NAME = "dotfiles-sync";
const LOG_FILE_NAME = "debug.log";
const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;

export type LogLevel = "info" | "warn" | "error";

export type LoggerOptions = {
  maxFileBytes?: number;
};

export type Logger = {
  info: (cat: string, data?: Record<string, unknown>) => void;
  warn: (cat: string, data?: Record<string, unknown>) => void;
  error: (cat: string, data?: Record<string, unknown>) => void;
  flush?: () => Promise<void>;
};

export function logPathFor(cacheDir: string): string {
  return join(cacheDir, LOG_DIR_NAME, LOG_FILE_NAME);
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

/**
 * NDJSON file logger. One object per line:
 *   {"ts":"...","level":"info","cat":"check-complete","commitsBehind":3}
 *
 * Nothing is ever printed to the terminal except a single warning per
 * failure kind, so the logger is safe to use from the background check.
 *   jq 'select(.cat | startswith("apply-"))' ~/.cache/dotfiles-sync/debug.log
 */
export function createLogger(
  logEnabled: boolean,
  cacheDir: string,
  options: LoggerOptions = {},
): Logger {
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const logPath = logPathFor(cacheDir);
  const rotatedPath = `${logPath}.1`;
  const warned = new Set<string>();
  let queue: Promise<void> = Promise.resolve();

  function warnOnce(key: string, message: string, err: unknown): void {
    if (warned.has(key)) return;
    warned.add(key);
    console.warn(`[dotfiles-sync] ${message}: ${toErrorMessage(err)}`);
  }

  async function prepare(): Promise<boolean> {
    try {
      await mkdir(dirname(logPath), { recursive: true });
    } catch (err) {
      warnOnce("mkdir", `Logger failed to create log directory at ${dirname(logPath)}`, err);
      return false;
    }

    if (maxFileBytes <= 0) return true;

    try {
      const { size } = await stat(logPath);
      if (size < maxFileBytes) return true;
      await rm(rotatedPath, { force: true });
      await rename(logPath, rotatedPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        warnOnce("rotate", `Logger failed to rotate ${logPath}`, err);
      }
    }
    return true;
  }

  function write(
    level: LogLevel,
    cat: string,
    data: Record<string, unknown> = {},
  ): void {
    if (!logEnabled) return;
    const line =
      JSON.stringify({ ts: new Date().toISOString(), level, cat, ...data }) +
      "\n";

    queue = queue
      .then(async () => {
        if (!(await prepare())) return;
        try {
          await appendFile(logPath, line);
        } catch (err) {
          warnOnce("write", `Logger failed to append to ${logPath}`, err);
        }
      })
      .catch((err: unknown) => {
        warnOnce("pipeline", "Logger pipeline failure", err);
      });
  }

  return {
    info: (cat, data) => write("info", cat, data),
    warn: (cat, data) => write("warn", cat, data),
    error: (cat, data) => write("error", cat, data),
    flush: () => queue,
  };
}

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
