import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";

export type DotfilesSyncConfig = {
  /** Write NDJSON debug log to <cache_dir>/dotfiles-sync/debug.log */
  log_enabled: boolean;
  /** Local checkout of the dotfiles repository */
  repo_dir: string;
  /** Remote name or URL/path to fetch from */
  remote: string;
  /** Branch tracked on the remote */
  branch: string;
  /** Minimum seconds between automatic background checks */
  check_interval_seconds: number;
  /** Apply updates without asking for confirmation */
  auto_apply: boolean;
  /** Directory holding the check timestamp and notification files */
  cache_dir: string;
  /** Timeout for each git invocation */
  git_timeout_ms: number;
  /** Shell command run after a successful update, null for a hint only */
  reload_command: string | null;
  /** Installer, run from repo_dir by `dotfiles-sync install` */
  install_command: string;
};

export const DEFAULT_CONFIG: Readonly<DotfilesSyncConfig> = {
  log_enabled: true,
  repo_dir: "~/.dotfiles-public",
  remote: "origin",
  branch: "main",
  check_interval_seconds: 24 * 60 * 60,
  auto_apply: false,
  cache_dir: "~/.cache",
  git_timeout_ms: 30_000,
  reload_command: null,
  install_command: "./install.sh",
};

export function configPathFor(home: string): string {
  return join(home, ".config", "dotfiles-sync", "config.json");
}

/**
 * Turn JSONC into JSON: drops `//` and `/* *\/` comments outside string
 * literals, then trailing commas before `]` or `}`.
 */
export function stripJsonComments(input: string): string {
  let out = "";
  let inString = false;
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);
    const next = input.charAt(i + 1);

    if (inString) {
      out += ch;
      if (ch === "\\") {
        out += next;
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      i++;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
    } else if (ch === "/" && next === "/") {
      const eol = input.indexOf("\n", i);
      i = eol === -1 ? input.length : eol;
    } else if (ch === "/" && next === "*") {
      const close = input.indexOf("*/", i + 2);
      i = close === -1 ? input.length : close + 2;
    } else {
      out += ch;
      i++;
    }
  }

  return out.replace(/,(\s*[\]}])/g, "$1");
}

export function expandHome(path: string, home: string): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function pick<T>(
  value: unknown,
  guard: (v: unknown) => v is T,
  fallback: T,
): T {
  return guard(value) ? value : fallback;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isReloadCommand(value: unknown): value is string | null {
  return value === null || isNonEmptyString(value);
}

function normalize(
  parsed: Record<string, unknown>,
): DotfilesSyncConfig {
  return {
    log_enabled: pick(parsed.log_enabled, isBoolean, DEFAULT_CONFIG.log_enabled),
    repo_dir: pick(parsed.repo_dir, isNonEmptyString, DEFAULT_CONFIG.repo_dir),
    remote: pick(parsed.remote, isNonEmptyString, DEFAULT_CONFIG.remote),
    branch: pick(parsed.branch, isNonEmptyString, DEFAULT_CONFIG.branch),
    check_interval_seconds: pick(
      parsed.check_interval_seconds,
      isPositiveNumber,
      DEFAULT_CONFIG.check_interval_seconds,
    ),
    auto_apply: pick(parsed.auto_apply, isBoolean, DEFAULT_CONFIG.auto_apply),
    cache_dir: pick(parsed.cache_dir, isNonEmptyString, DEFAULT_CONFIG.cache_dir),
    git_timeout_ms: pick(
      parsed.git_timeout_ms,
      isPositiveNumber,
      DEFAULT_CONFIG.git_timeout_ms,
    ),
    reload_command: pick(
      parsed.reload_command,
      isReloadCommand,
      DEFAULT_CONFIG.reload_command,
    ),
    install_command: pick(
      parsed.install_command,
      isNonEmptyString,
      DEFAULT_CONFIG.install_command,
    ),
  };
}

function applyEnv(
  config: DotfilesSyncConfig,
  env: NodeJS.ProcessEnv,
): DotfilesSyncConfig {
  const result = { ...config };
  if (isNonEmptyString(env.DOTFILES_DIR)) {
    result.repo_dir = env.DOTFILES_DIR;
  }
  if (isNonEmptyString(env.DOTFILES_AUTO_UPDATE)) {
    result.auto_apply = true;
  }
  const interval = Number(env.DOTFILES_UPDATE_INTERVAL);
  if (Number.isInteger(interval) && interval > 0) {
    result.check_interval_seconds = interval;
  }
  return result;
}

function resolvePaths(
  config: DotfilesSyncConfig,
  home: string,
): DotfilesSyncConfig {
  return {
    ...config,
    repo_dir: expandHome(config.repo_dir, home),
    cache_dir: expandHome(config.cache_dir, home),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function loadConfig(
  home: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DotfilesSyncConfig> {
  const configPath = configPathFor(home);

  let fromFile: DotfilesSyncConfig = { ...DEFAULT_CONFIG };

  if (existsSync(configPath)) {
    try {
      const raw = await readFile(configPath, "utf8");
      const parsed: unknown = JSON.parse(stripJsonComments(raw));
      if (!isRecord(parsed)) {
        throw new Error("top-level value is not an object");
      }
      fromFile = normalize(parsed);
    } catch (err) {
      console.warn(
        `[dotfiles-sync] Failed to parse config at ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
      );
    }
  }

  return resolvePaths(applyEnv(fromFile, env), home);
}
