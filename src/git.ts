import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import type { Logger } from "./logger.js";

export type GitRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: readonly string[], result: GitRunResult) {
    super(
      `git ${args.join(" ")} failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
    );
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/**
 * Operations the update subsystem needs from version control. Any backend
 * providing these works; the git one below is what the CLI wires in.
 */
export type GitBackend = {
  isRepository: () => Promise<boolean>;
  /** Download remote metadata without touching the working tree. */
  fetch: () => Promise<{ ok: boolean; stderr: string }>;
  resolveLocalTip: () => Promise<string | null>;
  /** Tip of the tracked branch as of the last fetch. */
  resolveRemoteTip: () => Promise<string | null>;
  countCommitsBetween: (from: string, to: string) => Promise<number>;
  listChangedPaths: (from: string, to: string) => Promise<string[]>;
  listCommits: (from: string, to: string) => Promise<string[]>;
  listModifiedPaths: () => Promise<string[]>;
  pull: () => Promise<{ ok: boolean; stderr: string }>;
  /** Abort any half-done merge and put HEAD back at `rev` without discarding edits. */
  restore: (rev: string) => Promise<{ ok: boolean; stderr: string }>;
  currentBranch: () => Promise<string | null>;
  remoteUrl: () => Promise<string | null>;
};

export type GitBackendOptions = {
  repoDir: string;
  remote: string;
  branch: string;
  timeoutMs: number;
};

function outputToString(output: string | Buffer): string {
  return typeof output === "string" ? output : output.toString("utf8");
}

/** Paths from `git status --porcelain`; renames report the new path. */
export function parsePorcelainPaths(output: string): string[] {
  const paths: string[] = [];
  for (const line of output.split("\n")) {
    if (line.length < 4) continue;
    const entry = line.slice(3);
    const arrow = entry.indexOf(" -> ");
    const path = arrow === -1 ? entry : entry.slice(arrow + 4);
    paths.push(unquote(path));
  }
  return paths;
}

function unquote(path: string): string {
  if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
    return path.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return path;
}

function nonEmptyLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export function createGitBackend(
  options: GitBackendOptions,
  log: Logger,
): GitBackend {
  const { repoDir, remote, branch, timeoutMs } = options;

  function run(args: string[]): Promise<GitRunResult> {
    return new Promise((resolve) => {
      execFile(
        "git",
        args,
        {
          cwd: repoDir,
          encoding: "utf8",
          timeout: timeoutMs,
          maxBuffer: 16 * 1024 * 1024,
          env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
        },
        (err, stdout, stderr) => {
          const out = outputToString(stdout);
          const errOut = outputToString(stderr);
          if (!err) {
            resolve({ exitCode: 0, stdout: out, stderr: errOut });
            return;
          }
          const exitCode = typeof err.code === "number" ? err.code : -1;
          resolve({
            exitCode,
            stdout: out,
            stderr: errOut || err.message,
          });
        },
      );
    });
  }

  async function runOrThrow(args: string[]): Promise<string> {
    const result = await run(args);
    if (result.exitCode !== 0) {
      log.warn("git-command-failed", {
        args,
        exitCode: result.exitCode,
        stderr: result.stderr.trim().slice(0, 500),
      });
      throw new GitCommandError(args, result);
    }
    return result.stdout;
  }

  async function revParse(rev: string): Promise<string | null> {
    const result = await run(["rev-parse", "--verify", "--quiet", `${rev}^{commit}`]);
    if (result.exitCode !== 0) return null;
    return result.stdout.trim() || null;
  }

  async function isRepository(): Promise<boolean> {
    if (!existsSync(repoDir)) return false;
    const result = await run(["rev-parse", "--is-inside-work-tree"]);
    return result.exitCode === 0 && result.stdout.trim() === "true";
  }

  async function fetch(): Promise<{ ok: boolean; stderr: string }> {
    const result = await run(["fetch", "--quiet", remote, branch]);
    if (result.exitCode !== 0) {
      log.warn("git-fetch-failed", {
        remote,
        branch,
        exitCode: result.exitCode,
        stderr: result.stderr.trim().slice(0, 500),
      });
    }
    return { ok: result.exitCode === 0, stderr: result.stderr.trim() };
  }

  async function countCommitsBetween(from: string, to: string): Promise<number> {
    const out = await runOrThrow(["rev-list", "--count", `${from}..${to}`]);
    const count = Number.parseInt(out.trim(), 10);
    if (Number.isNaN(count)) {
      throw new GitCommandError(["rev-list", "--count", `${from}..${to}`], {
        exitCode: 0,
        stdout: out,
        stderr: `unexpected output: ${out.trim()}`,
      });
    }
    return count;
  }

  async function listChangedPaths(from: string, to: string): Promise<string[]> {
    return nonEmptyLines(await runOrThrow(["diff", "--name-only", from, to]));
  }

  async function listCommits(from: string, to: string): Promise<string[]> {
    return nonEmptyLines(
      await runOrThrow(["log", "--oneline", "--no-decorate", `${from}..${to}`]),
    );
  }

  async function listModifiedPaths(): Promise<string[]> {
    return parsePorcelainPaths(
      await runOrThrow(["status", "--porcelain", "--untracked-files=no"]),
    );
  }

  async function pull(): Promise<{ ok: boolean; stderr: string }> {
    const result = await run(["pull", "--no-rebase", "--no-edit", remote, branch]);
    return { ok: result.exitCode === 0, stderr: result.stderr.trim() };
  }

  /**
   * Never discards edits: once any merge is aborted, a HEAD already at
   * `rev` is left alone, and a moved HEAD is only hard-reset over a clean
   * tree.
   */
  async function restore(rev: string): Promise<{ ok: boolean; stderr: string }> {
    const mergeHead = await revParse("MERGE_HEAD");
    if (mergeHead) {
      const aborted = await run(["merge", "--abort"]);
      if (aborted.exitCode !== 0) {
        log.warn("git-merge-abort-failed", { stderr: aborted.stderr.trim() });
        return { ok: false, stderr: aborted.stderr.trim() };
      }
    }

    if ((await revParse("HEAD")) === rev) {
      return { ok: true, stderr: "" };
    }

    const modified = await listModifiedPaths();
    if (modified.length > 0) {
      log.warn("git-restore-refused-dirty", { rev, modified });
      return {
        ok: false,
        stderr: `local changes in ${modified.join(", ")}; not resetting to ${rev}`,
      };
    }

    const reset = await run(["reset", "--hard", "--quiet", rev]);
    return { ok: reset.exitCode === 0, stderr: reset.stderr.trim() };
  }

  async function currentBranch(): Promise<string | null> {
    const result = await run(["branch", "--show-current"]);
    if (result.exitCode !== 0) return null;
    return result.stdout.trim() || null;
  }

  async function remoteUrl(): Promise<string | null> {
    const result = await run(["remote", "get-url", remote]);
    if (result.exitCode === 0) return result.stdout.trim() || null;
    // `remote` is already a URL or path rather than a configured name
    return remote.includes("/") || remote.includes(":") ? remote : null;
  }

  return {
    isRepository,
    fetch,
    resolveLocalTip: () => revParse("HEAD"),
    resolveRemoteTip: () => revParse("FETCH_HEAD"),
    countCommitsBetween,
    listChangedPaths,
    listCommits,
    listModifiedPaths,
    pull,
    restore,
    currentBranch,
    remoteUrl,
  };
}
