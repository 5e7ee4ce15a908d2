import type { GitBackend } from "./git.js";
import type { Logger } from "./logger.js";
import { describeProbeError, probe, type ProbeError } from "./probe.js";
import { formatTimestamp } from "./notify.js";
import { recordProbe, type StateStore } from "./store.js";

export type Comparison =
  | { kind: "synced" }
  | { kind: "behind"; commits: number }
  | { kind: "unknown"; error: ProbeError };

export type DotfilesStatus = {
  directory: string;
  branch: string | null;
  remoteUrl: string | null;
  comparison: Comparison;
  lastCheckedAt: number | null;
};

export type StatusDeps = {
  repoDir: string;
  git: GitBackend;
  store: StateStore;
  log: Logger;
  now: () => number;
};

/** Live status: always probes, and persists the result like any other check. */
export async function getStatus(deps: StatusDeps): Promise<DotfilesStatus> {
  const result = await probe(deps.git, deps.log);
  const state = await recordProbe(deps.store, result, deps.now(), deps.log);

  const isRepo = result.ok || result.error.kind !== "not-a-repository";
  const branch = isRepo ? await deps.git.currentBranch() : null;
  const remoteUrl = isRepo ? await deps.git.remoteUrl() : null;

  let comparison: Comparison;
  if (!result.ok) {
    comparison = { kind: "unknown", error: result.error };
  } else if (result.snapshot.local === result.snapshot.remote) {
    comparison = { kind: "synced" };
  } else {
    comparison = { kind: "behind", commits: result.snapshot.commitsBehind };
  }

  return {
    directory: deps.repoDir,
    branch,
    remoteUrl,
    comparison,
    lastCheckedAt: state.lastCheckedAt,
  };
}

export function formatStatus(status: DotfilesStatus): string {
  let comparison: string;
  switch (status.comparison.kind) {
    case "synced":
      comparison = "Up to date";
      break;
    case "behind":
      comparison = `${status.comparison.commits} commits behind`;
      break;
    case "unknown":
      comparison = `Unknown (${describeProbeError(status.comparison.error)})`;
      break;
  }

  return [
    "Dotfiles Status:",
    `Directory: ${status.directory}`,
    `Branch: ${status.branch ?? "unknown"}`,
    `Remote: ${status.remoteUrl ?? "No remote configured"}`,
    "",
    `Status: ${comparison}`,
    `Last checked: ${
      status.lastCheckedAt === null ? "Never" : formatTimestamp(status.lastCheckedAt)
    }`,
  ].join("\n");
}
