import type { GitBackend } from "./git.js";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";

/** Opaque revision id; compare for equality only. */
export type RevisionPointer = string;

export type RemoteSnapshot = {
  local: RevisionPointer;
  remote: RevisionPointer;
  commitsBehind: number;
  filesChanged: number;
};

export type ProbeError =
  | { kind: "unreachable"; detail: string }
  | { kind: "not-a-repository"; detail: string };

export type ProbeResult =
  | { ok: true; snapshot: RemoteSnapshot }
  | { ok: false; error: ProbeError };

export function describeProbeError(error: ProbeError): string {
  switch (error.kind) {
    case "unreachable":
      return `Remote could not be reached: ${error.detail}`;
    case "not-a-repository":
      return `Not a dotfiles checkout: ${error.detail}`;
  }
}

function failure(kind: ProbeError["kind"], detail: string): ProbeResult {
  return { ok: false, error: { kind, detail } };
}

/**
 * Fetch remote metadata and compare it with the local tip. Never merges
 * and never throws: every failure comes back as a ProbeError, which
 * callers must treat as "unknown" rather than "up to date".
 */
export async function probe(
  git: GitBackend,
  log: Logger,
): Promise<ProbeResult> {
  try {
    if (!(await git.isRepository())) {
      log.warn("probe-not-a-repository");
      return failure("not-a-repository", "directory is missing or not a git work tree");
    }

    const local = await git.resolveLocalTip();
    if (!local) {
      return failure("not-a-repository", "local branch has no commits");
    }

    const fetched = await git.fetch();
    if (!fetched.ok) {
      return failure("unreachable", fetched.stderr || "fetch failed");
    }

    const remote = await git.resolveRemoteTip();
    if (!remote) {
      return failure("unreachable", "remote branch could not be resolved");
    }

    if (local === remote) {
      log.info("probe-synced", { local });
      return {
        ok: true,
        snapshot: { local, remote, commitsBehind: 0, filesChanged: 0 },
      };
    }

    const commitsBehind = await git.countCommitsBetween(local, remote);
    const filesChanged = (await git.listChangedPaths(local, remote)).length;
    log.info("probe-diverged", { local, remote, commitsBehind, filesChanged });
    return {
      ok: true,
      snapshot: { local, remote, commitsBehind, filesChanged },
    };
  } catch (err) {
    log.error("probe-crashed", { error: toErrorMessage(err) });
    return failure("unreachable", toErrorMessage(err));
  }
}
