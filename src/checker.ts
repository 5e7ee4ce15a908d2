import type { GitBackend } from "./git.js";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";
import { probe, type ProbeResult } from "./probe.js";
import { recordProbe, type StateStore } from "./store.js";

export type CheckDeps = {
  git: GitBackend;
  store: StateStore;
  log: Logger;
  /** Epoch seconds. */
  now: () => number;
};

export type CheckOutcome = {
  result: ProbeResult;
  lastCheckedAt: number;
};

/** One probe, persisted. Used directly by the `check` command. */
export async function runCheck(deps: CheckDeps): Promise<CheckOutcome> {
  const result = await probe(deps.git, deps.log);
  const state = await recordProbe(deps.store, result, deps.now(), deps.log);
  if (result.ok) {
    deps.log.info("check-complete", {
      commitsBehind: result.snapshot.commitsBehind,
      filesChanged: result.snapshot.filesChanged,
      lastCheckedAt: state.lastCheckedAt,
    });
  } else {
    deps.log.warn("check-failed", {
      kind: result.error.kind,
      detail: result.error.detail,
      lastCheckedAt: state.lastCheckedAt,
    });
  }
  return { result, lastCheckedAt: state.lastCheckedAt };
}

export type BackgroundChecker = {
  /** Start the check unless one already ran; returns whether it started. */
  launch: () => boolean;
  /** Resolves once a launched check settles. Never rejects. */
  whenIdle: () => Promise<void>;
};

/**
 * Single-shot, fire-and-forget checker: at most one run per instance, and
 * nothing it does can reject into the caller or print to the terminal.
 */
export function createBackgroundChecker(deps: CheckDeps): BackgroundChecker {
  let launched = false;
  let pending: Promise<void> = Promise.resolve();

  function launch(): boolean {
    if (launched) return false;
    launched = true;
    deps.log.info("background-check-launched");

    pending = runCheck(deps)
      .then(() => undefined)
      .catch((err: unknown) => {
        deps.log.error("background-check-crashed", {
          error: toErrorMessage(err),
        });
      });
    return true;
  }

  return {
    launch,
    whenIdle: () => pending,
  };
}
