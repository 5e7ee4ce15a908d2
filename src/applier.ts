import type { GitBackend } from "./git.js";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";
import type { UpdateSummary } from "./notify.js";
import {
  probe,
  type ProbeError,
  type RemoteSnapshot,
  type RevisionPointer,
} from "./probe.js";
import { recordProbe, type StateStore } from "./store.js";

export type UpdaterState =
  | "idle"
  | "probing"
  | "up-to-date"
  | "blocked"
  | "confirming"
  | "applying"
  | "applied"
  | "failed";

export type ApplyError = {
  kind: "merge-failed";
  detail: string;
  /** Whether HEAD is back at the pre-apply revision with nothing discarded. */
  restored: boolean;
};

export type UpdateOutcome =
  | { state: "up-to-date"; revision: RevisionPointer }
  | { state: "declined"; snapshot: RemoteSnapshot; summary: UpdateSummary }
  | { state: "blocked"; reason: "dirty"; modifiedPaths: string[] }
  | { state: "failed"; stage: "probe"; error: ProbeError }
  | { state: "failed"; stage: "apply"; error: ApplyError }
  | {
      state: "applied";
      from: RevisionPointer;
      to: RevisionPointer;
      summary: UpdateSummary;
      reloadError?: string;
    };

export type UpdateApplierDeps = {
  git: GitBackend;
  store: StateStore;
  log: Logger;
  now: () => number;
  /** Skip the confirmation prompt. */
  autoApply: boolean;
  /** Ask the user; resolve true to apply. */
  confirm: (summary: UpdateSummary, snapshot: RemoteSnapshot) => Promise<boolean>;
  /** Host-supplied configuration reload, run after a successful apply. */
  reload: () => Promise<void>;
  /** Called before summaries are shown, so hosts can print them. */
  onSummary?: (summary: UpdateSummary, snapshot: RemoteSnapshot) => void;
  onTransition?: (from: UpdaterState, to: UpdaterState) => void;
};

export type UpdateApplier = {
  run: () => Promise<UpdateOutcome>;
};

/**
 * Interactive update:
 *
 *   idle → probing → up-to-date | blocked | failed | confirming
 *   confirming → applying | idle (declined)
 *   applying → applied | failed
 *
 * A dirty work tree is refused before anything is shown or asked, and
 * again right before pulling in case it changed while the prompt was open.
 * A failed merge is rolled back to the revision it started from.
 */
export function createUpdateApplier(deps: UpdateApplierDeps): UpdateApplier {
  const { git, store, log } = deps;
  let state: UpdaterState = "idle";

  function enter(next: UpdaterState): void {
    const prev = state;
    state = next;
    log.info("updater-transition", { from: prev, to: next });
    deps.onTransition?.(prev, next);
  }

  async function apply(
    snapshot: RemoteSnapshot,
    summary: UpdateSummary,
  ): Promise<UpdateOutcome> {
    enter("applying");
    const pulled = await git.pull();

    if (!pulled.ok) {
      const restoredTo = await git.restore(snapshot.local);
      const head = await git.resolveLocalTip();
      const restored = restoredTo.ok && head === snapshot.local;
      log.error("apply-failed", {
        stderr: pulled.stderr.slice(0, 500),
        before: snapshot.local,
        head,
        restored,
      });
      enter("failed");
      return {
        state: "failed",
        stage: "apply",
        error: { kind: "merge-failed", detail: pulled.stderr || "pull failed", restored },
      };
    }

    const to = (await git.resolveLocalTip()) ?? snapshot.remote;
    await store.clearNotification();
    await store.writeCheckState(deps.now());
    enter("applied");
    log.info("apply-complete", { from: snapshot.local, to });

    let reloadError: string | undefined;
    try {
      await deps.reload();
    } catch (err) {
      reloadError = toErrorMessage(err);
      log.error("reload-failed", { error: reloadError });
    }

    return reloadError === undefined
      ? { state: "applied", from: snapshot.local, to, summary }
      : { state: "applied", from: snapshot.local, to, summary, reloadError };
  }

  async function run(): Promise<UpdateOutcome> {
    state = "idle";
    enter("probing");

    const result = await probe(git, log);
    await recordProbe(store, result, deps.now(), log);

    if (!result.ok) {
      enter("failed");
      return { state: "failed", stage: "probe", error: result.error };
    }

    const { snapshot } = result;
    if (snapshot.local === snapshot.remote) {
      enter("up-to-date");
      return { state: "up-to-date", revision: snapshot.local };
    }

    const modifiedPaths = await git.listModifiedPaths();
    if (modifiedPaths.length > 0) {
      log.warn("apply-blocked-dirty", { modifiedPaths });
      enter("blocked");
      return { state: "blocked", reason: "dirty", modifiedPaths };
    }

    enter("confirming");
    const summary: UpdateSummary = {
      commits: await git.listCommits(snapshot.local, snapshot.remote),
      changedPaths: await git.listChangedPaths(snapshot.local, snapshot.remote),
    };
    deps.onSummary?.(summary, snapshot);

    const confirmed = deps.autoApply || (await deps.confirm(summary, snapshot));
    if (!confirmed) {
      log.info("apply-declined", { commitsBehind: snapshot.commitsBehind });
      enter("idle");
      return { state: "declined", snapshot, summary };
    }

    const modifiedSincePrompt = await git.listModifiedPaths();
    if (modifiedSincePrompt.length > 0) {
      log.warn("apply-blocked-dirty", { modifiedPaths: modifiedSincePrompt });
      enter("blocked");
      return { state: "blocked", reason: "dirty", modifiedPaths: modifiedSincePrompt };
    }

    return apply(snapshot, summary);
  }

  return { run };
}
