import {
  createUpdateApplier,
  type UpdateApplierDeps,
  type UpdateOutcome,
} from "./applier.js";
import {
  createBackgroundChecker,
  runCheck,
  type BackgroundChecker,
  type CheckOutcome,
} from "./checker.js";
import type { DotfilesSyncConfig } from "./config.js";
import { createGitBackend, type GitBackend } from "./git.js";
import type { Logger } from "./logger.js";
import { toErrorMessage } from "./logger.js";
import { formatNotification } from "./notify.js";
import { nowInSeconds, shouldCheck } from "./staleness.js";
import { getStatus, type DotfilesStatus } from "./status.js";
import { createStateStore, type StateStore } from "./store.js";

export type SessionStartResult = {
  /** Banner to show, or null when no update is pending. */
  notification: string | null;
  checkLaunched: boolean;
};

export type UpdateIO = Pick<
  UpdateApplierDeps,
  "confirm" | "reload" | "onSummary" | "onTransition"
> & {
  /** Explicit non-interactive opt-in, on top of `auto_apply`. */
  assumeYes?: boolean;
};

export type DotfilesSyncOptions = {
  config: DotfilesSyncConfig;
  log: Logger;
  git?: GitBackend;
  store?: StateStore;
  now?: () => number;
  /**
   * Starts a check without waiting for it. Defaults to an in-process
   * single-shot checker; the CLI passes a detached child process instead.
   */
  launchCheck?: () => boolean;
};

export type DotfilesSync = {
  readonly git: GitBackend;
  readonly store: StateStore;
  readonly checker: BackgroundChecker;
  sessionStart: () => Promise<SessionStartResult>;
  checkNow: () => boolean;
  runCheck: () => Promise<CheckOutcome>;
  update: (io: UpdateIO) => Promise<UpdateOutcome>;
  status: () => Promise<DotfilesStatus>;
};

export function createDotfilesSync(options: DotfilesSyncOptions): DotfilesSync {
  const { config, log } = options;
  const now = options.now ?? nowInSeconds;
  const git =
    options.git ??
    createGitBackend(
      {
        repoDir: config.repo_dir,
        remote: config.remote,
        branch: config.branch,
        timeoutMs: config.git_timeout_ms,
      },
      log,
    );
  const store = options.store ?? createStateStore(config.cache_dir, log);
  const checker = createBackgroundChecker({ git, store, log, now });
  const launchCheck = options.launchCheck ?? checker.launch;
  let sessionStarted = false;

  async function sessionStart(): Promise<SessionStartResult> {
    let notification: string | null = null;
    try {
      const record = await store.readNotification();
      notification = record ? formatNotification(record) : null;
    } catch (err) {
      log.warn("notification-read-failed", { error: toErrorMessage(err) });
    }

    if (sessionStarted) return { notification, checkLaunched: false };
    sessionStarted = true;

    let checkLaunched = false;
    try {
      const state = await store.readCheckState();
      if (shouldCheck(now(), state, config.check_interval_seconds)) {
        checkLaunched = launchCheck();
      }
    } catch (err) {
      log.error("session-start-check-failed", { error: toErrorMessage(err) });
    }

    return { notification, checkLaunched };
  }

  function checkNow(): boolean {
    log.info("check-forced");
    return launchCheck();
  }

  function update(io: UpdateIO): Promise<UpdateOutcome> {
    const applier = createUpdateApplier({
      git,
      store,
      log,
      now,
      autoApply: config.auto_apply || io.assumeYes === true,
      confirm: io.confirm,
      reload: io.reload,
      onSummary: io.onSummary,
      onTransition: io.onTransition,
    });
    return applier.run();
  }

  return {
    git,
    store,
    checker,
    sessionStart,
    checkNow,
    runCheck: () => runCheck({ git, store, log, now }),
    update,
    status: () =>
      getStatus({ repoDir: config.repo_dir, git, store, log, now }),
  };
}
