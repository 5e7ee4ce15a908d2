export {
  createUpdateApplier,
  type ApplyError,
  type UpdateApplier,
  type UpdateApplierDeps,
  type UpdateOutcome,
  type UpdaterState,
} from "./applier.js";
export {
  createBackgroundChecker,
  runCheck,
  type BackgroundChecker,
  type CheckDeps,
  type CheckOutcome,
} from "./checker.js";
export {
  DEFAULT_CONFIG,
  configPathFor,
  loadConfig,
  stripJsonComments,
  type DotfilesSyncConfig,
} from "./config.js";
export {
  GitCommandError,
  createGitBackend,
  parsePorcelainPaths,
  type GitBackend,
  type GitBackendOptions,
} from "./git.js";
export { createLogger, noopLogger, type Logger } from "./logger.js";
export {
  formatNotification,
  formatUpdateSummary,
  type UpdateSummary,
} from "./notify.js";
export {
  describeProbeError,
  probe,
  type ProbeError,
  type ProbeResult,
  type RemoteSnapshot,
  type RevisionPointer,
} from "./probe.js";
export { DEFAULT_CHECK_INTERVAL_SECONDS, shouldCheck } from "./staleness.js";
export {
  formatStatus,
  getStatus,
  type Comparison,
  type DotfilesStatus,
} from "./status.js";
export {
  createStateStore,
  recordProbe,
  type CheckState,
  type NotificationRecord,
  type StateStore,
} from "./store.js";
export {
  createDotfilesSync,
  type DotfilesSync,
  type DotfilesSyncOptions,
  type SessionStartResult,
  type UpdateIO,
} from "./sync.js";
