import type { CheckState } from "./store.js";

export const DEFAULT_CHECK_INTERVAL_SECONDS = 24 * 60 * 60;

/** True when no check has happened yet or the last one is older than `intervalSeconds`. */
export function shouldCheck(
  now: number,
  state: CheckState | null,
  intervalSeconds: number = DEFAULT_CHECK_INTERVAL_SECONDS,
): boolean {
  if (!state) return true;
  return now - state.lastCheckedAt > intervalSeconds;
}

export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
