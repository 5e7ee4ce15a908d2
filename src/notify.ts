import type { NotificationRecord } from "./store.js";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/** Session-start banner for a pending update. */
export function formatNotification(record: NotificationRecord): string {
  return [
    "Dotfiles update available!",
    `- Commits behind: ${record.commitsBehind}`,
    `- Files changed: ${record.filesChanged}`,
    "Run 'dfu' to update.",
  ].join("\n");
}

export type UpdateSummary = {
  commits: string[];
  changedPaths: string[];
};

export function formatUpdateSummary(summary: UpdateSummary): string {
  return [
    `Updates available (${plural(summary.commits.length, "commit")}):`,
    ...summary.commits.map((line) => `  ${line}`),
    "",
    `Files that will be updated (${plural(summary.changedPaths.length, "file")}):`,
    ...summary.changedPaths.map((path) => `  ${path}`),
  ].join("\n");
}

export function formatTimestamp(epochSeconds: number): string {
  const d = new Date(epochSeconds * 1000);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}
