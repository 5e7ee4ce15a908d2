import type { GitBackend } from "../git.js";

export type FakeRepo = {
  repository: boolean;
  local: string | null;
  remote: string;
  /** Commit lines between local and remote, newest first. */
  incoming: string[];
  changedPaths: string[];
  modifiedPaths: string[];
  fetchError: string | null;
  pullError: string | null;
  /** Simulate a pull that moved HEAD before failing. */
  pullLeavesPartialMerge: boolean;
  branch: string;
  url: string | null;
};

export type FakeGit = GitBackend & {
  repo: FakeRepo;
  calls: string[];
};

export function createFakeGit(overrides: Partial<FakeRepo> = {}): FakeGit {
  const repo: FakeRepo = {
    repository: true,
    local: "aaa1111",
    remote: "aaa1111",
    incoming: [],
    changedPaths: [],
    modifiedPaths: [],
    fetchError: null,
    pullError: null,
    pullLeavesPartialMerge: false,
    branch: "main",
    url: "https://example.com/dotfiles.git",
    ...overrides,
  };
  const calls: string[] = [];
  let fetchHead: string | null = null;

  return {
    repo,
    calls,
    isRepository: async () => {
      calls.push("isRepository");
      return repo.repository;
    },
    fetch: async () => {
      calls.push("fetch");
      if (repo.fetchError !== null) return { ok: false, stderr: repo.fetchError };
      fetchHead = repo.remote;
      return { ok: true, stderr: "" };
    },
    resolveLocalTip: async () => repo.local,
    resolveRemoteTip: async () => fetchHead,
    countCommitsBetween: async (from, to) => {
      calls.push("countCommitsBetween");
      return from === to ? 0 : repo.incoming.length;
    },
    listChangedPaths: async (from, to) => {
      calls.push("listChangedPaths");
      return from === to ? [] : [...repo.changedPaths];
    },
    listCommits: async (from, to) => {
      calls.push("listCommits");
      return from === to ? [] : [...repo.incoming];
    },
    listModifiedPaths: async () => {
      calls.push("listModifiedPaths");
      return [...repo.modifiedPaths];
    },
    pull: async () => {
      calls.push("pull");
      if (repo.pullError !== null) {
        if (repo.pullLeavesPartialMerge) repo.local = "merge-in-progress";
        return { ok: false, stderr: repo.pullError };
      }
      repo.local = repo.remote;
      repo.incoming = [];
      repo.changedPaths = [];
      return { ok: true, stderr: "" };
    },
    restore: async (rev) => {
      calls.push(`restore:${rev}`);
      if (repo.local !== rev && repo.modifiedPaths.length > 0) {
        return { ok: false, stderr: "local changes present" };
      }
      repo.local = rev;
      return { ok: true, stderr: "" };
    },
    currentBranch: async () => (repo.repository ? repo.branch : null),
    remoteUrl: async () => (repo.repository ? repo.url : null),
  };
}

/** Local tip `n` commits behind the remote, touching `files`. */
export function behindBy(n: number, files: string[]): Partial<FakeRepo> {
  return {
    local: "aaa1111",
    remote: "bbb2222",
    incoming: Array.from({ length: n }, (_, i) => `c${n - i}00000 change ${n - i}`),
    changedPaths: files,
  };
}
