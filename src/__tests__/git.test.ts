import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { execFileSync, spawnSync } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createUpdateApplier, type UpdateApplierDeps } from "../applier.js";
import {
  GitCommandError,
  createGitBackend,
  parsePorcelainPaths,
  type GitBackend,
} from "../git.js";
import { noopLogger } from "../logger.js";
import { probe } from "../probe.js";
import { createStateStore } from "../store.js";

describe("parsePorcelainPaths", () => {
  test("returns paths of modified and staged entries", () => {
    const output = [" M .zshrc", "M  .tmux.conf", "A  .config/starship.toml", ""].join("\n");
    expect(parsePorcelainPaths(output)).toEqual([
      ".zshrc",
      ".tmux.conf",
      ".config/starship.toml",
    ]);
  });

  test("reports the destination of a rename", () => {
    expect(parsePorcelainPaths("R  old/aliases.zsh -> new/aliases.zsh\n")).toEqual([
      "new/aliases.zsh",
    ]);
  });

  test("unquotes paths git quoted", () => {
    expect(parsePorcelainPaths(' M "with space.zsh"\n')).toEqual(["with space.zsh"]);
  });

  test("returns nothing for a clean tree", () => {
    expect(parsePorcelainPaths("")).toEqual([]);
  });
});

describe("GitCommandError", () => {
  test("carries the command, exit code and stderr", () => {
    const err = new GitCommandError(["rev-list", "--count", "a..b"], {
      exitCode: 128,
      stdout: "",
      stderr: "fatal: bad revision\n",
    });
    expect(err.message).toBe("git rev-list --count a..b failed (exit 128): fatal: bad revision");
    expect(err.exitCode).toBe(128);
    expect(err.name).toBe("GitCommandError");
  });
});

const gitAvailable = spawnSync("git", ["--version"], { stdio: "ignore" }).status === 0;

describe.skipIf(!gitAvailable)("createGitBackend against real repositories", () => {
  let root: string;
  let seed: string;
  let work: string;
  let backend: GitBackend;

  function git(cwd: string, ...args: string[]): string {
    return execFileSync("git", args, { cwd, encoding: "utf8" }).trim();
  }

  async function commitFile(cwd: string, path: string, content: string, message: string) {
    await writeFile(join(cwd, path), content);
    git(cwd, "add", path);
    git(cwd, "commit", "--quiet", "-m", message);
  }

  function makeApplier(overrides: Partial<UpdateApplierDeps> = {}) {
    return createUpdateApplier({
      git: backend,
      store: createStateStore(join(root, "cache"), noopLogger),
      log: noopLogger,
      now: () => 1_000,
      autoApply: true,
      confirm: async () => true,
      reload: async () => {},
      ...overrides,
    });
  }

  beforeEach(async () => {
    vi.stubEnv("GIT_CONFIG_NOSYSTEM", "1");
    vi.stubEnv("GIT_CONFIG_GLOBAL", join(tmpdir(), "dotfiles-sync-no-gitconfig"));
    vi.stubEnv("GIT_AUTHOR_NAME", "Test");
    vi.stubEnv("GIT_AUTHOR_EMAIL", "test@example.com");
    vi.stubEnv("GIT_COMMITTER_NAME", "Test");
    vi.stubEnv("GIT_COMMITTER_EMAIL", "test@example.com");

    root = await mkdtemp(join(tmpdir(), "git-backend-test-"));
    const origin = join(root, "origin.git");
    seed = join(root, "seed");
    work = join(root, "work");

    git(root, "init", "--quiet", "--bare", origin);
    git(origin, "symbolic-ref", "HEAD", "refs/heads/main");
    git(root, "init", "--quiet", seed);
    git(seed, "symbolic-ref", "HEAD", "refs/heads/main");
    await commitFile(seed, ".zshrc", "export EDITOR=vi\n", "initial");
    git(seed, "remote", "add", "origin", origin);
    git(seed, "push", "--quiet", "origin", "main");
    git(root, "clone", "--quiet", origin, work);

    await writeFile(join(seed, "aliases.zsh"), "alias ll='ls -l'\n");
    git(seed, "add", "aliases.zsh");
    await commitFile(seed, ".zshrc", "export EDITOR=nvim\n", "switch editor");
    git(seed, "push", "--quiet", "origin", "main");

    backend = createGitBackend(
      { repoDir: work, remote: "origin", branch: "main", timeoutMs: 10_000 },
      noopLogger,
    );
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(root, { recursive: true, force: true });
  });

  test("a checkout one commit behind reports the count and changed files", async () => {
    const result = await probe(backend, noopLogger);

    expect(result).toEqual({
      ok: true,
      snapshot: {
        local: git(work, "rev-parse", "HEAD"),
        remote: git(seed, "rev-parse", "HEAD"),
        commitsBehind: 1,
        filesChanged: 2,
      },
    });
    expect(await backend.listChangedPaths(git(work, "rev-parse", "HEAD"), git(seed, "rev-parse", "HEAD")))
      .toEqual([".zshrc", "aliases.zsh"]);
  });

  test("an apply fast-forwards the checkout to the remote tip", async () => {
    const remoteTip = git(seed, "rev-parse", "HEAD");
    const outcome = await makeApplier().run();

    expect(outcome.state).toBe("applied");
    expect(git(work, "rev-parse", "HEAD")).toBe(remoteTip);
    expect(await readFile(join(work, ".zshrc"), "utf8")).toBe("export EDITOR=nvim\n");
    expect(await readFile(join(work, "aliases.zsh"), "utf8")).toBe("alias ll='ls -l'\n");
  });

  test("a conflicting merge is aborted and the local commit is kept", async () => {
    await commitFile(work, ".zshrc", "export EDITOR=emacs\n", "local editor");
    const before = git(work, "rev-parse", "HEAD");

    const outcome = await makeApplier().run();

    expect(outcome).toMatchObject({
      state: "failed",
      stage: "apply",
      error: { kind: "merge-failed", restored: true },
    });
    expect(git(work, "rev-parse", "HEAD")).toBe(before);
    expect(await readFile(join(work, ".zshrc"), "utf8")).toBe("export EDITOR=emacs\n");
    expect(existsSync(join(work, ".git", "MERGE_HEAD"))).toBe(false);
    expect(await backend.listModifiedPaths()).toEqual([]);
  });

  test("an edit made while the prompt is open survives and blocks the pull", async () => {
    const before = git(work, "rev-parse", "HEAD");
    const outcome = await makeApplier({
      autoApply: false,
      confirm: async () => {
        await writeFile(join(work, ".zshrc"), "my precious local edit\n");
        return true;
      },
    }).run();

    expect(outcome).toEqual({ state: "blocked", reason: "dirty", modifiedPaths: [".zshrc"] });
    expect(git(work, "rev-parse", "HEAD")).toBe(before);
    expect(await readFile(join(work, ".zshrc"), "utf8")).toBe("my precious local edit\n");
  });

  test("restore leaves edits alone when HEAD is already at the revision", async () => {
    const head = git(work, "rev-parse", "HEAD");
    await writeFile(join(work, ".zshrc"), "uncommitted\n");

    expect(await backend.restore(head)).toEqual({ ok: true, stderr: "" });
    expect(await readFile(join(work, ".zshrc"), "utf8")).toBe("uncommitted\n");
  });

  test("restore refuses to reset a moved HEAD over local edits", async () => {
    const before = git(work, "rev-parse", "HEAD");
    await commitFile(work, "aliases.zsh", "alias la='ls -a'\n", "local alias");
    const moved = git(work, "rev-parse", "HEAD");
    await writeFile(join(work, ".zshrc"), "uncommitted\n");

    const result = await backend.restore(before);

    expect(result.ok).toBe(false);
    expect(result.stderr).toBe(`local changes in .zshrc; not resetting to ${before}`);
    expect(git(work, "rev-parse", "HEAD")).toBe(moved);
    expect(await readFile(join(work, ".zshrc"), "utf8")).toBe("uncommitted\n");
  });

  test("restore resets a moved HEAD when the tree is clean", async () => {
    const before = git(work, "rev-parse", "HEAD");
    await commitFile(work, "aliases.zsh", "alias la='ls -a'\n", "local alias");

    expect((await backend.restore(before)).ok).toBe(true);
    expect(git(work, "rev-parse", "HEAD")).toBe(before);
    expect(existsSync(join(work, "aliases.zsh"))).toBe(false);
  });
});
