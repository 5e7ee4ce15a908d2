import { describe, expect, test } from "vitest";
import { noopLogger } from "../logger.js";
import { describeProbeError, probe } from "../probe.js";
import { GitCommandError } from "../git.js";
import { behindBy, createFakeGit } from "./fake-git.js";

describe("probe", () => {
  test("reports zero counts when local and remote tips match", async () => {
    const git = createFakeGit();
    expect(await probe(git, noopLogger)).toEqual({
      ok: true,
      snapshot: { local: "aaa1111", remote: "aaa1111", commitsBehind: 0, filesChanged: 0 },
    });
    expect(git.calls).toEqual(["isRepository", "fetch"]);
  });

  test("counts commits and distinct changed paths when behind", async () => {
    const git = createFakeGit(behindBy(3, [".zshrc", ".tmux.conf"]));
    expect(await probe(git, noopLogger)).toEqual({
      ok: true,
      snapshot: { local: "aaa1111", remote: "bbb2222", commitsBehind: 3, filesChanged: 2 },
    });
  });

  test("never pulls or inspects the work tree", async () => {
    const git = createFakeGit(behindBy(1, [".vimrc"]));
    await probe(git, noopLogger);
    expect(git.calls).not.toContain("pull");
    expect(git.calls).not.toContain("listModifiedPaths");
  });

  test("fails with not-a-repository outside a checkout", async () => {
    const git = createFakeGit({ repository: false });
    const result = await probe(git, noopLogger);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("not-a-repository");
    expect(git.calls).toEqual(["isRepository"]);
  });

  test("fails with not-a-repository when HEAD does not resolve", async () => {
    const git = createFakeGit({ local: null });
    const result = await probe(git, noopLogger);
    expect(result).toEqual({
      ok: false,
      error: { kind: "not-a-repository", detail: "local branch has no commits" },
    });
  });

  test("fails with unreachable when the fetch fails", async () => {
    const git = createFakeGit({ fetchError: "fatal: Could not read from remote repository." });
    expect(await probe(git, noopLogger)).toEqual({
      ok: false,
      error: {
        kind: "unreachable",
        detail: "fatal: Could not read from remote repository.",
      },
    });
  });

  test("maps an unexpected git failure to unreachable instead of throwing", async () => {
    const git = createFakeGit(behindBy(2, []));
    git.countCommitsBetween = async () => {
      throw new GitCommandError(["rev-list"], { exitCode: 128, stdout: "", stderr: "boom" });
    };
    const result = await probe(git, noopLogger);
    expect(result).toEqual({
      ok: false,
      error: { kind: "unreachable", detail: "git rev-list failed (exit 128): boom" },
    });
  });
});

describe("describeProbeError", () => {
  test("names each failure kind", () => {
    expect(describeProbeError({ kind: "unreachable", detail: "timeout" })).toBe(
      "Remote could not be reached: timeout",
    );
    expect(describeProbeError({ kind: "not-a-repository", detail: "missing" })).toBe(
      "Not a dotfiles checkout: missing",
    );
  });
});
