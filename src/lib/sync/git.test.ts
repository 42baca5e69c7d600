import { describe, it, expect } from "vitest";
import type { CommandRunner, ExecResult, ExecSpec } from "../exec/executor.js";
import { SyncTransportError } from "../errors.js";
import { CliGitClient, GitCommandError } from "./git.js";

function runnerReturning(...results: ExecResult[]): CommandRunner & { specs: ExecSpec[] } {
  const specs: ExecSpec[] = [];
  return {
    specs,
    async run(spec) {
      specs.push(spec);
      return results.shift() ?? { status: "success", stdout: "", stderr: "", attempts: 1 };
    },
  };
}

const ok = (stdout = ""): ExecResult => ({ status: "success", stdout, stderr: "", attempts: 1 });
const fail = (exitCode: number, reason: string): ExecResult => ({
  status: "failed",
  reason,
  exitCode,
  stderr: reason,
  transient: false,
  attempts: 1,
});

describe("CliGitClient", () => {
  it("clones a single branch without prompting, once, within the timeout", async () => {
    const runner = runnerReturning(ok());
    const git = new CliGitClient({ executor: runner, timeoutMs: 30_000 });

    await git.clone("https://git.example.com/ops/cookbooks.git", "/var/lib/larder/sync/repo", "main");

    expect(runner.specs).toEqual([
      {
        argv: [
          "git",
          "clone",
          "--branch",
          "main",
          "--single-branch",
          "--",
          "https://git.example.com/ops/cookbooks.git",
          "/var/lib/larder/sync/repo",
        ],
        cwd: undefined,
        timeoutMs: 30_000,
        retry: false,
        env: { GIT_TERMINAL_PROMPT: "0" },
      },
    ]);
  });

  it("fetches the branch into its remote-tracking ref", async () => {
    const runner = runnerReturning(ok());
    await new CliGitClient({ executor: runner }).fetch("/repo", "release/2026");

    expect(runner.specs[0].argv).toEqual([
      "git",
      "fetch",
      "--prune",
      "origin",
      "+refs/heads/release/2026:refs/remotes/origin/release/2026",
    ]);
    expect(runner.specs[0].cwd).toBe("/repo");
    expect(runner.specs[0].timeoutMs).toBe(120_000);
  });

  it("reports fetch failures and timeouts as transport errors", async () => {
    const git = new CliGitClient({
      executor: runnerReturning(
        fail(128, "fatal: unable to access: Could not resolve host: git.example.com"),
        { status: "timed-out", timeoutMs: 120_000, attempts: 1 }
      ),
    });

    await expect(git.fetch("/repo", "main")).rejects.toThrow(
      new SyncTransportError("git fetch failed: fatal: unable to access: Could not resolve host: git.example.com")
    );
    await expect(git.fetch("/repo", "main")).rejects.toBeInstanceOf(SyncTransportError);
  });

  it("trims rev-parse output", async () => {
    const runner = runnerReturning(ok("0123abcd\n"));
    await expect(new CliGitClient({ executor: runner }).revParse("/repo", "origin/main")).resolves.toBe("0123abcd");
    expect(runner.specs[0].argv).toEqual(["git", "rev-parse", "--verify", "origin/main^{commit}"]);
  });

  it("reads merge-base exit codes as answers and other failures as errors", async () => {
    const git = new CliGitClient({
      executor: runnerReturning(ok(), fail(1, ""), fail(128, "fatal: Not a valid commit name")),
    });

    await expect(git.isAncestor("/repo", "a1", "b2")).resolves.toBe(true);
    await expect(git.isAncestor("/repo", "a1", "b2")).resolves.toBe(false);
    await expect(git.isAncestor("/repo", "a1", "b2")).rejects.toBeInstanceOf(GitCommandError);
  });

  it("treats any porcelain output as a dirty worktree", async () => {
    const git = new CliGitClient({ executor: runnerReturning(ok(""), ok("?? cookbooks/stray.yaml\n")) });
    await expect(git.isDirty("/repo")).resolves.toBe(false);
    await expect(git.isDirty("/repo")).resolves.toBe(true);
  });

  it("lists commits missing upstream", async () => {
    const runner = runnerReturning(ok("c3\nc2\n"));
    const commits = await new CliGitClient({ executor: runner }).commitsNotIn("/repo", "HEAD", "origin/main");

    expect(commits).toEqual(["c3", "c2"]);
    expect(runner.specs[0].argv).toEqual(["git", "rev-list", "HEAD", "^origin/main"]);
  });

  it("names the failing command in local errors", async () => {
    const git = new CliGitClient({ executor: runnerReturning(fail(1, "fatal: Not possible to fast-forward, aborting.")) });
    await expect(git.mergeFastForward("/repo", "origin/main")).rejects.toThrow(
      "git merge --ff-only origin/main failed: fatal: Not possible to fast-forward, aborting."
    );
  });
});
