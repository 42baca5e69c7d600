import type { CommandRunner, ExecResult } from "../exec/executor.js";
import { LarderError, ErrorCode, SyncTransportError } from "../errors.js";

/**
 * The git operations the sync service needs. Network operations (clone,
 * fetch) throw SyncTransportError; everything else is local to the worktree.
 */
export interface GitClient {
  clone(url: string, dir: string, branch: string): Promise<void>;
  fetch(dir: string, branch: string): Promise<void>;
  /** Full commit id for `ref`. */
  revParse(dir: string, ref: string): Promise<string>;
  isAncestor(dir: string, ancestor: string, descendant: string): Promise<boolean>;
  mergeFastForward(dir: string, ref: string): Promise<void>;
  resetHard(dir: string, ref: string): Promise<void>;
  /** Remove untracked and ignored files. */
  clean(dir: string): Promise<void>;
  isDirty(dir: string): Promise<boolean>;
  /** Commits reachable from `head` but not from `base`, newest first. */
  commitsNotIn(dir: string, head: string, base: string): Promise<string[]>;
}

export class GitCommandError extends LarderError {
  constructor(
    public readonly args: string[],
    message: string
  ) {
    super(`git ${args.join(" ")} failed: ${message}`, ErrorCode.SYNC_GIT, { args });
    this.name = "GitCommandError";
  }
}

export interface CliGitClientOptions {
  executor: CommandRunner;
  timeoutMs?: number;
}

function failureMessage(result: ExecResult): string {
  switch (result.status) {
    case "failed":
      return result.reason;
    case "timed-out":
      return `timed out after ${result.timeoutMs}ms`;
    default:
      return result.status;
  }
}

/**
 * GitClient over the git binary, run through the command executor. Each call
 * runs once; retrying is the caller's business.
 */
export class CliGitClient implements GitClient {
  private readonly executor: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: CliGitClientOptions) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  private exec(args: string[], cwd?: string): Promise<ExecResult> {
    return this.executor.run({
      argv: ["git", ...args],
      cwd,
      timeoutMs: this.timeoutMs,
      retry: false,
      // Never block on a credential prompt
      env: { GIT_TERMINAL_PROMPT: "0" },
    });
  }

  private async git(args: string[], cwd?: string): Promise<string> {
    const result = await this.exec(args, cwd);
    if (result.status !== "success") throw new GitCommandError(args, failureMessage(result));
    return result.stdout;
  }

  private async network(args: string[], cwd?: string): Promise<void> {
    const result = await this.exec(args, cwd);
    if (result.status !== "success") {
      throw new SyncTransportError(`git ${args[0]} failed: ${failureMessage(result)}`, { args });
    }
  }

  async clone(url: string, dir: string, branch: string): Promise<void> {
    await this.network(["clone", "--branch", branch, "--single-branch", "--", url, dir]);
  }

  async fetch(dir: string, branch: string): Promise<void> {
    await this.network(["fetch", "--prune", "origin", `+refs/heads/${branch}:refs/remotes/origin/${branch}`], dir);
  }

  async revParse(dir: string, ref: string): Promise<string> {
    return (await this.git(["rev-parse", "--verify", `${ref}^{commit}`], dir)).trim();
  }

  async isAncestor(dir: string, ancestor: string, descendant: string): Promise<boolean> {
    const args = ["merge-base", "--is-ancestor", ancestor, descendant];
    const result = await this.exec(args, dir);
    if (result.status === "success") return true;
    // Exit 1 is "no"; anything else is an error
    if (result.status === "failed" && result.exitCode === 1) return false;
    throw new GitCommandError(args, failureMessage(result));
  }

  async mergeFastForward(dir: string, ref: string): Promise<void> {
    await this.git(["merge", "--ff-only", ref], dir);
  }

  async resetHard(dir: string, ref: string): Promise<void> {
    await this.git(["reset", "--hard", ref], dir);
  }

  async clean(dir: string): Promise<void> {
    await this.git(["clean", "-fdx"], dir);
  }

  async isDirty(dir: string): Promise<boolean> {
    return (await this.git(["status", "--porcelain"], dir)).trim().length > 0;
  }

  async commitsNotIn(dir: string, head: string, base: string): Promise<string[]> {
    const out = await this.git(["rev-list", head, `^${base}`], dir);
    return out.split("\n").map((line) => line.trim()).filter(Boolean);
  }
}
