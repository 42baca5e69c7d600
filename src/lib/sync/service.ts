import { existsSync, rmSync, statSync } from "fs";
import { join } from "path";
import { systemClock, type Clock, type RandomSource } from "../clock.js";
import { resolveSettingsPath } from "../config/path.js";
import type { SyncSettings } from "../config/schema.js";
import { ConfigError, PublishError, SyncTransportError, errorMessage, isLarderError } from "../errors.js";
import { CommandExecutor, type CommandRunner } from "../exec/executor.js";
import { acquireFileLock } from "../fs-utils.js";
import { createLogger, type Logger } from "../logger.js";
import { retry, retryPolicyFromSettings } from "../retry.js";
import { CliGitClient, GitCommandError, type GitClient } from "./git.js";
import { currentRelease, publishRelease, type ReleaseLayout } from "./publish.js";
import { loadSyncState, saveSyncState, type ConflictDescriptor, type SyncPhase, type SyncState } from "./state.js";
import { validateGitRef, validateRelativeSubPath, validateRepoUrl } from "./validation.js";

export interface SyncServiceOptions {
  settings: SyncSettings;
  git?: GitClient;
  /** Runs git when no GitClient is given. */
  executor?: CommandRunner;
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

export type SyncCycleStatus = "unchanged" | "updated" | "reset" | "degraded" | "cancelled";

export interface SyncCycleResult {
  status: SyncCycleStatus;
  /** Commit published as current after the cycle. */
  commit: string | null;
  conflict: ConflictDescriptor | null;
  error?: string;
}

export interface SyncRunOptions {
  once?: boolean;
  signal?: AbortSignal;
}

/**
 * Keeps `<local_path>/current` pointing at a verified copy of the remote
 * branch head. Layout under local_path:
 *
 *   repo/              git worktree
 *   releases/<commit>  published trees
 *   current            symlink to the active release
 *   sync-state.json    persisted SyncState
 */
export class SyncService {
  readonly root: string;
  readonly repoDir: string;
  readonly layout: ReleaseLayout;
  private readonly statePath: string;
  private readonly settings: SyncSettings;
  private readonly repoUrl: string;
  private readonly git: GitClient;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private state: SyncState;

  constructor(options: SyncServiceOptions) {
    const { settings } = options;
    if (!settings.repo_url) {
      throw new ConfigError("sync.repo_url is required");
    }
    validateRepoUrl(settings.repo_url);
    validateGitRef(settings.branch);
    validateRelativeSubPath(settings.cookbook_subdir);

    this.settings = settings;
    this.repoUrl = settings.repo_url;
    this.root = resolveSettingsPath(settings.local_path);
    this.repoDir = join(this.root, "repo");
    this.layout = { releasesDir: join(this.root, "releases"), currentLink: join(this.root, "current") };
    this.statePath = join(this.root, "sync-state.json");
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger("sync");
    this.git =
      options.git ??
      new CliGitClient({
        executor: options.executor ?? new CommandExecutor({ clock: this.clock, random: this.random }),
        timeoutMs: settings.git_timeout_seconds * 1000,
      });
    this.state = loadSyncState(this.statePath, this.logger);
  }

  getState(): SyncState {
    return structuredClone(this.state);
  }

  /**
   * One cycle: jitter, clone or fetch, converge the worktree on the remote
   * head, publish. Transport and publish failures end the cycle degraded with
   * the previous release left in place.
   */
  async syncOnce(signal?: AbortSignal): Promise<SyncCycleResult> {
    const jitterMs = Math.round(this.random() * this.settings.max_jitter_seconds * 1000);
    await this.clock.sleep(jitterMs, signal);
    if (signal?.aborted) {
      return { status: "cancelled", commit: currentRelease(this.layout), conflict: null };
    }

    const release = acquireFileLock(this.statePath);
    try {
      this.state.last_attempt_at = this.clock.now().toISOString();
      return await this.cycle(signal);
    } catch (error) {
      if (!isLarderError(error)) throw error;
      return this.degrade(error);
    } finally {
      release();
    }
  }

  /**
   * `once` runs exactly one cycle. Otherwise cycles repeat every
   * interval_minutes (plus jitter) until `signal` aborts. An in-flight cycle
   * always finishes.
   */
  async run(options: SyncRunOptions = {}): Promise<SyncCycleResult | null> {
    const { once = false, signal } = options;
    this.logger.info(
      { repo: this.repoUrl, branch: this.settings.branch, root: this.root, intervalMinutes: this.settings.interval_minutes },
      "Starting sync service"
    );

    if (once) {
      return this.syncOnce(signal);
    }

    let last: SyncCycleResult | null = null;
    while (!signal?.aborted) {
      try {
        last = await this.syncOnce(signal);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, "Sync cycle failed");
      }
      if (signal?.aborted) break;
      await this.clock.sleep(this.settings.interval_minutes * 60_000, signal);
    }
    this.logger.info("Sync service stopped");
    return last;
  }

  private setPhase(phase: SyncPhase): void {
    if (this.state.phase !== phase) {
      this.logger.debug({ from: this.state.phase, to: phase }, "Sync phase");
      this.state.phase = phase;
    }
  }

  private async transport(op: () => Promise<void>, signal?: AbortSignal): Promise<void> {
    await retry(op, (error) => error instanceof SyncTransportError, {
      policy: retryPolicyFromSettings(this.settings.retry),
      clock: this.clock,
      random: this.random,
      signal,
      onRetry: (attempt, delayMs) => this.logger.warn({ attempt, delayMs }, "Transport failure, retrying"),
    });
  }

  private async cycle(signal?: AbortSignal): Promise<SyncCycleResult> {
    const { branch } = this.settings;
    const remoteRef = `origin/${branch}`;

    const cloning = !existsSync(join(this.repoDir, ".git"));
    if (cloning) {
      this.setPhase("cloning");
      this.logger.info({ repo: this.repoUrl }, "Cloning repository");
      await this.transport(async () => {
        rmSync(this.repoDir, { recursive: true, force: true });
        await this.git.clone(this.repoUrl, this.repoDir, branch);
      }, signal);
    } else {
      await this.transport(() => this.git.fetch(this.repoDir, branch), signal);
    }

    const remote = await this.git.revParse(this.repoDir, remoteRef);
    const local = await this.git.revParse(this.repoDir, "HEAD");
    const dirty = await this.git.isDirty(this.repoDir);

    let status: SyncCycleStatus = cloning ? "updated" : "unchanged";
    let conflict: ConflictDescriptor | null = null;

    if (local !== remote || dirty) {
      if (!dirty && (await this.git.isAncestor(this.repoDir, local, remote))) {
        this.setPhase("drifted");
        await this.git.mergeFastForward(this.repoDir, remoteRef);
        status = "updated";
        this.logger.info({ from: local, to: remote }, "Fast-forwarded");
      } else {
        this.setPhase("conflict-detected");
        conflict = await this.describeConflict(local, remote, dirty);
        this.logger.warn({ ...conflict }, "Local worktree diverged from remote, resetting");
        this.setPhase("resolving");
        await this.git.resetHard(this.repoDir, remoteRef);
        await this.git.clean(this.repoDir);
        status = "reset";
      }
    }

    const head = await this.git.revParse(this.repoDir, "HEAD");
    if (head !== remote) {
      throw new GitCommandError(["rev-parse", "HEAD"], `worktree at ${head} after sync, expected ${remote}`);
    }

    if (status !== "unchanged" || currentRelease(this.layout) !== remote) {
      this.publish(remote);
    }

    this.setPhase("synced");
    this.state.last_commit = remote;
    this.state.last_synced_at = this.clock.now().toISOString();
    this.state.last_error = null;
    this.state.consecutive_failures = 0;
    if (conflict) this.state.last_conflict = conflict;
    this.persist();

    return { status, commit: remote, conflict };
  }

  private async describeConflict(local: string, remote: string, dirty: boolean): Promise<ConflictDescriptor> {
    const discarded = local === remote ? [] : await this.git.commitsNotIn(this.repoDir, "HEAD", `origin/${this.settings.branch}`);
    let kind: ConflictDescriptor["kind"] = "dirty";
    if (discarded.length > 0) {
      kind = (await this.git.isAncestor(this.repoDir, remote, local)) ? "local-ahead" : "diverged";
    }
    return {
      detected_at: this.clock.now().toISOString(),
      kind,
      local_commit: local,
      remote_commit: remote,
      discarded_commits: discarded,
      dirty,
    };
  }

  private publish(commit: string): void {
    const subdir = join(this.repoDir, this.settings.cookbook_subdir);
    if (!existsSync(subdir) || !statSync(subdir).isDirectory()) {
      throw new PublishError(`Commit ${commit} has no ${this.settings.cookbook_subdir || "."} directory`, { commit });
    }
    publishRelease({
      worktree: this.repoDir,
      ...this.layout,
      commit,
      keep: this.settings.keep_releases,
      now: this.clock.now(),
      logger: this.logger,
    });
  }

  private degrade(error: Error): SyncCycleResult {
    this.setPhase("degraded");
    this.state.last_error = error.message;
    this.state.consecutive_failures++;
    this.persist();
    this.logger.error(
      { error: error.message, failures: this.state.consecutive_failures },
      "Sync cycle degraded, keeping the published release"
    );
    return { status: "degraded", commit: currentRelease(this.layout), conflict: null, error: error.message };
  }

  private persist(): void {
    saveSyncState(this.statePath, this.state);
  }
}
