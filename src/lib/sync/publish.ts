import { cpSync, mkdirSync, readdirSync, readlinkSync, renameSync, rmSync, statSync, utimesSync } from "fs";
import { basename, dirname, join, relative } from "path";
import { atomicSymlinkSwap } from "../fs-utils.js";
import { hashDirectory } from "../hash.js";
import { PublishError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

const GIT_DIR = new Set([".git"]);
const STAGING_PREFIX = ".staging-";

export interface ReleaseLayout {
  /** Directory holding one subdirectory per published commit. */
  releasesDir: string;
  /** Symlink the reconciler reads through. */
  currentLink: string;
}

export interface PublishRequest extends ReleaseLayout {
  worktree: string;
  commit: string;
  /** Releases kept on disk, the current one included. */
  keep: number;
  now: Date;
  logger?: Logger;
}

export interface PublishResult {
  release: string;
  path: string;
  /** The release directory already held this exact tree. */
  reused: boolean;
  pruned: string[];
}

/**
 * Release directories are named `<commit>`, or `<commit>.<ms>` when an
 * earlier directory for the same commit had to be replaced.
 */
export function releaseCommit(releaseName: string): string {
  const dot = releaseName.indexOf(".");
  return dot === -1 ? releaseName : releaseName.slice(0, dot);
}

/** Directory name `current` points at, or null before the first publish. */
export function currentReleaseName(layout: ReleaseLayout): string | null {
  try {
    return basename(readlinkSync(layout.currentLink));
  } catch {
    return null;
  }
}

/** Commit `current` points at, or null before the first publish. */
export function currentRelease(layout: ReleaseLayout): string | null {
  const name = currentReleaseName(layout);
  return name === null ? null : releaseCommit(name);
}

function freshReleaseName(taken: readonly string[], commit: string, now: Date): string {
  if (!taken.includes(commit)) return commit;
  let name = `${commit}.${now.getTime()}`;
  for (let n = 1; taken.includes(name); n++) {
    name = `${commit}.${now.getTime()}-${n}`;
  }
  return name;
}

function releasesFor(releasesDir: string, commit: string): string[] {
  return readdirSync(releasesDir, { withFileTypes: true })
    .filter((e) => e.isDirectory() && !e.name.startsWith(STAGING_PREFIX) && releaseCommit(e.name) === commit)
    .map((e) => e.name)
    .sort();
}

/**
 * Copy the worktree (minus .git) into a staging directory, verify the copy by
 * hash, rename it into `releases/` and swap `current` onto it. Readers of
 * `current` see the old tree or the new one, never a mix. A directory already
 * holding this commit is reused when its contents match; otherwise the new
 * copy gets a fresh name, so the directory `current` points at is never
 * replaced in place.
 */
export function publishRelease(request: PublishRequest): PublishResult {
  const { worktree, releasesDir, currentLink, commit, logger } = request;
  mkdirSync(releasesDir, { recursive: true });
  const expected = hashDirectory(worktree, GIT_DIR);

  const existing = releasesFor(releasesDir, commit);
  const match = existing.find((name) => hashDirectory(join(releasesDir, name)) === expected);
  const release = match ?? freshReleaseName(existing, commit, request.now);
  const target = join(releasesDir, release);

  const reused = match !== undefined;
  if (!reused) {
    const staging = join(releasesDir, `${STAGING_PREFIX}${commit}-${process.pid}`);
    rmSync(staging, { recursive: true, force: true });
    try {
      const gitDir = join(worktree, ".git");
      cpSync(worktree, staging, {
        recursive: true,
        verbatimSymlinks: true,
        filter: (src) => src !== gitDir,
      });
      const actual = hashDirectory(staging);
      if (actual !== expected) {
        throw new PublishError(`Staged release for ${commit} does not match the worktree`, { expected, actual });
      }
      renameSync(staging, target);
    } catch (error) {
      rmSync(staging, { recursive: true, force: true });
      if (error instanceof PublishError) throw error;
      throw new PublishError(`Failed to stage release ${commit}: ${errorMessage(error)}`, { commit });
    }
  }

  utimesSync(target, request.now, request.now);
  // Relative, so the whole sync directory can move
  atomicSymlinkSwap(currentLink, relative(dirname(currentLink), target));
  logger?.info({ release, commit, reused }, "Published release");

  // Other copies of this commit are stale now that current has moved off them
  const stale = existing.filter((name) => name !== release);
  for (const name of stale) {
    rmSync(join(releasesDir, name), { recursive: true, force: true });
  }

  const pruned = [...stale, ...pruneReleases(request, release, request.keep)];
  return { release, path: target, reused, pruned };
}

/**
 * Delete the oldest releases beyond `keep`, and any staging leftovers. The
 * current release is never deleted.
 */
export function pruneReleases(layout: ReleaseLayout, current: string, keep: number): string[] {
  const entries = readdirSync(layout.releasesDir, { withFileTypes: true }).filter((e) => e.isDirectory());

  for (const entry of entries) {
    if (entry.name.startsWith(STAGING_PREFIX)) {
      rmSync(join(layout.releasesDir, entry.name), { recursive: true, force: true });
    }
  }

  const releases = entries
    .filter((e) => !e.name.startsWith(STAGING_PREFIX) && e.name !== current)
    .map((e) => ({ name: e.name, mtimeMs: statSync(join(layout.releasesDir, e.name)).mtimeMs }))
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

  const stale = releases.slice(Math.max(0, keep - 1)).map((r) => r.name);
  for (const name of stale) {
    rmSync(join(layout.releasesDir, name), { recursive: true, force: true });
  }
  return stale;
}
