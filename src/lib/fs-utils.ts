import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from "fs";
import { basename, dirname, join } from "path";
import { StateLockedError } from "./errors.js";

function tempSibling(path: string, label: string): string {
  const suffix = `${Date.now()}.${process.pid}.${Math.random().toString(36).slice(2, 8)}`;
  return join(dirname(path), `.${basename(path)}.${label}.${suffix}`);
}

/**
 * Write `content` beside `path`, fsync it, then rename it into place. Readers see
 * either the previous file or the complete new one.
 */
export function atomicWriteFileSync(path: string, content: string, mode?: number): void {
  mkdirSync(dirname(path), { recursive: true });
  const tempPath = tempSibling(path, "tmp");
  const fd = openSync(tempPath, "w", mode);
  try {
    try {
      writeFileSync(fd, content);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Point `linkPath` at `target` with a single rename of a freshly made symlink.
 */
export function atomicSymlinkSwap(linkPath: string, target: string): void {
  const tempLink = tempSibling(linkPath, "link");
  symlinkSync(target, tempLink);
  try {
    renameSync(tempLink, linkPath);
  } catch (error) {
    rmSync(tempLink, { force: true });
    throw error;
  }
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrno(error, "EPERM");
  }
}

function readLockHolder(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(readFileSync(lockPath, "utf-8").trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

export type ReleaseLock = () => void;

/**
 * Take the exclusive advisory lock `<path>.lock` or fail fast with
 * StateLockedError. A lock whose recorded pid no longer runs is reclaimed.
 */
export function acquireFileLock(path: string): ReleaseLock {
  mkdirSync(dirname(path), { recursive: true });
  const lockPath = `${path}.lock`;

  for (let attempt = 0; attempt < 2; attempt += 1) {
    let fd: number;
    try {
      fd = openSync(lockPath, "wx");
    } catch (error) {
      if (!isErrno(error, "EEXIST")) throw error;
      const holder = readLockHolder(lockPath);
      if (attempt === 0 && holder !== null && holder !== process.pid && !isProcessAlive(holder)) {
        rmSync(lockPath, { force: true });
        continue;
      }
      throw new StateLockedError(lockPath, holder);
    }

    try {
      writeFileSync(fd, String(process.pid));
    } finally {
      closeSync(fd);
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (readLockHolder(lockPath) === process.pid) {
        rmSync(lockPath, { force: true });
      }
    };
  }

  throw new StateLockedError(lockPath, readLockHolder(lockPath));
}
