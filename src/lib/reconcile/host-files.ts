import { chmodSync, chownSync, existsSync, mkdirSync, readFileSync, rmSync, statSync } from "fs";
import { dirname } from "path";
import { atomicWriteFileSync } from "../fs-utils.js";
import { hashFile, hashString } from "../hash.js";
import type { FileSpec } from "../cookbook/model.js";

/** Resolves owner and group names to numeric ids. Numeric strings pass through. */
export interface AccountLookup {
  uid(owner: string): number | null;
  gid(group: string): number | null;
}

function parseIdFile(path: string, idField: number): Map<string, number> {
  const ids = new Map<string, number>();
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch {
    return ids;
  }
  for (const line of text.split("\n")) {
    if (!line || line.startsWith("#")) continue;
    const fields = line.split(":");
    const id = Number.parseInt(fields[idField] ?? "", 10);
    if (fields[0] && Number.isInteger(id)) ids.set(fields[0], id);
  }
  return ids;
}

function numeric(value: string): number | null {
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

export function systemAccounts(passwdPath = "/etc/passwd", groupPath = "/etc/group"): AccountLookup {
  return {
    uid: (owner) => numeric(owner) ?? parseIdFile(passwdPath, 2).get(owner) ?? null,
    gid: (group) => numeric(group) ?? parseIdFile(groupPath, 2).get(group) ?? null,
  };
}

export interface HostFileState {
  exists: boolean;
  contentHash: string | null;
  uid: number | null;
  gid: number | null;
  /** Four octal digits. */
  mode: string | null;
}

export function readHostFile(path: string): HostFileState {
  if (!existsSync(path)) {
    return { exists: false, contentHash: null, uid: null, gid: null, mode: null };
  }
  const stat = statSync(path);
  return {
    exists: true,
    contentHash: stat.isFile() ? hashFile(path) : null,
    uid: stat.uid,
    gid: stat.gid,
    mode: (stat.mode & 0o7777).toString(8).padStart(4, "0"),
  };
}

export interface FileDrift {
  content: boolean;
  owner: boolean;
  group: boolean;
  mode: boolean;
  presence: boolean;
}

export function hasDrift(drift: FileDrift): boolean {
  return drift.content || drift.owner || drift.group || drift.mode || drift.presence;
}

/**
 * Compare the host against a file spec. A present file matches only when its
 * content, owner, group and mode all do.
 */
export function detectFileDrift(spec: FileSpec, host: HostFileState, accounts: AccountLookup): FileDrift {
  if (spec.presence === "absent") {
    return { content: false, owner: false, group: false, mode: false, presence: host.exists };
  }
  if (!host.exists) {
    return { content: true, owner: !!spec.owner, group: !!spec.group, mode: !!spec.mode, presence: true };
  }
  return {
    content: host.contentHash !== hashString(spec.content),
    owner: spec.owner !== undefined && accounts.uid(spec.owner) !== host.uid,
    group: spec.group !== undefined && accounts.gid(spec.group) !== host.gid,
    mode: spec.mode !== undefined && spec.mode !== host.mode,
    presence: false,
  };
}

export interface FileChange {
  contentChanged: boolean;
  metadataChanged: boolean;
}

/**
 * Bring one file to its declared state. Accounts are resolved first, so an
 * unknown owner or group leaves the file untouched. Content is written
 * atomically only when it differs, after `beforeContentChange` has run; owner,
 * group and mode are checked afterwards.
 */
export function enforceFile(spec: FileSpec, accounts: AccountLookup, beforeContentChange?: () => void): FileChange {
  if (spec.presence === "absent") {
    const existed = existsSync(spec.path);
    if (existed) {
      beforeContentChange?.();
      rmSync(spec.path, { force: true });
    }
    return { contentChanged: existed, metadataChanged: false };
  }

  const uid = spec.owner === undefined ? null : accounts.uid(spec.owner);
  const gid = spec.group === undefined ? null : accounts.gid(spec.group);
  if (spec.owner !== undefined && uid === null) throw new Error(`Unknown owner: ${spec.owner}`);
  if (spec.group !== undefined && gid === null) throw new Error(`Unknown group: ${spec.group}`);

  const before = readHostFile(spec.path);
  let contentChanged = false;
  if (!before.exists || before.contentHash !== hashString(spec.content)) {
    beforeContentChange?.();
    mkdirSync(dirname(spec.path), { recursive: true });
    const mode = spec.mode ? Number.parseInt(spec.mode, 8) : before.mode ? Number.parseInt(before.mode, 8) : 0o644;
    atomicWriteFileSync(spec.path, spec.content, mode);
    contentChanged = true;
  }

  const after = readHostFile(spec.path);
  let metadataChanged = false;

  // A rewrite replaces the inode; undeclared ownership stays what it was
  const wantUid = uid ?? before.uid;
  const wantGid = gid ?? before.gid;

  if ((wantUid !== null && wantUid !== after.uid) || (wantGid !== null && wantGid !== after.gid)) {
    chownSync(spec.path, wantUid ?? -1, wantGid ?? -1);
    metadataChanged = true;
  }
  if (spec.mode && spec.mode !== after.mode) {
    chmodSync(spec.path, Number.parseInt(spec.mode, 8));
    metadataChanged = true;
  }

  return { contentChanged, metadataChanged };
}
