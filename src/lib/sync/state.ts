import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { atomicWriteFileSync } from "../fs-utils.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export const SyncPhaseSchema = z.enum([
  "uninitialized",
  "cloning",
  "synced",
  "drifted",
  "conflict-detected",
  "resolving",
  "degraded",
]);

export type SyncPhase = z.infer<typeof SyncPhaseSchema>;

export const ConflictDescriptorSchema = z.object({
  detected_at: z.string(),
  /** diverged: both sides moved. local-ahead: local commits upstream lacks. dirty: uncommitted edits only. */
  kind: z.enum(["diverged", "local-ahead", "dirty"]),
  local_commit: z.string(),
  remote_commit: z.string(),
  discarded_commits: z.array(z.string()),
  dirty: z.boolean(),
});

export type ConflictDescriptor = z.infer<typeof ConflictDescriptorSchema>;

export const SyncStateSchema = z.object({
  phase: SyncPhaseSchema.default("uninitialized"),
  last_commit: z.string().nullable().default(null),
  last_synced_at: z.string().nullable().default(null),
  last_attempt_at: z.string().nullable().default(null),
  last_conflict: ConflictDescriptorSchema.nullable().default(null),
  last_error: z.string().nullable().default(null),
  consecutive_failures: z.number().int().min(0).default(0),
});

export type SyncState = z.infer<typeof SyncStateSchema>;

export function initialSyncState(): SyncState {
  return SyncStateSchema.parse({});
}

/** Missing or unreadable files load as the initial state. */
export function loadSyncState(path: string, logger?: Logger): SyncState {
  if (!existsSync(path)) return initialSyncState();
  try {
    const result = SyncStateSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (result.success) return result.data;
    logger?.warn({ path }, "Sync state invalid, starting fresh");
  } catch (error) {
    logger?.warn({ path, error: errorMessage(error) }, "Sync state unreadable, starting fresh");
  }
  return initialSyncState();
}

export function saveSyncState(path: string, state: SyncState): void {
  atomicWriteFileSync(path, JSON.stringify(state, null, 2) + "\n");
}
