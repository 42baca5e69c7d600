export { SyncService } from "./service.js";
export type { SyncServiceOptions, SyncCycleResult, SyncCycleStatus, SyncRunOptions } from "./service.js";
export { CliGitClient, GitCommandError } from "./git.js";
export type { GitClient, CliGitClientOptions } from "./git.js";
export { publishRelease, pruneReleases, currentRelease, currentReleaseName, releaseCommit } from "./publish.js";
export type { PublishRequest, PublishResult, ReleaseLayout } from "./publish.js";
export { SyncStateSchema, ConflictDescriptorSchema, initialSyncState, loadSyncState, saveSyncState } from "./state.js";
export type { SyncState, SyncPhase, ConflictDescriptor } from "./state.js";
export { validateGitRef, validateRepoUrl, validateRelativeSubPath } from "./validation.js";
