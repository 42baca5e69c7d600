export { Reconciler } from "./reconciler.js";
export type { ApplyOptions, ReconcilerDeps } from "./reconciler.js";
export { reconcileDirectory } from "./directory.js";
export type { ReconcileDirectoryOptions } from "./directory.js";
export {
  systemAccounts,
  readHostFile,
  detectFileDrift,
  enforceFile,
  hasDrift,
} from "./host-files.js";
export type { AccountLookup, HostFileState, FileDrift, FileChange } from "./host-files.js";
export { ResourceTracker, isTerminalPhase } from "./types.js";
export type {
  CookbookOutcome,
  FailureCode,
  PlanEntry,
  ReconcileOutcome,
  ResourcePhase,
  ResourceResult,
  ResourceStatus,
  TransitionEvent,
} from "./types.js";
