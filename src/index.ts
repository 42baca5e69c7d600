export * from "./lib/cookbook/index.js";
export * from "./lib/state/index.js";
export * from "./lib/exec/index.js";
export * from "./lib/reconcile/index.js";
export * from "./lib/sync/index.js";
export * from "./lib/config/index.js";
export {
  ErrorCode,
  LarderError,
  ParseError,
  ResourceApplyError,
  CommandTimeoutError,
  SyncTransportError,
  PublishError,
  StateLockedError,
  ConfigError,
  isLarderError,
  errorMessage,
} from "./lib/errors.js";
export type { ParseIssue } from "./lib/errors.js";
export { createLogger } from "./lib/logger.js";
export type { Logger, LogLevel } from "./lib/logger.js";
export { systemClock } from "./lib/clock.js";
export type { Clock, RandomSource } from "./lib/clock.js";
export { DEFAULT_RETRY_POLICY, backoffDelay, retry, retryWhile, retryPolicyFromSettings } from "./lib/retry.js";
export type { RetryPolicy, RetryContext } from "./lib/retry.js";
export { hashJson, hashDirectory, stableStringify } from "./lib/hash.js";
export {
  createExecutor,
  createReconcilerDeps,
  reconcileFromSettings,
  createSyncService,
  runSync,
  syncSettingsFor,
} from "./lib/runtime.js";
export type { RuntimeOverrides, ReconcileRunOptions, SyncEntryOptions } from "./lib/runtime.js";
