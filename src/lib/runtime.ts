import type { Clock, RandomSource } from "./clock.js";
import { loadSettingsStrict } from "./config/loader.js";
import { resolveSettingsPath } from "./config/path.js";
import type { Settings, SyncSettings } from "./config/schema.js";
import { CommandExecutor } from "./exec/executor.js";
import { getPackageManager } from "./exec/packages.js";
import type { ProcessRunner } from "./exec/process.js";
import { reconcileDirectory } from "./reconcile/directory.js";
import type { AccountLookup } from "./reconcile/host-files.js";
import type { ReconcilerDeps } from "./reconcile/reconciler.js";
import type { ReconcileOutcome, TransitionEvent } from "./reconcile/types.js";
import { retryPolicyFromSettings } from "./retry.js";
import { FileStateStore } from "./state/store.js";
import { SyncService, type SyncCycleResult } from "./sync/service.js";

/** Seams for running against something other than the real host. */
export interface RuntimeOverrides {
  runner?: ProcessRunner;
  clock?: Clock;
  random?: RandomSource;
  isRoot?: () => boolean;
  accounts?: AccountLookup;
}

export function createExecutor(settings: Settings, overrides: RuntimeOverrides = {}): CommandExecutor {
  return new CommandExecutor({
    runner: overrides.runner,
    clock: overrides.clock,
    random: overrides.random,
    isRoot: overrides.isRoot,
    retryPolicy: retryPolicyFromSettings(settings.retry),
    defaultTimeoutMs: settings.command_timeout_seconds * 1000,
    elevation: settings.elevation,
  });
}

export function createReconcilerDeps(settings: Settings, overrides: RuntimeOverrides = {}): ReconcilerDeps {
  return {
    store: new FileStateStore(resolveSettingsPath(settings.state_file)),
    executor: createExecutor(settings, overrides),
    packageManager: getPackageManager(settings.package_manager),
    accounts: overrides.accounts,
    clock: overrides.clock,
  };
}

export interface ReconcileRunOptions extends RuntimeOverrides {
  /** Drop state for resources no cookbook declares any more. */
  prune?: boolean;
  onTransition?: (event: TransitionEvent) => void;
}

/**
 * One reconciliation run over the configured cookbook directory. Settings are
 * read from the config directory when not given.
 */
export async function reconcileFromSettings(
  settings: Settings = loadSettingsStrict(),
  options: ReconcileRunOptions = {}
): Promise<ReconcileOutcome> {
  return reconcileDirectory(resolveSettingsPath(settings.cookbook_dir), createReconcilerDeps(settings, options), {
    policy: settings.failure_policy,
    prune: options.prune,
    onTransition: options.onTransition,
  });
}

export interface SyncEntryOptions extends RuntimeOverrides {
  repoUrl?: string;
  localPath?: string;
  branch?: string;
  intervalMinutes?: number;
  once?: boolean;
  signal?: AbortSignal;
}

/** Explicit options win over the settings file. */
export function syncSettingsFor(options: SyncEntryOptions, base: SyncSettings): SyncSettings {
  return {
    ...base,
    repo_url: options.repoUrl ?? base.repo_url,
    local_path: options.localPath ?? base.local_path,
    branch: options.branch ?? base.branch,
    interval_minutes: options.intervalMinutes ?? base.interval_minutes,
  };
}

export function createSyncService(options: SyncEntryOptions, settings: Settings = loadSettingsStrict()): SyncService {
  return new SyncService({
    settings: syncSettingsFor(options, settings.sync),
    executor: createExecutor(settings, options),
    clock: options.clock,
    random: options.random,
  });
}

/**
 * Sync entry point: one cycle with `once`, otherwise until `signal` aborts.
 */
export async function runSync(options: SyncEntryOptions, settings: Settings = loadSettingsStrict()): Promise<SyncCycleResult | null> {
  return createSyncService(options, settings).run({ once: options.once, signal: options.signal });
}
