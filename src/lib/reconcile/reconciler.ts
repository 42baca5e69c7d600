import { readFileSync } from "fs";
import { createTwoFilesPatch } from "diff";
import type { FailurePolicy } from "../config/schema.js";
import {
  SECTION_ORDER,
  fingerprint,
  orderedResources,
  resourceId,
  type CommandSpec,
  type Cookbook,
  type FileSpec,
  type PackageSpec,
  type PlacedResource,
  type Resource,
  type Section,
  type ServiceSpec,
} from "../cookbook/model.js";
import { systemClock, type Clock } from "../clock.js";
import { CommandTimeoutError, ErrorCode, ResourceApplyError, errorMessage } from "../errors.js";
import type { CommandRunner, ExecResult, ExecSpec } from "../exec/executor.js";
import { aptPackageManager, satisfiesVersion, type PackageManager, type PackageStatus } from "../exec/packages.js";
import { systemctl, type ServiceVerb } from "../exec/services.js";
import { hashJson } from "../hash.js";
import { createLogger, type Logger } from "../logger.js";
import type { StateDocument } from "../state/schema.js";
import type { StateStore } from "../state/store.js";
import {
  detectFileDrift,
  enforceFile,
  hasDrift,
  readHostFile,
  systemAccounts,
  type AccountLookup,
} from "./host-files.js";
import {
  ResourceTracker,
  type CookbookOutcome,
  type FailureCode,
  type PlanEntry,
  type ReconcileOutcome,
  type ResourceResult,
  type TransitionEvent,
} from "./types.js";

export interface ReconcilerDeps {
  store: StateStore;
  executor: CommandRunner;
  packageManager?: PackageManager;
  accounts?: AccountLookup;
  clock?: Clock;
  logger?: Logger;
}

export interface ApplyOptions {
  policy?: FailurePolicy;
  onTransition?: (event: TransitionEvent) => void;
}

type ApplyAttempt = { ok: true } | { ok: false; code: FailureCode; reason: string };

function failureCode(error: unknown): FailureCode {
  if (error instanceof CommandTimeoutError) return "timed-out";
  if (error instanceof ResourceApplyError && error.code === ErrorCode.RESOURCE_VERIFY_FAILED) return "verify-failed";
  return "failed";
}

/** Counts the external actions made on behalf of one resource. */
class ActionCounter {
  count = 0;

  constructor(
    private readonly executor: CommandRunner,
    private readonly resourceId: string
  ) {}

  async run(spec: ExecSpec): Promise<ExecResult> {
    const result = await this.executor.run(spec);
    if (result.status !== "not-applicable") this.count++;
    return result;
  }

  /** Runs and requires success (or not-applicable). */
  async require(spec: ExecSpec): Promise<void> {
    const result = await this.run(spec);
    if (result.status === "success" || result.status === "not-applicable") return;
    if (result.status === "timed-out") {
      throw new CommandTimeoutError(spec.argv.join(" "), result.timeoutMs);
    }
    throw new ResourceApplyError(this.resourceId, result.reason);
  }

  /** Runs a query whose exit code is the answer. */
  async query(spec: ExecSpec): Promise<{ exitCode: number; stdout: string }> {
    const result = await this.run({ ...spec, retry: false });
    switch (result.status) {
      case "success":
        return { exitCode: 0, stdout: result.stdout };
      case "failed":
        if (result.exitCode === null) throw new ResourceApplyError(this.resourceId, result.reason);
        return { exitCode: result.exitCode, stdout: "" };
      case "timed-out":
        throw new CommandTimeoutError(spec.argv.join(" "), result.timeoutMs);
      case "not-applicable":
        return { exitCode: 0, stdout: "" };
    }
  }
}

/**
 * Services owed a restart by file changes. Pending names are mirrored into the
 * state document so a restart interrupted by a later failure is owed on the next run.
 */
interface RestartBatch {
  cookbook: string;
  pending: Set<string>;
  done: Set<string>;
}

const RESTART_POINT = SECTION_ORDER.indexOf("configure.services");

/** True for sections that run after notified services are restarted. */
function afterRestartPoint(section: Section): boolean {
  return SECTION_ORDER.indexOf(section) > RESTART_POINT;
}

/**
 * Applies cookbooks against the host, acting only on resources whose
 * fingerprint (and, for files, on-disk state) differs from the last success.
 */
export class Reconciler {
  private readonly store: StateStore;
  private readonly executor: CommandRunner;
  private readonly packageManager: PackageManager;
  private readonly accounts: AccountLookup;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: ReconcilerDeps) {
    this.store = deps.store;
    this.executor = deps.executor;
    this.packageManager = deps.packageManager ?? aptPackageManager;
    this.accounts = deps.accounts ?? systemAccounts();
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger("reconciler");
  }

  async apply(cookbook: Cookbook, options: ApplyOptions = {}): Promise<CookbookOutcome> {
    const outcome = await this.run([cookbook], options);
    return outcome.cookbooks[0];
  }

  /**
   * Apply cookbooks in order under one state lock. Throws StateLockedError when
   * another run holds the lock.
   */
  async run(cookbooks: Cookbook[], options: ApplyOptions = {}): Promise<ReconcileOutcome> {
    const policy = options.policy ?? "fail-fast";
    const release = this.store.lock();
    try {
      const doc = this.store.load();
      const outcomes: CookbookOutcome[] = [];
      for (const cookbook of cookbooks) {
        outcomes.push(await this.applyCookbook(cookbook, doc, policy, options.onTransition));
      }

      const success = outcomes.every((o) => o.success);
      if (success) {
        doc.last_config_applied = this.clock.now().toISOString();
        doc.config_hash = hashJson(
          cookbooks.map((c) => ({ cookbook: c.name, resources: orderedResources(c).map((p) => fingerprint(p.resource)) }))
        );
        this.store.save(doc);
      }
      return { success, policy, cookbooks: outcomes };
    } finally {
      release();
    }
  }

  /**
   * Compare only. Never runs a command, writes a file or touches the state.
   */
  plan(cookbook: Cookbook): PlanEntry[] {
    const doc = this.store.load();
    return orderedResources(cookbook).map(({ section, resource }) => {
      const id = resourceId(resource);
      const base = { id, category: resource.kind, section };
      if (doc.resources[id]?.fingerprint !== fingerprint(resource)) {
        return {
          ...base,
          status: "drift" as const,
          reason: doc.resources[id] ? "declaration changed" : "never applied",
          diff: resource.kind === "file" ? this.fileDiff(resource) : undefined,
        };
      }
      if (resource.kind === "file" && hasDrift(detectFileDrift(resource, readHostFile(resource.path), this.accounts))) {
        return { ...base, status: "drift" as const, reason: "host changed", diff: this.fileDiff(resource) };
      }
      return { ...base, status: "up-to-date" as const };
    });
  }

  /**
   * Drop state for resources no cookbook declares any more. Returns the removed identities.
   */
  prune(cookbooks: Cookbook[]): string[] {
    const declared = new Set(cookbooks.flatMap((c) => orderedResources(c).map((p) => resourceId(p.resource))));
    const release = this.store.lock();
    try {
      const doc = this.store.load();
      const removed = Object.keys(doc.resources).filter((id) => !declared.has(id));
      for (const id of removed) {
        delete doc.resources[id];
        const [category] = id.split(".", 1);
        const key = id.slice(category.length + 1);
        if (category === "file") delete doc.files[key];
        if (category === "package") delete doc.packages[key];
        if (category === "service") delete doc.services[key];
      }
      if (removed.length > 0) {
        this.store.save(doc);
        this.logger.info({ removed }, "Pruned stale state records");
      }
      return removed;
    } finally {
      release();
    }
  }

  private async applyCookbook(
    cookbook: Cookbook,
    doc: StateDocument,
    policy: FailurePolicy,
    onTransition?: (event: TransitionEvent) => void
  ): Promise<CookbookOutcome> {
    const log = this.logger.child({ cookbook: cookbook.name });
    const results: ResourceResult[] = [];
    const batch: RestartBatch = {
      cookbook: cookbook.name,
      pending: new Set(doc.pending_restarts[cookbook.name] ?? []),
      done: new Set(),
    };
    const declared = new Map(cookbook.sections["configure.services"].map((s) => [s.name, s]));
    let aborted: string | null = null;
    let flushed = false;

    const flush = async () => {
      flushed = true;
      if (aborted) return;
      const restarts = await this.flushRestarts(doc, batch, declared);
      results.push(...restarts);
      const failed = restarts.find((r) => r.status === "failed");
      if (failed && policy === "fail-fast") aborted = failed.id;
    };

    for (const placed of orderedResources(cookbook)) {
      const { section, resource } = placed;
      const id = resourceId(resource);

      // Undeclared notified services restart after configure.services, before post_install
      if (!flushed && afterRestartPoint(section)) await flush();

      if (aborted) {
        results.push({ id, category: resource.kind, section, status: "failed", code: "aborted", reason: `Aborted after ${aborted} failed`, actions: 0 });
        continue;
      }

      const result = await this.applyResource(placed, doc, batch, onTransition);
      results.push(result);
      if (result.status === "failed" && policy === "fail-fast") {
        aborted = id;
      }
    }
    if (!flushed) await flush();

    const summary = { skipped: 0, applied: 0, failed: 0 };
    for (const r of results) summary[r.status]++;
    const success = summary.failed === 0;
    log.info({ ...summary, policy }, success ? "Cookbook applied" : "Cookbook failed");
    return { cookbook: cookbook.name, source: cookbook.source, policy, success, results, summary };
  }

  private async applyResource(
    { section, resource }: PlacedResource,
    doc: StateDocument,
    batch: RestartBatch,
    onTransition?: (event: TransitionEvent) => void
  ): Promise<ResourceResult> {
    const id = resourceId(resource);
    const tracker = new ResourceTracker(id, onTransition);
    const base = { id, category: resource.kind, section };
    const desired = fingerprint(resource);

    tracker.to("compared");
    if (doc.resources[id]?.fingerprint === desired && this.hostMatches(resource, batch)) {
      tracker.to("up-to-date");
      this.logger.debug({ resource: id }, "Up to date");
      return { ...base, status: "skipped", actions: 0 };
    }

    tracker.to("drift-detected");
    tracker.to("applying");
    const counter = new ActionCounter(this.executor, id);
    const attempt = await this.enforce(resource, doc, batch, counter);

    if (!attempt.ok) {
      tracker.to("failed");
      this.logger.error({ resource: id, code: attempt.code, reason: attempt.reason }, "Apply failed");
      return { ...base, status: "failed", code: attempt.code, reason: attempt.reason, actions: counter.count };
    }

    doc.resources[id] = { fingerprint: desired, applied_at: this.clock.now().toISOString() };
    this.store.save(doc);
    tracker.to("applied");
    this.logger.info({ resource: id, actions: counter.count }, "Applied");
    return { ...base, status: "applied", actions: counter.count };
  }

  private hostMatches(resource: Resource, batch: RestartBatch): boolean {
    if (resource.kind === "file") {
      return !hasDrift(detectFileDrift(resource, readHostFile(resource.path), this.accounts));
    }
    if (resource.kind === "service") {
      return !batch.pending.has(resource.name) || resource.state === "stopped";
    }
    return true;
  }

  private async enforce(
    resource: Resource,
    doc: StateDocument,
    batch: RestartBatch,
    counter: ActionCounter
  ): Promise<ApplyAttempt> {
    try {
      switch (resource.kind) {
        case "package":
          await this.enforcePackage(resource, doc, counter);
          break;
        case "file":
          this.enforceFileSpec(resource, doc, batch);
          break;
        case "service":
          await this.enforceService(resource, doc, batch, counter);
          break;
        case "command":
          await this.enforceCommand(resource, counter);
          break;
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, code: failureCode(error), reason: errorMessage(error) };
    }
  }

  private async queryPackage(name: string, counter: ActionCounter): Promise<PackageStatus> {
    const { exitCode, stdout } = await counter.query({ argv: this.packageManager.queryCommand(name) });
    return this.packageManager.parseQuery(exitCode, stdout);
  }

  private async enforcePackage(spec: PackageSpec, doc: StateDocument, counter: ActionCounter): Promise<void> {
    const before = await this.queryPackage(spec.name, counter);

    if (spec.presence === "absent") {
      if (before.installed) {
        await counter.require({ argv: this.packageManager.removeCommand(spec.name), elevate: true });
        const after = await this.queryPackage(spec.name, counter);
        if (after.installed) {
          throw new ResourceApplyError(
            resourceId(spec),
            `${spec.name} is still installed after removal`,
            ErrorCode.RESOURCE_VERIFY_FAILED
          );
        }
      }
      delete doc.packages[spec.name];
      return;
    }

    if (!satisfiesVersion(spec, before) || spec.version.kind === "latest") {
      await counter.require({ argv: this.packageManager.installCommand(spec), elevate: true });
    }
    // Presence is verified by query, not inferred from the installer's exit code
    const after = await this.queryPackage(spec.name, counter);
    if (!satisfiesVersion(spec, after)) {
      const found = after.installed ? `version ${after.version ?? "unknown"}` : "not installed";
      throw new ResourceApplyError(resourceId(spec), `${spec.name} verification failed: ${found}`, ErrorCode.RESOURCE_VERIFY_FAILED);
    }
    doc.packages[spec.name] = after.version ?? "unknown";
  }

  private enforceFileSpec(spec: FileSpec, doc: StateDocument, batch: RestartBatch): void {
    // The restart is owed (and saved) before the content changes on disk
    enforceFile(spec, this.accounts, () => {
      if (spec.notify.length === 0) return;
      for (const service of spec.notify) batch.pending.add(service);
      this.recordPending(doc, batch);
      this.store.save(doc);
    });
    if (spec.presence === "absent") {
      delete doc.files[spec.path];
    } else {
      const host = readHostFile(spec.path);
      doc.files[spec.path] = host.contentHash ?? "";
    }
  }

  private recordPending(doc: StateDocument, batch: RestartBatch): void {
    if (batch.pending.size === 0) {
      delete doc.pending_restarts[batch.cookbook];
    } else {
      doc.pending_restarts[batch.cookbook] = [...batch.pending].sort();
    }
  }

  /** The owed restart is done, or no longer wanted. */
  private settleRestart(doc: StateDocument, batch: RestartBatch, name: string): void {
    if (!batch.pending.delete(name)) return;
    this.recordPending(doc, batch);
    this.store.save(doc);
  }

  private async serviceIs(query: string[], counter: ActionCounter): Promise<boolean> {
    const { exitCode } = await counter.query({ argv: query });
    return exitCode === 0;
  }

  private async serviceAction(verb: ServiceVerb, name: string, counter: ActionCounter): Promise<void> {
    await counter.require({ argv: systemctl.action(verb, name), elevate: true });
  }

  private async enforceService(
    spec: ServiceSpec,
    doc: StateDocument,
    batch: RestartBatch,
    counter: ActionCounter
  ): Promise<void> {
    const notified = batch.pending.has(spec.name);

    if (spec.state === "stopped") {
      if (await this.serviceIs(systemctl.isActive(spec.name), counter)) {
        await this.serviceAction("stop", spec.name, counter);
      }
    } else if (spec.state === "restarted" || notified) {
      if (!batch.done.has(spec.name)) {
        await this.serviceAction("restart", spec.name, counter);
        batch.done.add(spec.name);
      }
    } else if (spec.state === "started") {
      if (!(await this.serviceIs(systemctl.isActive(spec.name), counter))) {
        await this.serviceAction("start", spec.name, counter);
      }
    }
    this.settleRestart(doc, batch, spec.name);

    if (spec.enabled !== undefined) {
      const enabled = await this.serviceIs(systemctl.isEnabled(spec.name), counter);
      if (enabled !== spec.enabled) {
        await this.serviceAction(spec.enabled ? "enable" : "disable", spec.name, counter);
      }
    }

    doc.services[spec.name] = spec.state ?? (spec.enabled === false ? "disabled" : "enabled");
  }

  /**
   * Restart services notified by file changes but not declared in
   * configure.services. A failed restart stays owed.
   */
  private async flushRestarts(
    doc: StateDocument,
    batch: RestartBatch,
    declared: ReadonlyMap<string, ServiceSpec>
  ): Promise<ResourceResult[]> {
    const results: ResourceResult[] = [];
    for (const name of [...batch.pending].sort()) {
      const spec = declared.get(name);
      if (batch.done.has(name) || spec?.state === "stopped") {
        this.settleRestart(doc, batch, name);
        continue;
      }
      // A declared service whose own apply failed keeps the restart for next run
      if (spec) continue;

      const counter = new ActionCounter(this.executor, `service.${name}`);
      const base = { id: `service.${name}`, category: "service" as const, section: "configure.services" as const };
      try {
        await this.serviceAction("restart", name, counter);
        batch.done.add(name);
        this.settleRestart(doc, batch, name);
        results.push({ ...base, status: "applied", actions: counter.count });
      } catch (error) {
        results.push({ ...base, status: "failed", code: failureCode(error), reason: errorMessage(error), actions: counter.count });
      }
    }
    return results;
  }

  private async enforceCommand(spec: CommandSpec, counter: ActionCounter): Promise<void> {
    await counter.require({
      argv: spec.argv,
      elevate: spec.elevate,
      timeoutMs: spec.timeoutMs,
      creates: spec.creates,
    });
  }

  private fileDiff(spec: FileSpec): string {
    let current = "";
    try {
      current = readFileSync(spec.path, "utf-8");
    } catch {
      // Missing file diffs against empty content
    }
    const desired = spec.presence === "present" ? spec.content : "";
    return createTwoFilesPatch(spec.path, spec.path, current, desired, "host", "cookbook", { context: 3 });
  }
}
