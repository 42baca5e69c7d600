import { existsSync } from "fs";
import { systemClock, type Clock, type RandomSource } from "../clock.js";
import { createLogger, type Logger } from "../logger.js";
import { DEFAULT_RETRY_POLICY, retryWhile, type RetryPolicy } from "../retry.js";
import { spawnProcess, type ProcessOutcome, type ProcessRunner } from "./process.js";

export interface ExecSpec {
  argv: string[];
  /** Run with administrative privilege (sudo) when not already root. */
  elevate?: boolean;
  timeoutMs?: number;
  /** Skip as not-applicable while this path exists. */
  creates?: string;
  cwd?: string;
  env?: Record<string, string>;
  /** Decides whether a failure is worth retrying; defaults to known lock/network messages. */
  transient?: (failure: { exitCode: number; stderr: string }) => boolean;
  /** Set false to run exactly once. */
  retry?: boolean;
}

export type ExecResult =
  | { status: "success"; stdout: string; stderr: string; attempts: number }
  | { status: "not-applicable"; reason: string }
  | { status: "failed"; reason: string; exitCode: number | null; stderr: string; transient: boolean; attempts: number }
  | { status: "timed-out"; timeoutMs: number; attempts: number };

export interface CommandRunner {
  run(spec: ExecSpec): Promise<ExecResult>;
}

export type ElevationMode = "auto" | "never";

export interface CommandExecutorOptions {
  runner?: ProcessRunner;
  clock?: Clock;
  random?: RandomSource;
  retryPolicy?: RetryPolicy;
  defaultTimeoutMs?: number;
  elevation?: ElevationMode;
  isRoot?: () => boolean;
  logger?: Logger;
}

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /could not get lock/i,
  /unable to acquire the dpkg frontend lock/i,
  /is another process using it/i,
  /waiting for cache lock/i,
  /temporary failure resolving/i,
  /could not resolve host/i,
  /connection (timed out|reset|refused)/i,
  /rpmdb.*lock/i,
];

export function isTransientFailure(failure: { stderr: string }): boolean {
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(failure.stderr));
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

/**
 * Runs external actions with a bounded timeout, retrying transient failures
 * under the retry policy. Holds no state between calls.
 */
export class CommandExecutor implements CommandRunner {
  private readonly runner: ProcessRunner;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly retryPolicy: RetryPolicy;
  private readonly defaultTimeoutMs: number;
  private readonly elevation: ElevationMode;
  private readonly isRoot: () => boolean;
  private readonly logger: Logger;

  constructor(options: CommandExecutorOptions = {}) {
    this.runner = options.runner ?? spawnProcess;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 300_000;
    this.elevation = options.elevation ?? "auto";
    this.isRoot = options.isRoot ?? (() => process.getuid?.() === 0);
    this.logger = options.logger ?? createLogger("executor");
  }

  /** The argv actually executed for `spec`. */
  resolveArgv(spec: ExecSpec): string[] {
    if (spec.elevate && this.elevation !== "never" && !this.isRoot()) {
      return ["sudo", "-n", ...spec.argv];
    }
    return [...spec.argv];
  }

  async run(spec: ExecSpec): Promise<ExecResult> {
    if (spec.argv.length === 0) {
      return { status: "failed", reason: "Empty command", exitCode: null, stderr: "", transient: false, attempts: 0 };
    }

    if (spec.creates && existsSync(spec.creates)) {
      return { status: "not-applicable", reason: `${spec.creates} exists` };
    }

    const [cmd, ...args] = this.resolveArgv(spec);
    const timeoutMs = spec.timeoutMs ?? this.defaultTimeoutMs;
    const classify = spec.transient ?? isTransientFailure;
    const policy = spec.retry === false ? { ...this.retryPolicy, maxAttempts: 1 } : this.retryPolicy;
    const line = [cmd, ...args].join(" ");

    const { result, attempts } = await retryWhile<ProcessOutcome>(
      (attempt) => {
        this.logger.debug({ cmd: line, attempt }, "Running command");
        return this.runner({
          cmd,
          args,
          timeoutMs,
          cwd: spec.cwd,
          env: spec.env ? { ...process.env, ...spec.env } : undefined,
        });
      },
      (outcome) =>
        outcome.kind === "exited" &&
        outcome.exitCode !== 0 &&
        classify({ exitCode: outcome.exitCode, stderr: outcome.stderr }),
      {
        policy,
        clock: this.clock,
        random: this.random,
        onRetry: (attempt, delayMs) =>
          this.logger.warn({ cmd: line, attempt, delayMs }, "Transient failure, retrying"),
      }
    );

    switch (result.kind) {
      case "exited":
        if (result.exitCode === 0) {
          return { status: "success", stdout: result.stdout, stderr: result.stderr, attempts };
        }
        return {
          status: "failed",
          reason: lastLine(result.stderr) || `${cmd} exited with code ${result.exitCode}`,
          exitCode: result.exitCode,
          stderr: result.stderr,
          transient: classify({ exitCode: result.exitCode, stderr: result.stderr }),
          attempts,
        };
      case "timed-out":
        this.logger.warn({ cmd: line, timeoutMs }, "Command timed out");
        return { status: "timed-out", timeoutMs, attempts };
      case "spawn-error":
        return {
          status: "failed",
          reason: result.code === "ENOENT" ? `Command not found: ${cmd}` : result.message,
          exitCode: null,
          stderr: "",
          transient: false,
          attempts,
        };
    }
  }
}
