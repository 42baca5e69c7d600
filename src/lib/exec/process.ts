import { spawn } from "child_process";

export interface ProcessRequest {
  cmd: string;
  args: string[];
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type ProcessOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "timed-out"; stdout: string; stderr: string }
  | { kind: "spawn-error"; code?: string; message: string };

/**
 * Starts one process and reports how it ended. Never rejects.
 */
export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessOutcome>;

const KILL_GRACE_MS = 1500;

export const spawnProcess: ProcessRunner = (request) =>
  new Promise<ProcessOutcome>((resolve) => {
    let stdout = "";
    let stderr = "";
    let finished = false;
    let timedOut = false;

    const child = spawn(request.cmd, request.args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const finish = (outcome: ProcessOutcome) => {
      if (finished) return;
      finished = true;
      clearTimeout(timeoutId);
      resolve(outcome);
    };

    const timeoutId = setTimeout(() => {
      if (finished) return;
      timedOut = true;
      child.kill("SIGTERM");
      setTimeout(() => {
        if (!finished) {
          child.kill("SIGKILL");
        }
      }, KILL_GRACE_MS).unref();
    }, request.timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      finish({ kind: "spawn-error", code: error.code, message: error.message });
    });

    child.on("close", (code: number | null) => {
      if (timedOut) {
        finish({ kind: "timed-out", stdout, stderr });
        return;
      }
      finish({ kind: "exited", exitCode: code ?? 1, stdout, stderr });
    });
  });
