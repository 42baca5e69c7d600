import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "events";

const { spawnMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
}));

vi.mock("child_process", () => ({
  spawn: spawnMock,
}));

import { spawnProcess } from "./process.js";

function createFakeProcess() {
  const proc = new EventEmitter() as EventEmitter & {
    stdout: EventEmitter;
    stderr: EventEmitter;
    kill: ReturnType<typeof vi.fn>;
  };
  proc.stdout = new EventEmitter();
  proc.stderr = new EventEmitter();
  proc.kill = vi.fn(() => {
    proc.emit("close", null);
  });
  return proc;
}

beforeEach(() => {
  spawnMock.mockReset();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("spawnProcess", () => {
  it("collects output and the exit code", async () => {
    const proc = createFakeProcess();
    spawnMock.mockReturnValue(proc);

    const pending = spawnProcess({ cmd: "dpkg-query", args: ["-W", "nginx"], timeoutMs: 1000 });
    proc.stdout.emit("data", Buffer.from("install ok installed\t"));
    proc.stdout.emit("data", "1.24.0");
    proc.stderr.emit("data", "warning\n");
    proc.emit("close", 0);

    await expect(pending).resolves.toEqual({
      kind: "exited",
      exitCode: 0,
      stdout: "install ok installed\t1.24.0",
      stderr: "warning\n",
    });
    expect(spawnMock).toHaveBeenCalledWith("dpkg-query", ["-W", "nginx"], {
      cwd: undefined,
      env: undefined,
      stdio: ["ignore", "pipe", "pipe"],
    });
  });

  it("kills the process and reports a timeout", async () => {
    vi.useFakeTimers();
    const proc = createFakeProcess();
    spawnMock.mockReturnValue(proc);

    const pending = spawnProcess({ cmd: "sleep", args: ["60"], timeoutMs: 500 });
    vi.advanceTimersByTime(500);

    await expect(pending).resolves.toEqual({ kind: "timed-out", stdout: "", stderr: "" });
    expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
  });

  it("reports spawn errors", async () => {
    const proc = createFakeProcess();
    spawnMock.mockReturnValue(proc);

    const pending = spawnProcess({ cmd: "missing-binary", args: [], timeoutMs: 1000 });
    const error = Object.assign(new Error("spawn missing-binary ENOENT"), { code: "ENOENT" });
    proc.emit("error", error);

    await expect(pending).resolves.toEqual({
      kind: "spawn-error",
      code: "ENOENT",
      message: "spawn missing-binary ENOENT",
    });
  });
});
