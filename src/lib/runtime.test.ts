import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { SettingsSchema, type Settings } from "./config/schema.js";
import { ConfigError, ParseError } from "./errors.js";
import type { ProcessRequest, ProcessRunner } from "./exec/process.js";
import { createSyncService, reconcileFromSettings, syncSettingsFor } from "./runtime.js";
import { FakeClock } from "./testing.js";

let dir: string;
let requests: ProcessRequest[];
const ORIG_CONFIG_DIR = process.env.LARDER_CONFIG_DIR;

const runner: ProcessRunner = async (request) => {
  requests.push(request);
  return { kind: "exited", exitCode: 0, stdout: "", stderr: "" };
};

function settingsFor(overrides: Record<string, unknown> = {}): Settings {
  return SettingsSchema.parse({
    state_file: join(dir, "state.json"),
    cookbook_dir: join(dir, "sync", "current", "cookbooks"),
    command_timeout_seconds: 60,
    ...overrides,
  });
}

function publishCookbooks(files: Record<string, string>): void {
  const release = join(dir, "sync", "releases", "r1", "cookbooks");
  mkdirSync(release, { recursive: true });
  for (const [name, text] of Object.entries(files)) {
    writeFileSync(join(release, name), text);
  }
  symlinkSync(join("releases", "r1"), join(dir, "sync", "current"));
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "larder-runtime-"));
  requests = [];
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  if (ORIG_CONFIG_DIR !== undefined) process.env.LARDER_CONFIG_DIR = ORIG_CONFIG_DIR;
  else delete process.env.LARDER_CONFIG_DIR;
});

function writeConfig(text: string): void {
  mkdirSync(join(dir, "etc"), { recursive: true });
  writeFileSync(join(dir, "etc", "config.yaml"), text);
  process.env.LARDER_CONFIG_DIR = join(dir, "etc");
}

describe("reconcileFromSettings", () => {
  it("applies the published cookbooks through the configured executor and state file", async () => {
    publishCookbooks({
      "10-motd.yaml": `name: motd\nversion: 1\ninstall:\n  pre_install:\n    - command: apt-get update\n      elevate: true\nconfigure:\n  files:\n    - path: ${dir}/motd\n      content: welcome\n`,
    });

    const outcome = await reconcileFromSettings(settingsFor(), {
      runner,
      isRoot: () => false,
      clock: new FakeClock(),
    });

    expect(outcome.success).toBe(true);
    expect(outcome.policy).toBe("fail-fast");
    expect(requests.map((r) => [r.cmd, ...r.args])).toEqual([["sudo", "-n", "apt-get", "update"]]);
    expect(requests[0].timeoutMs).toBe(60_000);
    expect(readFileSync(join(dir, "motd"), "utf-8")).toBe("welcome\n");

    const state = JSON.parse(readFileSync(join(dir, "state.json"), "utf-8"));
    expect(Object.keys(state.resources).sort()).toEqual(["command.apt-get update", `file.${dir}/motd`]);
    expect(state.last_config_applied).toBe("2026-01-01T00:00:00.000Z");
    expect(existsSync(join(dir, "state.json.lock"))).toBe(false);
  });

  it("rejects a bad cookbook before touching anything", async () => {
    publishCookbooks({
      "10-motd.yaml": `name: motd\nversion: 1\nconfigure:\n  files:\n    - path: ${dir}/motd\n      content: welcome\n`,
      "20-broken.yaml": "name: broken\nversion: 1\nconfigure:\n  files:\n    - path: relative/path\n",
    });

    await expect(reconcileFromSettings(settingsFor(), { runner })).rejects.toBeInstanceOf(ParseError);
    expect(requests).toEqual([]);
    expect(existsSync(join(dir, "motd"))).toBe(false);
    expect(existsSync(join(dir, "state.json"))).toBe(false);
  });
});

describe("settings from the config directory", () => {
  it("reconciles with the settings file when none are passed", async () => {
    writeConfig(`state_file: ${dir}/from-config.json\ncookbook_dir: ${dir}/sync/current/cookbooks\nelevation: never\n`);
    publishCookbooks({
      "10-update.yaml": "name: update\nversion: 1\ninstall:\n  pre_install:\n    - command: apt-get update\n      elevate: true\n",
    });

    const outcome = await reconcileFromSettings(undefined, { runner, isRoot: () => false, clock: new FakeClock() });

    expect(outcome.success).toBe(true);
    expect(requests.map((r) => [r.cmd, ...r.args])).toEqual([["apt-get", "update"]]);
    expect(existsSync(join(dir, "from-config.json"))).toBe(true);
  });

  it("refuses to run on an invalid settings file", async () => {
    writeConfig("failure_policy: sometimes\n");
    await expect(reconcileFromSettings(undefined, { runner })).rejects.toBeInstanceOf(ConfigError);
    expect(requests).toEqual([]);
  });

  it("takes the sync repository from the settings file", () => {
    writeConfig(`sync:\n  repo_url: https://git.example.com/ops/cookbooks.git\n  local_path: ${dir}/sync\n`);
    const sync = createSyncService({});
    expect(sync.repoDir).toBe(join(dir, "sync", "repo"));
  });
});

describe("sync entry point", () => {
  it("lets explicit options override the settings file", () => {
    const base = settingsFor({ sync: { repo_url: "https://git.example.com/a.git", branch: "main" } }).sync;

    const merged = syncSettingsFor({ repoUrl: "https://git.example.com/b.git", intervalMinutes: 1 }, base);

    expect(merged.repo_url).toBe("https://git.example.com/b.git");
    expect(merged.branch).toBe("main");
    expect(merged.interval_minutes).toBe(1);
    expect(merged.keep_releases).toBe(3);
  });

  it("requires a repository URL from somewhere", () => {
    expect(() => createSyncService({ localPath: join(dir, "sync") }, settingsFor())).toThrow(ConfigError);
  });

  it("roots the sync layout at the local path", () => {
    const sync = createSyncService(
      { repoUrl: "https://git.example.com/ops/cookbooks.git", localPath: join(dir, "sync") },
      settingsFor()
    );
    expect(sync.repoDir).toBe(join(dir, "sync", "repo"));
    expect(sync.layout.currentLink).toBe(join(dir, "sync", "current"));
  });
});
