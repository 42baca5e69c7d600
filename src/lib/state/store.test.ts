import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, writeFileSync, readFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { FileStateStore, MemoryStateStore } from "./store.js";
import { emptyState, type StateDocument } from "./schema.js";
import { StateLockedError } from "../errors.js";

const TMP = join(tmpdir(), `larder-state-test-${Date.now()}`);
const STATE_PATH = join(TMP, "state.json");

const SAMPLE: StateDocument = {
  files: { "/etc/motd": "abc123" },
  packages: { nginx: "1.24.0-2ubuntu7" },
  services: { nginx: "started" },
  last_config_applied: "2026-03-01T00:00:00.000Z",
  config_hash: "def456",
  resources: {
    "package.nginx": { fingerprint: "fp1", applied_at: "2026-03-01T00:00:00.000Z" },
  },
};

beforeEach(() => {
  mkdirSync(TMP, { recursive: true });
});

afterEach(() => {
  rmSync(TMP, { recursive: true, force: true });
});

describe("FileStateStore", () => {
  it("returns empty state when no file exists", () => {
    const store = new FileStateStore(STATE_PATH);
    expect(store.load()).toEqual(emptyState());
    expect(store.lastLoadWarning).toBeNull();
  });

  it("round-trips state through save and load", () => {
    const store = new FileStateStore(STATE_PATH);
    store.save(SAMPLE);
    expect(store.load()).toEqual(SAMPLE);
  });

  it("writes the documented JSON shape", () => {
    new FileStateStore(STATE_PATH).save(SAMPLE);
    const onDisk = JSON.parse(readFileSync(STATE_PATH, "utf-8"));
    expect(Object.keys(onDisk)).toEqual([
      "files",
      "packages",
      "services",
      "last_config_applied",
      "config_hash",
      "resources",
    ]);
  });

  it("returns empty state with a warning for corrupt JSON", () => {
    writeFileSync(STATE_PATH, '{"files": {"/etc/motd": ');
    const store = new FileStateStore(STATE_PATH);
    expect(store.load()).toEqual(emptyState());
    expect(store.lastLoadWarning).toMatch(/^State file unreadable, starting empty: /);
  });

  it("returns empty state with a warning for a structurally invalid file", () => {
    writeFileSync(STATE_PATH, JSON.stringify({ files: ["not", "a", "map"] }));
    const store = new FileStateStore(STATE_PATH);
    expect(store.load()).toEqual(emptyState());
    expect(store.lastLoadWarning).toMatch(/^State file invalid, starting empty: files: /);
  });

  it("fills in keys missing from an older file", () => {
    writeFileSync(STATE_PATH, JSON.stringify({ files: { "/etc/motd": "abc" } }));
    const state = new FileStateStore(STATE_PATH).load();
    expect(state.files).toEqual({ "/etc/motd": "abc" });
    expect(state.resources).toEqual({});
    expect(state.last_config_applied).toBeNull();
  });

  it("locks exclusively and releases the lock file", () => {
    const store = new FileStateStore(STATE_PATH);
    const other = new FileStateStore(STATE_PATH);
    const release = store.lock();
    expect(() => other.lock()).toThrow(StateLockedError);
    release();
    expect(existsSync(`${STATE_PATH}.lock`)).toBe(false);
    other.lock()();
  });
});

describe("MemoryStateStore", () => {
  it("isolates saved documents from later mutation", () => {
    const store = new MemoryStateStore();
    const doc = emptyState();
    doc.packages.curl = "8.5.0";
    store.save(doc);
    doc.packages.curl = "changed";
    expect(store.load().packages.curl).toBe("8.5.0");
    expect(store.saves).toBe(1);
  });

  it("refuses a second lock", () => {
    const store = new MemoryStateStore();
    const release = store.lock();
    expect(() => store.lock()).toThrow(StateLockedError);
    release();
    expect(() => store.lock()).not.toThrow();
  });
});
