import { readFileSync, existsSync } from "fs";
import { basename, dirname, extname, join } from "path";
import { parse as parseYaml } from "yaml";
import { SettingsSchema, type Settings } from "./schema.js";
import { deepMerge } from "./merge.js";
import { getConfigDir } from "./path.js";
import { ConfigError } from "../errors.js";

export interface SettingsIssue {
  /** File the issue came from. */
  file: string;
  message: string;
  /** Dotted settings key, when the issue is about one value. */
  key?: string;
}

export interface LoadSettingsResult {
  settings: Settings;
  /** Files that were read, in merge order. */
  files: string[];
  issues: SettingsIssue[];
}

type SettingsLayer =
  | { kind: "missing"; file: string }
  | { kind: "read"; file: string; data: Record<string, unknown> }
  | { kind: "broken"; file: string; message: string };

export function getConfigPath(): string {
  return join(getConfigDir(), "config.yaml");
}

/** `config.yaml` → `config.local.yaml`, beside the base file. */
export function localOverridePath(configPath: string): string {
  const ext = extname(configPath);
  return join(dirname(configPath), `${basename(configPath, ext)}.local${ext}`);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readLayer(file: string): SettingsLayer {
  if (!existsSync(file)) return { kind: "missing", file };
  let data: unknown;
  try {
    data = parseYaml(readFileSync(file, "utf-8"));
  } catch (error) {
    return { kind: "broken", file, message: error instanceof Error ? error.message : String(error) };
  }
  if (data === null || data === undefined) return { kind: "read", file, data: {} };
  if (!isMapping(data)) {
    return { kind: "broken", file, message: "Settings must be a YAML mapping" };
  }
  return { kind: "read", file, data };
}

/**
 * Settings from `config.yaml` with `config.local.yaml` deep-merged over it.
 * Any issue (unreadable YAML, a schema violation) falls back to the built-in
 * defaults and is reported in `issues`; a missing file is not an issue.
 */
export function loadSettings(configPath: string = getConfigPath()): LoadSettingsResult {
  const layers = [readLayer(configPath), readLayer(localOverridePath(configPath))];
  const files: string[] = [];
  const issues: SettingsIssue[] = [];
  let merged: Record<string, unknown> = {};

  for (const layer of layers) {
    switch (layer.kind) {
      case "missing":
        break;
      case "broken":
        files.push(layer.file);
        issues.push({ file: layer.file, message: layer.message });
        break;
      case "read":
        files.push(layer.file);
        merged = deepMerge(merged, layer.data);
        break;
    }
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const file = files[files.length - 1] ?? configPath;
    for (const issue of parsed.error.issues) {
      issues.push({ file, message: issue.message, key: issue.path.map(String).join(".") || undefined });
    }
  }

  const settings = parsed.success && issues.length === 0 ? parsed.data : SettingsSchema.parse({});
  return { settings, files, issues };
}

/**
 * Like {@link loadSettings}, but any issue is a ConfigError. Entry points use
 * this so a typo never silently runs with defaults.
 */
export function loadSettingsStrict(configPath?: string): Settings {
  const { settings, files, issues } = loadSettings(configPath);
  if (issues.length > 0) {
    const lines = issues.map((i) => (i.key ? `${i.file}: ${i.key}: ${i.message}` : `${i.file}: ${i.message}`));
    throw new ConfigError(`Invalid settings:\n${lines.join("\n")}`, { files, issues: issues.length });
  }
  return settings;
}
