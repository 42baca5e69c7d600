import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";

export function expandPath(pathValue: string): string {
  if (pathValue === "~") return homedir();
  if (pathValue.startsWith("~/")) return join(homedir(), pathValue.slice(2));
  return pathValue;
}

export function getConfigDir(): string {
  return process.env.LARDER_CONFIG_DIR || "/etc/larder";
}

export function getStateDir(): string {
  return process.env.LARDER_STATE_DIR || "/var/lib/larder";
}

/**
 * Resolve a settings path. Supports:
 * - Absolute paths (start with /)
 * - Home-relative paths (start with ~)
 * - Relative paths (resolved against the state directory)
 */
export function resolveSettingsPath(pathValue: string): string {
  const expanded = expandPath(pathValue);
  if (isAbsolute(expanded)) return expanded;
  return resolve(getStateDir(), expanded);
}
