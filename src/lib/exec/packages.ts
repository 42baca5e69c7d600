import type { PackageSpec } from "../cookbook/model.js";

export type PackageManagerKind = "apt" | "dnf";

export interface PackageStatus {
  installed: boolean;
  version: string | null;
}

/**
 * Builds package-manager command lines and reads back presence queries.
 */
export interface PackageManager {
  readonly kind: PackageManagerKind;
  installCommand(spec: PackageSpec): string[];
  removeCommand(name: string): string[];
  queryCommand(name: string): string[];
  /** Interprets a finished query; a non-zero exit means "not installed". */
  parseQuery(exitCode: number, stdout: string): PackageStatus;
}

const NOT_INSTALLED: PackageStatus = { installed: false, version: null };

export const aptPackageManager: PackageManager = {
  kind: "apt",

  installCommand(spec) {
    const target = spec.version.kind === "exact" ? `${spec.name}=${spec.version.value}` : spec.name;
    return ["env", "DEBIAN_FRONTEND=noninteractive", "apt-get", "install", "-y", "-q", target];
  },

  removeCommand(name) {
    return ["env", "DEBIAN_FRONTEND=noninteractive", "apt-get", "remove", "-y", "-q", name];
  },

  queryCommand(name) {
    return ["dpkg-query", "-W", "-f=${Status}\t${Version}", name];
  },

  parseQuery(exitCode, stdout) {
    if (exitCode !== 0) return NOT_INSTALLED;
    const [status = "", version = ""] = stdout.trim().split("\t");
    if (status !== "install ok installed") return NOT_INSTALLED;
    return { installed: true, version: version || null };
  },
};

export const dnfPackageManager: PackageManager = {
  kind: "dnf",

  installCommand(spec) {
    const target = spec.version.kind === "exact" ? `${spec.name}-${spec.version.value}` : spec.name;
    return ["dnf", "install", "-y", "-q", target];
  },

  removeCommand(name) {
    return ["dnf", "remove", "-y", "-q", name];
  },

  queryCommand(name) {
    return ["rpm", "-q", "--qf", "%{VERSION}-%{RELEASE}", name];
  },

  parseQuery(exitCode, stdout) {
    if (exitCode !== 0) return NOT_INSTALLED;
    const version = stdout.trim();
    return { installed: true, version: version || null };
  },
};

export function getPackageManager(kind: PackageManagerKind): PackageManager {
  return kind === "apt" ? aptPackageManager : dnfPackageManager;
}

/**
 * Whether an installed version satisfies the declared constraint.
 * Exact pins compare on the version prefix so "1.24.0" matches "1.24.0-2ubuntu7".
 */
export function satisfiesVersion(spec: PackageSpec, status: PackageStatus): boolean {
  if (!status.installed) return false;
  if (spec.version.kind !== "exact") return true;
  const installed = status.version ?? "";
  const wanted = spec.version.value;
  return installed === wanted || installed.startsWith(`${wanted}-`) || installed.startsWith(`${wanted}+`);
}
