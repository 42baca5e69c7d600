import { hashJson, hashString } from "../hash.js";

export type Presence = "present" | "absent";
export type ServiceRunState = "started" | "stopped" | "restarted";
export type CommandPhase = "pre" | "post";

export type VersionConstraint =
  | { kind: "exact"; value: string }
  | { kind: "latest" }
  | { kind: "any" };

export interface PackageSpec {
  kind: "package";
  name: string;
  version: VersionConstraint;
  presence: Presence;
}

export interface FileSpec {
  kind: "file";
  path: string;
  /** Canonical content (see canonicalizeContent). */
  content: string;
  owner?: string;
  group?: string;
  /** Four octal digits, e.g. "0644". */
  mode?: string;
  presence: Presence;
  /** Services restarted once per cycle when this file changes. */
  notify: string[];
}

export interface ServiceSpec {
  kind: "service";
  name: string;
  state?: ServiceRunState;
  enabled?: boolean;
}

export interface CommandSpec {
  kind: "command";
  name?: string;
  /** The command line as declared. */
  line: string;
  argv: string[];
  elevate: boolean;
  phase: CommandPhase;
  timeoutMs?: number;
  creates?: string;
}

export type Resource = PackageSpec | FileSpec | ServiceSpec | CommandSpec;
export type ResourceCategory = Resource["kind"];

export interface CookbookSections {
  pre_install: CommandSpec[];
  remove: PackageSpec[];
  install: PackageSpec[];
  "configure.files": FileSpec[];
  "configure.services": ServiceSpec[];
  post_install: CommandSpec[];
}

export type Section = keyof CookbookSections;

export const SECTION_ORDER: readonly Section[] = [
  "pre_install",
  "remove",
  "install",
  "configure.files",
  "configure.services",
  "post_install",
];

export interface Cookbook {
  name: string;
  version: string;
  description?: string;
  /** File the cookbook was loaded from. */
  source: string;
  sections: CookbookSections;
}

export interface PlacedResource {
  section: Section;
  resource: Resource;
}

/**
 * Resources in application order. Document order is irrelevant.
 */
export function orderedResources(cookbook: Cookbook): PlacedResource[] {
  const placed: PlacedResource[] = [];
  for (const section of SECTION_ORDER) {
    for (const resource of cookbook.sections[section]) {
      placed.push({ section, resource });
    }
  }
  return placed;
}

export function resourceKey(resource: Resource): string {
  switch (resource.kind) {
    case "package":
      return resource.name;
    case "file":
      return resource.path;
    case "service":
      return resource.name;
    case "command":
      return resource.name ?? resource.line;
  }
}

/** `{category}.{id}` */
export function resourceId(resource: Resource): string {
  return `${resource.kind}.${resourceKey(resource)}`;
}

/**
 * Normalise line endings and trailing whitespace so that semantically equal
 * text hashes the same. Non-empty content ends with exactly one newline.
 */
export function canonicalizeContent(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
}

export function contentHash(content: string): string {
  return hashString(canonicalizeContent(content));
}

export function formatVersion(version: VersionConstraint): string {
  return version.kind === "exact" ? version.value : version.kind;
}

export function fingerprint(resource: Resource): string {
  switch (resource.kind) {
    case "package":
      return hashJson({
        kind: resource.kind,
        name: resource.name,
        presence: resource.presence,
        version: resource.presence === "present" ? formatVersion(resource.version) : undefined,
      });
    case "file":
      return hashJson({
        kind: resource.kind,
        path: resource.path,
        presence: resource.presence,
        content: resource.presence === "present" ? contentHash(resource.content) : undefined,
        owner: resource.owner,
        group: resource.group,
        mode: resource.mode,
      });
    case "service":
      return hashJson({
        kind: resource.kind,
        name: resource.name,
        state: resource.state,
        enabled: resource.enabled,
      });
    case "command":
      return hashJson({
        kind: resource.kind,
        argv: resource.argv,
        elevate: resource.elevate,
        creates: resource.creates,
      });
  }
}
