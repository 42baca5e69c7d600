import { readFileSync } from "fs";
import fg from "fast-glob";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { CookbookDocumentSchema, type CookbookDocument, type CommandEntry, type FileEntry } from "./schema.js";
import {
  canonicalizeContent,
  orderedResources,
  resourceId,
  type CommandPhase,
  type CommandSpec,
  type Cookbook,
  type FileSpec,
  type PackageSpec,
  type ServiceSpec,
  type VersionConstraint,
} from "./model.js";
import { renderTemplate, splitCommandLine, TemplateError, type TemplateVars } from "./template.js";
import { ErrorCode, ParseError, errorMessage, type ParseIssue } from "../errors.js";

export interface LoadCookbookOptions {
  /** Variables available to templated files; the cookbook's own `vars` win. */
  vars?: TemplateVars;
}

function issuesFromZod(error: z.ZodError): ParseIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

function toVersion(raw: string | number | undefined): VersionConstraint {
  if (raw === undefined) return { kind: "any" };
  const value = String(raw);
  if (value === "latest") return { kind: "latest" };
  if (value === "any" || value === "*") return { kind: "any" };
  return { kind: "exact", value };
}

function toMode(raw: string | number | undefined, at: string, issues: ParseIssue[]): string | undefined {
  if (raw === undefined) return undefined;
  // YAML reads an unquoted 0644 as the decimal number 644; its digits are what was meant
  const digits = String(raw).replace(/^0o/, "");
  if (!/^[0-7]{3,4}$/.test(digits)) {
    issues.push({ path: `${at}.mode`, message: `Invalid file mode: ${String(raw)}` });
    return undefined;
  }
  return digits.padStart(4, "0");
}

function toCommand(entry: CommandEntry, phase: CommandPhase, at: string, issues: ParseIssue[]): CommandSpec | null {
  let argv: string[];
  try {
    argv = splitCommandLine(entry.command);
  } catch (error) {
    issues.push({ path: `${at}.command`, message: errorMessage(error) });
    return null;
  }
  if (argv.length === 0) {
    issues.push({ path: `${at}.command`, message: "Command is empty" });
    return null;
  }
  return {
    kind: "command",
    name: entry.name,
    line: entry.command.trim(),
    argv,
    elevate: entry.elevate,
    phase,
    timeoutMs: entry.timeout === undefined ? undefined : Math.round(entry.timeout * 1000),
    creates: entry.creates,
  };
}

function toFile(entry: FileEntry, vars: TemplateVars, at: string, issues: ParseIssue[]): FileSpec {
  let content = entry.content;
  if (entry.template) {
    try {
      content = renderTemplate(content, vars);
    } catch (error) {
      if (!(error instanceof TemplateError)) throw error;
      issues.push({ path: `${at}.content`, message: error.message });
    }
  }
  return {
    kind: "file",
    path: entry.path,
    content: canonicalizeContent(content),
    owner: entry.owner === undefined ? undefined : String(entry.owner),
    group: entry.group === undefined ? undefined : String(entry.group),
    mode: toMode(entry.mode, at, issues),
    presence: entry.state,
    notify: entry.notify,
  };
}

function buildCookbook(doc: CookbookDocument, source: string, options: LoadCookbookOptions): Cookbook {
  const issues: ParseIssue[] = [];
  const vars: TemplateVars = { ...options.vars, ...doc.vars };

  const commands = (entries: CommandEntry[], phase: CommandPhase, at: string): CommandSpec[] =>
    entries
      .map((entry, i) => toCommand(entry, phase, `${at}.${i}`, issues))
      .filter((spec): spec is CommandSpec => spec !== null);

  const remove = (doc.remove?.packages ?? []).map((entry): PackageSpec => ({
    kind: "package",
    name: entry.name,
    version: { kind: "any" },
    presence: "absent",
  }));

  const install = (doc.install?.install ?? []).map((entry): PackageSpec => ({
    kind: "package",
    name: entry.package,
    version: toVersion(entry.version),
    presence: entry.state,
  }));

  const cookbook: Cookbook = {
    name: doc.name,
    version: doc.version,
    description: doc.description,
    source,
    sections: {
      pre_install: commands(doc.install?.pre_install ?? [], "pre", "install.pre_install"),
      remove,
      install,
      "configure.files": (doc.configure?.files ?? []).map((entry, i) =>
        toFile(entry, vars, `configure.files.${i}`, issues)
      ),
      "configure.services": (doc.configure?.services ?? []).map((entry): ServiceSpec => ({
        kind: "service",
        name: entry.name,
        state: entry.state,
        enabled: entry.enabled,
      })),
      post_install: commands(doc.install?.post_install ?? [], "post", "install.post_install"),
    },
  };

  if (issues.length > 0) {
    throw new ParseError(source, issues);
  }

  const seen = new Set<string>();
  const duplicates: ParseIssue[] = [];
  for (const { section, resource } of orderedResources(cookbook)) {
    const id = resourceId(resource);
    if (seen.has(id)) {
      duplicates.push({ path: section, message: `Duplicate resource ${id}` });
    }
    seen.add(id);
  }
  if (duplicates.length > 0) {
    throw new ParseError(source, duplicates, ErrorCode.PARSE_DUPLICATE_RESOURCE);
  }

  return cookbook;
}

/**
 * Parse YAML text into a typed cookbook. Throws ParseError on malformed YAML,
 * unknown keys, invalid values, undefined template variables or duplicate
 * resource identities.
 */
export function parseCookbook(text: string, source: string, options: LoadCookbookOptions = {}): Cookbook {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ParseError(source, [{ path: "", message: errorMessage(error) }]);
  }

  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ParseError(source, [{ path: "", message: "Cookbook must be a YAML mapping" }]);
  }

  const result = CookbookDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(source, issuesFromZod(result.error));
  }

  return buildCookbook(result.data, source, options);
}

export function loadCookbook(path: string, options: LoadCookbookOptions = {}): Cookbook {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ParseError(path, [{ path: "", message: errorMessage(error) }]);
  }
  return parseCookbook(text, path, options);
}

export function listCookbookFiles(dir: string): string[] {
  return fg
    .sync(["*.yaml", "*.yml"], { cwd: dir, absolute: true, onlyFiles: true })
    .sort();
}

/**
 * Load every cookbook in `dir`, in file name order. All of them are parsed
 * before any is returned, so one bad file rejects the whole set.
 */
export function loadCookbookDir(dir: string, options: LoadCookbookOptions = {}): Cookbook[] {
  return listCookbookFiles(dir).map((path) => loadCookbook(path, options));
}
