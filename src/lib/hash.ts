import { readFileSync, lstatSync, readlinkSync, readdirSync } from "fs";
import { createHash } from "crypto";
import { join } from "path";

export function hashBuffer(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

export function hashString(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

export function hashFile(path: string): string {
  return hashBuffer(readFileSync(path));
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue | undefined };

/**
 * JSON with object keys sorted at every level; undefined members are omitted.
 */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);

  if (Array.isArray(value)) {
    return "[" + value.map(stableStringify).join(",") + "]";
  }

  const keys = Object.keys(value).sort();
  const parts: string[] = [];
  for (const key of keys) {
    const member = value[key];
    if (member === undefined) continue;
    parts.push(JSON.stringify(key) + ":" + stableStringify(member));
  }
  return "{" + parts.join(",") + "}";
}

export function hashJson(value: JsonValue): string {
  return hashString(stableStringify(value));
}

/**
 * Hash a directory tree by relative path and file content. Entries whose
 * top-level name is in `exclude` are skipped.
 */
export function hashDirectory(dir: string, exclude: ReadonlySet<string> = new Set()): string {
  const entries: string[] = [];

  const walk = (current: string, prefix: string) => {
    const children = readdirSync(current);
    children.sort();
    for (const child of children) {
      if (!prefix && exclude.has(child)) continue;
      const fullPath = join(current, child);
      const relPath = prefix ? `${prefix}/${child}` : child;
      const stat = lstatSync(fullPath);
      if (stat.isSymbolicLink()) {
        entries.push(`${relPath}\0->${readlinkSync(fullPath)}`);
      } else if (stat.isDirectory()) {
        walk(fullPath, relPath);
      } else if (stat.isFile()) {
        entries.push(relPath);
      }
    }
  };

  walk(dir, "");
  entries.sort();

  const hasher = createHash("sha256");
  for (const entry of entries) {
    hasher.update(entry);
    hasher.update("\0");
    if (!entry.includes("\0->")) {
      hasher.update(hashFile(join(dir, entry)));
    }
    hasher.update("\0");
  }
  return hasher.digest("hex");
}
