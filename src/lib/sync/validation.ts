import { ConfigError } from "../errors.js";

const SAFE_GIT_REF_PATTERN = /^[a-zA-Z0-9._/-]+$/;
const SCP_LIKE_URL = /^[\w.-]+@[\w.-]+:[\w./~-]+$/;
const SUPPORTED_PROTOCOLS = new Set(["https:", "ssh:", "git:", "file:"]);

export function validateGitRef(ref: string): void {
  if (!SAFE_GIT_REF_PATTERN.test(ref) || ref.includes("..") || ref.startsWith("-") || ref.endsWith("/")) {
    throw new ConfigError(`Invalid git ref: ${ref}`, { ref });
  }
}

export function validateRepoUrl(url: string): void {
  if (SCP_LIKE_URL.test(url)) return;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid repository URL: ${url}`, { url });
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new ConfigError(`Unsupported repository URL protocol: ${parsed.protocol}`, { url });
  }
}

/** A path that stays inside the tree it is joined to. Empty means the root. */
export function validateRelativeSubPath(path: string): void {
  if (!path) return;
  const normalized = path.replace(/^\.\//, "");
  if (normalized.startsWith("/") || normalized.startsWith("~")) {
    throw new ConfigError(`Invalid subpath: ${path}`, { path });
  }
  const parts = normalized.split("/");
  if (parts.some((part) => part === ".." || part.includes("\0"))) {
    throw new ConfigError(`Invalid subpath: ${path}`, { path });
  }
}
