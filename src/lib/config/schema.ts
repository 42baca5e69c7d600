import { z } from "zod";

// ─────────────────────────────────────────────────────────────────────────────
// Retry policy: bounded exponential backoff with jitter
// ─────────────────────────────────────────────────────────────────────────────

export const RetrySettingsSchema = z.object({
  max_attempts: z.number().int().min(1).max(20).default(4),
  base_delay_ms: z.number().int().min(0).default(500),
  max_delay_ms: z.number().int().min(0).default(10_000),
  jitter: z.number().min(0).max(1).default(0.2),
});

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

// Outer defaults are given fully parsed; the nested field defaults would not apply to them
const RETRY_DEFAULT = RetrySettingsSchema.parse({});
const SYNC_RETRY_DEFAULT = RetrySettingsSchema.parse({
  max_attempts: 5,
  base_delay_ms: 2_000,
  max_delay_ms: 60_000,
});

// ─────────────────────────────────────────────────────────────────────────────
// Sync service
// ─────────────────────────────────────────────────────────────────────────────

export const SyncSettingsSchema = z.object({
  repo_url: z.string().min(1).optional(),
  local_path: z.string().min(1).default("sync"),
  branch: z.string().min(1).default("main"),
  interval_minutes: z.number().positive().default(5),
  max_jitter_seconds: z.number().min(0).default(30),
  cookbook_subdir: z.string().default("cookbooks"),
  keep_releases: z.number().int().min(2).max(50).default(3),
  git_timeout_seconds: z.number().positive().default(120),
  retry: RetrySettingsSchema.default(SYNC_RETRY_DEFAULT),
});

export type SyncSettings = z.infer<typeof SyncSettingsSchema>;

const SYNC_DEFAULT = SyncSettingsSchema.parse({});

// ─────────────────────────────────────────────────────────────────────────────
// Top-level settings
// ─────────────────────────────────────────────────────────────────────────────

export const FailurePolicySchema = z.enum(["fail-fast", "continue"]);
export type FailurePolicy = z.infer<typeof FailurePolicySchema>;

export const SettingsSchema = z.object({
  state_file: z.string().min(1).default("state.json"),
  cookbook_dir: z.string().min(1).default("sync/current/cookbooks"),
  failure_policy: FailurePolicySchema.default("fail-fast"),
  package_manager: z.enum(["apt", "dnf"]).default("apt"),
  elevation: z.enum(["auto", "never"]).default("auto"),
  command_timeout_seconds: z.number().positive().default(300),
  retry: RetrySettingsSchema.default(RETRY_DEFAULT),
  sync: SyncSettingsSchema.default(SYNC_DEFAULT),
});

export type Settings = z.infer<typeof SettingsSchema>;
