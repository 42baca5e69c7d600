export {
  SettingsSchema,
  SyncSettingsSchema,
  RetrySettingsSchema,
  FailurePolicySchema,
} from "./schema.js";
export type { Settings, SyncSettings, RetrySettings, FailurePolicy } from "./schema.js";
export { loadSettings, loadSettingsStrict, getConfigPath, localOverridePath } from "./loader.js";
export type { LoadSettingsResult, SettingsIssue } from "./loader.js";
export { deepMerge } from "./merge.js";
export { expandPath, getConfigDir, getStateDir, resolveSettingsPath } from "./path.js";
