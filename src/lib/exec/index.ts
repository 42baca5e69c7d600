export { CommandExecutor, isTransientFailure } from "./executor.js";
export type { ExecSpec, ExecResult, CommandRunner, CommandExecutorOptions, ElevationMode } from "./executor.js";
export { spawnProcess } from "./process.js";
export type { ProcessRunner, ProcessRequest, ProcessOutcome } from "./process.js";
export { aptPackageManager, dnfPackageManager, getPackageManager, satisfiesVersion } from "./packages.js";
export type { PackageManager, PackageManagerKind, PackageStatus } from "./packages.js";
export { systemctl } from "./services.js";
export type { ServiceVerb } from "./services.js";
