import { realpathSync } from "fs";
import { loadCookbookDir, type LoadCookbookOptions } from "../cookbook/loader.js";
import { Reconciler, type ApplyOptions, type ReconcilerDeps } from "./reconciler.js";
import type { ReconcileOutcome } from "./types.js";

export interface ReconcileDirectoryOptions extends ApplyOptions, LoadCookbookOptions {
  /** Drop state records no loaded cookbook declares. */
  prune?: boolean;
}

/**
 * Reconcile every cookbook in `dir`. The directory is resolved once, so a
 * release published mid-run is picked up by the next run, not this one.
 * A ParseError in any file is thrown before anything is applied.
 */
export async function reconcileDirectory(
  dir: string,
  deps: ReconcilerDeps,
  options: ReconcileDirectoryOptions = {}
): Promise<ReconcileOutcome> {
  const resolved = realpathSync(dir);
  const cookbooks = loadCookbookDir(resolved, { vars: options.vars });
  const reconciler = new Reconciler(deps);
  const outcome = await reconciler.run(cookbooks, options);
  if (options.prune && outcome.success) {
    reconciler.prune(cookbooks);
  }
  return outcome;
}
