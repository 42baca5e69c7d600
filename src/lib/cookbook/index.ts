export {
  SECTION_ORDER,
  orderedResources,
  resourceId,
  resourceKey,
  fingerprint,
  canonicalizeContent,
  contentHash,
  formatVersion,
} from "./model.js";
export type {
  Cookbook,
  CookbookSections,
  Section,
  Resource,
  ResourceCategory,
  PackageSpec,
  FileSpec,
  ServiceSpec,
  CommandSpec,
  VersionConstraint,
  Presence,
  ServiceRunState,
  CommandPhase,
  PlacedResource,
} from "./model.js";
export { parseCookbook, loadCookbook, loadCookbookDir, listCookbookFiles } from "./loader.js";
export type { LoadCookbookOptions } from "./loader.js";
export { renderTemplate, splitCommandLine, TemplateError } from "./template.js";
export type { TemplateVars } from "./template.js";
