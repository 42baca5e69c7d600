import { z } from "zod";

// Empty YAML keys (`install:` with nothing under it) parse as null
function list<T extends z.ZodType>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

// ─────────────────────────────────────────────────────────────────────────────
// Commands (install.pre_install / install.post_install)
// ─────────────────────────────────────────────────────────────────────────────

export const CommandEntrySchema = z.strictObject({
  command: z.string().min(1),
  name: z.string().min(1).optional(),
  elevate: z.boolean().default(false),
  /** Seconds */
  timeout: z.number().positive().optional(),
  /** The command is not applicable while this path exists. */
  creates: z.string().startsWith("/").optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Packages (install.install / remove.packages)
// ─────────────────────────────────────────────────────────────────────────────

export const InstallEntrySchema = z.strictObject({
  package: z.string().min(1),
  version: z.union([z.string().min(1), z.number()]).optional(),
  state: z.enum(["present", "absent"]).default("present"),
});

export const RemoveEntrySchema = z.strictObject({
  name: z.string().min(1),
});

// ─────────────────────────────────────────────────────────────────────────────
// Files and services (configure.*)
// ─────────────────────────────────────────────────────────────────────────────

export const FileEntrySchema = z.strictObject({
  path: z.string().startsWith("/", { message: "File path must be absolute" }),
  content: z.string().default(""),
  template: z.boolean().default(false),
  owner: ScalarSchema.optional(),
  group: ScalarSchema.optional(),
  mode: z.union([z.string(), z.number().int()]).optional(),
  state: z.enum(["present", "absent"]).default("present"),
  notify: z.array(z.string().min(1)).default([]),
});

export const ServiceEntrySchema = z.strictObject({
  name: z.string().min(1),
  state: z.enum(["started", "stopped", "restarted"]).optional(),
  enabled: z.boolean().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Top-level document
// ─────────────────────────────────────────────────────────────────────────────

export const CookbookDocumentSchema = z.strictObject({
  name: z.string().min(1),
  version: z.union([z.string(), z.number()]).transform(String),
  description: z.string().optional(),
  vars: z.record(z.string(), ScalarSchema).nullish().transform((value) => value ?? {}),
  install: z
    .strictObject({
      pre_install: list(CommandEntrySchema),
      install: list(InstallEntrySchema),
      post_install: list(CommandEntrySchema),
    })
    .nullish(),
  remove: z
    .strictObject({
      packages: list(RemoveEntrySchema),
    })
    .nullish(),
  configure: z
    .strictObject({
      files: list(FileEntrySchema),
      services: list(ServiceEntrySchema),
    })
    .nullish(),
});

export type CookbookDocument = z.infer<typeof CookbookDocumentSchema>;
export type CommandEntry = z.infer<typeof CommandEntrySchema>;
export type InstallEntry = z.infer<typeof InstallEntrySchema>;
export type FileEntry = z.infer<typeof FileEntrySchema>;
export type ServiceEntry = z.infer<typeof ServiceEntrySchema>;
