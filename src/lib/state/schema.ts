import { z } from "zod";

export const StateRecordSchema = z.object({
  fingerprint: z.string().min(1),
  applied_at: z.string(),
});

export const StateDocumentSchema = z.object({
  files: z.record(z.string(), z.string()).default({}),
  packages: z.record(z.string(), z.string()).default({}),
  services: z.record(z.string(), z.string()).default({}),
  last_config_applied: z.string().nullable().default(null),
  config_hash: z.string().nullable().default(null),
  resources: z.record(z.string(), StateRecordSchema).default({}),
  /** Cookbook name → services owed a restart by a file change already on disk. */
  pending_restarts: z.record(z.string(), z.array(z.string())).default({}),
});

export type StateRecord = z.infer<typeof StateRecordSchema>;
export type StateDocument = z.infer<typeof StateDocumentSchema>;

export function emptyState(): StateDocument {
  return StateDocumentSchema.parse({});
}

export function cloneState(doc: StateDocument): StateDocument {
  return structuredClone(doc);
}
