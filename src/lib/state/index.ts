export { FileStateStore, MemoryStateStore } from "./store.js";
export type { StateStore } from "./store.js";
export { StateDocumentSchema, StateRecordSchema, emptyState, cloneState } from "./schema.js";
export type { StateDocument, StateRecord } from "./schema.js";
