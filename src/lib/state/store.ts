import { existsSync, readFileSync } from "fs";
import { acquireFileLock, atomicWriteFileSync, type ReleaseLock } from "../fs-utils.js";
import { StateLockedError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { StateDocumentSchema, cloneState, emptyState, type StateDocument } from "./schema.js";

/**
 * Persisted resource fingerprints. Passed explicitly to whatever reconciles, so
 * tests can hand in a MemoryStateStore.
 */
export interface StateStore {
  /** Never throws: a missing or unreadable store loads as empty state. */
  load(): StateDocument;
  save(doc: StateDocument): void;
  /** Exclusive for one load-modify-save sequence. Throws StateLockedError when taken. */
  lock(): ReleaseLock;
}

export class FileStateStore implements StateStore {
  /** Why the last load fell back to empty state, if it did. */
  public lastLoadWarning: string | null = null;
  private readonly logger: Logger;

  constructor(public readonly path: string, logger?: Logger) {
    this.logger = logger ?? createLogger("state");
  }

  load(): StateDocument {
    this.lastLoadWarning = null;
    if (!existsSync(this.path)) {
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (error) {
      return this.fallback(`State file unreadable, starting empty: ${errorMessage(error)}`);
    }

    const result = StateDocumentSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      return this.fallback(`State file invalid, starting empty: ${detail}`);
    }
    return result.data;
  }

  save(doc: StateDocument): void {
    atomicWriteFileSync(this.path, JSON.stringify(doc, null, 2) + "\n");
  }

  lock(): ReleaseLock {
    return acquireFileLock(this.path);
  }

  private fallback(message: string): StateDocument {
    this.lastLoadWarning = message;
    this.logger.warn({ path: this.path }, message);
    return emptyState();
  }
}

export class MemoryStateStore implements StateStore {
  public saves = 0;
  private doc: StateDocument;
  private locked = false;

  constructor(initial: StateDocument = emptyState()) {
    this.doc = cloneState(initial);
  }

  load(): StateDocument {
    return cloneState(this.doc);
  }

  save(doc: StateDocument): void {
    this.doc = cloneState(doc);
    this.saves++;
  }

  lock(): ReleaseLock {
    if (this.locked) {
      throw new StateLockedError("memory", process.pid);
    }
    this.locked = true;
    return () => {
      this.locked = false;
    };
  }
}
