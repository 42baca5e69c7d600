import type { FailurePolicy } from "../config/schema.js";
import type { ResourceCategory, Section } from "../cookbook/model.js";

export type ResourceStatus = "skipped" | "applied" | "failed";

export type FailureCode = "failed" | "timed-out" | "verify-failed" | "aborted";

export interface ResourceResult {
  id: string;
  category: ResourceCategory;
  section: Section;
  status: ResourceStatus;
  code?: FailureCode;
  reason?: string;
  /** External command invocations made for this resource. */
  actions: number;
}

export interface CookbookOutcome {
  cookbook: string;
  source: string;
  policy: FailurePolicy;
  success: boolean;
  results: ResourceResult[];
  summary: { skipped: number; applied: number; failed: number };
}

export interface ReconcileOutcome {
  success: boolean;
  policy: FailurePolicy;
  cookbooks: CookbookOutcome[];
}

export interface PlanEntry {
  id: string;
  category: ResourceCategory;
  section: Section;
  status: "up-to-date" | "drift";
  reason?: string;
  /** Unified diff of on-disk vs desired content, for files. */
  diff?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-resource state machine
// ─────────────────────────────────────────────────────────────────────────────

export type ResourcePhase =
  | "unchecked"
  | "compared"
  | "up-to-date"
  | "drift-detected"
  | "applying"
  | "applied"
  | "failed";

const TRANSITIONS: Record<ResourcePhase, readonly ResourcePhase[]> = {
  unchecked: ["compared"],
  compared: ["up-to-date", "drift-detected"],
  "drift-detected": ["applying"],
  applying: ["applied", "failed"],
  "up-to-date": [],
  applied: [],
  failed: [],
};

export function isTerminalPhase(phase: ResourcePhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

export interface TransitionEvent {
  id: string;
  from: ResourcePhase;
  to: ResourcePhase;
}

export class ResourceTracker {
  private current: ResourcePhase = "unchecked";

  constructor(
    public readonly id: string,
    private readonly onTransition?: (event: TransitionEvent) => void
  ) {}

  get phase(): ResourcePhase {
    return this.current;
  }

  to(next: ResourcePhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal transition for ${this.id}: ${this.current} -> ${next}`);
    }
    const from = this.current;
    this.current = next;
    this.onTransition?.({ id: this.id, from, to: next });
  }
}
