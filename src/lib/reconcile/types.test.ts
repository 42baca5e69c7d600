import { describe, it, expect } from "vitest";
import { ResourceTracker, isTerminalPhase, type TransitionEvent } from "./types.js";

describe("ResourceTracker", () => {
  it("walks the apply path and reports each transition", () => {
    const events: TransitionEvent[] = [];
    const tracker = new ResourceTracker("package.nginx", (e) => events.push(e));
    tracker.to("compared");
    tracker.to("drift-detected");
    tracker.to("applying");
    tracker.to("applied");
    expect(events.map((e) => `${e.from}->${e.to}`)).toEqual([
      "unchecked->compared",
      "compared->drift-detected",
      "drift-detected->applying",
      "applying->applied",
    ]);
    expect(isTerminalPhase(tracker.phase)).toBe(true);
  });

  it("rejects skipping the comparison", () => {
    const tracker = new ResourceTracker("file./etc/motd");
    expect(() => tracker.to("applying")).toThrow("Illegal transition for file./etc/motd: unchecked -> applying");
  });

  it("allows no transition out of a terminal phase", () => {
    const tracker = new ResourceTracker("service.nginx");
    tracker.to("compared");
    tracker.to("up-to-date");
    expect(() => tracker.to("applying")).toThrow();
  });
});
