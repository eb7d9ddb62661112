import { describe, expect, it } from "vitest";
import { PHASE_IDS, type PhaseId } from "../../types/phase.ts";
import { PHASE_TABLE, isSkippablePhase, selectPhases } from "../phase-table.ts";

describe("PHASE_TABLE", () => {
  it("lists every phase in run order", () => {
    expect(PHASE_TABLE.map((spec) => spec.id)).toEqual([...PHASE_IDS]);
  });

  it("only depends on earlier phases", () => {
    PHASE_TABLE.forEach((spec, index) => {
      for (const dep of spec.dependsOn) {
        expect(PHASE_IDS.indexOf(dep)).toBeLessThan(index);
      }
    });
  });

  it("marks health, backup, memory and summary as quick", () => {
    expect(PHASE_TABLE.filter((spec) => spec.quick).map((spec) => spec.id)).toEqual([
      "health",
      "backup",
      "memory",
      "summary",
    ]);
  });
});

describe("selectPhases", () => {
  it("runs everything but the summary in normal mode", () => {
    const selection = selectPhases("normal", new Set());
    expect(selection.run).toHaveLength(9);
    expect(selection.skipped).toEqual([]);
  });

  it("skips non-quick phases in quick mode", () => {
    const selection = selectPhases("quick", new Set());
    expect(selection.run.map((spec) => spec.id)).toEqual(["health", "backup", "memory"]);
    expect(selection.skipped.every((s) => s.reason === "quick_mode")).toBe(true);
  });

  it("never skips the summary", () => {
    const selection = selectPhases("normal", new Set<PhaseId>(["summary", "sync"]));
    expect(selection.skipped).toEqual([{ id: "sync", reason: "skip_flag" }]);
  });
});

describe("isSkippablePhase", () => {
  it("accepts phase ids other than summary", () => {
    expect(isSkippablePhase("tasks")).toBe(true);
    expect(isSkippablePhase("summary")).toBe(false);
    expect(isSkippablePhase("nope")).toBe(false);
  });
});
