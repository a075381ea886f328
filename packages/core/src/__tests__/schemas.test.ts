import { describe, it, expect } from "vitest";
import {
  PipelineStateSchema,
  RunStatusSchema,
  StageNameSchema,
  summarizeRun,
  type PipelineState,
} from "../schemas/pipeline.js";
import { SpanSchema } from "../schemas/corpus.js";

function baseState(): PipelineState {
  return PipelineStateSchema.parse({
    runId: "run-1",
    topic: { title: "Retrieval grounding" },
    status: "running",
    currentStage: "research",
    researchAttempts: 0,
    loopCount: 0,
    startedAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  });
}

describe("StageNameSchema", () => {
  it("accepts the six stages", () => {
    for (const stage of ["research", "outline", "write", "critique", "optimize", "publish"]) {
      expect(StageNameSchema.parse(stage)).toBe(stage);
    }
  });

  it("rejects unknown stages", () => {
    expect(() => StageNameSchema.parse("draft")).toThrow();
  });
});

describe("RunStatusSchema", () => {
  it("accepts terminal statuses", () => {
    for (const status of ["running", "done", "failed", "escalated", "cancelled"]) {
      expect(RunStatusSchema.parse(status)).toBe(status);
    }
  });
});

describe("SpanSchema", () => {
  it("rejects spans ending before they start", () => {
    expect(() => SpanSchema.parse({ start: 10, end: 5 })).toThrow();
    expect(SpanSchema.parse({ start: 5, end: 5 })).toEqual({ start: 5, end: 5 });
  });
});

describe("PipelineStateSchema", () => {
  it("fills collection defaults", () => {
    const state = baseState();
    expect(state.critiques).toEqual([]);
    expect(state.warnings).toEqual([]);
    expect(state.transitions).toEqual([]);
    expect(state.topic.keywords).toEqual([]);
  });
});

describe("summarizeRun", () => {
  it("captures last stage, last critique and error class", () => {
    const state = baseState();
    state.status = "escalated";
    state.lastStage = "critique";
    state.loopCount = 2;
    state.critiques = [
      { score: 0.4, components: { groundedness: 0.4, redundancy: 0, structure: 1 }, issues: [], decision: "revise", attempt: 1 },
      { score: 0.6, components: { groundedness: 0.6, redundancy: 0, structure: 1 }, issues: [], decision: "escalate", attempt: 2 },
    ];
    state.error = { errorClass: "QualityExhausted", message: "gave up", stage: "critique" };

    const summary = summarizeRun(state);
    expect(summary.status).toBe("escalated");
    expect(summary.lastStage).toBe("critique");
    expect(summary.loopCount).toBe(2);
    expect(summary.lastCritique?.score).toBe(0.6);
    expect(summary.errorClass).toBe("QualityExhausted");
    expect(summary.title).toBe("Retrieval grounding");
  });
});
