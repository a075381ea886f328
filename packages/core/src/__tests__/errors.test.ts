import { describe, it, expect } from "vitest";
import {
  classifyError,
  DimensionMismatchError,
  FatalError,
  IngestionError,
  InsufficientGrounding,
  isRetryable,
  PublishError,
  QualityExhausted,
  TransientError,
} from "../errors.js";

describe("classifyError", () => {
  it("maps taxonomy errors to their class", () => {
    expect(classifyError(new TransientError("x"))).toBe("TransientError");
    expect(classifyError(new FatalError("x"))).toBe("FatalError");
    expect(classifyError(new IngestionError("x", "a.md"))).toBe("IngestionError");
    expect(classifyError(new QualityExhausted(2, 0.4))).toBe("QualityExhausted");
    expect(classifyError(new InsufficientGrounding(3))).toBe("InsufficientGrounding");
    expect(classifyError(new PublishError("x"))).toBe("PublishError");
  });

  it("treats unknown errors as fatal", () => {
    expect(classifyError(new Error("boom"))).toBe("FatalError");
    expect(classifyError("string thrown")).toBe("FatalError");
  });

  it("classifies dimension mismatches as fatal", () => {
    const err = new DimensionMismatchError(8, 4);
    expect(classifyError(err)).toBe("FatalError");
    expect(err.message).toBe("Vector dimension 4 does not match index dimension 8");
  });
});

describe("isRetryable", () => {
  it("retries transient errors only", () => {
    expect(isRetryable(new TransientError("x", 503))).toBe(true);
    expect(isRetryable(new PublishError("x", true))).toBe(true);
    expect(isRetryable(new PublishError("x"))).toBe(false);
    expect(isRetryable(new FatalError("x"))).toBe(false);
    expect(isRetryable(new Error("x"))).toBe(false);
  });
});

describe("error names", () => {
  it("uses the concrete class name", () => {
    expect(new QualityExhausted(2, 0.5).name).toBe("QualityExhausted");
    expect(new QualityExhausted(2, 0.5).message).toBe(
      "Quality gate not passed after 2 revision(s); last score 0.50"
    );
  });
});
