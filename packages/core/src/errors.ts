import type { ErrorClass } from "./schemas/pipeline.js";

export abstract class PipelineError extends Error {
  abstract readonly errorClass: ErrorClass;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or rate-limit failure. Retried with backoff. */
export class TransientError extends PipelineError {
  readonly errorClass = "TransientError" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Capability permanently unavailable or returned unusable output. */
export class FatalError extends PipelineError {
  readonly errorClass = "FatalError" as const;
}

/** A source document that cannot be ingested. Skipped, never aborts. */
export class IngestionError extends PipelineError {
  readonly errorClass = "IngestionError" as const;

  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DimensionMismatchError extends FatalError {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Vector dimension ${actual} does not match index dimension ${expected}`);
  }
}

export class QualityExhausted extends PipelineError {
  readonly errorClass = "QualityExhausted" as const;

  constructor(
    readonly iterations: number,
    readonly lastScore: number
  ) {
    super(
      `Quality gate not passed after ${iterations} revision(s); last score ${lastScore.toFixed(2)}`
    );
  }
}

export class InsufficientGrounding extends PipelineError {
  readonly errorClass = "InsufficientGrounding" as const;

  constructor(readonly attempts: number) {
    super(`Retrieval returned no context after ${attempts} attempt(s)`);
  }
}

export class PublishError extends PipelineError {
  readonly errorClass = "PublishError" as const;

  constructor(
    message: string,
    readonly transient = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof TransientError) return true;
  if (err instanceof PublishError) return err.transient;
  return false;
}

/**
 * Map anything thrown across a stage boundary onto the taxonomy.
 * Unknown errors are fatal.
 */
export function classifyError(err: unknown): ErrorClass {
  if (err instanceof PipelineError) return err.errorClass;
  return "FatalError";
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
