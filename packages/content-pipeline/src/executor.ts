import { randomUUID } from "node:crypto";
import {
  classifyError,
  createChildLogger,
  FatalError,
  formatError,
  InsufficientGrounding,
  isRetryable,
  PipelineStateSchema,
  QualityExhausted,
  TransientError,
  withRetry,
  type CritiqueResult,
  type NextStage,
  type PipelineConfig,
  type PipelineState,
  type RunError,
  type StageName,
  type TerminalStatus,
  type TopicSpec,
} from "@draftloom/core";
import type { IndexSnapshot, Retriever } from "@draftloom/knowledge-base";
import type { Publisher } from "@draftloom/publishing";
import {
  isAllowedTransition,
  type ApproveHook,
  type StageContext,
  type StageNode,
  type StageOutcome,
} from "./graph.js";
import type { Generator } from "./llm.js";
import type { RunStore } from "./run-store.js";
import {
  critiqueNode,
  optimizeNode,
  outlineNode,
  publishNode,
  researchNode,
  writeNode,
} from "./stages/index.js";

const logger = createChildLogger({ module: "pipeline:executor" });

export interface ExecutorCallbacks {
  onStageStart?: (stage: StageName, state: PipelineState) => void;
  onStageComplete?: (stage: StageName, next: NextStage | TerminalStatus, state: PipelineState) => void;
  onRevision?: (loopCount: number, critique: CritiqueResult | undefined) => void;
}

export interface ExecutorOptions {
  config: PipelineConfig;
  generator: Generator;
  retriever: Retriever;
  /** index the run researches against; pinned for the run's lifetime */
  snapshot: IndexSnapshot;
  publisher: Publisher;
  store?: RunStore;
  approve?: ApproveHook;
  signal?: AbortSignal;
  callbacks?: ExecutorCallbacks;
}

export interface ResumeOptions {
  /** continue an escalated run at Optimize */
  approve?: boolean;
}

type Step =
  | { kind: "continue"; state: PipelineState }
  | { kind: "stop"; state: PipelineState };

function nodeFor(stage: StageName): StageNode {
  switch (stage) {
    case "research":
      return researchNode;
    case "outline":
      return outlineNode;
    case "write":
      return writeNode;
    case "critique":
      return critiqueNode;
    case "optimize":
      return optimizeNode;
    case "publish":
      return publishNode;
  }
}

export function createInitialState(topic: TopicSpec, runId: string = randomUUID()): PipelineState {
  const now = new Date().toISOString();
  return PipelineStateSchema.parse({
    runId,
    topic,
    status: "running",
    currentStage: "research",
    researchAttempts: 0,
    loopCount: 0,
    startedAt: now,
    updatedAt: now,
  });
}

/**
 * Drives a run through the stage graph.
 *
 * The executor owns every state change between stages: each node works on a
 * private copy, the proposed edge is checked against the transition table,
 * and the research and revision counters are kept here rather than trusted
 * to the nodes. Every terminal status is persisted.
 */
export class GraphExecutor {
  constructor(private readonly options: ExecutorOptions) {}

  async run(topic: TopicSpec, runId?: string): Promise<PipelineState> {
    const state = createInitialState(topic, runId);
    logger.info({ runId: state.runId, title: topic.title, indexVersion: this.options.snapshot.version }, "Starting run");
    return this.drive(state);
  }

  /** Continue a persisted run that ended failed, cancelled or escalated. */
  async resume(persisted: PipelineState, options?: ResumeOptions): Promise<PipelineState> {
    const state = structuredClone(persisted);
    const now = new Date().toISOString();

    switch (state.status) {
      case "done":
        throw new FatalError(`Run ${state.runId} already completed`);

      case "escalated":
        if (!options?.approve) {
          throw new FatalError(`Run ${state.runId} is escalated; approve it to continue at optimize`);
        }
        state.warnings.push("Approved manually after escalation");
        state.transitions.push({ from: "critique", to: "optimize", at: now });
        state.currentStage = "optimize";
        break;

      case "failed":
      case "cancelled": {
        const stage = state.error?.stage ?? state.currentStage;
        if (stage === "research") state.researchAttempts = 0;
        state.currentStage = stage;
        break;
      }

      case "running":
        break;
    }

    state.status = "running";
    state.error = undefined;
    state.completedAt = undefined;
    state.updatedAt = now;

    logger.info({ runId: state.runId, stage: state.currentStage }, "Resuming run");
    return this.drive(state);
  }

  private context(): StageContext {
    const { config, generator, retriever, snapshot, publisher, approve, signal } = this.options;
    return {
      config,
      generator,
      retriever,
      snapshot,
      publisher,
      approve,
      signal,
      logger: createChildLogger({ module: "pipeline:stage" }),
      call: async (label, fn) => {
        try {
          return await withRetry(fn, label, {
            ...config.retry,
            signal,
            retryableErrors: (err) => !signal?.aborted && isRetryable(err),
          });
        } catch (err) {
          // out of attempts: the stage gives up on the capability
          if (err instanceof TransientError && !signal?.aborted) {
            throw new FatalError(
              `${label} failed after ${config.retry.maxAttempts} attempt(s): ${err.message}`,
              { cause: err }
            );
          }
          throw err;
        }
      },
    };
  }

  private async drive(initial: PipelineState): Promise<PipelineState> {
    const ctx = this.context();
    let state = initial;

    for (;;) {
      const stage = state.currentStage;

      if (this.options.signal?.aborted) {
        return this.finish(state, stage, "cancelled", {
          errorClass: "Cancelled",
          message: "Run cancelled",
          stage,
        });
      }

      if (stage === "research") state.researchAttempts++;

      this.options.callbacks?.onStageStart?.(stage, state);
      logger.debug({ runId: state.runId, stage, loopCount: state.loopCount }, "Executing stage");

      let step: Step;
      try {
        const outcome = await nodeFor(stage).execute(structuredClone(state), ctx);
        step = this.step(state, stage, outcome);
      } catch (err) {
        step = this.failure(this.absorb(state, undefined, stage), stage, err);
      }

      if (step.kind === "stop") {
        return this.persist(step.state);
      }
      state = step.state;
    }
  }

  /** Merge a node's proposed state, keeping the executor-owned fields. */
  private absorb(current: PipelineState, proposed: PipelineState | undefined, stage: StageName): PipelineState {
    const base = proposed ?? current;
    return {
      ...base,
      runId: current.runId,
      topic: current.topic,
      status: current.status,
      currentStage: current.currentStage,
      lastStage: stage,
      researchAttempts: current.researchAttempts,
      loopCount: current.loopCount,
      transitions: current.transitions,
      startedAt: current.startedAt,
      updatedAt: new Date().toISOString(),
    };
  }

  private step(current: PipelineState, stage: StageName, outcome: StageOutcome): Step {
    const state = this.absorb(current, outcome.state, stage);

    switch (outcome.kind) {
      case "cancel":
        return this.stop(state, stage, "cancelled", {
          errorClass: "Cancelled",
          message: outcome.reason,
          stage,
        });

      case "fail":
        return this.failure(state, stage, outcome.error);

      case "advance":
        return this.advance(state, stage, outcome.next);
    }
  }

  private advance(state: PipelineState, stage: StageName, next: NextStage): Step {
    const { config } = this.options;

    if (!isAllowedTransition(stage, next)) {
      return this.failure(state, stage, new FatalError(`Illegal transition ${stage} -> ${next}`));
    }

    if (next === "research" && state.researchAttempts >= config.research.maxAttempts) {
      return this.failure(state, stage, new InsufficientGrounding(state.researchAttempts));
    }

    if (stage === "critique" && next === "write") {
      if (state.loopCount >= config.qualityGate.maxIterations) {
        const lastScore = state.critiques.at(-1)?.score ?? 0;
        return this.exhausted(state, new QualityExhausted(state.loopCount, lastScore));
      }
      state.loopCount++;
      this.options.callbacks?.onRevision?.(state.loopCount, state.critiques.at(-1));
      logger.info({ runId: state.runId, loopCount: state.loopCount }, "Quality gate requested revision");
    }

    if (next === "done") {
      return this.stop(state, stage, "done");
    }

    this.transition(state, stage, next);
    state.currentStage = next;
    return { kind: "continue", state };
  }

  private failure(state: PipelineState, stage: StageName, err: unknown): Step {
    if (this.options.signal?.aborted) {
      return this.stop(state, stage, "cancelled", {
        errorClass: "Cancelled",
        message: `Run cancelled during ${stage}`,
        stage,
      });
    }

    if (err instanceof QualityExhausted) {
      return this.exhausted(state, err);
    }

    const errorClass = classifyError(err);
    logger.error({ runId: state.runId, stage, errorClass, error: formatError(err) }, "Stage failed");
    return this.stop(state, stage, "failed", { errorClass, message: formatError(err), stage });
  }

  private exhausted(state: PipelineState, err: QualityExhausted): Step {
    if (this.options.config.qualityGate.onExhausted === "approve_with_warning") {
      state.warnings.push(`${err.message}; continuing with a warning`);
      logger.warn({ runId: state.runId, loopCount: state.loopCount }, "Quality gate exhausted, approving with warning");
      this.transition(state, "critique", "optimize");
      state.currentStage = "optimize";
      return { kind: "continue", state };
    }

    logger.warn({ runId: state.runId, loopCount: state.loopCount, lastScore: err.lastScore }, "Quality gate exhausted, escalating");
    return this.stop(state, "critique", "escalated", {
      errorClass: err.errorClass,
      message: err.message,
      stage: "critique",
    });
  }

  private transition(state: PipelineState, from: StageName, to: NextStage | TerminalStatus): void {
    const at = new Date().toISOString();
    state.transitions.push({ from, to, at });
    state.updatedAt = at;
    this.options.callbacks?.onStageComplete?.(from, to, state);
  }

  private stop(state: PipelineState, stage: StageName, status: TerminalStatus, error?: RunError): Step {
    this.transition(state, stage, status);
    state.status = status;
    state.error = error;
    state.completedAt = state.updatedAt;
    return { kind: "stop", state };
  }

  private finish(state: PipelineState, stage: StageName, status: TerminalStatus, error?: RunError): Promise<PipelineState> {
    return this.persist(this.stop(state, stage, status, error).state);
  }

  private async persist(state: PipelineState): Promise<PipelineState> {
    logger.info(
      {
        runId: state.runId,
        status: state.status,
        lastStage: state.lastStage,
        loopCount: state.loopCount,
        errorClass: state.error?.errorClass,
      },
      "Run finished"
    );

    if (this.options.store) {
      const location = await this.options.store.save(state);
      logger.info({ runId: state.runId, location }, "Persisted run state");
    }
    return state;
  }
}
