import type {
  FinalContent,
  Logger,
  NextStage,
  PipelineConfig,
  PipelineError,
  PipelineState,
  StageName,
} from "@draftloom/core";
import type { IndexSnapshot, Retriever } from "@draftloom/knowledge-base";
import type { Publisher } from "@draftloom/publishing";
import type { Generator } from "./llm.js";

/** Asked before publishing; resolving false cancels the run. */
export type ApproveHook = (content: FinalContent, state: PipelineState) => Promise<boolean>;

export interface StageContext {
  config: PipelineConfig;
  generator: Generator;
  retriever: Retriever;
  /** index pinned for the whole run */
  snapshot: IndexSnapshot;
  publisher: Publisher;
  approve?: ApproveHook;
  signal?: AbortSignal;
  logger: Logger;
  /** Run an external call under the executor's retry policy. */
  call<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

export type StageOutcome =
  | { kind: "advance"; state: PipelineState; next: NextStage }
  | { kind: "fail"; state?: PipelineState; error: PipelineError }
  | { kind: "cancel"; state: PipelineState; reason: string };

interface NodeBase<S extends StageName> {
  readonly stage: S;
  execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome>;
}

export type ResearchNode = NodeBase<"research">;
export type OutlineNode = NodeBase<"outline">;
export type WriteNode = NodeBase<"write">;
export type CritiqueNode = NodeBase<"critique">;
export type OptimizeNode = NodeBase<"optimize">;
export type PublishNode = NodeBase<"publish">;

export type StageNode =
  | ResearchNode
  | OutlineNode
  | WriteNode
  | CritiqueNode
  | OptimizeNode
  | PublishNode;

/** Every edge a stage may propose. Anything else is rejected by the executor. */
export const TRANSITIONS: { readonly [S in StageName]: readonly NextStage[] } = {
  research: ["research", "outline"],
  outline: ["write"],
  write: ["critique"],
  critique: ["write", "optimize"],
  optimize: ["publish"],
  publish: ["done"],
};

export function isAllowedTransition(from: StageName, to: NextStage): boolean {
  return TRANSITIONS[from].includes(to);
}
