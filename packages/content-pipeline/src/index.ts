export {
  GraphExecutor,
  createInitialState,
  type ExecutorCallbacks,
  type ExecutorOptions,
  type ResumeOptions,
} from "./executor.js";
export {
  TRANSITIONS,
  isAllowedTransition,
  type ApproveHook,
  type StageContext,
  type StageNode,
  type StageOutcome,
} from "./graph.js";
export {
  LlmGenerator,
  extractJson,
  generateJson,
  parseJsonPermissive,
  type GeneratePurpose,
  type GenerateRequest,
  type Generator,
  type ModelTier,
} from "./llm.js";
export * from "./quality.js";
export * from "./run-store.js";
export * from "./stages/index.js";
