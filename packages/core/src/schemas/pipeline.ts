import { z } from "zod";
import { RetrievalContextSchema } from "./corpus.js";

// ─── Stages & Status ────────────────────────────────────────────────────────

export const StageNameSchema = z.enum([
  "research",
  "outline",
  "write",
  "critique",
  "optimize",
  "publish",
]);

export type StageName = z.infer<typeof StageNameSchema>;

/** Where a stage may route to. "done" ends the run successfully. */
export type NextStage = StageName | "done";

export const RunStatusSchema = z.enum([
  "running",
  "done",
  "failed",
  "escalated",
  "cancelled",
]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export type TerminalStatus = Exclude<RunStatus, "running">;

export const ErrorClassSchema = z.enum([
  "TransientError",
  "FatalError",
  "IngestionError",
  "QualityExhausted",
  "InsufficientGrounding",
  "PublishError",
  "Cancelled",
]);

export type ErrorClass = z.infer<typeof ErrorClassSchema>;

// ─── Topic ──────────────────────────────────────────────────────────────────

export const TopicSpecSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  keywords: z.array(z.string()).default([]),
  targetAudience: z.string().default("technical readers"),
  tone: z.string().default("informative and engaging"),
});

export type TopicSpec = z.infer<typeof TopicSpecSchema>;

// ─── Outline ────────────────────────────────────────────────────────────────

export const OutlineSectionSchema = z.object({
  heading: z.string().min(1),
  level: z.number().int().min(1).max(3).default(2),
  keyPoints: z.array(z.string()).default([]),
  estimatedWords: z.number().int().positive().default(200),
  chunkIds: z.array(z.string()).default([]),
});

export type OutlineSection = z.infer<typeof OutlineSectionSchema>;

export const OutlineSchema = z.object({
  title: z.string(),
  introduction: z.string().default(""),
  sections: z.array(OutlineSectionSchema),
  conclusion: z.string().default(""),
  totalEstimatedWords: z.number().int().nonnegative(),
  lowConfidence: z.boolean().default(false),
});

export type Outline = z.infer<typeof OutlineSchema>;

// ─── Draft ──────────────────────────────────────────────────────────────────

export const DraftSectionSchema = z.object({
  heading: z.string(),
  body: z.string(),
  chunkIds: z.array(z.string()).default([]),
});

export type DraftSection = z.infer<typeof DraftSectionSchema>;

export const DraftContentSchema = z.object({
  title: z.string(),
  content: z.string(),
  sections: z.array(DraftSectionSchema),
  wordCount: z.number().int().nonnegative(),
  attempt: z.number().int().positive(),
});

export type DraftContent = z.infer<typeof DraftContentSchema>;

// ─── Critique ───────────────────────────────────────────────────────────────

export const CritiqueDecisionSchema = z.enum(["approve", "revise", "escalate"]);

export type CritiqueDecision = z.infer<typeof CritiqueDecisionSchema>;

export const CritiqueIssueSchema = z.object({
  kind: z.enum([
    "ungrounded_claim",
    "redundant_sections",
    "missing_section",
    "empty_section",
    "reviewer",
  ]),
  location: z.string(),
  message: z.string(),
});

export type CritiqueIssue = z.infer<typeof CritiqueIssueSchema>;

export const CritiqueComponentsSchema = z.object({
  groundedness: z.number().min(0).max(1),
  redundancy: z.number().min(0).max(1),
  structure: z.number().min(0).max(1),
  reviewer: z.number().min(0).max(1).optional(),
});

export type CritiqueComponents = z.infer<typeof CritiqueComponentsSchema>;

export const CritiqueResultSchema = z.object({
  score: z.number().min(0).max(1),
  components: CritiqueComponentsSchema,
  issues: z.array(CritiqueIssueSchema),
  decision: CritiqueDecisionSchema,
  attempt: z.number().int().positive(),
});

export type CritiqueResult = z.infer<typeof CritiqueResultSchema>;

// ─── Final Content & Publishing ─────────────────────────────────────────────

export const VisibilitySchema = z.enum(["draft", "published", "scheduled"]);

export type Visibility = z.infer<typeof VisibilitySchema>;

export const FinalContentSchema = z.object({
  title: z.string(),
  content: z.string(),
  metaDescription: z.string().default(""),
  slug: z.string(),
  tags: z.array(z.string()).default([]),
  category: z.string().default("Tech"),
});

export type FinalContent = z.infer<typeof FinalContentSchema>;

export const PublishResultSchema = z.object({
  id: z.string(),
  url: z.string(),
  platform: z.string(),
  visibility: VisibilitySchema,
  publishedAt: z.string(),
});

export type PublishResult = z.infer<typeof PublishResultSchema>;

// ─── Pipeline State ─────────────────────────────────────────────────────────

export const TransitionSchema = z.object({
  from: StageNameSchema,
  to: z.union([StageNameSchema, RunStatusSchema]),
  at: z.string(),
});

export type Transition = z.infer<typeof TransitionSchema>;

export const RunErrorSchema = z.object({
  errorClass: ErrorClassSchema,
  message: z.string(),
  stage: StageNameSchema,
});

export type RunError = z.infer<typeof RunErrorSchema>;

export const PipelineStateSchema = z.object({
  runId: z.string(),
  topic: TopicSpecSchema,
  status: RunStatusSchema,
  currentStage: StageNameSchema,
  lastStage: StageNameSchema.optional(),
  researchAttempts: z.number().int().nonnegative(),
  loopCount: z.number().int().nonnegative(), // Critique → Write traversals
  retrieval: RetrievalContextSchema.optional(),
  keyFacts: z.array(z.string()).default([]),
  outline: OutlineSchema.optional(),
  draft: DraftContentSchema.optional(),
  critiques: z.array(CritiqueResultSchema).default([]),
  final: FinalContentSchema.optional(),
  publish: PublishResultSchema.optional(),
  warnings: z.array(z.string()).default([]),
  error: RunErrorSchema.optional(),
  transitions: z.array(TransitionSchema).default([]),
  indexVersion: z.number().int().nonnegative().optional(),
  startedAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
});

export type PipelineState = z.infer<typeof PipelineStateSchema>;

// ─── Persisted Run ──────────────────────────────────────────────────────────

export const RunSummarySchema = z.object({
  runId: z.string(),
  title: z.string(),
  status: RunStatusSchema,
  lastStage: StageNameSchema.optional(),
  loopCount: z.number().int().nonnegative(),
  lastCritique: CritiqueResultSchema.optional(),
  errorClass: ErrorClassSchema.optional(),
  errorMessage: z.string().optional(),
  publishedUrl: z.string().optional(),
});

export type RunSummary = z.infer<typeof RunSummarySchema>;

export const PersistedRunSchema = z.object({
  runId: z.string(),
  persistedAt: z.string(),
  summary: RunSummarySchema,
  state: PipelineStateSchema,
});

export type PersistedRun = z.infer<typeof PersistedRunSchema>;

export function summarizeRun(state: PipelineState): RunSummary {
  return {
    runId: state.runId,
    title: state.topic.title,
    status: state.status,
    lastStage: state.lastStage,
    loopCount: state.loopCount,
    lastCritique: state.critiques.at(-1),
    errorClass: state.error?.errorClass,
    errorMessage: state.error?.message,
    publishedUrl: state.publish?.url,
  };
}
