import { z } from "zod";
import { VisibilitySchema } from "./pipeline.js";

// ─── Knowledge Base ─────────────────────────────────────────────────────────

export const ChunkingConfigSchema = z.object({
  chunkSize: z.number().int().positive().default(1000),
  overlap: z.number().min(0).max(0.9).default(0.2),
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(["hashing", "gemini"]).default("hashing"),
  dimensions: z.number().int().positive().default(256),
  concurrency: z.number().int().positive().default(4),
});

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  perSourceCap: z.number().int().positive().default(2),
  minSimilarity: z.number().min(-1).max(1).default(0.2),
  metric: z.enum(["cosine", "dot"]).default("cosine"),
});

// ─── Pipeline ───────────────────────────────────────────────────────────────

export const ResearchConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  confidenceThreshold: z.number().min(0).max(1).default(0.5),
  extractFacts: z.boolean().default(true),
});

export const CritiqueWeightsSchema = z.object({
  groundedness: z.number().nonnegative().default(0.5),
  redundancy: z.number().nonnegative().default(0.2),
  structure: z.number().nonnegative().default(0.3),
  reviewer: z.number().nonnegative().default(0),
});

export const QualityGateConfigSchema = z.object({
  approvalThreshold: z.number().min(0).max(1).default(0.8),
  maxIterations: z.number().int().min(1).default(2),
  onExhausted: z.enum(["escalate", "approve_with_warning"]).default("escalate"),
  weights: CritiqueWeightsSchema.default({}),
  minClaimWords: z.number().int().positive().default(4),
  claimOverlap: z.number().min(0).max(1).default(0.5),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  initialDelayMs: z.number().nonnegative().default(1000),
  maxDelayMs: z.number().nonnegative().default(30_000),
  backoffMultiplier: z.number().min(1).default(2),
});

export const GenerationConfigSchema = z.object({
  targetWordCount: z.number().int().positive().default(1500),
  minSections: z.number().int().positive().default(3),
});

export const PublishingConfigSchema = z.object({
  platform: z.enum(["dry-run", "ghost", "wordpress"]).default("dry-run"),
  visibility: VisibilitySchema.default("draft"),
  scheduledAt: z.string().datetime().optional(),
  category: z.string().default("Tech"),
  defaultTags: z.array(z.string()).default([]),
  requireApproval: z.boolean().default(false),
});

// ─── Full Pipeline Config ───────────────────────────────────────────────────

export const PipelineConfigSchema = z.object({
  chunking: ChunkingConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  research: ResearchConfigSchema.default({}),
  qualityGate: QualityGateConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  generation: GenerationConfigSchema.default({}),
  publishing: PublishingConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type QualityGateConfig = z.infer<typeof QualityGateConfigSchema>;
export type CritiqueWeights = z.infer<typeof CritiqueWeightsSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type PublishingConfig = z.infer<typeof PublishingConfigSchema>;
