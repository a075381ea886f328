import { z } from "zod";

// ─── Documents & Chunks ─────────────────────────────────────────────────────

export const MediaTypeSchema = z.enum([
  "text/plain",
  "text/markdown",
  "application/pdf",
]);

export type MediaType = z.infer<typeof MediaTypeSchema>;

export const DocumentSchema = z.object({
  id: z.string(), // sha256 of the decoded text
  source: z.string(),
  mediaType: MediaTypeSchema,
  text: z.string(),
  ordinal: z.number().int().nonnegative(), // ingestion order
  ingestedAt: z.string(),
});

export type Document = z.infer<typeof DocumentSchema>;

export const SpanSchema = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .refine((s) => s.end >= s.start, { message: "span end before start" });

export type Span = z.infer<typeof SpanSchema>;

export const ChunkSchema = z.object({
  id: z.string(), // `${documentId}:${ordinal}`
  documentId: z.string(),
  source: z.string(),
  ordinal: z.number().int().nonnegative(),
  span: SpanSchema,
  text: z.string(),
});

export type Chunk = z.infer<typeof ChunkSchema>;

export const ScoredChunkSchema = z.object({
  chunk: ChunkSchema,
  score: z.number(),
});

export type ScoredChunk = z.infer<typeof ScoredChunkSchema>;

// ─── Retrieval Context ──────────────────────────────────────────────────────

export const RetrievalContextSchema = z.object({
  query: z.string(),
  items: z.array(ScoredChunkSchema),
  confidence: z.number().min(0).max(1),
  lowConfidence: z.boolean(),
});

export type RetrievalContext = z.infer<typeof RetrievalContextSchema>;
