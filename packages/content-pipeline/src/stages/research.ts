import { z } from "zod";
import {
  FatalError,
  InsufficientGrounding,
  type PipelineState,
  type RetrievalContext,
  type TopicSpec,
} from "@draftloom/core";
import type { ResearchNode, StageContext, StageOutcome } from "../graph.js";
import { generateJson } from "../llm.js";
import { formatSources } from "./sources.js";

/**
 * Query for a given research attempt. Each retry widens the query by
 * dropping the more specific parts of the topic.
 */
export function researchQuery(topic: TopicSpec, attempt: number): string {
  const keywords = topic.keywords.join(" ");
  switch (attempt) {
    case 1:
      return [topic.title, topic.description, keywords].filter(Boolean).join(" ");
    case 2:
      return [topic.title, keywords].filter(Boolean).join(" ");
    default:
      return topic.title;
  }
}

const KeyFactsSchema = z.object({
  facts: z.array(z.string().min(1)).min(1),
});

function fallbackFacts(context: RetrievalContext): string[] {
  return context.items.map(({ chunk }) => {
    const firstSentence = chunk.text.trim().split(/(?<=[.!?])\s+/)[0] ?? "";
    return firstSentence.slice(0, 300);
  });
}

async function extractKeyFacts(
  state: PipelineState,
  context: RetrievalContext,
  ctx: StageContext
): Promise<string[]> {
  const { topic } = state;
  const system = `You are a research analyst preparing notes for a writer.

Topic: ${topic.title}
Audience: ${topic.targetAudience}

CRITICAL RULES:
- ONLY include facts that appear in the sources. Do NOT invent or hallucinate any information.
- Every fact must be traceable to a specific source.

Respond with JSON: {"facts": ["...", "..."]}`;

  const prompt = `Sources:\n\n${formatSources(context)}\n\nExtract the key facts as JSON.`;

  try {
    const { facts } = await ctx.call("research:key-facts", () =>
      generateJson(ctx.generator, { purpose: "research", tier: "sonnet", system, prompt }, KeyFactsSchema)
    );
    return facts;
  } catch (err) {
    if (!(err instanceof FatalError)) throw err;
    ctx.logger.warn({ runId: state.runId, error: err.message }, "Key fact extraction unusable, falling back to source text");
    state.warnings.push(`Key fact fallback: ${err.message}`);
    return fallbackFacts(context);
  }
}

/**
 * Research: retrieve grounding for the topic. An empty retrieval routes
 * back to Research with a broader query until the attempt budget is spent.
 */
export const researchNode: ResearchNode = {
  stage: "research",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const attempt = state.researchAttempts;
    const maxAttempts = ctx.config.research.maxAttempts;
    const query = researchQuery(state.topic, attempt);

    ctx.logger.info({ runId: state.runId, attempt, query }, "Starting research stage");

    const context = await ctx.retriever.retrieve(query, ctx.snapshot);
    state.indexVersion = ctx.snapshot.version;

    if (context.items.length === 0) {
      state.warnings.push(`Research attempt ${attempt} found no grounding for "${query}"`);
      if (attempt >= maxAttempts) {
        return { kind: "fail", state, error: new InsufficientGrounding(attempt) };
      }
      return { kind: "advance", state, next: "research" };
    }

    state.retrieval = context;
    if (context.lowConfidence) {
      state.warnings.push(
        `Low retrieval confidence (${context.confidence.toFixed(2)}) for "${query}"`
      );
    }

    state.keyFacts = ctx.config.research.extractFacts
      ? await extractKeyFacts(state, context, ctx)
      : fallbackFacts(context);

    ctx.logger.info(
      { runId: state.runId, chunks: context.items.length, facts: state.keyFacts.length, confidence: context.confidence },
      "Research complete"
    );
    return { kind: "advance", state, next: "outline" };
  },
};
