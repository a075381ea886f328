import { z } from "zod";
import { FatalError, type Outline, type PipelineState } from "@draftloom/core";
import type { OutlineNode, StageContext, StageOutcome } from "../graph.js";
import { generateJson } from "../llm.js";
import { formatSources } from "./sources.js";

const OutlineResponseSchema = z.object({
  title: z.string().min(1),
  introduction: z.string().default(""),
  sections: z
    .array(
      z.object({
        heading: z.string().min(1),
        level: z.number().int().min(1).max(3).default(2),
        keyPoints: z.array(z.string()).default([]),
        estimatedWords: z.number().int().positive().default(200),
        chunkIds: z.array(z.string()).default([]),
      })
    )
    .min(1),
  conclusion: z.string().default(""),
});

/**
 * Outline: section-by-section structure grounded in the retrieved chunks.
 */
export const outlineNode: OutlineNode = {
  stage: "outline",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const { topic, retrieval } = state;
    if (!retrieval) {
      return { kind: "fail", error: new FatalError("Outline requires research context") };
    }

    ctx.logger.info({ runId: state.runId }, "Starting outline stage");

    const { targetWordCount, minSections } = ctx.config.generation;
    const system = `You are a content strategist creating an outline for a long-form article.

Topic: ${topic.title}
${topic.description ? `Description: ${topic.description}\n` : ""}Audience: ${topic.targetAudience}
Tone: ${topic.tone}
Target word count: ${targetWordCount}

The outline should:
1. Open with a short introduction concept
2. Have at least ${minSections} well-structured sections
3. Ground every section in the numbered sources, citing their ids in "chunkIds"
4. End with a conclusion

Respond with JSON:
{
  "title": "Article title",
  "introduction": "Intro concept",
  "sections": [
    { "heading": "Section heading", "level": 2, "keyPoints": ["..."], "estimatedWords": 250, "chunkIds": ["<source id>"] }
  ],
  "conclusion": "How to wrap up"
}`;

    const prompt = `Key facts:\n${state.keyFacts.map((f) => `- ${f}`).join("\n")}\n\nSources:\n\n${formatSources(retrieval)}\n\nCreate the outline as JSON.`;

    const raw = await ctx.call("outline", () =>
      generateJson(ctx.generator, { purpose: "outline", tier: "sonnet", system, prompt }, OutlineResponseSchema)
    );

    const knownIds = new Set(retrieval.items.map((i) => i.chunk.id));
    const allIds = [...knownIds];

    const sections = raw.sections.map((section) => {
      const cited = section.chunkIds.filter((id) => knownIds.has(id));
      return { ...section, chunkIds: cited.length > 0 ? cited : allIds };
    });

    const outline: Outline = {
      title: raw.title,
      introduction: raw.introduction,
      sections,
      conclusion: raw.conclusion,
      totalEstimatedWords: sections.reduce((sum, s) => sum + s.estimatedWords, 0),
      lowConfidence: retrieval.lowConfidence,
    };

    state.outline = outline;
    ctx.logger.info(
      { runId: state.runId, sections: sections.length, estimatedWords: outline.totalEstimatedWords },
      "Outline complete"
    );
    return { kind: "advance", state, next: "write" };
  },
};
