import { z } from "zod";
import {
  FatalError,
  type DraftContent,
  type FinalContent,
  type PipelineState,
} from "@draftloom/core";
import type { OptimizeNode, StageContext, StageOutcome } from "../graph.js";
import { generateJson } from "../llm.js";
import { slugify } from "./sources.js";

const OptimizedSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
  metaDescription: z.string().default(""),
  slug: z.string().default(""),
  tags: z.array(z.string()).default([]),
});

function describe(content: string): string {
  const paragraph =
    content
      .split(/\n{2,}/)
      .map((p) => p.trim())
      .find((p) => p.length > 0 && !p.startsWith("#")) ?? "";
  return paragraph.replace(/\s+/g, " ").slice(0, 155);
}

/** Final content straight from the draft, used when the optimizer output is unusable. */
export function finalFromDraft(draft: DraftContent, state: PipelineState, config: StageContext["config"]): FinalContent {
  return {
    title: draft.title,
    content: draft.content,
    metaDescription: describe(draft.content),
    slug: slugify(draft.title),
    tags: [...new Set([...state.topic.keywords, ...config.publishing.defaultTags])],
    category: config.publishing.category,
  };
}

/**
 * Optimize: metadata and light edits for publication. Never changes the
 * facts; falls back to the approved draft when the output is unusable.
 */
export const optimizeNode: OptimizeNode = {
  stage: "optimize",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const { draft } = state;
    if (!draft) {
      return { kind: "fail", error: new FatalError("Optimize requires a draft") };
    }

    ctx.logger.info({ runId: state.runId }, "Starting optimize stage");

    const system = `You are an editor preparing an approved article for publication.

Tasks:
1. Tighten wording without adding or removing facts.
2. Keep every "## " section heading.
3. Write a meta description under 155 characters.
4. Suggest a URL slug and up to 5 tags.

Respond with JSON: {"title": "...", "content": "<markdown>", "metaDescription": "...", "slug": "...", "tags": ["..."]}`;

    const prompt = `Keywords: ${state.topic.keywords.join(", ") || "(none)"}\n\nArticle:\n\n${draft.content}`;

    let final: FinalContent;
    try {
      const optimized = await ctx.call("optimize", () =>
        generateJson(ctx.generator, { purpose: "optimize", tier: "sonnet", system, prompt }, OptimizedSchema)
      );
      final = {
        title: optimized.title,
        content: optimized.content,
        metaDescription: optimized.metaDescription || describe(optimized.content),
        slug: slugify(optimized.slug || optimized.title),
        tags: [...new Set([...optimized.tags, ...ctx.config.publishing.defaultTags])],
        category: ctx.config.publishing.category,
      };
    } catch (err) {
      if (!(err instanceof FatalError)) throw err;
      ctx.logger.warn({ runId: state.runId, error: err.message }, "Optimizer output unusable, publishing the draft as is");
      state.warnings.push(`Optimize fallback: ${err.message}`);
      final = finalFromDraft(draft, state, ctx.config);
    }

    state.final = final;
    ctx.logger.info({ runId: state.runId, slug: final.slug }, "Optimize complete");
    return { kind: "advance", state, next: "publish" };
  },
};
