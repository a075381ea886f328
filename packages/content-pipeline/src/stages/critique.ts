import { z } from "zod";
import {
  FatalError,
  QualityExhausted,
  type CritiqueIssue,
  type CritiqueResult,
  type PipelineState,
} from "@draftloom/core";
import type { CritiqueNode, StageContext, StageOutcome } from "../graph.js";
import { generateJson } from "../llm.js";
import { combineScore, decide, evaluateDraft } from "../quality.js";
import { formatSources } from "./sources.js";

const ReviewerSchema = z.object({
  score: z.number().min(0).max(1),
  issues: z.array(z.string()).default([]),
});

async function reviewerScore(
  state: PipelineState,
  ctx: StageContext
): Promise<{ score: number; issues: CritiqueIssue[] }> {
  const system = `You are a demanding editor reviewing a draft against its sources.
Score it from 0 to 1 for accuracy, depth and clarity, and list concrete problems.

Respond with JSON: {"score": 0.0, "issues": ["..."]}`;

  const prompt = `Topic: ${state.topic.title}

Sources:

${formatSources(state.retrieval, 600)}

Draft:

${state.draft?.content ?? ""}`;

  const review = await ctx.call("critique:reviewer", () =>
    generateJson(ctx.generator, { purpose: "critique", tier: "sonnet", system, prompt, temperature: 0 }, ReviewerSchema)
  );

  return {
    score: review.score,
    issues: review.issues.map((message) => ({ kind: "reviewer" as const, location: "draft", message })),
  };
}

/**
 * Critique: score the draft and apply the quality gate. Exhausting the
 * revision budget is reported as QualityExhausted; the executor decides
 * what that means for the run.
 */
export const critiqueNode: CritiqueNode = {
  stage: "critique",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const { draft } = state;
    if (!draft) {
      return { kind: "fail", error: new FatalError("Critique requires a draft") };
    }

    const gate = ctx.config.qualityGate;
    const sources = [
      ...(state.retrieval?.items.map((i) => i.chunk.text) ?? []),
      ...state.keyFacts,
    ];

    const evaluation = evaluateDraft({
      draft,
      outline: state.outline,
      sources,
      minClaimWords: gate.minClaimWords,
      claimOverlap: gate.claimOverlap,
    });

    const components = { ...evaluation.components };
    const issues = [...evaluation.issues];
    if (gate.weights.reviewer > 0) {
      const review = await reviewerScore(state, ctx);
      components.reviewer = review.score;
      issues.push(...review.issues);
    }

    const score = combineScore(components, gate.weights);
    const decision = decide(score, state.loopCount, gate);

    const critique: CritiqueResult = {
      score,
      components,
      issues,
      decision,
      attempt: draft.attempt,
    };
    state.critiques.push(critique);

    ctx.logger.info(
      { runId: state.runId, attempt: draft.attempt, score: Number(score.toFixed(3)), decision, issues: issues.length },
      "Critique complete"
    );

    switch (decision) {
      case "approve":
        return { kind: "advance", state, next: "optimize" };
      case "revise":
        return { kind: "advance", state, next: "write" };
      case "escalate":
        return { kind: "fail", state, error: new QualityExhausted(state.loopCount, score) };
    }
  },
};
