import { FatalError, type PipelineState } from "@draftloom/core";
import type { PublishNode, StageContext, StageOutcome } from "../graph.js";

/**
 * Publish: optional manual approval, then hand the final content to the
 * publisher. Failures are left to the executor; the final content stays in state.
 */
export const publishNode: PublishNode = {
  stage: "publish",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const { final } = state;
    if (!final) {
      return { kind: "fail", error: new FatalError("Publish requires final content") };
    }

    const { publishing } = ctx.config;
    if (publishing.requireApproval && ctx.approve) {
      const approved = await ctx.approve(final, state);
      if (!approved) {
        ctx.logger.info({ runId: state.runId }, "Publication declined at approval gate");
        return { kind: "cancel", state, reason: "Publication declined at approval gate" };
      }
    }

    ctx.logger.info(
      { runId: state.runId, platform: ctx.publisher.platform, visibility: publishing.visibility },
      "Starting publish stage"
    );

    state.publish = await ctx.call("publish", () =>
      ctx.publisher.publish(final, {
        visibility: publishing.visibility,
        scheduledAt: publishing.scheduledAt,
      })
    );

    ctx.logger.info({ runId: state.runId, url: state.publish.url }, "Published");
    return { kind: "advance", state, next: "done" };
  },
};
