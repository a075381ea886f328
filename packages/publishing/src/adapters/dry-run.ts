import type { FinalContent, PublishResult } from "@draftloom/core";
import { createChildLogger } from "@draftloom/core";
import { assertPublishable, type Publisher, type PublishOptions } from "../publisher.js";

const logger = createChildLogger({ module: "publishing:dry-run" });

/** Accepts everything and publishes nothing. */
export class DryRunPublisher implements Publisher {
  readonly platform = "dry-run";
  readonly published: Array<{ content: FinalContent; result: PublishResult }> = [];

  async publish(content: FinalContent, options: PublishOptions): Promise<PublishResult> {
    assertPublishable(content, options);

    const result: PublishResult = {
      id: `dry-run-${this.published.length + 1}`,
      url: `dry-run://${content.slug}`,
      platform: this.platform,
      visibility: options.visibility,
      publishedAt: options.visibility === "scheduled" && options.scheduledAt
        ? options.scheduledAt
        : new Date().toISOString(),
    };
    this.published.push({ content, result });

    logger.info(
      { title: content.title, slug: content.slug, words: content.content.split(/\s+/).length },
      "Dry run: content not sent anywhere"
    );
    return result;
  }
}
