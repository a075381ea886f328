import type { FinalContent, PublishResult } from "@draftloom/core";
import { createChildLogger, PublishError } from "@draftloom/core";
import GhostAdminAPI from "@tryghost/admin-api";
import { assertPublishable, type Publisher, type PublishOptions } from "../publisher.js";
import { isTransientFailure } from "./http.js";
import { markdownToHtml } from "./markdown.js";

const logger = createChildLogger({ module: "publishing:ghost" });

export interface GhostConfig {
  url: string;
  apiKey: string;
}

/**
 * Publish content to Ghost through the Admin API.
 */
export class GhostPublisher implements Publisher {
  readonly platform = "ghost";
  private readonly api: GhostAdminAPI;

  constructor(config: GhostConfig) {
    this.api = new GhostAdminAPI({
      url: config.url,
      key: config.apiKey,
      version: "v5.0",
    });
  }

  async publish(content: FinalContent, options: PublishOptions): Promise<PublishResult> {
    assertPublishable(content, options);
    logger.info({ slug: content.slug, visibility: options.visibility }, "Publishing to Ghost");

    try {
      const post = await this.api.posts.add(
        {
          title: content.title,
          html: markdownToHtml(content.content),
          slug: content.slug,
          custom_excerpt: content.metaDescription || undefined,
          status: options.visibility,
          published_at: options.visibility === "scheduled" ? options.scheduledAt : undefined,
          tags: content.tags.map((name) => ({ name })),
        },
        { source: "html" }
      );

      logger.info({ postId: post.id, url: post.url }, "Ghost post created");

      return {
        id: post.id,
        url: post.url,
        platform: this.platform,
        visibility: options.visibility,
        publishedAt: post.published_at ?? new Date().toISOString(),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "Ghost publish failed");
      throw new PublishError(`Ghost publish failed: ${message}`, isTransientFailure(err), {
        cause: err,
      });
    }
  }
}
