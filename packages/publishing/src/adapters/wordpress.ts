import { z } from "zod";
import type { FinalContent, PublishResult, Visibility } from "@draftloom/core";
import { createChildLogger, PublishError } from "@draftloom/core";
import { assertPublishable, type Publisher, type PublishOptions } from "../publisher.js";
import { isTransientFailure, isTransientStatus } from "./http.js";
import { markdownToHtml } from "./markdown.js";

const logger = createChildLogger({ module: "publishing:wordpress" });

export interface WordPressConfig {
  url: string;
  username: string;
  password: string; // Application password (not account password)
}

const WpPostSchema = z.object({
  id: z.number(),
  link: z.string(),
  status: z.string(),
  date_gmt: z.string().nullable().optional(),
});

const WpTermSchema = z.object({ id: z.number(), name: z.string() });

const WP_STATUS: Record<Visibility, string> = {
  draft: "draft",
  published: "publish",
  scheduled: "future",
};

/**
 * Publish content to WordPress via the REST API (v2).
 * Uses Application Passwords for authentication.
 * https://developer.wordpress.org/rest-api/reference/posts/
 */
export class WordPressPublisher implements Publisher {
  readonly platform = "wordpress";
  private readonly baseUrl: string;
  private readonly authHeader: string;

  constructor(config: WordPressConfig) {
    this.baseUrl = config.url.replace(/\/$/, "");
    this.authHeader = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString("base64")}`;
  }

  async publish(content: FinalContent, options: PublishOptions): Promise<PublishResult> {
    assertPublishable(content, options);
    logger.info({ slug: content.slug, visibility: options.visibility }, "Publishing to WordPress");

    const categoryIds = await this.resolveTerms("categories", content.category ? [content.category] : []);
    const tagIds = await this.resolveTerms("tags", content.tags);

    const body: Record<string, unknown> = {
      title: content.title,
      content: markdownToHtml(content.content),
      status: WP_STATUS[options.visibility],
      slug: content.slug,
      format: "standard",
    };
    if (content.metaDescription) body.excerpt = content.metaDescription;
    if (options.visibility === "scheduled") body.date_gmt = options.scheduledAt;
    if (categoryIds.length > 0) body.categories = categoryIds;
    if (tagIds.length > 0) body.tags = tagIds;

    const post = WpPostSchema.parse(
      await this.request("/wp-json/wp/v2/posts", { method: "POST", body: JSON.stringify(body) })
    );

    logger.info({ postId: post.id, url: post.link, status: post.status }, "WordPress post created");

    return {
      id: String(post.id),
      url: post.link,
      platform: this.platform,
      visibility: options.visibility,
      publishedAt: post.date_gmt ? `${post.date_gmt}Z` : new Date().toISOString(),
    };
  }

  /** Look up terms by name, creating the missing ones. */
  private async resolveTerms(kind: "categories" | "tags", names: string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const name of names) {
      const found = z
        .array(WpTermSchema)
        .parse(await this.request(`/wp-json/wp/v2/${kind}?search=${encodeURIComponent(name)}`, { method: "GET" }));
      const match = found.find((t) => t.name.toLowerCase() === name.toLowerCase());
      if (match) {
        ids.push(match.id);
        continue;
      }
      const created = WpTermSchema.parse(
        await this.request(`/wp-json/wp/v2/${kind}`, { method: "POST", body: JSON.stringify({ name }) })
      );
      ids.push(created.id);
    }
    return ids;
  }

  private async request(path: string, init: { method: string; body?: string }): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        headers: {
          "Content-Type": "application/json",
          Authorization: this.authHeader,
        },
        signal: AbortSignal.timeout(30_000),
      });
    } catch (err) {
      throw new PublishError(`WordPress request failed: ${path}`, isTransientFailure(err) || err instanceof TypeError, {
        cause: err,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      logger.error({ status: response.status, path }, "WordPress API error");
      throw new PublishError(
        `WordPress API error ${response.status}: ${errorBody.slice(0, 200)}`,
        isTransientStatus(response.status)
      );
    }

    return response.json();
  }
}
