import type { FinalContent, PublishResult, Visibility } from "@draftloom/core";
import { createChildLogger, PublishError } from "@draftloom/core";
import {
  generateIdempotencyKey,
  type IdempotencyStore,
} from "./idempotency.js";

const logger = createChildLogger({ module: "publishing" });

export interface PublishOptions {
  visibility: Visibility;
  /** ISO timestamp, required when visibility is "scheduled" */
  scheduledAt?: string;
}

export interface Publisher {
  readonly platform: string;
  publish(content: FinalContent, options: PublishOptions): Promise<PublishResult>;
}

export function assertPublishable(content: FinalContent, options: PublishOptions): void {
  if (!content.title.trim() || !content.content.trim()) {
    throw new PublishError("Refusing to publish empty content");
  }
  if (options.visibility === "scheduled") {
    if (!options.scheduledAt) {
      throw new PublishError("Scheduled publishing needs a publish time");
    }
    if (Number.isNaN(Date.parse(options.scheduledAt))) {
      throw new PublishError(`Invalid publish time: ${options.scheduledAt}`);
    }
  }
}

/**
 * Wraps a publisher so the same content is never sent to the same platform
 * twice with the same visibility. A repeat call returns the earlier result.
 */
export class IdempotentPublisher implements Publisher {
  constructor(
    private readonly inner: Publisher,
    private readonly store: IdempotencyStore
  ) {}

  get platform(): string {
    return this.inner.platform;
  }

  async publish(content: FinalContent, options: PublishOptions): Promise<PublishResult> {
    const key = generateIdempotencyKey(
      this.inner.platform,
      content.slug,
      content.content,
      options.visibility,
      options.scheduledAt
    );

    const previous = await this.store.get(key);
    if (previous) {
      logger.info(
        { platform: this.inner.platform, idempotencyKey: key, url: previous.url },
        "Skipping duplicate publish (idempotency)"
      );
      return previous;
    }

    const result = await this.inner.publish(content, options);
    await this.store.record(key, result);
    return result;
  }
}
