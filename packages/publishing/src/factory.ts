import { env, FatalError, type PublishingConfig } from "@draftloom/core";
import { DryRunPublisher } from "./adapters/dry-run.js";
import { GhostPublisher } from "./adapters/ghost.js";
import { WordPressPublisher } from "./adapters/wordpress.js";
import { FileIdempotencyStore } from "./idempotency.js";
import { IdempotentPublisher, type Publisher } from "./publisher.js";

/**
 * Build the configured publisher. Credentials come from the environment.
 * Real platforms are wrapped with the idempotency guard; dry runs are not.
 */
export function createPublisher(
  config: PublishingConfig,
  options?: { idempotencyPath?: string }
): Publisher {
  switch (config.platform) {
    case "dry-run":
      return new DryRunPublisher();

    case "ghost": {
      const url = env.ghostUrl;
      const apiKey = env.ghostAdminApiKey;
      if (!url || !apiKey) {
        throw new FatalError("Ghost publishing needs GHOST_URL and GHOST_ADMIN_API_KEY");
      }
      return new IdempotentPublisher(
        new GhostPublisher({ url, apiKey }),
        new FileIdempotencyStore(options?.idempotencyPath)
      );
    }

    case "wordpress": {
      const url = env.wordpressUrl;
      const username = env.wordpressUsername;
      const password = env.wordpressPassword;
      if (!url || !username || !password) {
        throw new FatalError(
          "WordPress publishing needs WORDPRESS_URL, WORDPRESS_USERNAME and WORDPRESS_APP_PASSWORD"
        );
      }
      return new IdempotentPublisher(
        new WordPressPublisher({ url, username, password }),
        new FileIdempotencyStore(options?.idempotencyPath)
      );
    }
  }
}
