export {
  IdempotentPublisher,
  assertPublishable,
  type Publisher,
  type PublishOptions,
} from "./publisher.js";
export {
  FileIdempotencyStore,
  MemoryIdempotencyStore,
  generateIdempotencyKey,
  defaultIdempotencyPath,
  type IdempotencyStore,
} from "./idempotency.js";
export { GhostPublisher, type GhostConfig } from "./adapters/ghost.js";
export { WordPressPublisher, type WordPressConfig } from "./adapters/wordpress.js";
export { DryRunPublisher } from "./adapters/dry-run.js";
export { markdownToHtml } from "./adapters/markdown.js";
export { isTransientFailure, isTransientStatus } from "./adapters/http.js";
export { createPublisher } from "./factory.js";
