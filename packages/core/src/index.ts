export * from "./schemas/corpus.js";
export * from "./schemas/pipeline.js";
export * from "./schemas/config.js";
export * from "./errors.js";
export * from "./retry.js";
export * from "./config.js";
export { env, requireEnv, optionalEnv } from "./env.js";
export { logger, createChildLogger, type Logger } from "./logger.js";
