import { config } from "dotenv";
import { resolve } from "node:path";

// Load .env from project root
config({ path: resolve(process.cwd(), ".env") });

export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

export function optionalEnv(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

export const env = {
  get anthropicApiKey() {
    return process.env.ANTHROPIC_API_KEY;
  },
  get geminiApiKey() {
    return process.env.GEMINI_API_KEY;
  },
  get embedder() {
    return optionalEnv("EMBEDDER", "hashing");
  },
  get pipelineConfigPath() {
    return optionalEnv("PIPELINE_CONFIG", "pipeline.yml");
  },
  get runsDir() {
    return resolve(optionalEnv("RUNS_DIR", "runs"));
  },
  get indexDir() {
    return resolve(optionalEnv("INDEX_DIR", ".draftloom/index"));
  },
  get runStore() {
    return optionalEnv("RUN_STORE", "file");
  },
  get databaseUrl() {
    return requireEnv("DATABASE_URL");
  },
  get ghostUrl() {
    return process.env.GHOST_URL;
  },
  get ghostAdminApiKey() {
    return process.env.GHOST_ADMIN_API_KEY;
  },
  get wordpressUrl() {
    return process.env.WORDPRESS_URL;
  },
  get wordpressUsername() {
    return process.env.WORDPRESS_USERNAME;
  },
  get wordpressPassword() {
    return process.env.WORDPRESS_APP_PASSWORD;
  },
};
