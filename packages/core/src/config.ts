import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodType, ZodTypeDef } from "zod";
import {
  PipelineConfigSchema,
  type PipelineConfig,
} from "./schemas/config.js";
import { TopicSpecSchema, type TopicSpec } from "./schemas/pipeline.js";
import { env } from "./env.js";
import { logger } from "./logger.js";

export function getPipelineConfigPath(explicit?: string): string {
  return resolve(explicit ?? env.pipelineConfigPath);
}

/**
 * Load pipeline.yml. A missing file yields the schema defaults; a present but
 * invalid file is an error listing every offending path.
 */
export async function loadPipelineConfig(
  path?: string
): Promise<PipelineConfig> {
  const configPath = getPipelineConfigPath(path);

  logger.debug({ configPath }, "Loading pipeline config");

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.debug({ configPath }, "No pipeline config found, using defaults");
      return PipelineConfigSchema.parse({});
    }
    throw err;
  }

  return parseWithSchema(
    PipelineConfigSchema,
    parseYaml(raw) ?? {},
    `pipeline config "${configPath}"`
  );
}

export async function loadTopicSpec(path: string): Promise<TopicSpec> {
  const topicPath = resolve(path);
  const raw = await readFile(topicPath, "utf-8");
  return parseWithSchema(TopicSpecSchema, parseYaml(raw), `topic "${topicPath}"`);
}

export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  label: string
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map(
      (i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`
    );
    throw new Error(`Invalid ${label}:\n${errors.join("\n")}`);
  }
  return result.data;
}

export function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
