import { createHash } from "node:crypto";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import {
  createChildLogger,
  isMissingFile,
  PublishResultSchema,
  type PublishResult,
  type Visibility,
} from "@draftloom/core";

const logger = createChildLogger({ module: "publishing:idempotency" });

const IdempotencyFileSchema = z.object({
  records: z.record(PublishResultSchema),
});

export interface IdempotencyStore {
  get(key: string): Promise<PublishResult | undefined>;
  record(key: string, result: PublishResult): Promise<void>;
}

/**
 * Generate an idempotency key from platform + slug + placement + content.
 * Same content to same platform with the same visibility = same key = skip.
 * A draft later published live gets a new key.
 */
export function generateIdempotencyKey(
  platform: string,
  slug: string,
  content: string,
  visibility: Visibility = "draft",
  scheduledAt?: string
): string {
  const hash = createHash("sha256")
    .update(`${platform}:${slug}:${visibility}:${scheduledAt ?? ""}:${content}`)
    .digest("hex")
    .slice(0, 24);
  return `pub-${platform}-${hash}`;
}

export function defaultIdempotencyPath(): string {
  return join(homedir(), ".draftloom", "idempotency.json");
}

export class FileIdempotencyStore implements IdempotencyStore {
  constructor(private readonly path: string = defaultIdempotencyPath()) {}

  async get(key: string): Promise<PublishResult | undefined> {
    const records = await this.load();
    return records[key];
  }

  async record(key: string, result: PublishResult): Promise<void> {
    const records = await this.load();
    records[key] = result;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify({ records }, null, 2), "utf-8");
    logger.debug({ idempotencyKey: key, platform: result.platform }, "Recorded publish for idempotency");
  }

  private async load(): Promise<Record<string, PublishResult>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn({ path: this.path, error: String(err) }, "Ignoring unreadable idempotency file");
      return {};
    }

    const parsed = IdempotencyFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ path: this.path }, "Ignoring unreadable idempotency file");
      return {};
    }
    return parsed.data.records;
  }
}

export class MemoryIdempotencyStore implements IdempotencyStore {
  private readonly records = new Map<string, PublishResult>();

  async get(key: string): Promise<PublishResult | undefined> {
    return this.records.get(key);
  }

  async record(key: string, result: PublishResult): Promise<void> {
    this.records.set(key, result);
  }
}
