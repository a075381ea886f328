import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
  ChunkSchema,
  createChildLogger,
  DimensionMismatchError,
  DocumentSchema,
  FatalError,
  isMissingFile,
} from "@draftloom/core";
import type { Embedder } from "./embedders.js";
import { KnowledgeBase, type KnowledgeBaseConfig } from "./knowledge-base.js";
import { VectorIndex } from "./vector-index.js";

const logger = createChildLogger({ module: "knowledge-base:persistence" });

const INDEX_FILE = "index.json";

const PersistedIndexSchema = z.object({
  formatVersion: z.literal(1),
  embedder: z.string(),
  dimensions: z.number().int().positive(),
  savedAt: z.string(),
  documents: z.array(DocumentSchema),
  entries: z.array(
    z.object({
      chunk: ChunkSchema,
      vector: z.array(z.number()),
      documentOrdinal: z.number().int().nonnegative(),
    })
  ),
});

export type PersistedIndex = z.infer<typeof PersistedIndexSchema>;

export async function saveIndex(kb: KnowledgeBase, dir: string): Promise<string> {
  const { index } = kb.registry.pin();
  const payload: PersistedIndex = {
    formatVersion: 1,
    embedder: kb.embedder.name,
    dimensions: index.dimensions,
    savedAt: new Date().toISOString(),
    documents: kb.corpus.listDocuments(),
    entries: [...index.entries()],
  };

  await mkdir(dir, { recursive: true });
  const target = join(dir, INDEX_FILE);
  const tmp = `${target}.tmp`;
  await writeFile(tmp, JSON.stringify(payload));
  await rename(tmp, target);

  logger.info(
    { path: target, documents: payload.documents.length, chunks: payload.entries.length },
    "Saved index"
  );
  return target;
}

/**
 * Restore a knowledge base saved with saveIndex. A missing index yields an
 * empty knowledge base; a different embedder or dimension is fatal.
 */
export async function loadKnowledgeBase(
  dir: string,
  embedder: Embedder,
  config: KnowledgeBaseConfig
): Promise<KnowledgeBase> {
  const path = join(dir, INDEX_FILE);

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.debug({ path }, "No saved index, starting empty");
      return new KnowledgeBase(embedder, config);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new FatalError(`Saved index at ${path} is not valid JSON`, { cause: err });
  }

  const parsed = PersistedIndexSchema.safeParse(json);
  if (!parsed.success) {
    throw new FatalError(`Saved index at ${path} is invalid: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  const saved = parsed.data;

  if (saved.embedder !== embedder.name) {
    throw new FatalError(
      `Saved index was built with embedder "${saved.embedder}", current embedder is "${embedder.name}"`
    );
  }
  if (saved.dimensions !== embedder.dimensions) {
    throw new DimensionMismatchError(saved.dimensions, embedder.dimensions);
  }

  const kb = new KnowledgeBase(embedder, config, VectorIndex.from(saved.dimensions, saved.entries));
  kb.corpus.restore(
    saved.documents,
    saved.entries.map((e) => e.chunk)
  );

  logger.info(
    { path, documents: saved.documents.length, chunks: saved.entries.length },
    "Loaded index"
  );
  return kb;
}
