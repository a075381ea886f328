import { readdir, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { createChildLogger, IngestionError } from "@draftloom/core";
import { KnowledgeBase, type IngestReport } from "./knowledge-base.js";
import { loadSourceFile, mediaTypeFor, type LoadedSource } from "./loaders.js";

const logger = createChildLogger({ module: "knowledge-base:ingest" });

/**
 * Expand files and directories into supported source files, sorted so that
 * ingestion order (and thus tie-breaking) is stable. Dot-files are skipped.
 */
export async function collectSourceFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];

  async function visit(path: string): Promise<void> {
    if (basename(path).startsWith(".")) return;
    const info = await stat(path);
    if (info.isDirectory()) {
      const names = (await readdir(path)).sort();
      for (const name of names) await visit(join(path, name));
      return;
    }
    if (!mediaTypeFor(path)) {
      logger.debug({ path }, "Skipping unsupported file type");
      return;
    }
    files.push(path);
  }

  for (const path of paths) await visit(resolve(path));
  return files;
}

/**
 * Load every supported file under `paths` into the knowledge base. Files that
 * fail to load are reported as skipped; the rest are ingested.
 */
export async function ingestPaths(kb: KnowledgeBase, paths: string[]): Promise<IngestReport> {
  const files = await collectSourceFiles(paths);
  logger.info({ files: files.length }, "Starting corpus ingestion");

  const sources: LoadedSource[] = [];
  const skipped: IngestReport["skipped"] = [];

  for (const file of files) {
    try {
      sources.push(await loadSourceFile(file));
    } catch (err) {
      if (!(err instanceof IngestionError)) throw err;
      skipped.push(KnowledgeBase.describeSkip(err, file));
    }
  }

  return kb.ingest(sources, skipped);
}
