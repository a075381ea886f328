import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify as stringifyYaml } from "yaml";
import {
  createChildLogger,
  isMissingFile,
  parseWithSchema,
  PersistedRunSchema,
  summarizeRun,
  type FinalContent,
  type PersistedRun,
  type PipelineState,
} from "@draftloom/core";

const logger = createChildLogger({ module: "pipeline:run-store" });

/** Durable storage for terminal run states, keyed by run id and time. */
export interface RunStore {
  /** Persist a snapshot; returns where it was written. */
  save(state: PipelineState): Promise<string>;
  /** Latest snapshot of a run. */
  load(runId: string): Promise<PersistedRun | undefined>;
  /** Latest snapshot of every run, newest first. */
  list(): Promise<PersistedRun[]>;
}

export function toPersistedRun(state: PipelineState, persistedAt: Date = new Date()): PersistedRun {
  return {
    runId: state.runId,
    persistedAt: persistedAt.toISOString(),
    summary: summarizeRun(state),
    state,
  };
}

/** Markdown with YAML front matter, ready for a static site. */
export function renderPost(final: FinalContent, state: PipelineState): string {
  const frontMatter: Record<string, unknown> = {
    title: final.title,
    slug: final.slug,
    description: final.metaDescription,
    tags: final.tags,
    category: final.category,
    date: state.completedAt ?? state.updatedAt,
    runId: state.runId,
  };
  if (state.publish) frontMatter.url = state.publish.url;

  return `---\n${stringifyYaml(frontMatter)}---\n\n${final.content.trim()}\n`;
}

function fileStamp(iso: string): string {
  return iso.replace(/[:.]/g, "-");
}

/** Newest snapshot per run id. */
export function latestPerRun(runs: PersistedRun[]): PersistedRun[] {
  const latest = new Map<string, PersistedRun>();
  for (const run of runs) {
    const seen = latest.get(run.runId);
    if (!seen || run.persistedAt >= seen.persistedAt) latest.set(run.runId, run);
  }
  return [...latest.values()].sort((a, b) => b.persistedAt.localeCompare(a.persistedAt));
}

/**
 * Run snapshots as `<runId>--<timestamp>.json` files in one directory. A
 * completed run also gets its post as `<runId>--<timestamp>.md`.
 */
export class FileRunStore implements RunStore {
  constructor(private readonly dir: string) {}

  async save(state: PipelineState): Promise<string> {
    await mkdir(this.dir, { recursive: true });

    const persisted = toPersistedRun(state);
    const base = `${state.runId}--${fileStamp(persisted.persistedAt)}`;
    const path = join(this.dir, `${base}.json`);
    await writeFile(path, JSON.stringify(persisted, null, 2) + "\n", "utf-8");

    if (state.status === "done" && state.final) {
      const postPath = join(this.dir, `${base}.md`);
      await writeFile(postPath, renderPost(state.final, state), "utf-8");
      logger.info({ runId: state.runId, postPath }, "Exported post");
    }

    logger.debug({ runId: state.runId, path, status: state.status }, "Saved run");
    return path;
  }

  async load(runId: string): Promise<PersistedRun | undefined> {
    const files = (await this.snapshotFiles()).filter((f) => f.startsWith(`${runId}--`));
    const newest = files.at(-1);
    return newest ? this.read(newest) : undefined;
  }

  async list(): Promise<PersistedRun[]> {
    const files = await this.snapshotFiles();
    const runs = await Promise.all(files.map((f) => this.read(f)));
    return latestPerRun(runs);
  }

  private async snapshotFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return entries.filter((f) => f.endsWith(".json") && f.includes("--")).sort();
  }

  private async read(file: string): Promise<PersistedRun> {
    const path = join(this.dir, file);
    const raw = await readFile(path, "utf-8");
    return parseWithSchema(PersistedRunSchema, JSON.parse(raw), `run snapshot "${path}"`);
  }
}

/** In-process store; keeps every snapshot. */
export class MemoryRunStore implements RunStore {
  readonly snapshots: PersistedRun[] = [];

  async save(state: PipelineState): Promise<string> {
    const persisted = toPersistedRun(structuredClone(state));
    this.snapshots.push(persisted);
    return `memory:${state.runId}:${this.snapshots.length}`;
  }

  async load(runId: string): Promise<PersistedRun | undefined> {
    return this.snapshots.filter((s) => s.runId === runId).at(-1);
  }

  async list(): Promise<PersistedRun[]> {
    return latestPerRun(this.snapshots);
  }
}
