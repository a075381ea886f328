import { desc, eq } from "drizzle-orm";
import {
  createChildLogger,
  parseWithSchema,
  PersistedRunSchema,
  type PersistedRun,
  type PipelineState,
} from "@draftloom/core";
import { latestPerRun, toPersistedRun, type RunStore } from "@draftloom/content-pipeline";
import type { Db } from "./client.js";
import {
  pipelineRuns,
  publications,
  type NewPipelineRunRow,
  type PipelineRunRow,
} from "./schema.js";

const logger = createChildLogger({ module: "database:run-store" });

export function toRunRow(persisted: PersistedRun): NewPipelineRunRow {
  const { summary } = persisted;
  return {
    runId: persisted.runId,
    title: summary.title,
    status: summary.status,
    lastStage: summary.lastStage ?? null,
    loopCount: summary.loopCount,
    errorClass: summary.errorClass ?? null,
    errorMessage: summary.errorMessage ?? null,
    summary,
    state: persisted.state,
    persistedAt: new Date(persisted.persistedAt),
  };
}

/** jsonb columns come back untyped; validate them on the way out. */
export function fromRunRow(row: Pick<PipelineRunRow, "runId" | "persistedAt" | "summary" | "state">): PersistedRun {
  return parseWithSchema(
    PersistedRunSchema,
    {
      runId: row.runId,
      persistedAt: row.persistedAt.toISOString(),
      summary: row.summary,
      state: row.state,
    },
    `pipeline_runs row for run "${row.runId}"`
  );
}

/**
 * Run snapshots in Postgres. Every save inserts a row; a completed run that
 * published also records the publication.
 */
export class DrizzleRunStore implements RunStore {
  constructor(private readonly db: Db) {}

  async save(state: PipelineState): Promise<string> {
    const persisted = toPersistedRun(state);

    const id = await this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(pipelineRuns)
        .values(toRunRow(persisted))
        .returning({ id: pipelineRuns.id });
      if (!row) throw new Error(`Insert into pipeline_runs returned no row for run ${state.runId}`);

      if (state.status === "done" && state.publish) {
        await tx.insert(publications).values({
          pipelineRunId: row.id,
          runId: state.runId,
          platform: state.publish.platform,
          platformId: state.publish.id,
          url: state.publish.url,
          visibility: state.publish.visibility,
          publishedAt: new Date(state.publish.publishedAt),
        });
      }
      return row.id;
    });

    logger.debug({ runId: state.runId, id, status: state.status }, "Saved run");
    return `pipeline_runs:${id}`;
  }

  async load(runId: string): Promise<PersistedRun | undefined> {
    const [row] = await this.db
      .select()
      .from(pipelineRuns)
      .where(eq(pipelineRuns.runId, runId))
      .orderBy(desc(pipelineRuns.persistedAt))
      .limit(1);
    return row ? fromRunRow(row) : undefined;
  }

  async list(): Promise<PersistedRun[]> {
    const rows = await this.db
      .selectDistinctOn([pipelineRuns.runId])
      .from(pipelineRuns)
      .orderBy(pipelineRuns.runId, desc(pipelineRuns.persistedAt));
    return latestPerRun(rows.map(fromRunRow));
  }
}
