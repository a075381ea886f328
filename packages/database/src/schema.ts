import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  uuid,
  index,
} from "drizzle-orm/pg-core";

// ─── Pipeline Runs ──────────────────────────────────────────────────────────

/** One row per persisted snapshot; a retried run gets a new row. */
export const pipelineRuns = pgTable(
  "pipeline_runs",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    runId: text("run_id").notNull(),
    title: text("title").notNull(),
    status: text("status").notNull(),
    lastStage: text("last_stage"),
    loopCount: integer("loop_count").notNull().default(0),
    errorClass: text("error_class"),
    errorMessage: text("error_message"),
    summary: jsonb("summary").notNull(),
    state: jsonb("state").notNull(),
    persistedAt: timestamp("persisted_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("idx_pipeline_runs_run").on(table.runId),
    index("idx_pipeline_runs_status").on(table.status),
  ]
);

// ─── Publications ───────────────────────────────────────────────────────────

export const publications = pgTable(
  "publications",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    pipelineRunId: uuid("pipeline_run_id")
      .references(() => pipelineRuns.id)
      .notNull(),
    runId: text("run_id").notNull(),
    platform: text("platform").notNull(),
    platformId: text("platform_id").notNull(),
    url: text("url").notNull(),
    visibility: text("visibility").notNull(),
    publishedAt: timestamp("published_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("idx_publications_run").on(table.runId),
  ]
);

export type PipelineRunRow = typeof pipelineRuns.$inferSelect;
export type NewPipelineRunRow = typeof pipelineRuns.$inferInsert;
export type NewPublicationRow = typeof publications.$inferInsert;
