import {
  env,
  loadPipelineConfig,
  type PipelineConfig,
} from "@draftloom/core";
import { FileRunStore, type RunStore } from "@draftloom/content-pipeline";
import {
  createEmbedder,
  loadKnowledgeBase,
  type KnowledgeBase,
} from "@draftloom/knowledge-base";

export interface GlobalOptions {
  config?: string;
}

export interface Workspace {
  config: PipelineConfig;
  kb: KnowledgeBase;
}

/** Pipeline config plus the knowledge base saved under INDEX_DIR. */
export async function openWorkspace(options: GlobalOptions): Promise<Workspace> {
  const config = await loadPipelineConfig(options.config);
  const kb = await loadKnowledgeBase(env.indexDir, createEmbedder(config.embedding), config);
  return { config, kb };
}

export interface OpenRunStore {
  store: RunStore;
  close(): Promise<void>;
}

/** File store by default; RUN_STORE=postgres switches to the database. */
export async function openRunStore(): Promise<OpenRunStore> {
  if (env.runStore === "postgres") {
    const { closeDb, DrizzleRunStore, getDb } = await import("@draftloom/database");
    return { store: new DrizzleRunStore(getDb()), close: closeDb };
  }
  return { store: new FileRunStore(env.runsDir), close: async () => {} };
}
