import {
  formatError,
  loadTopicSpec,
  type FinalContent,
  type PipelineState,
} from "@draftloom/core";
import {
  GraphExecutor,
  LlmGenerator,
  type ApproveHook,
  type ExecutorOptions,
} from "@draftloom/content-pipeline";
import { createPublisher } from "@draftloom/publishing";
import { confirm } from "@inquirer/prompts";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { openRunStore, openWorkspace, type GlobalOptions } from "../context.js";
import { formatScore, printOutcome } from "../format.js";

interface RunOptions extends GlobalOptions {
  dryRun: boolean;
  approve: boolean;
}

export const confirmPublish: ApproveHook = async (content: FinalContent) => {
  console.log(chalk.blue(`\n  ${content.title}`));
  console.log(chalk.dim(`  /${content.slug}  ${content.metaDescription}`));
  console.log(chalk.dim(`  ${content.content.split(/\s+/).length} words, tags: ${content.tags.join(", ") || "-"}\n`));
  return confirm({ message: "Publish this post?", default: false });
};

/** Executor wiring shared by `run` and `retry`. */
export async function buildExecutor(
  options: RunOptions,
  spinner: Ora
): Promise<{ executor: GraphExecutor; close: () => Promise<void>; abort: AbortController }> {
  const { config, kb } = await openWorkspace(options);
  if (options.dryRun) config.publishing.platform = "dry-run";
  if (options.approve) config.publishing.requireApproval = true;

  const { store, close } = await openRunStore();
  const abort = new AbortController();

  const executorOptions: ExecutorOptions = {
    config,
    generator: new LlmGenerator(),
    retriever: kb.createRetriever(),
    snapshot: kb.registry.pin(),
    publisher: createPublisher(config.publishing),
    store,
    signal: abort.signal,
    approve: async (content, state) => {
      spinner.stop();
      return confirmPublish(content, state);
    },
    callbacks: {
      onStageStart: (stage, state) => {
        const suffix = stage === "write" && state.loopCount > 0 ? ` (revision ${state.loopCount})` : "";
        spinner.start(`Running ${stage} stage${suffix}...`);
      },
      onStageComplete: (stage, next) => {
        if (spinner.isSpinning) spinner.succeed(`${stage} -> ${next}`);
      },
      onRevision: (loopCount, critique) => {
        spinner.warn(`Quality gate: score ${formatScore(critique?.score)}, revision ${loopCount}`);
      },
    },
  };

  return { executor: new GraphExecutor(executorOptions), close, abort };
}

/** First Ctrl-C cancels between stages; the run state is still persisted. */
export function cancelOnInterrupt(abort: AbortController, spinner: Ora): () => void {
  const onSigint = () => {
    spinner.warn("Cancelling after the current stage...");
    abort.abort();
  };
  process.once("SIGINT", onSigint);
  return () => process.removeListener("SIGINT", onSigint);
}

export function reportRun(state: PipelineState, spinner: Ora): void {
  if (spinner.isSpinning) spinner.stop();
  printOutcome(state);
  if (state.status !== "done") process.exitCode = 1;
}

export async function runCommand(topicPath: string, options: RunOptions) {
  console.log(chalk.blue(`\n${options.dryRun ? "[DRY RUN] " : ""}Running pipeline for: ${topicPath}\n`));

  const spinner = ora();

  try {
    spinner.start("Loading topic and knowledge base...");
    const topic = await loadTopicSpec(topicPath);
    const { executor, close, abort } = await buildExecutor(options, spinner);
    spinner.succeed(`Loaded topic: ${topic.title}`);

    const release = cancelOnInterrupt(abort, spinner);
    try {
      const state = await executor.run(topic);
      reportRun(state, spinner);
    } finally {
      release();
      await close();
    }
  } catch (err) {
    spinner.fail(`Pipeline failed: ${formatError(err)}`);
    process.exitCode = 1;
  }
}
