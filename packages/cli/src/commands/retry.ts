import { formatError } from "@draftloom/core";
import chalk from "chalk";
import ora from "ora";
import { openRunStore, type GlobalOptions } from "../context.js";
import { buildExecutor, cancelOnInterrupt, reportRun } from "./run.js";

interface RetryOptions extends GlobalOptions {
  approve: boolean;
  dryRun: boolean;
}

/**
 * Resume a persisted run: failed and cancelled runs restart the stage they
 * stopped in, escalated runs continue at optimize with --approve.
 */
export async function retryCommand(runId: string, options: RetryOptions) {
  const spinner = ora();

  try {
    const lookup = await openRunStore();
    const persisted = await lookup.store.load(runId).finally(lookup.close);
    if (!persisted) {
      spinner.fail(`No run found with id ${runId}`);
      process.exitCode = 1;
      return;
    }

    const { state } = persisted;
    console.log(chalk.blue(`\nRetrying ${state.topic.title} (${state.status} at ${state.error?.stage ?? state.currentStage})\n`));

    const { executor, close, abort } = await buildExecutor({ ...options, approve: false }, spinner);
    const release = cancelOnInterrupt(abort, spinner);
    try {
      const resumed = await executor.resume(state, { approve: options.approve });
      reportRun(resumed, spinner);
    } finally {
      release();
      await close();
    }
  } catch (err) {
    spinner.fail(`Retry failed: ${formatError(err)}`);
    process.exitCode = 1;
  }
}
