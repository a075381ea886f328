import { env, formatError } from "@draftloom/core";
import { ingestPaths, saveIndex } from "@draftloom/knowledge-base";
import chalk from "chalk";
import Table from "cli-table3";
import ora from "ora";
import { openWorkspace, type GlobalOptions } from "../context.js";

export async function ingestCommand(paths: string[], options: GlobalOptions) {
  const spinner = ora();

  try {
    spinner.start("Loading knowledge base...");
    const { kb } = await openWorkspace(options);
    spinner.succeed(`Loaded knowledge base: ${kb.corpus.documentCount} document(s), index v${kb.registry.version}`);

    spinner.start(`Ingesting ${paths.join(", ")}...`);
    const report = await ingestPaths(kb, paths);
    spinner.succeed(
      `Added ${report.added.length}, unchanged ${report.unchanged.length}, skipped ${report.skipped.length}; ${report.chunksIndexed} chunk(s) indexed`
    );

    if (report.added.length > 0 || report.skipped.length > 0) {
      const table = new Table({
        head: [chalk.blue("Source"), chalk.blue("Result"), chalk.blue("Detail")],
      });
      for (const doc of report.added) {
        table.push([doc.source, chalk.green("added"), `${kb.corpus.chunksFor(doc.id).length} chunk(s)`]);
      }
      for (const skip of report.skipped) {
        table.push([skip.source, chalk.yellow("skipped"), skip.reason]);
      }
      console.log(`\n${table.toString()}\n`);
    }

    spinner.start("Saving index...");
    const path = await saveIndex(kb, env.indexDir);
    spinner.succeed(`Index v${report.indexVersion} saved to ${path}`);
  } catch (err) {
    spinner.fail(`Ingestion failed: ${formatError(err)}`);
    process.exitCode = 1;
  }
}
