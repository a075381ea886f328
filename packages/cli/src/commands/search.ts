import { formatError } from "@draftloom/core";
import { Retriever } from "@draftloom/knowledge-base";
import chalk from "chalk";
import Table from "cli-table3";
import { openWorkspace, type GlobalOptions } from "../context.js";

interface SearchOptions extends GlobalOptions {
  topK?: string;
}

export async function searchCommand(query: string, options: SearchOptions) {
  try {
    const { config, kb } = await openWorkspace(options);
    const topK = options.topK ? Number.parseInt(options.topK, 10) : config.retrieval.topK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new Error(`--top-k must be a positive integer, got "${options.topK}"`);
    }

    const snapshot = kb.registry.pin();
    if (snapshot.index.size === 0) {
      console.log(chalk.yellow("\nThe knowledge base is empty. Run: draftloom ingest <paths...>\n"));
      return;
    }

    const retriever = new Retriever(kb.embedder, {
      retrieval: { ...config.retrieval, topK },
      confidenceThreshold: config.research.confidenceThreshold,
      retry: config.retry,
    });
    const context = await retriever.retrieve(query, snapshot);

    if (context.items.length === 0) {
      console.log(chalk.yellow(`\nNo chunks above similarity ${config.retrieval.minSimilarity}.\n`));
      return;
    }

    const table = new Table({
      head: [chalk.blue("Score"), chalk.blue("Source"), chalk.blue("Chunk"), chalk.blue("Text")],
      colWidths: [8, 24, 12, 70],
      wordWrap: true,
    });
    for (const { chunk, score } of context.items) {
      table.push([score.toFixed(3), chunk.source, String(chunk.ordinal), chunk.text.slice(0, 200)]);
    }

    console.log(`\n${table.toString()}`);
    const confidence = `confidence ${context.confidence.toFixed(2)}`;
    console.log(
      `  ${context.lowConfidence ? chalk.yellow(`${confidence} (low)`) : chalk.green(confidence)}, index v${snapshot.version}\n`
    );
  } catch (err) {
    console.log(chalk.red(`Error: ${formatError(err)}`));
    process.exitCode = 1;
  }
}
