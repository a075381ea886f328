import {
  env,
  formatError,
  getPipelineConfigPath,
  loadPipelineConfig,
  loadTopicSpec,
  type PipelineConfig,
} from "@draftloom/core";
import { createEmbedder, loadKnowledgeBase } from "@draftloom/knowledge-base";
import { createPublisher } from "@draftloom/publishing";
import chalk from "chalk";
import type { GlobalOptions } from "../context.js";

function pass(message: string) {
  console.log(chalk.green(`  [PASS] ${message}`));
}

function fail(message: string) {
  console.log(chalk.red(`  [FAIL] ${message}`));
}

function warn(message: string) {
  console.log(chalk.yellow(`  [WARN] ${message}`));
}

async function checkIndex(config: PipelineConfig): Promise<boolean> {
  try {
    const kb = await loadKnowledgeBase(env.indexDir, createEmbedder(config.embedding), config);
    const { index, version } = kb.registry.pin();
    if (index.size === 0) {
      warn(`Knowledge base at ${env.indexDir} is empty; run: draftloom ingest <paths...>`);
    } else {
      pass(`Knowledge base: ${kb.corpus.documentCount} document(s), ${index.size} chunk(s), v${version}`);
    }
    return true;
  } catch (err) {
    fail(`Knowledge base: ${formatError(err)}`);
    return false;
  }
}

export async function validateCommand(topicPath: string | undefined, options: GlobalOptions) {
  const configPath = getPipelineConfigPath(options.config);
  console.log(chalk.blue(`\nValidating ${configPath}\n`));

  let hasErrors = false;

  try {
    const config = await loadPipelineConfig(options.config);
    pass("Pipeline config is valid");
    console.log(
      chalk.dim(
        `         threshold ${config.qualityGate.approvalThreshold}, max revisions ${config.qualityGate.maxIterations}, on exhaustion ${config.qualityGate.onExhausted}`
      )
    );

    if (topicPath) {
      try {
        const topic = await loadTopicSpec(topicPath);
        pass(`Topic: ${topic.title}`);
      } catch (err) {
        fail(formatError(err));
        hasErrors = true;
      }
    }

    if (env.anthropicApiKey || process.env.ANTHROPIC_BASE_URL) {
      pass("Anthropic API key found");
    } else if (env.geminiApiKey) {
      pass("Gemini API key found (generator fallback)");
    } else {
      fail("No generator credentials: set ANTHROPIC_API_KEY or GEMINI_API_KEY");
      hasErrors = true;
    }

    if (!(await checkIndex(config))) hasErrors = true;

    try {
      const publisher = createPublisher(config.publishing);
      pass(`Publisher: ${publisher.platform} (${config.publishing.visibility})`);
      if (config.publishing.visibility === "scheduled" && !config.publishing.scheduledAt) {
        fail("publishing.scheduledAt is required for scheduled visibility");
        hasErrors = true;
      }
    } catch (err) {
      fail(`Publisher: ${formatError(err)}`);
      hasErrors = true;
    }

    if (env.runStore === "postgres") {
      if (process.env.DATABASE_URL) pass("DATABASE_URL set for the postgres run store");
      else {
        fail("RUN_STORE=postgres needs DATABASE_URL");
        hasErrors = true;
      }
    } else {
      pass(`Run store: ${env.runsDir}`);
    }
  } catch (err) {
    fail(`Config error: ${formatError(err)}`);
    hasErrors = true;
  }

  console.log();
  if (hasErrors) {
    console.log(chalk.red("  Validation failed. Fix the errors above before running."));
    process.exitCode = 1;
  } else {
    console.log(chalk.green("  All checks passed!"));
    console.log(`\n  Run: draftloom run ${topicPath ?? "<topic.yml>"} --dry-run`);
  }
  console.log();
}
