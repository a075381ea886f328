#!/usr/bin/env -S npx tsx

import { Command } from "commander";
import { ingestCommand } from "./commands/ingest.js";
import { searchCommand } from "./commands/search.js";
import { runCommand } from "./commands/run.js";
import { runsCommand, showCommand } from "./commands/runs.js";
import { retryCommand } from "./commands/retry.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("draftloom")
  .description("Retrieval-grounded long-form writing with a bounded critique loop")
  .version("0.1.0");

program
  .command("ingest <paths...>")
  .description("Add documents (.md, .txt, .pdf) to the knowledge base")
  .option("-c, --config <path>", "Pipeline config file")
  .action(ingestCommand);

program
  .command("search <query>")
  .description("Query the knowledge base")
  .option("-c, --config <path>", "Pipeline config file")
  .option("-k, --top-k <number>", "Number of chunks to return")
  .action(searchCommand);

program
  .command("run <topic-file>")
  .description("Run the pipeline for a topic file")
  .option("-c, --config <path>", "Pipeline config file")
  .option("--dry-run", "Generate content without publishing", false)
  .option("--approve", "Ask for confirmation before publishing", false)
  .action(runCommand);

program
  .command("runs")
  .description("List recorded runs")
  .action(runsCommand);

program
  .command("show <run-id>")
  .description("Show a recorded run")
  .action(showCommand);

program
  .command("retry <run-id>")
  .description("Resume a failed or cancelled run; --approve continues an escalated one")
  .option("-c, --config <path>", "Pipeline config file")
  .option("--approve", "Accept the last draft of an escalated run", false)
  .option("--dry-run", "Generate content without publishing", false)
  .action(retryCommand);

program
  .command("validate [topic-file]")
  .description("Validate config, topic, credentials and the saved index")
  .option("-c, --config <path>", "Pipeline config file")
  .action(validateCommand);

await program.parseAsync();
