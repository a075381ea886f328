import { formatError } from "@draftloom/core";
import chalk from "chalk";
import Table from "cli-table3";
import { openRunStore } from "../context.js";
import { outcomeLines, nextStep, runRow, statusColor } from "../format.js";

export async function runsCommand() {
  try {
    const { store, close } = await openRunStore();
    try {
      const runs = await store.list();

      if (runs.length === 0) {
        console.log(chalk.yellow("\nNo runs recorded yet. Run: draftloom run <topic.yml>\n"));
        return;
      }

      const table = new Table({
        head: [
          chalk.blue("Run"),
          chalk.blue("Title"),
          chalk.blue("Status"),
          chalk.blue("Last Stage"),
          chalk.blue("Revisions"),
          chalk.blue("Score"),
          chalk.blue("Error / URL"),
          chalk.blue("Persisted"),
        ],
      });
      for (const run of runs) table.push(runRow(run));

      console.log(`\n${table.toString()}\n`);
    } finally {
      await close();
    }
  } catch (err) {
    console.log(chalk.red(`Error: ${formatError(err)}`));
    process.exitCode = 1;
  }
}

export async function showCommand(runId: string) {
  try {
    const { store, close } = await openRunStore();
    try {
      const run = await store.load(runId);
      if (!run) {
        console.log(chalk.red(`No run found with id ${runId}`));
        process.exitCode = 1;
        return;
      }

      const { state } = run;
      console.log(chalk.blue(`\n${state.topic.title}\n`));
      for (const line of outcomeLines(state)) {
        console.log(`  ${line.startsWith("Status:") ? statusColor(state.status)(line) : line}`);
      }
      console.log(`  Persisted:  ${run.persistedAt}`);

      if (state.critiques.length > 0) {
        const table = new Table({
          head: [chalk.blue("Attempt"), chalk.blue("Score"), chalk.blue("Decision"), chalk.blue("Issues")],
        });
        for (const critique of state.critiques) {
          table.push([
            String(critique.attempt),
            critique.score.toFixed(2),
            critique.decision,
            critique.issues.slice(0, 3).map((i) => `${i.kind}: ${i.message}`).join("\n") || "-",
          ]);
        }
        console.log(`\n${table.toString()}`);
      }

      if (state.transitions.length > 0) {
        console.log(chalk.dim(`\n  ${state.transitions.map((t) => `${t.from} -> ${t.to}`).join(", ")}`));
      }

      const hint = nextStep(state);
      if (hint) console.log(chalk.dim(`\n  Next: ${hint}`));
      console.log();
    } finally {
      await close();
    }
  } catch (err) {
    console.log(chalk.red(`Error: ${formatError(err)}`));
    process.exitCode = 1;
  }
}
