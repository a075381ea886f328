import type { PersistedRun, PipelineState, RunStatus } from "@draftloom/core";
import chalk from "chalk";

export function statusColor(status: RunStatus): (text: string) => string {
  switch (status) {
    case "done":
      return chalk.green;
    case "escalated":
      return chalk.yellow;
    case "cancelled":
      return chalk.gray;
    case "failed":
      return chalk.red;
    case "running":
      return chalk.blue;
  }
}

export function formatScore(score: number | undefined): string {
  return score === undefined ? "-" : score.toFixed(2);
}

/** Plain-text outcome lines for a finished run. */
export function outcomeLines(state: PipelineState): string[] {
  const lastCritique = state.critiques.at(-1);
  const lines = [
    `Run:        ${state.runId}`,
    `Status:     ${state.status}`,
    `Last stage: ${state.lastStage ?? "-"}`,
    `Revisions:  ${state.loopCount}`,
    `Score:      ${formatScore(lastCritique?.score)}`,
  ];

  if (state.error) {
    lines.push(`Error:      ${state.error.errorClass} in ${state.error.stage}: ${state.error.message}`);
  }
  if (state.publish) {
    lines.push(`Published:  ${state.publish.url} (${state.publish.visibility})`);
  }
  for (const warning of state.warnings) {
    lines.push(`Warning:    ${warning}`);
  }
  return lines;
}

/** What a user can do next with a run that did not finish. */
export function nextStep(state: PipelineState): string | undefined {
  switch (state.status) {
    case "failed":
    case "cancelled":
      return `draftloom retry ${state.runId}`;
    case "escalated":
      return `draftloom retry ${state.runId} --approve`;
    default:
      return undefined;
  }
}

export function printOutcome(state: PipelineState): void {
  const color = statusColor(state.status);
  console.log();
  for (const line of outcomeLines(state)) {
    console.log(`  ${line.startsWith("Status:") ? color(line) : line}`);
  }
  const hint = nextStep(state);
  if (hint) console.log(chalk.dim(`\n  Next: ${hint}`));
  console.log();
}

export function runRow(run: PersistedRun): string[] {
  const { summary } = run;
  return [
    summary.runId,
    summary.title,
    statusColor(summary.status)(summary.status),
    summary.lastStage ?? "-",
    String(summary.loopCount),
    formatScore(summary.lastCritique?.score),
    summary.errorClass ?? summary.publishedUrl ?? "",
    run.persistedAt,
  ];
}
