/**
 * Console output
 *
 * Colorized narration of a run and its summary. Everything goes through a
 * `write` function so commands stay testable.
 */

import chalk from "chalk";
import type { DeploymentObserver } from "#/core";
import type { DeploymentOutcome, DiscoveryPreview } from "#/deploy";
import type { DeploymentStatus } from "#/artifact";
import { errorMessage, isDeploymentError } from "#/errors";

export type WriteLine = (line: string) => void;

export function createConsoleObserver(write: WriteLine): DeploymentObserver {
  return {
    onStep: (step, total, title) => {
      write("");
      write(chalk.bold.cyan(`[${step}/${total}] ${title}`));
    },
    onInfo: (message) => write(`  ${chalk.gray("-")} ${message}`),
    onSuccess: (message) => write(`  ${chalk.green("✓")} ${message}`),
    onWarning: (message) => write(`  ${chalk.yellow("!")} ${message}`),
    onError: (message) => write(`  ${chalk.red("✗")} ${message}`),
  };
}

function statusColor(status: DeploymentStatus): (text: string) => string {
  switch (status) {
    case "Deployed":
      return chalk.green;
    case "Failed":
      return chalk.red;
    case "Skipped":
      return chalk.yellow;
  }
}

export function formatSummary(outcome: DeploymentOutcome): string[] {
  const lines: string[] = [""];

  if (!outcome.report) {
    lines.push(chalk.red.bold(`Deployment failed (${outcome.failedAt ?? outcome.state})`));
    if (outcome.error) lines.push(`  ${outcome.error.message}`);
    return lines;
  }

  const { summary, target, results } = outcome.report;
  lines.push(chalk.bold(`Deployment summary for ${target.workspaceName} (${target.workspaceId})`));
  for (const result of results) {
    const status = statusColor(result.status)(result.status.padEnd(8));
    const reason = result.reason ? chalk.gray(` ${result.reason}`) : "";
    lines.push(`  ${status} ${result.type.padEnd(13)} ${result.displayName}${reason}`);
  }
  lines.push("");
  lines.push(
    `  Total: ${summary.total}  ` +
      chalk.green(`Deployed: ${summary.successful}`) +
      "  " +
      chalk.red(`Failed: ${summary.failed}`) +
      "  " +
      chalk.yellow(`Skipped: ${summary.skipped}`)
  );

  if (outcome.warnings.length > 0) {
    lines.push(chalk.yellow(`  ${outcome.warnings.length} access warning(s)`));
  }
  if (outcome.reportPath) {
    lines.push(chalk.gray(`  Report: ${outcome.reportPath}`));
  }

  lines.push(outcome.success ? chalk.green.bold("Deployment completed") : chalk.red.bold("Deployment completed with failures"));
  return lines;
}

export function formatPreview(preview: DiscoveryPreview): string[] {
  const lines = [chalk.bold(`${preview.source} (${preview.branch})`)];

  for (const artifact of preview.eligible) {
    const definition = artifact.definitionPath ? "" : chalk.yellow(" (no definition file)");
    lines.push(`  ${chalk.green("+")} ${artifact.type.padEnd(13)} ${artifact.displayName}${definition}`);
  }
  for (const entry of preview.excluded) {
    const why = entry.reason === "unknown-type" ? "unrecognized" : `${entry.type} not selected`;
    lines.push(`  ${chalk.gray("-")} ${entry.folderName} ${chalk.gray(`(${why})`)}`);
  }

  lines.push("");
  lines.push(`${preview.eligible.length} deployable, ${preview.excluded.length} excluded`);
  return lines;
}

export function formatError(err: unknown): string[] {
  const lines = [chalk.red(`Error: ${errorMessage(err)}`)];
  if (isDeploymentError(err)) {
    const message = err.message;
    const unlisted = (err.details.issues ?? []).filter((issue) => !message.includes(issue));
    for (const issue of unlisted) {
      lines.push(chalk.gray(`  - ${issue}`));
    }
  }
  return lines;
}
