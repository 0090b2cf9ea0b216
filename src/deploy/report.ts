import { dirname, isAbsolute, resolve } from "path";
import type { FileSystem } from "#/core";
import type { AccessWarning } from "#/errors";
import type { DeploymentResult, ExcludedArtifact } from "#/artifact";
import type { DeploymentReport, DeploymentSummary } from "./deploy.types";

export interface ReportInput {
  timestamp: Date;
  source: DeploymentReport["source"];
  target: DeploymentReport["target"];
  results: DeploymentResult[];
  excluded: ExcludedArtifact[];
  accessWarnings: AccessWarning[];
}

export function summarize(results: DeploymentResult[]): DeploymentSummary {
  return {
    total: results.length,
    successful: results.filter((r) => r.status === "Deployed").length,
    failed: results.filter((r) => r.status === "Failed").length,
    skipped: results.filter((r) => r.status === "Skipped").length,
  };
}

export function buildReport(input: ReportInput): DeploymentReport {
  const { results } = input;

  return {
    timestamp: input.timestamp.toISOString(),
    source: input.source,
    target: input.target,
    summary: summarize(results),
    failedItems: results.filter((r) => r.status === "Failed").map((r) => r.displayName),
    deployedItems: results
      .filter((r) => r.status === "Deployed")
      .map((r) => ({ name: r.displayName, type: r.type })),
    skippedItems: results
      .filter((r) => r.status === "Skipped")
      .map((r) => ({ name: r.displayName, reason: r.reason ?? "skipped" })),
    excludedFolders: input.excluded.map((e) => ({ folderName: e.folderName, reason: e.reason })),
    accessWarnings: input.accessWarnings,
    results,
  };
}

export function resolveReportPath(workDir: string, reportPath: string): string {
  return isAbsolute(reportPath) ? reportPath : resolve(workDir, reportPath);
}

/**
 * Write the report as indented JSON, creating the parent directory
 */
export function writeReport(fs: FileSystem, path: string, report: DeploymentReport): void {
  const dir = dirname(path);
  if (!fs.exists(dir)) {
    fs.mkdir(dir, { recursive: true });
  }
  fs.writeFile(path, JSON.stringify(report, null, 2) + "\n");
}
