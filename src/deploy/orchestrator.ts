/**
 * Deployment orchestrator
 *
 * Drives one run through the pipeline:
 *
 *   Init → Authenticated → WorkspaceReady → AccessChecked → ItemsDiscovered
 *        → Deploying → Reported → Done
 *
 * Authentication, workspace, source and discovery failures end the run in
 * Failed. Once Deploying is entered a report is always produced, and the
 * source checkout is released on every exit path.
 */

import type { Logger } from "winston";
import type { EngineContext } from "#/core";
import type { TokenSource } from "#/auth";
import type { WorkspaceReconciler } from "#/workspace";
import type { AccessReconciler } from "#/access";
import {
  discoverArtifacts,
  partitionArtifacts,
  type ArtifactMaterializer,
  type DeployableArtifact,
  type DeploymentResult,
  type ExcludedArtifact,
} from "#/artifact";
import { checkoutSource, describeCheckout, type SourceCheckout } from "#/source";
import { resolvePrincipalId } from "#/config";
import type { DeployConfig } from "#/schemas";
import type { WorkspaceInfo } from "#/fabric";
import { DiscoveryError, errorMessage, type AccessWarning } from "#/errors";
import { componentLogger } from "#/logging";
import { buildReport, resolveReportPath, writeReport } from "./report";
import type { DeploymentOutcome, DeploymentReport, DeploymentState } from "./deploy.types";

const TOTAL_STEPS = 6;

export interface OrchestratorComponents {
  tokens: TokenSource;
  workspaces: WorkspaceReconciler;
  access: AccessReconciler;
  materializer: ArtifactMaterializer;
}

interface ResolvedWorkspaces {
  target: WorkspaceInfo;
  source?: WorkspaceInfo;
}

interface ReportedRun {
  report: DeploymentReport;
  reportPath?: string;
}

export class DeploymentOrchestrator {
  private state: DeploymentState = "Init";
  private warnings: AccessWarning[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly ctx: EngineContext,
    private readonly config: DeployConfig,
    private readonly components: OrchestratorComponents
  ) {
    this.logger = componentLogger(ctx.logger, "orchestrator");
  }

  get currentState(): DeploymentState {
    return this.state;
  }

  async run(): Promise<DeploymentOutcome> {
    const { observer } = this.ctx;
    let checkout: SourceCheckout | undefined;
    this.state = "Init";
    this.warnings = [];

    try {
      await this.authenticate();
      const workspaces = await this.ensureWorkspace();
      const workspace = workspaces.target;
      await this.checkAccess(workspace);

      checkout = await this.fetchSource();
      const { eligible, excluded } = this.discover(checkout);

      this.transition("Deploying");
      const results = await this.deployAll(eligible, workspace);

      const reported = this.report(checkout, workspaces, results, excluded);
      this.transition("Done");

      const success = reported.report.summary.failed === 0;
      return {
        state: this.state,
        report: reported.report,
        reportPath: reported.reportPath,
        warnings: this.warnings,
        success,
      };
    } catch (err) {
      const failedAt = this.state;
      this.state = "Failed";
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Deployment failed after ${failedAt}: ${error.message}`);
      observer.onError(error.message);
      return { state: this.state, failedAt, error, warnings: this.warnings, success: false };
    } finally {
      checkout?.release();
    }
  }

  private transition(next: DeploymentState): void {
    this.logger.debug(`${this.state} -> ${next}`);
    this.state = next;
  }

  private async authenticate(): Promise<void> {
    this.ctx.observer.onStep(1, TOTAL_STEPS, "Authenticating");
    await this.components.tokens.acquire();
    this.ctx.observer.onSuccess("Authenticated");
    this.transition("Authenticated");
  }

  private async ensureWorkspace(): Promise<ResolvedWorkspaces> {
    const { observer } = this.ctx;
    observer.onStep(2, TOTAL_STEPS, `Ensuring workspace ${this.config.targetWorkspaceName}`);

    let source: WorkspaceInfo | undefined;
    if (this.config.sourceWorkspaceId) {
      source = await this.components.workspaces.verify(this.config.sourceWorkspaceId, "Source");
      observer.onSuccess(`Source workspace ${source.displayName} is accessible`);
    }

    const { workspace, resolution } = await this.components.workspaces.ensure({
      name: this.config.targetWorkspaceName,
      capacityId: this.config.capacityId,
      explicitId: this.config.targetWorkspaceId,
    });

    observer.onSuccess(
      resolution === "created"
        ? `Created workspace ${workspace.displayName} (${workspace.id})`
        : `Using workspace ${workspace.displayName} (${workspace.id})`
    );
    this.transition("WorkspaceReady");
    return { target: workspace, ...(source ? { source } : {}) };
  }

  private async checkAccess(workspace: WorkspaceInfo): Promise<void> {
    const { observer } = this.ctx;
    observer.onStep(3, TOTAL_STEPS, "Checking workspace access");

    if (this.config.skipRoleAssignment) {
      observer.onInfo("Role assignment skipped");
    } else {
      const principalId = resolvePrincipalId(this.config);
      const result = await this.components.access.ensureRole({
        workspaceId: workspace.id,
        principalId,
        principalType: this.config.principalType,
        role: this.config.role,
      });

      if (result.warning) {
        this.warnings.push(result.warning);
        observer.onWarning(result.warning.message);
      } else if (result.assigned) {
        observer.onSuccess(`Assigned ${this.config.role} to ${principalId}`);
      } else {
        observer.onSuccess(`${principalId} already has access`);
      }
    }

    this.transition("AccessChecked");
  }

  private async fetchSource(): Promise<SourceCheckout> {
    this.ctx.observer.onStep(4, TOTAL_STEPS, "Discovering items");
    return checkoutSource(
      {
        fs: this.ctx.fs,
        fetcher: this.ctx.fetcher,
        paths: this.ctx.paths,
        logger: componentLogger(this.ctx.logger, "source"),
      },
      this.config.source
    );
  }

  private discover(checkout: SourceCheckout): { eligible: DeployableArtifact[]; excluded: ExcludedArtifact[] } {
    const { observer } = this.ctx;
    const folder = this.config.source.folder;

    const artifacts = discoverArtifacts(
      this.ctx.fs,
      checkout.root,
      folder,
      componentLogger(this.ctx.logger, "discovery")
    );
    const { eligible, excluded } = partitionArtifacts(artifacts, this.config.itemTypes);

    for (const entry of excluded) {
      observer.onWarning(
        entry.reason === "unknown-type"
          ? `Skipping unrecognized folder ${entry.folderName}`
          : `Skipping ${entry.folderName}: ${entry.type} not selected`
      );
    }

    if (eligible.length === 0) {
      throw new DiscoveryError(`No deployable items found in ${folder}`, { path: folder });
    }

    observer.onSuccess(`Found ${eligible.length} item(s) to deploy`);
    this.transition("ItemsDiscovered");
    return { eligible, excluded };
  }

  private async deployAll(artifacts: DeployableArtifact[], workspace: WorkspaceInfo): Promise<DeploymentResult[]> {
    const { observer, clock } = this.ctx;
    observer.onStep(5, TOTAL_STEPS, `Deploying ${artifacts.length} item(s)`);

    const results: DeploymentResult[] = [];
    for (const [index, artifact] of artifacts.entries()) {
      if (index > 0) {
        await clock.sleep(this.config.itemDelayMs);
      }

      observer.onInfo(`Deploying ${artifact.type} ${artifact.displayName}`);
      const result = await this.components.materializer.deploy(artifact, workspace.id);
      results.push(result);

      if (result.status === "Deployed") {
        observer.onSuccess(`Deployed ${artifact.displayName}`);
      } else if (result.status === "Skipped") {
        observer.onWarning(`Skipped ${artifact.displayName}: ${result.reason ?? "no reason given"}`);
      } else {
        observer.onError(`Failed ${artifact.displayName}: ${result.reason ?? "unknown error"}`);
      }
    }

    return results;
  }

  private report(
    checkout: SourceCheckout,
    workspaces: ResolvedWorkspaces,
    results: DeploymentResult[],
    excluded: ExcludedArtifact[]
  ): ReportedRun {
    const { observer, fs, clock, paths } = this.ctx;
    observer.onStep(6, TOTAL_STEPS, "Writing report");
    const { target, source } = workspaces;
    const sourceWorkspaceName = source?.displayName ?? this.config.sourceWorkspaceName;

    const report = buildReport({
      timestamp: new Date(clock.now()),
      source: {
        location: describeCheckout(checkout),
        branch: checkout.branch,
        folder: this.config.source.folder,
        ...(sourceWorkspaceName ? { workspaceName: sourceWorkspaceName } : {}),
        ...(source ? { workspaceId: source.id } : {}),
      },
      target: { workspaceName: target.displayName, workspaceId: target.id },
      results,
      excluded,
      accessWarnings: this.warnings,
    });
    this.transition("Reported");

    const reportPath = resolveReportPath(paths.workDir, this.config.reportPath);
    try {
      writeReport(fs, reportPath, report);
      observer.onSuccess(`Report written to ${reportPath}`);
      return { report, reportPath };
    } catch (err) {
      // The run itself is complete; only the archival copy is missing
      const message = `Could not write report to ${reportPath}: ${errorMessage(err)}`;
      this.logger.error(message);
      observer.onWarning(message);
      return { report };
    }
  }
}
