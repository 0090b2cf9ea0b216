import type { AccessWarning } from "#/errors";
import type { ArtifactType } from "#/item-types";
import type {
  Artifact,
  DeploymentResult,
  ExcludedArtifact,
  ExclusionReason,
} from "#/artifact";

export type DeploymentState =
  | "Init"
  | "Authenticated"
  | "WorkspaceReady"
  | "AccessChecked"
  | "ItemsDiscovered"
  | "Deploying"
  | "Reported"
  | "Done"
  | "Failed";

export interface DeploymentSummary {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface DeploymentReport {
  timestamp: string;
  source: {
    location: string;
    branch: string;
    folder: string;
    workspaceName?: string;
    workspaceId?: string;
  };
  target: {
    workspaceName: string;
    workspaceId: string;
  };
  summary: DeploymentSummary;
  failedItems: string[];
  deployedItems: { name: string; type: ArtifactType }[];
  skippedItems: { name: string; reason: string }[];
  excludedFolders: { folderName: string; reason: ExclusionReason }[];
  accessWarnings: AccessWarning[];
  results: DeploymentResult[];
}

export interface DeploymentOutcome {
  state: DeploymentState;
  /** Last state reached before failing, when state is Failed */
  failedAt?: DeploymentState;
  report?: DeploymentReport;
  /** Where the report was written, when writing succeeded */
  reportPath?: string;
  error?: Error;
  warnings: AccessWarning[];
  /** Reached Done with no failed items */
  success: boolean;
}

export interface DiscoveryPreview {
  source: string;
  branch: string;
  artifacts: Artifact[];
  eligible: Artifact[];
  excluded: ExcludedArtifact[];
}
