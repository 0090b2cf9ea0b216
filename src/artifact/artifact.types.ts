import type { ArtifactType, ItemType } from "#/item-types";

/**
 * A source folder classified for deployment. Discovered fresh each run.
 */
export interface Artifact {
  displayName: string;
  type: ArtifactType;
  /** Folder name as found on disk, marker included */
  folderName: string;
  sourcePath: string;
  /** Definition file that will be uploaded, null when none was found */
  definitionPath: string | null;
}

/** An artifact whose type is deployable */
export type DeployableArtifact = Artifact & { type: ItemType };

export type ExclusionReason = "unknown-type" | "filtered";

export interface ExcludedArtifact {
  folderName: string;
  type: ArtifactType;
  reason: ExclusionReason;
}

export interface PartitionedArtifacts {
  eligible: DeployableArtifact[];
  excluded: ExcludedArtifact[];
}

export type DeploymentStatus = "Deployed" | "Failed" | "Skipped";

export interface DeploymentResult {
  displayName: string;
  type: ArtifactType;
  status: DeploymentStatus;
  reason?: string;
  httpStatus?: number;
  /** Response body of a failed call, truncated */
  responseBody?: string;
  itemId?: string;
}
