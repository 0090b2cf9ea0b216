import type { WorkspaceInfo } from "#/fabric";

export interface EnsureWorkspaceRequest {
  name: string;
  capacityId: string;
  /** Known id of the target; tried first and used when creation conflicts */
  explicitId?: string;
}

/** How the workspace was established */
export type WorkspaceResolution = "found-by-id" | "found-by-name" | "created" | "conflict-resolved";

export interface EnsuredWorkspace {
  workspace: WorkspaceInfo;
  resolution: WorkspaceResolution;
}

export interface WorkspaceReconcilerOptions {
  /** Wait after creating a workspace before using it */
  provisioningDelayMs?: number;
}
