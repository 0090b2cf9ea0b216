/**
 * Fabric API types
 *
 * The abstract capability surface the reconcilers and the materializer
 * consume. Only FabricClient knows URLs and wire shapes.
 */

import type { CreatedItem, PrincipalType, RoleAssignmentInfo, WorkspaceInfo, WorkspaceRole } from "#/schemas";
import type { ItemType } from "#/item-types";

export type { CreatedItem, RoleAssignmentInfo, WorkspaceInfo } from "#/schemas";

/**
 * Outcome of one API call. A status of 0 means no response arrived
 * (network failure or timeout).
 */
export type ApiResult<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; body: string; error: string };

export interface CreateWorkspaceRequest {
  displayName: string;
  capacityId: string;
  description?: string;
}

export interface Principal {
  id: string;
  type: PrincipalType;
}

export type PayloadType = "InlineBase64";

export interface DefinitionPart {
  path: string;
  payload: string;
  payloadType: PayloadType;
}

export interface CreateItemRequest {
  displayName: string;
  type: ItemType;
  definition: { parts: DefinitionPart[] };
}

export interface FabricApi {
  getWorkspace(workspaceId: string): Promise<ApiResult<WorkspaceInfo>>;
  listWorkspaces(): Promise<ApiResult<WorkspaceInfo[]>>;
  createWorkspace(request: CreateWorkspaceRequest): Promise<ApiResult<WorkspaceInfo>>;
  listRoleAssignments(workspaceId: string): Promise<ApiResult<RoleAssignmentInfo[]>>;
  createRoleAssignment(workspaceId: string, principal: Principal, role: WorkspaceRole): Promise<ApiResult<null>>;
  /** data is null when the platform accepted the item without returning it (202) */
  createItem(workspaceId: string, request: CreateItemRequest): Promise<ApiResult<CreatedItem | null>>;
}

export interface FabricClientOptions {
  baseUrl?: string;
  readTimeoutMs?: number;
  itemTimeoutMs?: number;
  /** Upper bound on pages followed when listing */
  maxPages?: number;
}
