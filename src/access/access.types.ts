import type { AccessWarning } from "#/errors";
import type { PrincipalType, WorkspaceRole } from "#/schemas";

export interface EnsureRoleRequest {
  workspaceId: string;
  principalId: string;
  principalType: PrincipalType;
  role: WorkspaceRole;
}

export interface AccessResult {
  /** A sufficient binding exists (found, created, or reported as already present) */
  confirmed: boolean;
  /** A role assignment call was made and accepted */
  assigned: boolean;
  /** Role held before reconciliation, when the listing showed one */
  existingRole?: string;
  warning?: AccessWarning;
}
