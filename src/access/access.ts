/**
 * Access reconciler
 *
 * Ensures a principal holds at least the requested role on a workspace.
 * Never throws: anything that goes wrong becomes an AccessWarning and the
 * deployment carries on, since the principal may already have access through
 * a group or as the workspace creator.
 */

import type { Logger } from "winston";
import type { FabricApi, RoleAssignmentInfo } from "#/fabric";
import { errorMessage, type AccessWarning } from "#/errors";
import { WORKSPACE_ROLES, type WorkspaceRole } from "#/schemas";
import type { AccessResult, EnsureRoleRequest } from "./access.types";

// The platform reports a duplicate binding this way instead of with a 409
const ALREADY_EXISTS_MARKER = "AccessAlreadyExists";

/**
 * Rank of a role name, -1 when the platform returned a role we don't know
 */
export function roleRank(role: string): number {
  return WORKSPACE_ROLES.findIndex((known) => known === role);
}

/**
 * Whether holding `held` satisfies a request for `requested`
 */
export function isSufficientRole(held: string, requested: WorkspaceRole): boolean {
  const rank = roleRank(held);
  return rank >= 0 && rank >= roleRank(requested);
}

export class AccessReconciler {
  constructor(
    private readonly fabric: FabricApi,
    private readonly logger: Logger
  ) {}

  async ensureRole(request: EnsureRoleRequest): Promise<AccessResult> {
    try {
      return await this.reconcile(request);
    } catch (err) {
      // Token failures land here when called outside the orchestrator
      return this.warn(request, `Role reconciliation failed: ${errorMessage(err)}`);
    }
  }

  private async reconcile(request: EnsureRoleRequest): Promise<AccessResult> {
    const { workspaceId, principalId, principalType, role } = request;

    const existing = await this.findBinding(workspaceId, principalId);
    if (existing && isSufficientRole(existing.role, role)) {
      this.logger.info(`Principal ${principalId} already holds ${existing.role} on ${workspaceId}`);
      return { confirmed: true, assigned: false, existingRole: existing.role };
    }

    this.logger.info(`Assigning ${role} on ${workspaceId} to ${principalType} ${principalId}`);
    const created = await this.fabric.createRoleAssignment(
      workspaceId,
      { id: principalId, type: principalType },
      role
    );

    if (created.ok) {
      return { confirmed: true, assigned: true, existingRole: existing?.role };
    }

    if (created.body.includes(ALREADY_EXISTS_MARKER)) {
      this.logger.info(`Principal ${principalId} already has access to ${workspaceId}`);
      return { confirmed: true, assigned: false, existingRole: existing?.role };
    }

    const reason =
      created.status === 403
        ? "insufficient permission to manage workspace access"
        : created.error;
    return {
      ...this.warn(request, `Could not assign ${role} to ${principalId}: ${reason}`, created.status),
      existingRole: existing?.role,
    };
  }

  private async findBinding(workspaceId: string, principalId: string): Promise<RoleAssignmentInfo | undefined> {
    const listed = await this.fabric.listRoleAssignments(workspaceId);
    if (!listed.ok) {
      // Reading assignments needs Admin; treat an unreadable list as empty
      this.logger.debug(`Role assignments unreadable (${listed.status}); assuming none`);
      return undefined;
    }
    return listed.data.find((assignment) => assignment.principal.id === principalId);
  }

  private warn(request: EnsureRoleRequest, message: string, status?: number): AccessResult {
    const warning: AccessWarning = {
      workspaceId: request.workspaceId,
      principalId: request.principalId,
      message,
      ...(status === undefined ? {} : { status }),
    };
    this.logger.warn(message);
    return { confirmed: false, assigned: false, warning };
  }
}
