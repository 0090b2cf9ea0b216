/**
 * Workspace reconciler
 *
 * Makes sure the target workspace exists: look it up by id, then by name,
 * and create it only when neither finds it.
 */

import type { Logger } from "winston";
import type { Clock } from "#/core";
import type { FabricApi, WorkspaceInfo } from "#/fabric";
import { WorkspaceError } from "#/errors";
import { WORKSPACE_PROVISIONING_DELAY_MS } from "#/constants";
import type {
  EnsuredWorkspace,
  EnsureWorkspaceRequest,
  WorkspaceReconcilerOptions,
} from "./workspace.types";

export function workspaceDescription(name: string): string {
  return `Production workspace for ${name}, managed by fabric-promote`;
}

function accessFailureReason(status: number, error: string): string {
  switch (status) {
    case 401:
      return "unauthorized, check the client credentials";
    case 403:
      return "access denied, the principal is not a member";
    case 404:
      return "workspace not found";
    default:
      return error;
  }
}

export class WorkspaceReconciler {
  private readonly provisioningDelayMs: number;

  constructor(
    private readonly fabric: FabricApi,
    private readonly clock: Clock,
    private readonly logger: Logger,
    options: WorkspaceReconcilerOptions = {}
  ) {
    this.provisioningDelayMs = options.provisioningDelayMs ?? WORKSPACE_PROVISIONING_DELAY_MS;
  }

  /**
   * Resolve the target workspace, creating it when absent.
   * Throws WorkspaceError when no usable workspace can be established.
   */
  async ensure(request: EnsureWorkspaceRequest): Promise<EnsuredWorkspace> {
    const { name, capacityId, explicitId } = request;

    if (explicitId) {
      const byId = await this.fabric.getWorkspace(explicitId);
      if (byId.ok && byId.status === 200) {
        this.logger.info(`Using workspace ${byId.data.displayName} (${byId.data.id})`);
        return { workspace: byId.data, resolution: "found-by-id" };
      }
      this.logger.debug(`Workspace ${explicitId} not reachable by id (${byId.status}), searching by name`);
    }

    const byName = await this.findByName(name);
    if (byName) {
      this.logger.info(`Found existing workspace ${name} (${byName.id})`);
      return { workspace: byName, resolution: "found-by-name" };
    }

    this.logger.info(`Creating workspace ${name} on capacity ${capacityId}`);
    const created = await this.fabric.createWorkspace({
      displayName: name,
      capacityId,
      description: workspaceDescription(name),
    });

    if (created.ok) {
      // Newly created workspaces reject item calls for a moment
      await this.clock.sleep(this.provisioningDelayMs);
      this.logger.info(`Created workspace ${name} (${created.data.id})`);
      return { workspace: created.data, resolution: "created" };
    }

    if (created.status === 409) {
      return this.resolveConflict(name, capacityId, explicitId);
    }

    throw new WorkspaceError(`Failed to create workspace ${name}: ${created.error}`, {
      status: created.status,
      body: created.body,
      workspace: name,
    });
  }

  /**
   * Confirm an existing workspace is reachable by id. Never creates.
   * Throws WorkspaceError on anything but 200.
   */
  async verify(workspaceId: string, label: string): Promise<WorkspaceInfo> {
    const result = await this.fabric.getWorkspace(workspaceId);
    if (result.ok && result.status === 200) {
      this.logger.info(`${label} workspace ${result.data.displayName} (${result.data.id}) is accessible`);
      return result.data;
    }

    const reason = result.ok ? `unexpected status ${result.status}` : accessFailureReason(result.status, result.error);
    throw new WorkspaceError(`Cannot access ${label.toLowerCase()} workspace ${workspaceId}: ${reason}`, {
      status: result.status,
      ...(result.ok ? {} : { body: result.body }),
      workspace: workspaceId,
    });
  }

  private async findByName(name: string): Promise<WorkspaceInfo | undefined> {
    const listed = await this.fabric.listWorkspaces();
    if (!listed.ok) {
      this.logger.warn(`Could not list workspaces (${listed.status}); treating ${name} as absent`);
      return undefined;
    }
    return listed.data.find((workspace) => workspace.displayName === name);
  }

  private async resolveConflict(
    name: string,
    capacityId: string,
    explicitId: string | undefined
  ): Promise<EnsuredWorkspace> {
    if (explicitId) {
      this.logger.warn(`Workspace ${name} already exists; using configured id ${explicitId}`);
      return {
        workspace: { id: explicitId, displayName: name, capacityId },
        resolution: "conflict-resolved",
      };
    }

    this.logger.warn(`Workspace ${name} already exists but was not listed; searching again`);
    const retried = await this.findByName(name);
    if (retried) {
      return { workspace: retried, resolution: "conflict-resolved" };
    }

    throw new WorkspaceError(
      `Workspace ${name} already exists but is not visible to this principal; set its id explicitly`,
      { status: 409, workspace: name }
    );
  }
}
