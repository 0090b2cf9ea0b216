/**
 * Artifact materializer
 *
 * Uploads one artifact's definition file as a new item in the target
 * workspace. Every outcome, including thrown errors, becomes a
 * DeploymentResult; nothing propagates to the caller.
 */

import { basename } from "path";
import type { Logger } from "winston";
import type { FileSystem } from "#/core";
import type { CreateItemRequest, FabricApi } from "#/fabric";
import { ItemError, errorMessage, isDeploymentError } from "#/errors";
import { MAX_RESPONSE_BODY_LENGTH } from "#/constants";
import type { Artifact, DeployableArtifact, DeploymentResult } from "./artifact.types";
import { isDeployable } from "./discovery";

export function truncateBody(body: string, max = MAX_RESPONSE_BODY_LENGTH): string {
  return body.length > max ? body.slice(0, max) : body;
}

/**
 * Build the create-item payload: a single inline base64 part named after the
 * definition file.
 */
export function buildCreateItemRequest(
  artifact: DeployableArtifact,
  definitionPath: string,
  content: Buffer
): CreateItemRequest {
  return {
    displayName: artifact.displayName,
    type: artifact.type,
    definition: {
      parts: [
        {
          path: basename(definitionPath),
          payload: content.toString("base64"),
          payloadType: "InlineBase64",
        },
      ],
    },
  };
}

export class ArtifactMaterializer {
  constructor(
    private readonly fabric: FabricApi,
    private readonly fs: FileSystem,
    private readonly logger: Logger
  ) {}

  async deploy(artifact: Artifact, workspaceId: string): Promise<DeploymentResult> {
    const base = { displayName: artifact.displayName, type: artifact.type };

    if (!isDeployable(artifact)) {
      return { ...base, status: "Skipped", reason: "unknown item type" };
    }

    if (!artifact.definitionPath) {
      this.logger.warn(`No definition file for ${artifact.type} ${artifact.displayName}`);
      return { ...base, status: "Skipped", reason: "definition not found" };
    }

    try {
      const itemId = await this.create(artifact, artifact.definitionPath, workspaceId);
      this.logger.info(`Deployed ${artifact.type} ${artifact.displayName}`);
      return itemId ? { ...base, status: "Deployed", itemId } : { ...base, status: "Deployed" };
    } catch (err) {
      const result: DeploymentResult = { ...base, status: "Failed", reason: errorMessage(err) };
      if (isDeploymentError(err)) {
        if (err.details.status !== undefined) result.httpStatus = err.details.status;
        if (err.details.body) result.responseBody = truncateBody(err.details.body);
      }
      this.logger.error(`Failed to deploy ${artifact.type} ${artifact.displayName}: ${result.reason}`);
      return result;
    }
  }

  private async create(
    artifact: DeployableArtifact,
    definitionPath: string,
    workspaceId: string
  ): Promise<string | undefined> {
    let content: Buffer;
    try {
      content = this.fs.readFileBinary(definitionPath);
    } catch (err) {
      throw new ItemError(`Could not read ${definitionPath}: ${errorMessage(err)}`, {
        artifact: artifact.displayName,
        path: definitionPath,
      });
    }

    const request = buildCreateItemRequest(artifact, definitionPath, content);
    const result = await this.fabric.createItem(workspaceId, request);

    if (result.ok) {
      return result.data?.id;
    }

    throw new ItemError(describeFailure(result.status, result.error), {
      status: result.status,
      body: result.body,
      artifact: artifact.displayName,
    });
  }
}

function describeFailure(status: number, error: string): string {
  if (status === 401 || status === 403) {
    return `Missing permission to create items in the workspace (${status})`;
  }
  if (status === 0) {
    return error;
  }
  return `Item creation rejected: ${error}`;
}
