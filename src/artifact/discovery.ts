/**
 * Artifact discovery
 *
 * Classifies the immediate child folders of the source folder. Nothing here
 * touches the remote platform.
 */

import { join } from "path";
import type { Logger } from "winston";
import type { FileSystem } from "#/core";
import type { ItemType } from "#/item-types";
import { DiscoveryError, errorMessage } from "#/errors";
import { createSilentLogger } from "#/logging";
import { DEFAULT_SOURCE_FOLDER } from "#/constants";
import { classifyFolderName } from "./naming";
import { resolveDefinitionFile } from "./definition";
import type {
  Artifact,
  DeployableArtifact,
  ExcludedArtifact,
  PartitionedArtifacts,
} from "./artifact.types";

export function isDeployable(artifact: Artifact): artifact is DeployableArtifact {
  return artifact.type !== "Unknown";
}

/**
 * Scan `<root>/<folder>` and return one artifact per child directory, in
 * directory-listing order. Plain files are ignored.
 *
 * @throws DiscoveryError when the source folder does not exist
 */
export function discoverArtifacts(
  fs: FileSystem,
  root: string,
  folder: string = DEFAULT_SOURCE_FOLDER,
  logger: Logger = createSilentLogger()
): Artifact[] {
  const sourceDir = join(root, folder);

  if (!fs.exists(sourceDir) || !fs.stat(sourceDir).isDirectory) {
    throw new DiscoveryError(`Source folder not found: ${sourceDir}`, { path: sourceDir });
  }

  const artifacts: Artifact[] = [];

  for (const entry of fs.readdir(sourceDir)) {
    const sourcePath = join(sourceDir, entry);
    let isDirectory: boolean;
    try {
      isDirectory = fs.stat(sourcePath).isDirectory;
    } catch (err) {
      // Dangling symlinks and entries removed mid-scan
      logger.warn(`Skipping unreadable entry ${entry}: ${errorMessage(err)}`);
      continue;
    }
    if (!isDirectory) continue;

    const { type, displayName } = classifyFolderName(entry);
    const definitionPath = resolveDefinitionFile(fs, sourcePath, type, displayName);

    if (type === "Unknown") {
      logger.warn(`Unrecognized folder type: ${entry}`);
    } else {
      logger.debug(`Found ${type} ${displayName}`, { definitionPath });
    }

    artifacts.push({ displayName, type, folderName: entry, sourcePath, definitionPath });
  }

  logger.info(`Discovered ${artifacts.length} folder(s) in ${sourceDir}`);
  return artifacts;
}

/**
 * Split discovered artifacts into those to materialize and those to leave
 * out: Unknown types always, and types outside `itemTypes` when given.
 */
export function partitionArtifacts(
  artifacts: Artifact[],
  itemTypes?: readonly ItemType[]
): PartitionedArtifacts {
  const eligible: DeployableArtifact[] = [];
  const excluded: ExcludedArtifact[] = [];

  for (const artifact of artifacts) {
    if (!isDeployable(artifact)) {
      excluded.push({ folderName: artifact.folderName, type: artifact.type, reason: "unknown-type" });
    } else if (itemTypes && !itemTypes.includes(artifact.type)) {
      excluded.push({ folderName: artifact.folderName, type: artifact.type, reason: "filtered" });
    } else {
      eligible.push(artifact);
    }
  }

  return { eligible, excluded };
}
