/**
 * Artifact module
 *
 * Folder classification, discovery and materialization of Fabric items.
 */

export * from "./artifact.types";
export { classifyFolderName, type FolderClassification } from "./naming";
export { definitionCandidates, resolveDefinitionFile } from "./definition";
export { discoverArtifacts, isDeployable, partitionArtifacts } from "./discovery";
export { ArtifactMaterializer, buildCreateItemRequest, truncateBody } from "./materializer";
