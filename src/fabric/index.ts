export { FabricClient } from "./client";
export type {
  ApiResult,
  CreatedItem,
  CreateItemRequest,
  CreateWorkspaceRequest,
  DefinitionPart,
  FabricApi,
  FabricClientOptions,
  PayloadType,
  Principal,
  RoleAssignmentInfo,
  WorkspaceInfo,
} from "./fabric.types";
