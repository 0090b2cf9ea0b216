import { z } from "zod";
import { ITEM_TYPES } from "#/item-types";
import { LOG_LEVELS } from "#/logging";
import {
  DEFAULT_ITEM_DELAY_MS,
  DEFAULT_REPORT_PATH,
  DEFAULT_SOURCE_BRANCH,
  DEFAULT_SOURCE_FOLDER,
} from "#/constants";

// Workspace roles, lowest privilege first
export const WORKSPACE_ROLES = ["Viewer", "Contributor", "Member", "Admin"] as const;
export const WorkspaceRoleSchema = z.enum(WORKSPACE_ROLES);
export type WorkspaceRole = z.infer<typeof WorkspaceRoleSchema>;

export const PRINCIPAL_TYPES = ["User", "Group", "ServicePrincipal", "ServicePrincipalProfile"] as const;
export const PrincipalTypeSchema = z.enum(PRINCIPAL_TYPES);
export type PrincipalType = z.infer<typeof PrincipalTypeSchema>;

export const ItemTypeSchema = z.enum(ITEM_TYPES);

// ---------------------------------------------------------------------------
// Identity endpoint
// ---------------------------------------------------------------------------

// Client-credentials token response (v2.0 endpoint sends expires_in as a number, v1 as a string)
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expires_in: z.coerce.number().int().positive(),
});
export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Fabric REST API
// ---------------------------------------------------------------------------

export const WorkspaceSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  description: z.string().optional(),
  type: z.string().optional(),
  capacityId: z.string().optional(),
});
export type WorkspaceInfo = z.infer<typeof WorkspaceSchema>;

// Paged list envelope; continuationUri is absent or null on the last page
function pagedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    continuationToken: z.string().nullish(),
    continuationUri: z.string().nullish(),
  });
}

export const WorkspaceListSchema = pagedSchema(WorkspaceSchema);

export const RoleAssignmentSchema = z.object({
  id: z.string().optional(),
  principal: z.object({
    id: z.string(),
    type: z.string(),
  }),
  role: z.string(),
});
export type RoleAssignmentInfo = z.infer<typeof RoleAssignmentSchema>;

export const RoleAssignmentListSchema = pagedSchema(RoleAssignmentSchema);

export const CreatedItemSchema = z.object({
  id: z.string(),
  displayName: z.string().optional(),
  type: z.string().optional(),
  workspaceId: z.string().optional(),
});
export type CreatedItem = z.infer<typeof CreatedItemSchema>;

// ---------------------------------------------------------------------------
// Deployment configuration
// ---------------------------------------------------------------------------

const RequiredString = z.string().trim().min(1);

export const SourceConfigSchema = z.object({
  // Local path, git URL, or github:/gitlab: shorthand
  location: RequiredString,
  branch: RequiredString.default(DEFAULT_SOURCE_BRANCH),
  // Subfolder whose immediate children are item folders
  folder: RequiredString.default(DEFAULT_SOURCE_FOLDER),
});
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export const DeployConfigSchema = z.object({
  tenantId: RequiredString,
  clientId: RequiredString,
  clientSecret: RequiredString,
  capacityId: RequiredString,
  targetWorkspaceName: RequiredString,
  targetWorkspaceId: RequiredString.optional(),
  sourceWorkspaceName: RequiredString.optional(),
  // Verified reachable before the target is touched
  sourceWorkspaceId: RequiredString.optional(),
  source: SourceConfigSchema,
  skipRoleAssignment: z.boolean().default(false),
  // Principal the role is reconciled for; the client id when absent
  principalId: RequiredString.optional(),
  principalType: PrincipalTypeSchema.default("ServicePrincipal"),
  role: WorkspaceRoleSchema.default("Admin"),
  // Restrict deployment to these types; every type when absent
  itemTypes: z.array(ItemTypeSchema).min(1).optional(),
  itemDelayMs: z.coerce.number().int().min(0).default(DEFAULT_ITEM_DELAY_MS),
  reportPath: RequiredString.default(DEFAULT_REPORT_PATH),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});
export type DeployConfig = z.infer<typeof DeployConfigSchema>;
export type DeployConfigInput = z.input<typeof DeployConfigSchema>;

// Shape accepted from the optional YAML config file: everything optional,
// validation of required keys happens after env and flags are merged in
export const DeployConfigFileSchema = DeployConfigSchema.deepPartial();
