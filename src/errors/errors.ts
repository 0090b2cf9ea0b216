export type DeploymentErrorCode =
  | "CONFIGURATION" // required settings missing or malformed
  | "AUTHENTICATION" // identity endpoint rejected the credentials or was unreachable
  | "WORKSPACE" // no usable target workspace could be established
  | "SOURCE_FETCH" // the source tree could not be retrieved
  | "DISCOVERY" // source folder absent or holds nothing deployable
  | "ITEM"; // a single artifact failed to deploy

export interface DeploymentErrorDetails {
  status?: number;
  body?: string;
  issues?: string[];
  workspace?: string;
  artifact?: string;
  path?: string;
}

export class DeploymentError extends Error {
  constructor(
    public readonly code: DeploymentErrorCode,
    message: string,
    public readonly details: DeploymentErrorDetails = {},
  ) {
    super(message);
    this.name = "DeploymentError";
  }
}

export class ConfigurationError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("CONFIGURATION", message, details);
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("AUTHENTICATION", message, details);
    this.name = "AuthenticationError";
  }
}

export class WorkspaceError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("WORKSPACE", message, details);
    this.name = "WorkspaceError";
  }
}

export class SourceFetchError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("SOURCE_FETCH", message, details);
    this.name = "SourceFetchError";
  }
}

export class DiscoveryError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("DISCOVERY", message, details);
    this.name = "DiscoveryError";
  }
}

export class ItemError extends DeploymentError {
  constructor(message: string, details?: DeploymentErrorDetails) {
    super("ITEM", message, details);
    this.name = "ItemError";
  }
}

/**
 * Role reconciliation could not be confirmed. Never thrown: the run carries
 * on and the warning ends up in the outcome and the report.
 */
export interface AccessWarning {
  workspaceId: string;
  principalId: string;
  message: string;
  status?: number;
}

export function isDeploymentError(value: unknown): value is DeploymentError {
  return value instanceof DeploymentError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
