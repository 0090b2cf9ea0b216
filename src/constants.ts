/**
 * Global constants for the Fabric deployment engine
 */

export const FABRIC_API_URL = "https://api.fabric.microsoft.com/v1";
export const AUTHORITY_HOST = "https://login.microsoftonline.com";

// Audience the client-credentials grant requests a token for
export const FABRIC_SCOPE = "https://api.fabric.microsoft.com/.default";

// Cached tokens are treated as expired this long before their real expiry
export const TOKEN_SAFETY_MARGIN_MS = 300_000;

export const READ_TIMEOUT_MS = 10_000;
export const ITEM_CREATE_TIMEOUT_MS = 30_000;
export const TOKEN_TIMEOUT_MS = 30_000;
export const CLONE_TIMEOUT_MS = 60_000;

export const DEFAULT_ITEM_DELAY_MS = 2_000;
export const WORKSPACE_PROVISIONING_DELAY_MS = 2_000;

export const DEFAULT_SOURCE_FOLDER = "Development";
export const DEFAULT_SOURCE_BRANCH = "main";
export const DEFAULT_REPORT_PATH = "deployment_report.json";
export const DEFAULT_CONFIG_FILE = "fabric-promote.yaml";

// Response bodies kept on failed results are cut to this many characters
export const MAX_RESPONSE_BODY_LENGTH = 500;

export const USER_AGENT = "fabric-promote";
export const VERSION = "0.1.0";
