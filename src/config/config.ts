/**
 * Configuration loading
 *
 * Layers, lowest precedence first: YAML file, environment, overrides.
 * The merged result is validated once so every problem is reported together.
 */

import type { z } from "zod";
import { DeployConfigFileSchema, DeployConfigSchema, type DeployConfig } from "#/schemas";
import { formatZodIssues, safeParseYaml } from "#/friendly-errors";
import { ConfigurationError } from "#/errors";
import type { Environment, LoadConfigOptions } from "./config.types";

type ConfigRecord = { [key: string]: unknown };

/**
 * Environment variable feeding each config key
 */
export const ENV_KEYS = {
  tenantId: "FABRIC_TENANT_ID",
  clientId: "FABRIC_CLIENT_ID",
  clientSecret: "FABRIC_CLIENT_SECRET",
  capacityId: "FABRIC_CAPACITY_ID",
  targetWorkspaceName: "TARGET_WORKSPACE_NAME",
  targetWorkspaceId: "TARGET_WORKSPACE_ID",
  sourceWorkspaceName: "SOURCE_WORKSPACE_NAME",
  sourceWorkspaceId: "SOURCE_WORKSPACE_ID",
  "source.location": "SOURCE_LOCATION",
  "source.branch": "SOURCE_BRANCH",
  "source.folder": "SOURCE_FOLDER",
  skipRoleAssignment: "SKIP_ROLE_ASSIGNMENT",
  principalId: "PRINCIPAL_ID",
  principalType: "PRINCIPAL_TYPE",
  role: "WORKSPACE_ROLE",
  itemTypes: "ITEM_TYPES",
  itemDelayMs: "ITEM_DELAY_MS",
  reportPath: "REPORT_PATH",
  logLevel: "LOG_LEVEL",
} as const;

type ConfigKey = keyof typeof ENV_KEYS;

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(ENV_KEYS, key);
}

/**
 * Label for an issue path, naming the env var that sets it
 */
export function describeConfigPath(path: string): string {
  // A missing source block is reported against its one required key
  const key = path === "source" ? "source.location" : path;
  if (isConfigKey(key)) return `${key} (${ENV_KEYS[key]})`;

  // Array elements, e.g. itemTypes.1
  const parent = Object.keys(ENV_KEYS).find((candidate) => path.startsWith(`${candidate}.`));
  return parent && isConfigKey(parent) ? `${path} (${ENV_KEYS[parent]})` : path;
}

export function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  // Left as-is so validation reports it
  return value;
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function setPath(target: ConfigRecord, path: string, value: unknown): void {
  const [head, ...rest] = path.split(".");
  if (head === undefined) return;

  if (rest.length === 0) {
    target[head] = value;
    return;
  }

  const current = target[head];
  const child = isRecord(current) ? current : {};
  target[head] = child;
  setPath(child, rest.join("."), value);
}

/**
 * Build a config layer from environment variables. Empty values count as unset.
 */
export function configFromEnv(env: Environment): ConfigRecord {
  const layer: ConfigRecord = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === "") continue;

    let value: unknown = raw.trim();
    if (key === "skipRoleAssignment") value = parseBoolean(raw);
    if (key === "itemTypes") value = parseList(raw);

    setPath(layer, key, value);
  }

  return layer;
}

/**
 * Deep-merge layers left to right. Undefined values never overwrite.
 */
export function mergeLayers(...layers: unknown[]): ConfigRecord {
  const merged: ConfigRecord = {};

  for (const layer of layers) {
    if (!isRecord(layer)) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const existing = merged[key];
      merged[key] = isRecord(value) ? mergeLayers(isRecord(existing) ? existing : {}, value) : value;
    }
  }

  return merged;
}

function parseFileLayer(content: string, filePath: string | undefined): ConfigRecord {
  const result = safeParseYaml(content, DeployConfigFileSchema, filePath);
  if (!result.success) {
    throw new ConfigurationError(result.error.message, {
      issues: result.error.details ?? [],
      path: filePath,
    });
  }
  return result.data;
}

function invalidConfiguration(error: z.ZodError): ConfigurationError {
  const issues = formatZodIssues(error, describeConfigPath);
  return new ConfigurationError(
    `Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    { issues }
  );
}

/**
 * Load and validate the deployment configuration.
 *
 * @throws ConfigurationError listing every missing or malformed setting
 */
export function loadConfig(options: LoadConfigOptions = {}): DeployConfig {
  const fileLayer = options.fileContent === undefined ? {} : parseFileLayer(options.fileContent, options.filePath);
  const envLayer = configFromEnv(options.env ?? {});
  const merged = mergeLayers(fileLayer, envLayer, options.overrides);

  const parsed = DeployConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw invalidConfiguration(parsed.error);
  }

  return parsed.data;
}

/**
 * Principal whose workspace role is reconciled: the configured one, or the
 * deploying service principal itself.
 */
export function resolvePrincipalId(config: DeployConfig): string {
  return config.principalId ?? config.clientId;
}

const SourceOnlySchema = DeployConfigSchema.pick({ source: true, itemTypes: true });
export type SourceOnlyConfig = z.infer<typeof SourceOnlySchema>;

/**
 * Load just the source settings, for commands that never authenticate
 *
 * @throws ConfigurationError
 */
export function loadSourceConfig(options: LoadConfigOptions = {}): SourceOnlyConfig {
  const fileLayer = options.fileContent === undefined ? {} : parseFileLayer(options.fileContent, options.filePath);
  const merged = mergeLayers(fileLayer, configFromEnv(options.env ?? {}), options.overrides);

  const parsed = SourceOnlySchema.safeParse(merged);
  if (!parsed.success) {
    throw invalidConfiguration(parsed.error);
  }
  return parsed.data;
}
