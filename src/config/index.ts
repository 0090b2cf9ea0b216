export * from "./config.types";
export {
  ENV_KEYS,
  configFromEnv,
  describeConfigPath,
  loadConfig,
  loadSourceConfig,
  mergeLayers,
  parseBoolean,
  parseList,
  resolvePrincipalId,
  type SourceOnlyConfig,
} from "./config";
