import type { z } from "zod";
import type { DeployConfigFileSchema } from "#/schemas";

/** One layer of settings; every key optional */
export type ConfigLayer = z.input<typeof DeployConfigFileSchema>;

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Environment;
  /** Raw YAML of the config file, when one was found */
  fileContent?: string;
  filePath?: string;
  /** Highest-precedence values, typically CLI flags */
  overrides?: ConfigLayer;
}
