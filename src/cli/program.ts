import { resolve } from "path";
import { Command, InvalidArgumentError } from "commander";
import type { Logger } from "winston";
import type { Clock, EngineContext, FileSystem, HttpClient, RepositoryFetcher } from "#/core";
import { loadConfig, loadSourceConfig, type ConfigLayer, type Environment } from "#/config";
import { createDeployment, previewDiscovery } from "#/deploy";
import { ConfigurationError } from "#/errors";
import { isItemType, type ItemType, ITEM_TYPES } from "#/item-types";
import { LOG_LEVELS, createLogger, type LogLevel } from "#/logging";
import { DEFAULT_CONFIG_FILE, VERSION } from "#/constants";
import { createConsoleObserver, formatError, formatPreview, formatSummary, type WriteLine } from "./output";

/**
 * Everything a command touches outside its own arguments
 */
export interface CliRuntime {
  env: Environment;
  cwd: string;
  tempDir: string;
  fs: FileSystem;
  http: HttpClient;
  clock: Clock;
  createFetcher(logger: Logger): RepositoryFetcher;
  /** Used as-is when given; otherwise a console logger at the configured level */
  logger?: Logger;
  write: WriteLine;
  setExitCode(code: number): void;
}

interface SourceOptions {
  config?: string;
  source?: string;
  branch?: string;
  folder?: string;
  itemTypes?: ItemType[];
}

interface DeployOptions extends SourceOptions {
  workspace?: string;
  workspaceId?: string;
  sourceWorkspaceId?: string;
  skipRoleAssignment?: boolean;
  delay?: number;
  report?: string;
  logLevel?: LogLevel;
}

function parseItemTypes(value: string): ItemType[] {
  const types = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  const invalid = types.filter((type) => !isItemType(type));
  if (invalid.length > 0 || types.length === 0) {
    throw new InvalidArgumentError(`Expected a comma list of ${ITEM_TYPES.join(", ")}`);
  }
  return types.filter(isItemType);
}

function parseDelay(value: string): number {
  const delay = Number(value);
  if (!Number.isInteger(delay) || delay < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number of milliseconds");
  }
  return delay;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((known) => known === value);
  if (!level) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * Read the config file: the one named by --config (which must exist), or
 * the default file when present
 */
function readConfigFile(runtime: CliRuntime, explicit?: string): { fileContent?: string; filePath?: string } {
  const filePath = resolve(runtime.cwd, explicit ?? DEFAULT_CONFIG_FILE);

  if (!runtime.fs.exists(filePath)) {
    if (explicit) {
      throw new ConfigurationError(`Config file not found: ${filePath}`, { path: filePath });
    }
    return {};
  }

  return { fileContent: runtime.fs.readFile(filePath), filePath };
}

function sourceOverrides(options: SourceOptions): ConfigLayer {
  return {
    source: { location: options.source, branch: options.branch, folder: options.folder },
    itemTypes: options.itemTypes,
  };
}

function deployOverrides(options: DeployOptions): ConfigLayer {
  return {
    ...sourceOverrides(options),
    targetWorkspaceName: options.workspace,
    targetWorkspaceId: options.workspaceId,
    sourceWorkspaceId: options.sourceWorkspaceId,
    skipRoleAssignment: options.skipRoleAssignment,
    itemDelayMs: options.delay,
    reportPath: options.report,
    logLevel: options.logLevel,
  };
}

function addSourceOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", `YAML config file (default: ${DEFAULT_CONFIG_FILE} when present)`)
    .option("-s, --source <location>", "Local path, git URL, or github:/gitlab: shorthand")
    .option("-b, --branch <branch>", "Branch to check out")
    .option("-f, --folder <folder>", "Folder holding the item folders")
    .option("-t, --item-types <list>", "Only these item types, comma separated", parseItemTypes);
}

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name("fabric-promote")
    .description("Promote Fabric items from a source-controlled folder tree into a target workspace")
    .version(VERSION, "-V, --version", "Output the version number")
    .configureOutput({
      writeOut: (text) => runtime.write(text.trimEnd()),
      writeErr: (text) => runtime.write(text.trimEnd()),
    });

  addSourceOptions(program.command("deploy"))
    .description("Reconcile the target workspace and deploy every discovered item")
    .option("-w, --workspace <name>", "Target workspace display name")
    .option("--workspace-id <id>", "Target workspace id, when known")
    .option("--source-workspace-id <id>", "Source workspace id to verify before deploying")
    .option("--skip-role-assignment", "Do not reconcile the principal's workspace role")
    .option("--delay <ms>", "Pause between item deployments", parseDelay)
    .option("-r, --report <file>", "Where to write the JSON report")
    .option("--log-level <level>", `Diagnostic log level (${LOG_LEVELS.join(", ")})`, parseLogLevel)
    .action(async (options: DeployOptions) => {
      try {
        const config = loadConfig({
          env: runtime.env,
          ...readConfigFile(runtime, options.config),
          overrides: deployOverrides(options),
        });
        const logger = runtime.logger ?? createLogger({ level: config.logLevel });

        const ctx: EngineContext = {
          fs: runtime.fs,
          http: runtime.http,
          clock: runtime.clock,
          fetcher: runtime.createFetcher(logger.child({ component: "source" })),
          observer: createConsoleObserver(runtime.write),
          logger,
          paths: { workDir: runtime.cwd, tempDir: runtime.tempDir },
        };

        const outcome = await createDeployment(ctx, config).run();
        formatSummary(outcome).forEach((line) => runtime.write(line));
        runtime.setExitCode(outcome.success ? 0 : 1);
      } catch (err) {
        formatError(err).forEach((line) => runtime.write(line));
        runtime.setExitCode(1);
      }
    });

  addSourceOptions(program.command("discover"))
    .description("List the item folders a deployment would pick up, without contacting Fabric")
    .action(async (options: SourceOptions) => {
      try {
        const { source, itemTypes } = loadSourceConfig({
          env: runtime.env,
          ...readConfigFile(runtime, options.config),
          overrides: sourceOverrides(options),
        });
        const logger = runtime.logger ?? createLogger({ level: "warn" });

        const preview = await previewDiscovery(
          {
            fs: runtime.fs,
            http: runtime.http,
            clock: runtime.clock,
            fetcher: runtime.createFetcher(logger.child({ component: "source" })),
            observer: createConsoleObserver(runtime.write),
            logger,
            paths: { workDir: runtime.cwd, tempDir: runtime.tempDir },
          },
          source,
          itemTypes
        );
        formatPreview(preview).forEach((line) => runtime.write(line));
        runtime.setExitCode(preview.eligible.length > 0 ? 0 : 1);
      } catch (err) {
        formatError(err).forEach((line) => runtime.write(line));
        runtime.setExitCode(1);
      }
    });

  return program;
}
