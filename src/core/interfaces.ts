/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

import type { Logger } from "winston";

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  /** Create a unique directory whose name starts with `prefix` and return its path */
  mkdtemp(prefix: string): string;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
  rmdir(path: string, options?: { recursive?: boolean }): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Time source. Token expiry and the inter-item throttle both go through here
 * so tests can drive them without real waiting.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Retrieves a source tree into a local directory.
 * Resolves to the root of the checked-out tree.
 */
export interface RepositoryFetcher {
  fetch(url: string, branch: string, destination: string): Promise<string>;
}

/**
 * Receives human-facing narration of a deployment run.
 * Kept apart from the logger: the logger is for diagnostics, this is for people.
 */
export interface DeploymentObserver {
  onStep(step: number, total: number, title: string): void;
  onInfo(message: string): void;
  onSuccess(message: string): void;
  onWarning(message: string): void;
  onError(message: string): void;
}

export interface PathConfig {
  /** Directory relative paths (report, local sources) resolve against */
  workDir: string;
  /** Parent directory for temporary clones */
  tempDir: string;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  clock: Clock;
  fetcher: RepositoryFetcher;
  observer: DeploymentObserver;
  logger: Logger;
  paths: PathConfig;
}
