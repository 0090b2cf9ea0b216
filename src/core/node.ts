/**
 * Node.js implementations of the core interfaces.
 * Used by the CLI; tests use the in-memory mocks instead.
 */

import * as nodeFs from "fs";
import { join } from "path";
import { setTimeout as delay } from "timers/promises";
import type { Clock, FileSystem, HttpClient } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => nodeFs.readFileSync(path, "utf-8"),
    readFileBinary: (path) => nodeFs.readFileSync(path),
    writeFile: (path, content) => nodeFs.writeFileSync(path, content, "utf-8"),
    exists: (path) => nodeFs.existsSync(path),
    mkdir: (path, options) => {
      nodeFs.mkdirSync(path, { recursive: options?.recursive ?? false });
    },
    mkdtemp: (prefix) => nodeFs.mkdtempSync(prefix),
    readdir: (path) => nodeFs.readdirSync(path),
    stat: (path) => {
      const stats = nodeFs.statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
    rmdir: (path, options) => {
      nodeFs.rmSync(path, { recursive: options?.recursive ?? false, force: true });
    },
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) await delay(ms);
  },
};

/**
 * Prefix for temporary clone directories under `tempDir`.
 */
export function tempDirPrefix(tempDir: string): string {
  return join(tempDir, "fabric-promote-");
}
