/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { join } from "path";
import type {
  Clock,
  DeploymentObserver,
  EngineContext,
  FileSystem,
  HttpClient,
  RepositoryFetcher,
} from "#/core";
import { createSilentLogger } from "#/logging";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
}

function normalize(path: string): string {
  return path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Directories exist implicitly when a file lives under them.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry>; tempDirs: string[] } {
  const files = new Map<string, MockFileEntry>();
  const tempDirs: string[] = [];
  let tempCounter = 0;

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = normalize(path) + "/";
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  const getFile = (path: string, op: string): MockFileEntry => {
    const entry = files.get(path);
    if (!entry || entry.isDirectory) {
      throw new Error(`ENOENT: no such file or directory, ${op} '${path}'`);
    }
    return entry;
  };

  return {
    files,
    tempDirs,

    readFile(path: string): string {
      const { content } = getFile(path, "open");
      return typeof content === "string" ? content : content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const { content } = getFile(path, "open");
      return typeof content === "string" ? Buffer.from(content) : content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false });
    },

    exists(path: string): boolean {
      return files.has(normalize(path)) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      if (!files.has(path)) {
        files.set(path, { content: "", isDirectory: true });
      }
    },

    mkdtemp(prefix: string): string {
      tempCounter += 1;
      const path = `${prefix}${tempCounter}`;
      files.set(path, { content: "", isDirectory: true });
      tempDirs.push(path);
      return path;
    },

    readdir(path: string): string[] {
      const prefix = normalize(path) + "/";
      const results = new Set<string>();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(path);
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length };
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = normalize(path);
      for (const filePath of [...files.keys()]) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },
  };
}

/**
 * A request seen by the mock HttpClient
 */
export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export type MockResponder =
  | Response
  | ((request: RecordedRequest) => Response | Promise<Response>);

/**
 * Create a mock HttpClient with predefined responses.
 * Routes are keyed by "METHOD url". Unmatched requests get a 404.
 * Plain Response values are cloned per call so a route can answer repeatedly.
 */
export function createMockHttpClient(
  routes: Record<string, MockResponder> = {}
): HttpClient & { routes: Map<string, MockResponder>; requests: RecordedRequest[] } {
  const routeMap = new Map<string, MockResponder>(Object.entries(routes));
  const requests: RecordedRequest[] = [];

  return {
    routes: routeMap,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const method = (options?.method ?? "GET").toUpperCase();
      const headers: Record<string, string> = {};
      new Headers(options?.headers).forEach((value, key) => {
        headers[key] = value;
      });
      const body = typeof options?.body === "string" ? options.body : undefined;

      const request: RecordedRequest = { method, url, headers, body };
      requests.push(request);

      const responder = routeMap.get(`${method} ${url}`);
      if (!responder) {
        return new Response(null, { status: 404, statusText: "Not Found" });
      }

      return typeof responder === "function" ? responder(request) : responder.clone();
    },
  };
}

/**
 * Manual clock: sleeping advances time instantly and is recorded.
 */
export function createMockClock(
  start = 0
): Clock & { sleeps: number[]; advance(ms: number): void } {
  let current = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    advance(ms: number): void {
      current += ms;
    },
    async sleep(ms: number): Promise<void> {
      sleeps.push(ms);
      current += ms;
    },
  };
}

export type ObserverEventKind = "step" | "info" | "success" | "warning" | "error";

export interface ObserverEvent {
  kind: ObserverEventKind;
  message: string;
}

/**
 * Observer that records every narration call in order
 */
export function createRecordingObserver(): DeploymentObserver & { events: ObserverEvent[] } {
  const events: ObserverEvent[] = [];
  const record = (kind: ObserverEventKind) => (message: string) => {
    events.push({ kind, message });
  };

  return {
    events,
    onStep: (step, total, title) => events.push({ kind: "step", message: `${step}/${total} ${title}` }),
    onInfo: record("info"),
    onSuccess: record("success"),
    onWarning: record("warning"),
    onError: record("error"),
  };
}

interface FetchCall {
  url: string;
  branch: string;
  destination: string;
}

/**
 * Fetcher that "clones" by writing the given files (paths relative to the
 * clone root) into the mock file system. Pass an Error to make it fail.
 */
export function createMockRepositoryFetcher(
  fs: FileSystem,
  tree: Record<string, string> | Error = {}
): RepositoryFetcher & { calls: FetchCall[] } {
  const calls: FetchCall[] = [];

  return {
    calls,
    async fetch(url: string, branch: string, destination: string): Promise<string> {
      calls.push({ url, branch, destination });
      if (tree instanceof Error) {
        throw tree;
      }
      for (const [relativePath, content] of Object.entries(tree)) {
        fs.writeFile(join(destination, relativePath), content);
      }
      return destination;
    },
  };
}

/**
 * Build a full EngineContext from mocks, overriding any part
 */
export function createTestContext(overrides: Partial<EngineContext> = {}): EngineContext {
  const fs = overrides.fs ?? createMockFileSystem();
  return {
    fs,
    http: createMockHttpClient(),
    clock: createMockClock(),
    fetcher: createMockRepositoryFetcher(fs),
    observer: createRecordingObserver(),
    logger: createSilentLogger(),
    paths: { workDir: "/work", tempDir: "/tmp" },
    ...overrides,
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response with an optional text body
 */
export function errorResponse(status: number, body = ""): Response {
  return new Response(body || null, { status });
}

/**
 * Helper to create an empty response (e.g. 202 Accepted)
 */
export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}
