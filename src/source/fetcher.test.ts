import { describe, test, expect } from "vitest";
import { GitRepositoryFetcher } from "./fetcher";
import { createSilentLogger } from "#/logging";
import { SourceFetchError } from "#/errors";
import type { GitCloner } from "./source.types";

interface CloneCall {
  timeoutMs: number;
  repoPath: string;
  localPath: string;
  options: string[];
}

function createFakeGit(failure?: Error) {
  const calls: CloneCall[] = [];
  const factory = (timeoutMs: number): GitCloner => ({
    clone: async (repoPath, localPath, options) => {
      calls.push({ timeoutMs, repoPath, localPath, options });
      if (failure) throw failure;
      return "";
    },
  });
  return { calls, factory };
}

describe("GitRepositoryFetcher", () => {
  test("shallow clones a single branch into the destination", async () => {
    const git = createFakeGit();
    const fetcher = new GitRepositoryFetcher(createSilentLogger(), 60_000, git.factory);

    const root = await fetcher.fetch("https://example.com/org/fabric.git", "release", "/tmp/fabric-promote-1");

    expect(root).toBe("/tmp/fabric-promote-1");
    expect(git.calls).toEqual([
      {
        timeoutMs: 60_000,
        repoPath: "https://example.com/org/fabric.git",
        localPath: "/tmp/fabric-promote-1",
        options: ["--branch", "release", "--single-branch", "--depth", "1"],
      },
    ]);
  });

  test("converts clone failures into SourceFetchError", async () => {
    const git = createFakeGit(new Error("fatal: Remote branch nope not found in upstream origin"));
    const fetcher = new GitRepositoryFetcher(createSilentLogger(), 60_000, git.factory);

    const attempt = fetcher.fetch("https://example.com/org/fabric.git", "nope", "/tmp/fabric-promote-1");

    await expect(attempt).rejects.toBeInstanceOf(SourceFetchError);
    await expect(attempt).rejects.toMatchObject({
      code: "SOURCE_FETCH",
      message: "Failed to clone branch nope: fatal: Remote branch nope not found in upstream origin",
      details: { path: "/tmp/fabric-promote-1" },
    });
  });
});
