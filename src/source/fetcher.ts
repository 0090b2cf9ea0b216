/**
 * Git repository fetcher
 *
 * Shallow single-branch clone through simple-git, bounded by a block timeout.
 */

import { simpleGit } from "simple-git";
import type { Logger } from "winston";
import type { RepositoryFetcher } from "#/core";
import { SourceFetchError, errorMessage } from "#/errors";
import { CLONE_TIMEOUT_MS } from "#/constants";
import type { GitClonerFactory } from "./source.types";

const defaultGitFactory: GitClonerFactory = (timeoutMs) => simpleGit({ timeout: { block: timeoutMs } });

export class GitRepositoryFetcher implements RepositoryFetcher {
  constructor(
    private readonly logger: Logger,
    private readonly timeoutMs: number = CLONE_TIMEOUT_MS,
    private readonly createGit: GitClonerFactory = defaultGitFactory
  ) {}

  async fetch(url: string, branch: string, destination: string): Promise<string> {
    this.logger.info(`Cloning branch ${branch}`, { destination });

    try {
      await this.createGit(this.timeoutMs).clone(url, destination, [
        "--branch",
        branch,
        "--single-branch",
        "--depth",
        "1",
      ]);
    } catch (err) {
      throw new SourceFetchError(`Failed to clone branch ${branch}: ${errorMessage(err)}`, {
        path: destination,
      });
    }

    this.logger.info("Clone complete");
    return destination;
  }
}
