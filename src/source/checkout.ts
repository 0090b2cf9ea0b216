import { isAbsolute, resolve } from "path";
import type { Logger } from "winston";
import type { FileSystem, PathConfig, RepositoryFetcher } from "#/core";
import { tempDirPrefix } from "#/core";
import { SourceFetchError, errorMessage, isDeploymentError } from "#/errors";
import type { SourceConfig } from "#/schemas";
import { getSourceDisplayName, parseSourceLocation } from "./sources";
import type { SourceCheckout } from "./source.types";

export interface CheckoutDeps {
  fs: FileSystem;
  fetcher: RepositoryFetcher;
  paths: PathConfig;
  logger: Logger;
}

/**
 * Make the configured source tree available locally.
 *
 * Local paths are used in place. Git sources are cloned into a fresh temp
 * directory that `release()` removes; a failed clone removes it before
 * throwing.
 *
 * @throws SourceFetchError
 */
export async function checkoutSource(deps: CheckoutDeps, config: SourceConfig): Promise<SourceCheckout> {
  const { fs, fetcher, paths, logger } = deps;
  const source = parseSourceLocation(config.location);
  const branch = source.ref ?? config.branch;

  if (source.type === "local") {
    const root = isAbsolute(source.location) ? source.location : resolve(paths.workDir, source.location);
    if (!fs.exists(root)) {
      throw new SourceFetchError(`Source directory not found: ${root}`, { path: root });
    }
    return { root, source, branch, release: () => undefined };
  }

  const tempDir = fs.mkdtemp(tempDirPrefix(paths.tempDir));
  let released = false;
  const release = (): void => {
    if (released) return;
    released = true;
    try {
      fs.rmdir(tempDir, { recursive: true });
      logger.debug(`Removed ${tempDir}`);
    } catch (err) {
      logger.warn(`Could not remove ${tempDir}: ${errorMessage(err)}`);
    }
  };

  logger.info(`Fetching ${getSourceDisplayName(source)}`);
  try {
    const root = await fetcher.fetch(source.location, branch, tempDir);
    return { root, source, branch, release };
  } catch (err) {
    release();
    if (isDeploymentError(err)) throw err;
    throw new SourceFetchError(`Failed to fetch ${getSourceDisplayName(source)}: ${errorMessage(err)}`, {
      path: tempDir,
    });
  }
}

/**
 * Label for a checkout: the resolved directory for local sources, the
 * credential-free URL for git ones
 */
export function describeCheckout(checkout: SourceCheckout): string {
  return checkout.source.type === "local" ? checkout.root : getSourceDisplayName(checkout.source);
}
