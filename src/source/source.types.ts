export type SourceKind = "local" | "git";

export interface ParsedSource {
  type: SourceKind;
  /** Filesystem path for local sources, clone URL for git sources */
  location: string;
  /** Branch named by a `#branch` suffix */
  ref?: string;
  raw: string;
}

/**
 * A source tree ready to be scanned. `release()` removes anything that was
 * created to hold it and is safe to call more than once.
 */
export interface SourceCheckout {
  root: string;
  source: ParsedSource;
  branch: string;
  release(): void;
}

/**
 * The part of a git client the fetcher needs
 */
export interface GitCloner {
  clone(repoPath: string, localPath: string, options: string[]): Promise<unknown>;
}

export type GitClonerFactory = (timeoutMs: number) => GitCloner;
