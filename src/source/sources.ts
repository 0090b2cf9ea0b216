/**
 * Source location parsing
 *
 * Supported formats:
 * - `./Fabric` or `/abs/path` → local directory
 * - `https://…`, `http://…`, `ssh://…`, `file://…`, `git@host:owner/repo` → git URL
 * - `github:owner/repo` → GitHub
 * - `gitlab:owner/repo` → GitLab.com
 * - `gitlab:host.com/owner/repo` → Self-hosted GitLab
 *
 * Git forms accept a `#branch` suffix that overrides the configured branch.
 */

import type { ParsedSource } from "./source.types";

const GIT_URL_PREFIXES = ["https://", "http://", "ssh://", "file://", "git@"];

function splitRef(value: string): { path: string; ref?: string } {
  const hashIndex = value.indexOf("#");
  if (hashIndex === -1) return { path: value };
  const ref = value.slice(hashIndex + 1);
  return ref ? { path: value.slice(0, hashIndex), ref } : { path: value.slice(0, hashIndex) };
}

function withGitSuffix(path: string): string {
  return path.endsWith(".git") ? path : `${path}.git`;
}

export function parseSourceLocation(source: string): ParsedSource {
  const raw = source.trim();

  // GitHub: github:owner/repo or github:owner/repo#branch
  if (raw.startsWith("github:")) {
    const { path, ref } = splitRef(raw.slice("github:".length));
    return { type: "git", location: `https://github.com/${withGitSuffix(path)}`, ref, raw };
  }

  // GitLab: gitlab:owner/repo or gitlab:host/owner/repo
  if (raw.startsWith("gitlab:")) {
    const { path, ref } = splitRef(raw.slice("gitlab:".length));
    const parts = path.split("/");
    const first = parts[0] ?? "";

    // 3+ parts with a dotted first segment is a self-hosted instance
    const selfHosted = parts.length >= 3 && first.includes(".");
    const host = selfHosted ? first : "gitlab.com";
    const repoPath = selfHosted ? parts.slice(1).join("/") : path;
    return { type: "git", location: `https://${host}/${withGitSuffix(repoPath)}`, ref, raw };
  }

  if (GIT_URL_PREFIXES.some((prefix) => raw.startsWith(prefix))) {
    const { path, ref } = splitRef(raw);
    return { type: "git", location: path, ref, raw };
  }

  return { type: "local", location: raw, raw };
}

/**
 * Short label for a source, without credentials embedded in URLs
 */
export function getSourceDisplayName(source: ParsedSource): string {
  if (source.type === "local") return source.location;

  try {
    const url = new URL(source.location);
    url.username = "";
    url.password = "";
    return url.toString();
  } catch {
    // scp-like git@host:owner/repo is not a URL
    return source.location;
  }
}
