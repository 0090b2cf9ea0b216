import { join } from "path";
import type { FileSystem } from "#/core";
import { getDefinitionFile, type ArtifactType } from "#/item-types";

/**
 * Candidate definition files for an artifact, most preferred first.
 * Notebooks exported as Jupyter files fall back to `<displayName>.ipynb`.
 */
export function definitionCandidates(type: ArtifactType, displayName: string): string[] {
  if (type === "Unknown") return [];

  const candidates: string[] = [];
  const canonical = getDefinitionFile(type);
  if (canonical) candidates.push(canonical);
  if (type === "Notebook") candidates.push(`${displayName}.ipynb`);
  return candidates;
}

/**
 * Path of the first candidate definition file present in the folder, or null
 */
export function resolveDefinitionFile(
  fs: FileSystem,
  folderPath: string,
  type: ArtifactType,
  displayName: string
): string | null {
  for (const candidate of definitionCandidates(type, displayName)) {
    const path = join(folderPath, candidate);
    if (fs.exists(path) && fs.stat(path).isFile) {
      return path;
    }
  }
  return null;
}
