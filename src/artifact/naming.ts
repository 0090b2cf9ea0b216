import { MARKER_PRIORITY, getMarker, type ArtifactType } from "#/item-types";

export interface FolderClassification {
  type: ArtifactType;
  displayName: string;
}

/**
 * Classify a source folder by the type marker in its name.
 * Markers are tested in MARKER_PRIORITY order; the first match wins and is
 * stripped to form the display name.
 *
 * @example classifyFolderName("Sales.Report") → { type: "Report", displayName: "Sales" }
 * @example classifyFolderName("Ingest.Pipeline") → { type: "Unknown", displayName: "Ingest.Pipeline" }
 */
export function classifyFolderName(folderName: string): FolderClassification {
  for (const type of MARKER_PRIORITY) {
    const marker = getMarker(type);
    if (folderName.includes(marker)) {
      return { type, displayName: folderName.split(marker).join("") };
    }
  }

  return { type: "Unknown", displayName: folderName };
}
