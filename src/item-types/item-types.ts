/**
 * Central definition of deployable Fabric item types.
 *
 * Single source of truth for folder markers and definition files.
 * Add new types here and they propagate everywhere.
 */

export const ITEM_TYPES = [
  "Report",
  "SemanticModel",
  "Lakehouse",
  "Dataflow",
  "Notebook",
  "Dashboard",
] as const;

export type ItemType = (typeof ITEM_TYPES)[number];

/** Classification of a folder that matched no marker */
export type ArtifactType = ItemType | "Unknown";

export interface ItemTypeConfig {
  /** Substring that identifies the type in a source folder name */
  marker: string;
  /** Canonical definition file inside the item folder, null when the type has none */
  definitionFile: string | null;
}

export const ITEM_TYPE_CONFIG: Record<ItemType, ItemTypeConfig> = {
  Report: { marker: ".Report", definitionFile: "definition.pbir" },
  SemanticModel: { marker: ".SemanticModel", definitionFile: "definition.pbism" },
  Lakehouse: { marker: ".Lakehouse", definitionFile: "lakehouse.metadata.json" },
  Dataflow: { marker: ".Dataflow", definitionFile: "mashup.pq" },
  Notebook: { marker: ".Notebook", definitionFile: "notebook-content.py" },
  Dashboard: { marker: ".Dashboard", definitionFile: null },
};

/**
 * Order in which markers are tested against a folder name.
 * Markers are expected to be mutually exclusive; when a name carries more
 * than one, the earliest entry here decides.
 */
export const MARKER_PRIORITY: readonly ItemType[] = [
  "Dataflow",
  "Lakehouse",
  "Report",
  "SemanticModel",
  "Notebook",
  "Dashboard",
];

export function isItemType(value: string): value is ItemType {
  return ITEM_TYPES.some((type) => type === value);
}

export function getMarker(type: ItemType): string {
  return ITEM_TYPE_CONFIG[type].marker;
}

export function getDefinitionFile(type: ItemType): string | null {
  return ITEM_TYPE_CONFIG[type].definitionFile;
}
