/**
 * Bulk-import interchange format
 *
 * Tab-separated files in the header convention of the store's offline bulk importer.
 * There is no quoting and no escaping: tabs separate columns, `\n` separates rows,
 * and `;` separates the elements of array-typed columns. These bytes are a fixed
 * contract with the import tool.
 *
 * @module export/format
 */

import { NodeLabel } from "../graph/types.js";

export const COLUMN_SEPARATOR = "\t";
export const ROW_SEPARATOR = "\n";
export const LIST_SEPARATOR = ";";

/**
 * The files of one export, by role
 */
export type BulkFileKind = "items" | "sessions" | "next" | "contains" | "lookup";

export const BULK_FILE_NAMES: Readonly<Record<BulkFileKind, string>> = {
  items: "items.csv",
  sessions: "sessions.csv",
  next: "next.csv",
  contains: "contains.csv",
  lookup: "lookup.json",
};

/**
 * Completion marker, written after every other file
 */
export const MANIFEST_FILE_NAME = "manifest.json";

export const MANIFEST_FORMAT = "session-graph/bulk-tsv@1";

export const BULK_HEADERS = {
  items: [`:ID(${NodeLabel.ITEM})`, ":LABEL"],
  sessions: [`:ID(${NodeLabel.SESSION})`, ":LABEL"],
  next: [
    `:START_ID(${NodeLabel.ITEM})`,
    `:END_ID(${NodeLabel.ITEM})`,
    "weight:int",
    "sessions:string[]",
  ],
  contains: [`:START_ID(${NodeLabel.SESSION})`, `:END_ID(${NodeLabel.ITEM})`],
} as const satisfies Record<Exclude<BulkFileKind, "lookup">, readonly string[]>;

/**
 * Whether a value can be written into an array-typed column unchanged and read back
 * as the same single element
 */
export function isListSafe(value: string): boolean {
  return value !== "" && !/[;\t\r\n]/.test(value);
}

/**
 * Shape of the lookup index
 */
export interface LookupIndex {
  item_to_id: Record<string, number>;
  session_to_id: Record<string, number>;
}

/**
 * Per-file entry of the manifest
 */
export interface ManifestFileEntry {
  file: string;
  rows: number;
}

/**
 * Completion marker contents
 */
export interface BulkManifest {
  format: typeof MANIFEST_FORMAT;
  createdAt: string;
  files: Record<BulkFileKind, ManifestFileEntry>;
}
