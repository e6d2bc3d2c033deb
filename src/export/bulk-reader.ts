/**
 * Bulk file reader
 *
 * Parses an export written by {@link BulkExporter} back into identity tables and
 * edge sets. Used to verify exports and by anything that needs the graph without a
 * store.
 *
 * @module export/bulk-reader
 */

import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { BulkFormatError } from "../graph/errors.js";
import { IdentityTable } from "../graph/identity.js";
import {
  NodeLabel,
  containmentKey,
  transitionKey,
  type ContainmentEdge,
  type ContainmentKey,
  type SessionGraph,
  type TransitionEdge,
  type TransitionKey,
} from "../graph/types.js";
import type { Identifier } from "../events/types.js";
import {
  BULK_FILE_NAMES,
  BULK_HEADERS,
  COLUMN_SEPARATOR,
  LIST_SEPARATOR,
  MANIFEST_FILE_NAME,
  MANIFEST_FORMAT,
  ROW_SEPARATOR,
  type BulkFileKind,
  type BulkManifest,
} from "./format.js";

const BULK_FILE_KINDS: readonly BulkFileKind[] = [
  "items",
  "sessions",
  "next",
  "contains",
  "lookup",
];

export interface BulkReadOptions {
  /**
   * Convert lookup keys back to numbers. The lookup index stores identifiers by their
   * string form, so numeric identifiers need this to compare equal to the originals.
   * @default false
   */
  numericIdentifiers?: boolean;

  /**
   * Fail when `manifest.json` is missing
   * @default true
   */
  requireManifest?: boolean;
}

export interface BulkExportContents extends SessionGraph {
  manifest?: BulkManifest;
}

const DenseIdSchema = z.number().int().nonnegative();

const LookupIndexSchema = z.object({
  item_to_id: z.record(DenseIdSchema),
  session_to_id: z.record(DenseIdSchema),
});

const ManifestEntrySchema = z.object({ file: z.string(), rows: z.number().int().nonnegative() });

const ManifestSchema = z.object({
  format: z.literal(MANIFEST_FORMAT),
  createdAt: z.string(),
  files: z.object({
    items: ManifestEntrySchema,
    sessions: ManifestEntrySchema,
    next: ManifestEntrySchema,
    contains: ManifestEntrySchema,
    lookup: ManifestEntrySchema,
  }),
});

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function readText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new BulkFormatError(filePath, "cannot be read", error instanceof Error ? error : undefined);
  }
}

function parseDenseId(value: string | undefined, filePath: string, line: number): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new BulkFormatError(
      filePath,
      `line ${line}: expected a non-negative integer, got ${JSON.stringify(value)}`
    );
  }
  return Number(value);
}

/**
 * Read a TSV file, check its header, and return the data rows split into cells
 */
async function readTsv(
  filePath: string,
  header: readonly string[]
): Promise<Array<{ line: number; cells: string[] }>> {
  const content = await readText(filePath);
  const lines = content.split(ROW_SEPARATOR);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const actualHeader = lines[0];
  const expectedHeader = header.join(COLUMN_SEPARATOR);
  if (actualHeader !== expectedHeader) {
    throw new BulkFormatError(
      filePath,
      `unexpected header ${JSON.stringify(actualHeader)}, expected ${JSON.stringify(expectedHeader)}`
    );
  }

  return lines.slice(1).map((text, index) => {
    const cells = text.split(COLUMN_SEPARATOR);
    const line = index + 2;
    if (cells.length !== header.length) {
      throw new BulkFormatError(
        filePath,
        `line ${line}: expected ${header.length} columns, got ${cells.length}`
      );
    }
    return { line, cells };
  });
}

async function readJson<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const text = await readText(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new BulkFormatError(
      filePath,
      "not valid JSON",
      error instanceof Error ? error : undefined
    );
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new BulkFormatError(filePath, parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

function toIdentityTable(
  record: Record<string, number>,
  numeric: boolean,
  filePath: string,
  field: string
): IdentityTable {
  const assignments: Array<[Identifier, number]> = Object.entries(record).map(([key, id]) => {
    if (!numeric) {
      return [key, id];
    }
    const value = Number(key);
    if (key.trim() === "" || !Number.isFinite(value)) {
      throw new BulkFormatError(filePath, `${field}: key ${JSON.stringify(key)} is not numeric`);
    }
    return [value, id];
  });

  const table = IdentityTable.fromAssignments(assignments);
  if (table === undefined) {
    throw new BulkFormatError(filePath, `${field}: IDs are not a dense range starting at 0`);
  }
  return table;
}

/**
 * Check that a node file lists IDs 0..size-1 in order under the expected label
 */
async function verifyNodeFile(
  filePath: string,
  header: readonly string[],
  label: string,
  size: number
): Promise<number> {
  const rows = await readTsv(filePath, header);
  if (rows.length !== size) {
    throw new BulkFormatError(
      filePath,
      `expected ${size} rows to match the lookup index, got ${rows.length}`
    );
  }
  rows.forEach(({ line, cells }, index) => {
    const id = parseDenseId(cells[0], filePath, line);
    if (id !== index || cells[1] !== label) {
      throw new BulkFormatError(filePath, `line ${line}: expected "${index}\\t${label}"`);
    }
  });
  return rows.length;
}

/**
 * Read an export directory
 *
 * @throws {BulkFormatError} If a file is missing, malformed, or disagrees with the
 *   lookup index or the manifest
 *
 * @example
 * ```typescript
 * const graph = await readBulkExport("import", { numericIdentifiers: true });
 * graph.transitions.get("0:1")?.weight;
 * ```
 */
export async function readBulkExport(
  dir: string,
  options: BulkReadOptions = {}
): Promise<BulkExportContents> {
  const { numericIdentifiers = false, requireManifest = true } = options;
  const file = (kind: BulkFileKind): string => path.join(dir, BULK_FILE_NAMES[kind]);

  const manifestPath = path.join(dir, MANIFEST_FILE_NAME);
  let manifest: BulkManifest | undefined;
  if (await exists(manifestPath)) {
    manifest = await readJson(manifestPath, ManifestSchema);
  } else if (requireManifest) {
    throw new BulkFormatError(manifestPath, "missing; the export did not complete");
  }

  const lookupPath = file("lookup");
  const lookup = await readJson(lookupPath, LookupIndexSchema);
  const items = toIdentityTable(lookup.item_to_id, numericIdentifiers, lookupPath, "item_to_id");
  const sessions = toIdentityTable(
    lookup.session_to_id,
    numericIdentifiers,
    lookupPath,
    "session_to_id"
  );

  const counts: Partial<Record<BulkFileKind, number>> = {
    lookup: items.size + sessions.size,
  };
  counts.items = await verifyNodeFile(
    file("items"),
    BULK_HEADERS.items,
    NodeLabel.ITEM,
    items.size
  );
  counts.sessions = await verifyNodeFile(
    file("sessions"),
    BULK_HEADERS.sessions,
    NodeLabel.SESSION,
    sessions.size
  );

  const nextPath = file("next");
  const transitions = new Map<TransitionKey, TransitionEdge>();
  for (const { line, cells } of await readTsv(nextPath, BULK_HEADERS.next)) {
    const [source, dest, weight, evidence = ""] = cells;
    const sourceId = parseDenseId(source, nextPath, line);
    const destId = parseDenseId(dest, nextPath, line);
    const key = transitionKey(sourceId, destId);
    if (sourceId >= items.size || destId >= items.size) {
      throw new BulkFormatError(nextPath, `line ${line}: item ID out of range`);
    }
    if (transitions.has(key)) {
      throw new BulkFormatError(nextPath, `line ${line}: duplicate edge ${key}`);
    }
    transitions.set(key, {
      sourceId,
      destId,
      weight: parseDenseId(weight, nextPath, line),
      evidence: new Set(evidence === "" ? [] : evidence.split(LIST_SEPARATOR)),
    });
  }
  counts.next = transitions.size;

  const containsPath = file("contains");
  const containment = new Map<ContainmentKey, ContainmentEdge>();
  for (const { line, cells } of await readTsv(containsPath, BULK_HEADERS.contains)) {
    const sessionId = parseDenseId(cells[0], containsPath, line);
    const itemId = parseDenseId(cells[1], containsPath, line);
    if (sessionId >= sessions.size || itemId >= items.size) {
      throw new BulkFormatError(containsPath, `line ${line}: node ID out of range`);
    }
    const key = containmentKey(sessionId, itemId);
    if (containment.has(key)) {
      throw new BulkFormatError(containsPath, `line ${line}: duplicate edge ${key}`);
    }
    containment.set(key, { sessionId, itemId });
  }
  counts.contains = containment.size;

  if (manifest) {
    for (const kind of BULK_FILE_KINDS) {
      const entry = manifest.files[kind];
      const actual = counts[kind];
      if (actual !== entry.rows) {
        throw new BulkFormatError(
          manifestPath,
          `${entry.file}: manifest records ${entry.rows} rows, found ${String(actual)}`
        );
      }
    }
  }

  return { items, sessions, transitions, containment, manifest };
}
