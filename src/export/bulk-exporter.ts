/**
 * Bulk file exporter
 *
 * Writes a session graph as the node, relationship and lookup files the store's
 * offline importer reads. Each file is written on its own; the manifest is written
 * last, so a directory without `manifest.json` holds an incomplete export.
 *
 * @module export/bulk-exporter
 */

import { createWriteStream } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import path from "node:path";
import type pino from "pino";
import { FormatViolationError } from "../graph/errors.js";
import { NodeLabel, type GraphIdentities, type SessionGraph } from "../graph/types.js";
import { getComponentLogger } from "../logging/index.js";
import {
  BULK_FILE_NAMES,
  BULK_HEADERS,
  COLUMN_SEPARATOR,
  LIST_SEPARATOR,
  MANIFEST_FILE_NAME,
  MANIFEST_FORMAT,
  ROW_SEPARATOR,
  isListSafe,
  type BulkFileKind,
  type BulkManifest,
  type LookupIndex,
} from "./format.js";

/**
 * What to do when a value cannot be represented in the bulk files
 * - error: throw {@link FormatViolationError} before writing anything
 * - warn: log the values and write them unchanged
 */
export type FormatViolationPolicy = "error" | "warn";

export interface BulkExportOptions {
  /** Directory to write into; created if missing */
  outputDir: string;
  /** @default "error" */
  onFormatViolation?: FormatViolationPolicy;
}

export interface BulkExportSummary {
  outputDir: string;
  manifestPath: string;
  files: BulkManifest["files"];
  /** Values written despite a format violation (policy "warn") */
  formatViolations: number;
}

type Cell = string | number;

/**
 * Every evidence value that {@link isListSafe} rejects, each reported once
 */
export function findFormatViolations(graph: Pick<SessionGraph, "transitions">): string[] {
  const violations = new Set<string>();
  for (const edge of graph.transitions.values()) {
    for (const value of edge.evidence) {
      if (!isListSafe(value)) {
        violations.add(value);
      }
    }
  }
  return [...violations];
}

/**
 * String forms shared by more than one identifier of the same table, items first
 *
 * Such identifiers get distinct IDs but one key in the lookup index.
 *
 * @example
 * ```typescript
 * findIdentifierCollisions(buildSessionGraph([{ item_id: 1, next_item_id: "1" }]));
 * // ["1"]
 * ```
 */
export function findIdentifierCollisions(
  identities: Pick<GraphIdentities, "items" | "sessions">
): string[] {
  const collisions: string[] = [];
  for (const table of [identities.items, identities.sessions]) {
    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const identifier of table.identifiers) {
      const key = String(identifier);
      if (seen.has(key) && !reported.has(key)) {
        reported.add(key);
        collisions.push(key);
      }
      seen.add(key);
    }
  }
  return collisions;
}

/**
 * Write rows to a file, honouring stream backpressure
 *
 * @returns Number of data rows written (header excluded)
 */
async function writeTsv(
  filePath: string,
  header: readonly string[],
  rows: Iterable<readonly Cell[]>
): Promise<number> {
  const stream = createWriteStream(filePath, { encoding: "utf8" });
  let count = 0;

  const write = async (line: string): Promise<void> => {
    if (!stream.write(line + ROW_SEPARATOR)) {
      await once(stream, "drain");
    }
  };

  try {
    await write(header.join(COLUMN_SEPARATOR));
    for (const row of rows) {
      await write(row.join(COLUMN_SEPARATOR));
      count++;
    }
    stream.end();
    await finished(stream);
  } catch (error) {
    stream.destroy();
    throw error;
  }

  return count;
}

function* nodeRows(size: number, label: string): Generator<readonly Cell[]> {
  for (let id = 0; id < size; id++) {
    yield [id, label];
  }
}

function* nextRows(graph: SessionGraph): Generator<readonly Cell[]> {
  for (const edge of graph.transitions.values()) {
    yield [edge.sourceId, edge.destId, edge.weight, [...edge.evidence].join(LIST_SEPARATOR)];
  }
}

function* containsRows(graph: SessionGraph): Generator<readonly Cell[]> {
  for (const edge of graph.containment.values()) {
    yield [edge.sessionId, edge.itemId];
  }
}

/**
 * Bulk exporter
 *
 * @example
 * ```typescript
 * const graph = buildSessionGraph(events);
 * const summary = await new BulkExporter().export(graph, { outputDir: "import" });
 * summary.files.next.rows; // number of NEXT relationships
 * ```
 */
export class BulkExporter {
  private logger: pino.Logger = getComponentLogger("export:bulk");

  /**
   * Write all bulk files for `graph`
   *
   * @throws {FormatViolationError} If two identifiers of one table share a string form,
   *   or an evidence value contains `;`, a tab or a line break (or is empty), and the
   *   policy is "error"
   */
  async export(graph: SessionGraph, options: BulkExportOptions): Promise<BulkExportSummary> {
    const { outputDir, onFormatViolation = "error" } = options;
    const startTime = Date.now();

    const collisions = findIdentifierCollisions(graph);
    if (collisions.length > 0) {
      if (onFormatViolation === "error") {
        throw new FormatViolationError(collisions, "are the string form of several identifiers");
      }
      this.logger.warn(
        { count: collisions.length, sample: collisions.slice(0, 5) },
        "Identifiers share a lookup key and will not read back as written"
      );
    }

    const violations = findFormatViolations(graph);
    if (violations.length > 0) {
      if (onFormatViolation === "error") {
        throw new FormatViolationError(violations);
      }
      this.logger.warn(
        { count: violations.length, sample: violations.slice(0, 5) },
        "Evidence values contain the list separator and will not read back as written"
      );
    }

    await mkdir(outputDir, { recursive: true });
    const manifestPath = path.join(outputDir, MANIFEST_FILE_NAME);
    // A manifest left from an earlier export must not vouch for this one
    await rm(manifestPath, { force: true });

    const target = (kind: BulkFileKind): string => path.join(outputDir, BULK_FILE_NAMES[kind]);
    this.logger.info({ outputDir }, "Writing bulk files");

    const items = await writeTsv(
      target("items"),
      BULK_HEADERS.items,
      nodeRows(graph.items.size, NodeLabel.ITEM)
    );
    const sessions = await writeTsv(
      target("sessions"),
      BULK_HEADERS.sessions,
      nodeRows(graph.sessions.size, NodeLabel.SESSION)
    );
    const next = await writeTsv(target("next"), BULK_HEADERS.next, nextRows(graph));
    const contains = await writeTsv(target("contains"), BULK_HEADERS.contains, containsRows(graph));

    const lookup: LookupIndex = {
      item_to_id: graph.items.toRecord(),
      session_to_id: graph.sessions.toRecord(),
    };
    await writeFile(target("lookup"), JSON.stringify(lookup), "utf8");

    const files: BulkManifest["files"] = {
      items: { file: BULK_FILE_NAMES.items, rows: items },
      sessions: { file: BULK_FILE_NAMES.sessions, rows: sessions },
      next: { file: BULK_FILE_NAMES.next, rows: next },
      contains: { file: BULK_FILE_NAMES.contains, rows: contains },
      lookup: { file: BULK_FILE_NAMES.lookup, rows: graph.items.size + graph.sessions.size },
    };
    const manifest: BulkManifest = {
      format: MANIFEST_FORMAT,
      createdAt: new Date().toISOString(),
      files,
    };
    await writeFile(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf8");

    this.logger.info(
      {
        metric: "export.bulk_ms",
        value: Date.now() - startTime,
        items,
        sessions,
        next,
        contains,
      },
      "Bulk files ready"
    );

    return {
      outputDir,
      manifestPath,
      files,
      formatViolations: collisions.length + violations.length,
    };
  }
}
