/**
 * Event and batch file readers
 *
 * Input files are JSON arrays. Event files hold one `{session_id, item_id,
 * next_item_id}` object per row; batch files hold arbitrary rows for a write query.
 *
 * @module events/event-reader
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { BulkFormatError, MissingRequiredFieldError } from "../graph/errors.js";
import { getComponentLogger } from "../logging/index.js";
import type { RawEvent } from "./types.js";

/**
 * Identifier schema: a string or a finite number
 */
export const IdentifierSchema = z.union([z.string(), z.number().finite()]);

/**
 * Event row schema. `item_id` is checked separately so that its absence surfaces as
 * {@link MissingRequiredFieldError} rather than a generic schema error.
 */
export const RawEventSchema = z.object({
  session_id: IdentifierSchema.nullish(),
  item_id: IdentifierSchema.nullish(),
  next_item_id: IdentifierSchema.nullish(),
});

async function readJsonArray(filePath: string): Promise<unknown[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new BulkFormatError(
      filePath,
      "cannot be read as JSON",
      error instanceof Error ? error : undefined
    );
  }
  if (!Array.isArray(raw)) {
    throw new BulkFormatError(filePath, "expected a JSON array");
  }
  return raw;
}

/**
 * Validate already-parsed rows as events
 *
 * @throws {MissingRequiredFieldError} If a row has no `item_id`
 * @throws {BulkFormatError} If a row has the wrong shape
 */
export function parseEvents(rows: readonly unknown[], source: string = "<input>"): RawEvent[] {
  return rows.map((row, index) => {
    const parsed = RawEventSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid row";
      throw new BulkFormatError(source, `event ${index}: ${where}`);
    }

    const { session_id, item_id, next_item_id } = parsed.data;
    if (item_id === null || item_id === undefined) {
      throw new MissingRequiredFieldError("item_id", index);
    }
    return { session_id, item_id, next_item_id };
  });
}

/**
 * Read an event file
 *
 * @example
 * ```typescript
 * const events = await readEventFile("data/batch.json");
 * const graph = buildSessionGraph(events);
 * ```
 */
export async function readEventFile(filePath: string): Promise<RawEvent[]> {
  const events = parseEvents(await readJsonArray(filePath), filePath);
  getComponentLogger("events:reader").info({ filePath, events: events.length }, "Events loaded");
  return events;
}

/**
 * Read a batch file of opaque write records
 */
export async function readBatchFile(filePath: string): Promise<unknown[]> {
  const records = await readJsonArray(filePath);
  getComponentLogger("events:reader").info({ filePath, rows: records.length }, "Batch rows loaded");
  return records;
}
