/**
 * Tests for reading bulk exports back
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { BulkExporter } from "../../../src/export/bulk-exporter.js";
import { readBulkExport } from "../../../src/export/bulk-reader.js";
import { buildSessionGraph } from "../../../src/graph/aggregation.js";
import { BulkFormatError } from "../../../src/graph/errors.js";
import type { RawEvent } from "../../../src/events/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";

const EXAMPLE_EVENTS: RawEvent[] = [
  { session_id: 1, item_id: 10, next_item_id: 20 },
  { session_id: 1, item_id: 20, next_item_id: null },
  { session_id: 2, item_id: 10, next_item_id: 30 },
];

describe("readBulkExport", () => {
  let dir: string;

  beforeEach(async () => {
    resetLogger();
    initializeLogger({ level: "silent", format: "json" });
    dir = await mkdtemp(path.join(tmpdir(), "bulk-read-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const exportEvents = async (events: RawEvent[]): Promise<void> => {
    await new BulkExporter().export(buildSessionGraph(events), { outputDir: dir });
  };

  test("reads back the graph that was exported", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const original = buildSessionGraph(EXAMPLE_EVENTS);

    const contents = await readBulkExport(dir, { numericIdentifiers: true });

    expect(contents.items.identifiers).toEqual([10, 20, 30]);
    expect(contents.sessions.identifiers).toEqual([1, 2]);
    expect(contents.transitions).toEqual(original.transitions);
    expect(contents.containment).toEqual(original.containment);
    expect(contents.manifest?.files.contains.rows).toBe(3);
  });

  test("keeps identifiers as strings by default", async () => {
    await exportEvents(EXAMPLE_EVENTS);

    const contents = await readBulkExport(dir);

    expect(contents.items.idOf("20")).toBe(1);
    expect(contents.items.idOf(20)).toBeUndefined();
  });

  test("splits multi-session evidence", async () => {
    await exportEvents([
      { session_id: "s1", item_id: "a", next_item_id: "b" },
      { session_id: "s2", item_id: "a", next_item_id: "b" },
    ]);

    const contents = await readBulkExport(dir);

    expect(contents.transitions.get("0:1")?.evidence).toEqual(new Set(["s1", "s2"]));
    expect(contents.transitions.get("0:1")?.weight).toBe(2);
  });

  test("requires the manifest unless told otherwise", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const manifestPath = path.join(dir, "manifest.json");
    await rm(manifestPath);

    await expect(readBulkExport(dir)).rejects.toThrow(
      `${manifestPath}: missing; the export did not complete`
    );

    const contents = await readBulkExport(dir, { requireManifest: false });
    expect(contents.manifest).toBeUndefined();
    expect(contents.transitions.size).toBe(2);
  });

  test("rejects an unexpected header", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const nextPath = path.join(dir, "next.csv");
    await writeFile(nextPath, "source\tdest\n", "utf8");

    await expect(readBulkExport(dir)).rejects.toBeInstanceOf(BulkFormatError);
    await expect(readBulkExport(dir)).rejects.toThrow("unexpected header");
  });

  test("rejects a relationship pointing outside the node range", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const nextPath = path.join(dir, "next.csv");
    await appendFile(nextPath, "0\t9\t1\t1\n", "utf8");

    await expect(readBulkExport(dir)).rejects.toThrow(`${nextPath}: line 4: item ID out of range`);
  });

  test("rejects a row with the wrong number of columns", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const containsPath = path.join(dir, "contains.csv");
    await appendFile(containsPath, "1\t1\t1\n", "utf8");

    await expect(readBulkExport(dir)).rejects.toThrow(
      `${containsPath}: line 5: expected 2 columns, got 3`
    );
  });

  test("rejects row counts that disagree with the manifest", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    const manifestPath = path.join(dir, "manifest.json");
    const manifest: unknown = JSON.parse(await readFile(manifestPath, "utf8"));
    const edited = JSON.stringify(manifest).replace(
      '"next":{"file":"next.csv","rows":2}',
      '"next":{"file":"next.csv","rows":5}'
    );
    await writeFile(manifestPath, edited, "utf8");

    await expect(readBulkExport(dir)).rejects.toThrow(
      `${manifestPath}: next.csv: manifest records 5 rows, found 2`
    );
  });

  test("rejects non-numeric keys when numeric identifiers are requested", async () => {
    await exportEvents([{ session_id: "s", item_id: "a", next_item_id: "b" }]);

    await expect(readBulkExport(dir, { numericIdentifiers: true })).rejects.toThrow(
      'item_to_id: key "a" is not numeric'
    );
  });

  test("rejects a lookup index that is not a dense range", async () => {
    await exportEvents(EXAMPLE_EVENTS);
    await writeFile(
      path.join(dir, "lookup.json"),
      JSON.stringify({ item_to_id: { "10": 0, "20": 2, "30": 3 }, session_to_id: {} }),
      "utf8"
    );

    await expect(readBulkExport(dir)).rejects.toThrow(
      "item_to_id: IDs are not a dense range starting at 0"
    );
  });
});
