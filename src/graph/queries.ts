/**
 * Write operations of the direct load
 *
 * Every query takes one chunk as `$batch` and is idempotent: nodes and relationships
 * are merged on their dense IDs and NEXT properties are assigned, not accumulated,
 * so replaying a chunk after an ambiguous failure leaves the same graph.
 *
 * JavaScript numbers reach the server as floats; `toInteger` stores IDs and weights
 * as integers.
 *
 * @module graph/queries
 */

import type { WriteOperation } from "../loader/types.js";
import { NodeLabel, RelationshipType } from "./types.js";

export const MERGE_ITEMS: WriteOperation = {
  name: "items",
  query: `UNWIND $batch AS row
MERGE (i:${NodeLabel.ITEM} {id: toInteger(row.id)})
SET i.key = row.key`,
};

export const MERGE_SESSIONS: WriteOperation = {
  name: "sessions",
  query: `UNWIND $batch AS row
MERGE (s:${NodeLabel.SESSION} {id: toInteger(row.id)})
SET s.key = row.key`,
};

export const MERGE_NEXT: WriteOperation = {
  name: "next",
  query: `UNWIND $batch AS row
MATCH (a:${NodeLabel.ITEM} {id: toInteger(row.source)})
MATCH (b:${NodeLabel.ITEM} {id: toInteger(row.dest)})
MERGE (a)-[r:${RelationshipType.NEXT}]->(b)
SET r.weight = toInteger(row.weight), r.sessions = row.sessions`,
};

export const MERGE_CONTAINS: WriteOperation = {
  name: "contains",
  query: `UNWIND $batch AS row
MATCH (s:${NodeLabel.SESSION} {id: toInteger(row.session)})
MATCH (i:${NodeLabel.ITEM} {id: toInteger(row.item)})
MERGE (s)-[:${RelationshipType.CONTAINS}]->(i)`,
};
