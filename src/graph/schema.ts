/**
 * @module graph/schema
 *
 * Neo4j schema for the session graph.
 *
 * Uniqueness constraints on the dense IDs back the `MERGE` lookups of the direct
 * load. All statements use IF NOT EXISTS and can be run before every load.
 */

import { NodeLabel } from "./types.js";

/**
 * Type of schema element for categorization
 */
export type SchemaElementType = "constraint" | "index";

/**
 * A single schema element (constraint or index)
 */
export interface SchemaElement {
  /** Unique name for this schema element */
  name: string;
  /** Type of schema element */
  type: SchemaElementType;
  /** Description of what this element does */
  description: string;
  /** Cypher statement to create the element */
  cypher: string;
}

/**
 * Unique constraints on node IDs
 */
export const CONSTRAINTS: readonly SchemaElement[] = [
  {
    name: "item_id",
    type: "constraint",
    description: "Ensure item dense IDs are unique",
    cypher: `CREATE CONSTRAINT item_id IF NOT EXISTS FOR (i:${NodeLabel.ITEM}) REQUIRE i.id IS UNIQUE`,
  },
  {
    name: "session_id",
    type: "constraint",
    description: "Ensure session dense IDs are unique",
    cypher: `CREATE CONSTRAINT session_id IF NOT EXISTS FOR (s:${NodeLabel.SESSION}) REQUIRE s.id IS UNIQUE`,
  },
];

/**
 * Lookup indexes on the raw identifiers
 */
export const INDEXES: readonly SchemaElement[] = [
  {
    name: "item_key",
    type: "index",
    description: "Index for resolving items by raw identifier",
    cypher: `CREATE INDEX item_key IF NOT EXISTS FOR (i:${NodeLabel.ITEM}) ON (i.key)`,
  },
  {
    name: "session_key",
    type: "index",
    description: "Index for resolving sessions by raw identifier",
    cypher: `CREATE INDEX session_key IF NOT EXISTS FOR (s:${NodeLabel.SESSION}) ON (s.key)`,
  },
];

/**
 * All schema elements, constraints first
 */
export const ALL_SCHEMA_ELEMENTS: readonly SchemaElement[] = [...CONSTRAINTS, ...INDEXES];

/**
 * Get all Cypher statements needed to create the schema
 *
 * @returns Array of Cypher statements in execution order
 */
export function getAllSchemaStatements(): string[] {
  return ALL_SCHEMA_ELEMENTS.map((element) => element.cypher);
}
