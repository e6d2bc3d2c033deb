/**
 * Type definitions for the session graph
 *
 * Two node kinds (items and sessions, each with its own dense ID range) and two
 * relationship kinds:
 * - NEXT: item → item, weighted, with the set of sessions it was observed in
 * - CONTAINS: session → item, presence only
 *
 * @module graph/types
 */

import type { IdentityTable } from "./identity.js";
import type { RetryConfig } from "../utils/retry.js";

/**
 * Dense integer ID assigned by an {@link IdentityTable}
 */
export type DenseId = number;

/**
 * Map key of a transition edge: `"<sourceId>:<destId>"`
 */
export type TransitionKey = `${DenseId}:${DenseId}`;

/**
 * Map key of a containment edge: `"<sessionId>:<itemId>"`
 */
export type ContainmentKey = `${DenseId}:${DenseId}`;

/**
 * Aggregated NEXT relationship between two items
 */
export interface TransitionEdge {
  sourceId: DenseId;
  destId: DenseId;
  /** Number of events carrying this ordered pair */
  weight: number;
  /** Raw session identifiers (string form) the transition was observed under */
  evidence: Set<string>;
}

/**
 * CONTAINS relationship between a session and an item
 */
export interface ContainmentEdge {
  sessionId: DenseId;
  itemId: DenseId;
}

/**
 * Identity tables for both node kinds
 */
export interface GraphIdentities {
  items: IdentityTable;
  sessions: IdentityTable;
}

/**
 * Aggregated edge sets
 */
export interface AggregatedEdges {
  transitions: Map<TransitionKey, TransitionEdge>;
  containment: Map<ContainmentKey, ContainmentEdge>;
}

/**
 * Everything built for one pipeline run
 */
export interface SessionGraph extends GraphIdentities, AggregatedEdges {}

/**
 * Node and relationship counts of a session graph
 */
export interface SessionGraphStats {
  items: number;
  sessions: number;
  transitions: number;
  containment: number;
  /** Sum of all transition weights */
  totalWeight: number;
}

/**
 * Node labels and relationship types used in the store and the bulk files
 */
export const NodeLabel = {
  ITEM: "Item",
  SESSION: "Session",
} as const;

export type NodeLabel = (typeof NodeLabel)[keyof typeof NodeLabel];

export const RelationshipType = {
  NEXT: "NEXT",
  CONTAINS: "CONTAINS",
} as const;

export type RelationshipType = (typeof RelationshipType)[keyof typeof RelationshipType];

export function transitionKey(sourceId: DenseId, destId: DenseId): TransitionKey {
  return `${sourceId}:${destId}`;
}

export function containmentKey(sessionId: DenseId, itemId: DenseId): ContainmentKey {
  return `${sessionId}:${itemId}`;
}

/**
 * Neo4j connection configuration
 */
export interface Neo4jConfig {
  /** Connection URI, e.g. `bolt://localhost:7687` or `neo4j+s://host` */
  uri: string;

  /** Neo4j username for authentication */
  username: string;

  /** Neo4j password for authentication */
  password: string;

  /** Target database; the server default when omitted */
  database?: string;

  /** Maximum connection pool size (default: 50) */
  maxConnectionPoolSize?: number;

  /** Connection acquisition timeout in ms (default: 30000) */
  connectionAcquisitionTimeout?: number;

  /** Optional retry configuration for establishing the connection */
  retry?: RetryConfig;
}
