/**
 * Edge aggregation
 *
 * Folds raw events into weighted NEXT edges and deduplicated CONTAINS edges keyed by
 * dense IDs. Accumulation is addition and set union only, so the result does not
 * depend on event order.
 *
 * @module graph/aggregation
 */

import { MissingRequiredFieldError } from "./errors.js";
import { assignIdentities, requireItemId, type IdentityTable } from "./identity.js";
import {
  containmentKey,
  transitionKey,
  type AggregatedEdges,
  type ContainmentEdge,
  type ContainmentKey,
  type DenseId,
  type GraphIdentities,
  type SessionGraph,
  type SessionGraphStats,
  type TransitionEdge,
  type TransitionKey,
} from "./types.js";
import { isPresent, type Identifier, type RawEvent } from "../events/types.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * Get the transition edge for `(sourceId, destId)`, inserting a zero-weight edge
 * if there is none yet
 */
export function getOrInsertTransition(
  transitions: Map<TransitionKey, TransitionEdge>,
  sourceId: DenseId,
  destId: DenseId
): TransitionEdge {
  const key = transitionKey(sourceId, destId);
  let edge = transitions.get(key);
  if (edge === undefined) {
    edge = { sourceId, destId, weight: 0, evidence: new Set() };
    transitions.set(key, edge);
  }
  return edge;
}

function resolve(
  table: IdentityTable,
  identifier: Identifier,
  field: string,
  eventIndex: number
): DenseId {
  const id = table.idOf(identifier);
  if (id === undefined) {
    throw new MissingRequiredFieldError(
      field,
      eventIndex,
      `Event at index ${eventIndex}: ${field} ${JSON.stringify(identifier)} has no assigned ID`
    );
  }
  return id;
}

/**
 * Aggregate NEXT and CONTAINS edges
 *
 * - Every event with a `next_item_id` adds 1 to its pair's weight and, when it has a
 *   `session_id`, the session's string form to the pair's evidence.
 * - Every event with a `session_id` adds its (session, item) pair to containment.
 *
 * @param identities - Tables built from the same events (see {@link assignIdentities})
 * @throws {MissingRequiredFieldError} If an event has no `item_id`, or refers to an
 *   identifier the tables do not know
 */
export function aggregateEdges(
  events: readonly RawEvent[],
  identities: GraphIdentities
): AggregatedEdges {
  const transitions = new Map<TransitionKey, TransitionEdge>();
  const containment = new Map<ContainmentKey, ContainmentEdge>();

  events.forEach((event, index) => {
    const itemId = resolve(identities.items, requireItemId(event, index), "item_id", index);

    if (isPresent(event.next_item_id)) {
      const nextId = resolve(identities.items, event.next_item_id, "next_item_id", index);
      const edge = getOrInsertTransition(transitions, itemId, nextId);
      edge.weight += 1;
      if (isPresent(event.session_id)) {
        edge.evidence.add(String(event.session_id));
      }
    }

    if (isPresent(event.session_id)) {
      const sessionId = resolve(identities.sessions, event.session_id, "session_id", index);
      const key = containmentKey(sessionId, itemId);
      if (!containment.has(key)) {
        containment.set(key, { sessionId, itemId });
      }
    }
  });

  getComponentLogger("graph:aggregation").info(
    { events: events.length, transitions: transitions.size, containment: containment.size },
    "Edges aggregated"
  );

  return { transitions, containment };
}

/**
 * Assign identities and aggregate edges in one step
 */
export function buildSessionGraph(events: readonly RawEvent[]): SessionGraph {
  const identities = assignIdentities(events);
  return { ...identities, ...aggregateEdges(events, identities) };
}

/**
 * Node and relationship counts
 */
export function getGraphStats(graph: SessionGraph): SessionGraphStats {
  let totalWeight = 0;
  for (const edge of graph.transitions.values()) {
    totalWeight += edge.weight;
  }
  return {
    items: graph.items.size,
    sessions: graph.sessions.size,
    transitions: graph.transitions.size,
    containment: graph.containment.size,
    totalWeight,
  };
}
