/**
 * Tests for edge aggregation
 */

import { describe, test, expect, beforeEach } from "vitest";
import {
  aggregateEdges,
  buildSessionGraph,
  getGraphStats,
  getOrInsertTransition,
} from "../../../src/graph/aggregation.js";
import { assignIdentities, IdentityTable } from "../../../src/graph/identity.js";
import { MissingRequiredFieldError } from "../../../src/graph/errors.js";
import type { TransitionEdge, TransitionKey } from "../../../src/graph/types.js";
import type { RawEvent } from "../../../src/events/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";

const EXAMPLE_EVENTS: RawEvent[] = [
  { session_id: 1, item_id: 10, next_item_id: 20 },
  { session_id: 1, item_id: 20, next_item_id: null },
  { session_id: 2, item_id: 10, next_item_id: 30 },
];

describe("Edge aggregation", () => {
  beforeEach(() => {
    resetLogger();
    initializeLogger({ level: "silent", format: "json" });
  });

  describe("aggregateEdges", () => {
    test("builds the transitions and containment of the example events", () => {
      const graph = buildSessionGraph(EXAMPLE_EVENTS);

      expect([...graph.transitions.keys()]).toEqual(["0:1", "0:2"]);
      expect(graph.transitions.get("0:1")).toEqual({
        sourceId: 0,
        destId: 1,
        weight: 1,
        evidence: new Set(["1"]),
      });
      expect(graph.transitions.get("0:2")).toEqual({
        sourceId: 0,
        destId: 2,
        weight: 1,
        evidence: new Set(["2"]),
      });
      expect([...graph.containment.values()]).toEqual([
        { sessionId: 0, itemId: 0 },
        { sessionId: 0, itemId: 1 },
        { sessionId: 1, itemId: 0 },
      ]);
    });

    test("weight counts every occurrence while evidence keeps distinct sessions", () => {
      const graph = buildSessionGraph([
        { session_id: "s1", item_id: "a", next_item_id: "b" },
        { session_id: "s1", item_id: "a", next_item_id: "b" },
        { session_id: "s2", item_id: "a", next_item_id: "b" },
      ]);

      const edge = graph.transitions.get("0:1");
      expect(edge?.weight).toBe(3);
      expect(edge?.evidence).toEqual(new Set(["s1", "s2"]));
    });

    test("weight is at least the evidence size", () => {
      const graph = buildSessionGraph([
        { session_id: 1, item_id: 1, next_item_id: 2 },
        { session_id: 2, item_id: 1, next_item_id: 2 },
        { item_id: 1, next_item_id: 2 },
        { session_id: 1, item_id: 2, next_item_id: 1 },
      ]);

      for (const edge of graph.transitions.values()) {
        expect(edge.weight).toBeGreaterThanOrEqual(edge.evidence.size);
      }
      expect(graph.transitions.get("0:1")?.weight).toBe(3);
      expect(graph.transitions.get("0:1")?.evidence).toEqual(new Set(["1", "2"]));
    });

    test("an event without session counts toward weight only", () => {
      const graph = buildSessionGraph([{ item_id: "x", next_item_id: "y", session_id: null }]);

      expect(graph.transitions.get("0:1")?.weight).toBe(1);
      expect(graph.transitions.get("0:1")?.evidence.size).toBe(0);
      expect(graph.containment.size).toBe(0);
      expect(graph.sessions.size).toBe(0);
    });

    test("an event without next item adds containment only", () => {
      const graph = buildSessionGraph([{ session_id: 7, item_id: "x" }]);

      expect(graph.transitions.size).toBe(0);
      expect([...graph.containment.keys()]).toEqual(["0:0"]);
    });

    test("self-transitions are kept", () => {
      const graph = buildSessionGraph([{ session_id: 1, item_id: 5, next_item_id: 5 }]);

      expect(graph.transitions.get("0:0")?.weight).toBe(1);
    });

    test("containment pairs are deduplicated", () => {
      const graph = buildSessionGraph([
        { session_id: 1, item_id: 1, next_item_id: 2 },
        { session_id: 1, item_id: 1, next_item_id: 3 },
        { session_id: 1, item_id: 1 },
      ]);

      expect(graph.containment.size).toBe(1);
    });

    test("containment only records item_id, not next_item_id", () => {
      const graph = buildSessionGraph([{ session_id: 1, item_id: "a", next_item_id: "b" }]);

      expect([...graph.containment.values()]).toEqual([{ sessionId: 0, itemId: 0 }]);
    });

    test("numeric session IDs become their string form in evidence", () => {
      const graph = buildSessionGraph([{ session_id: 0, item_id: 1, next_item_id: 2 }]);

      expect(graph.transitions.get("0:1")?.evidence).toEqual(new Set(["0"]));
    });

    test("is independent of event order", () => {
      const events: RawEvent[] = [
        { session_id: "b", item_id: 3, next_item_id: 1 },
        { session_id: "a", item_id: 1, next_item_id: 2 },
        { session_id: "a", item_id: 3, next_item_id: 1 },
        { session_id: "c", item_id: 2 },
      ];

      const forward = buildSessionGraph(events);
      const reversed = buildSessionGraph([...events].reverse());

      const weights = (g: typeof forward): Record<string, number> =>
        Object.fromEntries([...g.transitions].map(([key, edge]) => [key, edge.weight]));
      expect(weights(reversed)).toEqual(weights(forward));
      expect(reversed.transitions.get("2:0")?.evidence).toEqual(new Set(["a", "b"]));
      expect(new Set(reversed.containment.keys())).toEqual(new Set(forward.containment.keys()));
    });

    describe("over a mixed event list", () => {
      // Repeated pairs, self-loops, events without a session or a next item, and a
      // next item that never appears as item_id
      const events: RawEvent[] = [
        { session_id: "s1", item_id: 5, next_item_id: 7 },
        { session_id: "s1", item_id: 7, next_item_id: 5 },
        { session_id: "s1", item_id: 5, next_item_id: 7 },
        { session_id: "s2", item_id: 5, next_item_id: 7 },
        { session_id: null, item_id: 7, next_item_id: 13 },
        { session_id: "s2", item_id: 9, next_item_id: null },
        { session_id: "s3", item_id: 9, next_item_id: 9 },
        { session_id: "s3", item_id: 9, next_item_id: 9 },
        { item_id: 11 },
        { session_id: "s2", item_id: 7, next_item_id: "x" },
        { item_id: "x", next_item_id: 5 },
        { session_id: 0, item_id: 12, next_item_id: 5 },
      ];

      test("total weight equals the number of events with a next item", () => {
        const graph = buildSessionGraph(events);
        const withNext = events.filter(
          (event) => event.next_item_id !== null && event.next_item_id !== undefined
        ).length;

        expect(withNext).toBe(10);
        expect(getGraphStats(graph).totalWeight).toBe(withNext);
      });

      test("items are the union of item_id and next_item_id values", () => {
        const graph = buildSessionGraph(events);
        const distinct = new Set<string | number>();
        for (const event of events) {
          distinct.add(event.item_id);
          if (event.next_item_id !== null && event.next_item_id !== undefined) {
            distinct.add(event.next_item_id);
          }
        }

        expect(distinct.size).toBe(7);
        expect(graph.items.size).toBe(distinct.size);
        expect(graph.items.identifiers).toEqual([5, 7, 9, 11, 12, 13, "x"]);
      });

      test("collects weights and evidence per pair", () => {
        const graph = buildSessionGraph(events);

        const summary = Object.fromEntries(
          [...graph.transitions].map(([key, edge]) => [
            key,
            [edge.weight, [...edge.evidence].sort()],
          ])
        );

        expect(summary).toEqual({
          "0:1": [3, ["s1", "s2"]],
          "1:0": [1, ["s1"]],
          "1:5": [1, []],
          "2:2": [2, ["s3"]],
          "1:6": [1, ["s2"]],
          "6:0": [1, []],
          "4:0": [1, ["0"]],
        });
        expect(graph.containment.size).toBe(7);
        expect(graph.sessions.identifiers).toEqual([0, "s1", "s2", "s3"]);
      });

      test("gives the same weights, evidence and containment in reverse order", () => {
        const forward = buildSessionGraph(events);
        const reversed = buildSessionGraph([...events].reverse());

        expect(new Set(reversed.transitions.keys())).toEqual(new Set(forward.transitions.keys()));
        for (const [key, edge] of forward.transitions) {
          const other = reversed.transitions.get(key);
          expect(other?.weight).toBe(edge.weight);
          expect(other?.evidence).toEqual(edge.evidence);
        }
        expect(new Set(reversed.containment.keys())).toEqual(new Set(forward.containment.keys()));
      });
    });

    test("returns empty sets for no events", () => {
      const graph = buildSessionGraph([]);

      expect(graph.transitions.size).toBe(0);
      expect(graph.containment.size).toBe(0);
      expect(graph.items.size).toBe(0);
    });

    test("rejects identifiers missing from the tables", () => {
      const identities = {
        items: IdentityTable.fromIdentifiers([1]),
        sessions: IdentityTable.fromIdentifiers([]),
      };

      expect(() => aggregateEdges([{ item_id: 1, next_item_id: 2 }], identities)).toThrow(
        "Event at index 0: next_item_id 2 has no assigned ID"
      );
    });

    test("rejects events without item_id", () => {
      const events: RawEvent[] = JSON.parse('[{"session_id": 1, "next_item_id": 2}]');

      expect(() => aggregateEdges(events, assignIdentities([]))).toThrow(
        MissingRequiredFieldError
      );
    });
  });

  describe("getOrInsertTransition", () => {
    test("inserts a zero-weight edge once", () => {
      const transitions = new Map<TransitionKey, TransitionEdge>();

      const first = getOrInsertTransition(transitions, 2, 3);
      first.weight += 1;
      const second = getOrInsertTransition(transitions, 2, 3);

      expect(second).toBe(first);
      expect(second.weight).toBe(1);
      expect(transitions.size).toBe(1);
    });
  });

  describe("getGraphStats", () => {
    test("counts nodes, edges and total weight", () => {
      const stats = getGraphStats(buildSessionGraph(EXAMPLE_EVENTS));

      expect(stats).toEqual({
        items: 3,
        sessions: 2,
        transitions: 2,
        containment: 3,
        totalWeight: 2,
      });
    });
  });
});
