/**
 * Dense identity assignment
 *
 * Maps raw item and session identifiers to `[0, N)` by sorting the distinct values
 * and taking each one's rank. The mapping depends only on the set of identifiers,
 * never on event order, so re-running on the same input reproduces it. Tables from
 * independent runs over different inputs are not comparable.
 *
 * @module graph/identity
 */

import { MissingRequiredFieldError } from "./errors.js";
import type { DenseId, GraphIdentities } from "./types.js";
import { compareIdentifiers, isPresent, type Identifier, type RawEvent } from "../events/types.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * Bijection between a set of identifiers and `[0, size)`
 */
export class IdentityTable {
  private readonly ids: Map<Identifier, DenseId>;
  private readonly sorted: readonly Identifier[];

  private constructor(sorted: readonly Identifier[]) {
    this.sorted = sorted;
    this.ids = new Map(sorted.map((identifier, index) => [identifier, index]));
  }

  /**
   * Build a table from any collection of identifiers; duplicates collapse
   */
  static fromIdentifiers(identifiers: Iterable<Identifier>): IdentityTable {
    const distinct = [...new Set(identifiers)];
    distinct.sort(compareIdentifiers);
    return new IdentityTable(distinct);
  }

  /**
   * Rebuild a table from explicit `[identifier, id]` assignments, such as a lookup
   * index read back from disk
   *
   * @returns `undefined` unless the IDs cover `[0, n)` exactly once and no identifier
   *   repeats
   */
  static fromAssignments(
    assignments: Iterable<[Identifier, DenseId]>
  ): IdentityTable | undefined {
    const byId: Identifier[] = [];
    const seen = new Set<Identifier>();
    let count = 0;
    for (const [identifier, id] of assignments) {
      if (!Number.isInteger(id) || id < 0 || byId[id] !== undefined || seen.has(identifier)) {
        return undefined;
      }
      byId[id] = identifier;
      seen.add(identifier);
      count++;
    }
    if (byId.length !== count) {
      return undefined;
    }
    return new IdentityTable(byId);
  }

  /**
   * Number of identifiers
   */
  get size(): number {
    return this.sorted.length;
  }

  /**
   * Identifiers in ID order
   */
  get identifiers(): readonly Identifier[] {
    return this.sorted;
  }

  /**
   * Dense ID of an identifier, or `undefined` if it is not in the table
   */
  idOf(identifier: Identifier): DenseId | undefined {
    return this.ids.get(identifier);
  }

  /**
   * Identifier behind a dense ID, or `undefined` if out of range
   */
  identifierOf(id: DenseId): Identifier | undefined {
    return this.sorted[id];
  }

  has(identifier: Identifier): boolean {
    return this.ids.has(identifier);
  }

  /**
   * `[identifier, id]` pairs in ID order
   */
  *entries(): IterableIterator<[Identifier, DenseId]> {
    for (let id = 0; id < this.sorted.length; id++) {
      const identifier = this.sorted[id];
      if (identifier !== undefined) {
        yield [identifier, id];
      }
    }
  }

  /**
   * Plain object form for the lookup index; keys are the identifiers' string form
   */
  toRecord(): Record<string, DenseId> {
    const record: Record<string, DenseId> = {};
    for (const [identifier, id] of this.entries()) {
      record[String(identifier)] = id;
    }
    return record;
  }
}

/**
 * Build the item and session identity tables for a set of events
 *
 * Items are every `item_id` plus every present `next_item_id`; sessions are every
 * present `session_id`.
 *
 * @throws {MissingRequiredFieldError} If an event has no `item_id`
 *
 * @example
 * ```typescript
 * const { items, sessions } = assignIdentities([
 *   { session_id: 1, item_id: 10, next_item_id: 20 },
 *   { session_id: 2, item_id: 10, next_item_id: 30 },
 * ]);
 * items.idOf(30); // 2
 * sessions.idOf(2); // 1
 * ```
 */
export function assignIdentities(events: readonly RawEvent[]): GraphIdentities {
  const itemIdentifiers = new Set<Identifier>();
  const sessionIdentifiers = new Set<Identifier>();

  events.forEach((event, index) => {
    itemIdentifiers.add(requireItemId(event, index));
    if (isPresent(event.next_item_id)) {
      itemIdentifiers.add(event.next_item_id);
    }
    if (isPresent(event.session_id)) {
      sessionIdentifiers.add(event.session_id);
    }
  });

  const identities: GraphIdentities = {
    items: IdentityTable.fromIdentifiers(itemIdentifiers),
    sessions: IdentityTable.fromIdentifiers(sessionIdentifiers),
  };

  getComponentLogger("graph:identity").info(
    { events: events.length, items: identities.items.size, sessions: identities.sessions.size },
    "Identities assigned"
  );

  return identities;
}

/**
 * Read an event's `item_id`, rejecting absent values
 *
 * Input that did not pass through the event reader may violate the `RawEvent`
 * type, so the check happens at run time as well.
 *
 * @throws {MissingRequiredFieldError}
 */
export function requireItemId(event: RawEvent, index: number): Identifier {
  const itemId: Identifier | null | undefined = event.item_id;
  if (!isPresent(itemId)) {
    throw new MissingRequiredFieldError("item_id", index);
  }
  return itemId;
}
