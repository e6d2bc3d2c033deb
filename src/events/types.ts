/**
 * Raw session event types
 *
 * @module events/types
 */

/**
 * Externally sourced item or session token
 *
 * Compared by natural order: numbers numerically, strings by code unit, and every
 * number before every string.
 */
export type Identifier = string | number;

/**
 * One (session, item, next item) observation
 *
 * `session_id` and `next_item_id` are absent when `null` or `undefined`.
 */
export interface RawEvent {
  session_id?: Identifier | null;
  item_id: Identifier;
  next_item_id?: Identifier | null;
}

/**
 * Whether an optional identifier is present
 *
 * `0` and `""` are present values.
 */
export function isPresent(value: Identifier | null | undefined): value is Identifier {
  return value !== null && value !== undefined;
}

/**
 * Natural ordering of identifiers
 */
export function compareIdentifiers(a: Identifier, b: Identifier): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "number") {
    return -1;
  }
  if (typeof b === "number") {
    return 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
