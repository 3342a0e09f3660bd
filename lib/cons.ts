/**
 * This module provides the cons cell and the empty list, the two variants a
 * persistent singly linked list is built from.
 *
 * @example
 * ```ts
 * import { cons, nil, type List } from "persistent-adts";
 *
 * const xs: List<number> = cons(1, cons(2, nil));
 * ```
 *
 * @module
 */

/** The empty list. There is exactly one value of this type, {@link nil}. */
export interface Nil {
  readonly kind: "nil";
}

export interface ConsCell<T> {
  readonly kind: "cons";
  readonly head: T;
  readonly tail: List<T>;
}

/**
 * A persistent singly linked list is either empty or a head value followed
 * by another list.
 */
export type List<T> = Nil | ConsCell<T>;

export const nil: Nil = { kind: "nil" };

/**
 * @param head the first element.
 * @param tail the rest of the list, shared rather than copied.
 * @returns a new non-empty list.
 */
export const cons = <T>(head: T, tail: List<T>): ConsCell<T> => ({
  kind: "cons",
  head,
  tail,
});
