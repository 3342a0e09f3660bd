/**
 * Persistent lists and binary trees with structural-recursion operations.
 *
 * This module re-exports the public API:
 * - list cells and constructors, with list operations under `List`
 * - tree constructors, with tree operations under `Tree`
 * - seeded random generation of lists and trees
 *
 * @example
 * ```ts
 * import { List, Tree, branch, leaf } from "persistent-adts";
 * const xs = List.list(1, 2, 3);
 * List.prettyPrint(List.map(xs, (x) => x * 2)); // "Cons(2, Cons(4, Cons(6, Nil)))"
 * Tree.depth(branch(leaf(1), branch(leaf(2), leaf(4)))); // 2
 * ```
 *
 * @module
 */
// List cells
export { cons, type ConsCell, type Nil, nil } from "./cons.ts";
/** Operations over persistent singly linked lists. */
export * as List from "./data/list/list.ts";
/** Raised by `List.tail` when handed the empty list. */
export { EmptyListError } from "./data/list/emptyListError.ts";

// Tree nodes
export {
  type Branch,
  branch,
  type Leaf,
  leaf,
} from "./data/tree/tree.ts";
/** Operations over persistent binary trees. */
export * as Tree from "./data/tree/tree.ts";

// Random generation
export {
  type RandomSource,
  /** Generates a random list of integers of a given length. */
  randList,
  /** Generates a random tree with a given number of leaves. */
  randTree,
} from "./data/generator.ts";
