/**
 * Random list and tree generation.
 *
 * This module builds random lists and trees of a requested size from a
 * random source, so that a fixed seed reproduces the same structures.
 *
 * @module
 */
import type { List } from "../cons.ts";
import { fromArray } from "./list/list.ts";
import {
  type Branch,
  branch,
  leaf,
  type Leaf,
  type Tree,
} from "./tree/tree.ts";

/** Anything that can draw an integer from an inclusive range. */
export interface RandomSource {
  intBetween(min: number, max: number): number;
}

/**
 * @param rs the random source to use.
 * @param length how many elements to generate.
 * @param max the largest value an element may take.
 * @returns a list of integers drawn from `[0, max]`.
 */
export const randList = (
  rs: RandomSource,
  length: number,
  max: number,
): List<number> => {
  if (length < 0) {
    throw new Error("A list cannot have a negative length.");
  }

  const values: number[] = [];
  for (let i = 0; i < length; i++) {
    values.push(rs.intBetween(0, max));
  }
  return fromArray(values);
};

/**
 * Grows a tree from a single leaf. Each further leaf is paired with an
 * existing one, reached by flipping a coin at every branch on the way down
 * from the root.
 *
 * @returns a tree with exactly `leafCount` leaves.
 */
export const randTree = (
  rs: RandomSource,
  leafCount: number,
  max: number,
): Tree<number> => {
  if (leafCount < 1) {
    throw new Error(`A tree needs at least one leaf, got ${leafCount}.`);
  }

  let result: Tree<number> = leaf(rs.intBetween(0, max));
  for (let grown = 1; grown < leafCount; grown++) {
    result = splitLeaf(rs, result, leaf(rs.intBetween(0, max)));
  }
  return result;
};

interface Step {
  readonly parent: Branch<number>;
  readonly wentLeft: boolean;
}

// walks down to a leaf, pairs it with `fresh`, then rebuilds only the
// branches on the path; untouched subtrees are shared with `tree`
const splitLeaf = (
  rs: RandomSource,
  tree: Tree<number>,
  fresh: Leaf<number>,
): Tree<number> => {
  const path: Step[] = [];
  let current = tree;
  while (current.kind === "branch") {
    const wentLeft = rs.intBetween(0, 1) === 1;
    path.push({ parent: current, wentLeft });
    current = wentLeft ? current.left : current.right;
  }

  const split: Tree<number> = rs.intBetween(0, 1) === 1
    ? branch(current, fresh)
    : branch(fresh, current);

  return path.reduceRight<Tree<number>>(
    (child, { parent, wentLeft }) =>
      wentLeft ? branch(child, parent.right) : branch(parent.left, child),
    split,
  );
};
