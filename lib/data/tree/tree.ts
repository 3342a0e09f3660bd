/**
 * Persistent binary trees.
 *
 * A tree is either a leaf holding a value or a branch owning exactly two
 * subtrees. The measures and map are derived from {@link fold}, which walks the
 * tree with an explicit work stack so that deep, unbalanced trees do not
 * exhaust the call stack.
 *
 * @module
 */

export interface Leaf<T> {
  readonly kind: "leaf";
  readonly value: T;
}

export interface Branch<T> {
  readonly kind: "branch";
  readonly left: Tree<T>;
  readonly right: Tree<T>;
}

export type Tree<T> = Leaf<T> | Branch<T>;

export const leaf = <T>(value: T): Leaf<T> => ({
  kind: "leaf",
  value,
});

export const branch = <T>(left: Tree<T>, right: Tree<T>): Branch<T> => ({
  kind: "branch",
  left,
  right,
});

// pending work: either a subtree still to fold, or a marker to combine the
// two most recent results
type Frame<T> = { kind: "visit"; tree: Tree<T> } | { kind: "combine" };

/**
 * Collapses a tree bottom-up.
 *
 * @param tree the tree to fold.
 * @param onLeaf applied to each leaf value, leftmost first.
 * @param onBranch combines the folded left and right subtrees.
 * @returns the folded value of the root.
 */
export const fold = <T, B>(
  tree: Tree<T>,
  onLeaf: (value: T) => B,
  onBranch: (lft: B, rgt: B) => B,
): B => {
  const frames: Frame<T>[] = [{ kind: "visit", tree }];
  const results: B[] = [];

  while (frames.length > 0) {
    const frame = frames.pop();

    if (frame === undefined) {
      throw new Error("stack underflow");
    } else if (frame.kind === "combine") {
      if (results.length < 2) {
        throw new Error("stack underflow");
      }
      const [lft, rgt] = results.splice(-2, 2);
      results.push(onBranch(lft, rgt));
    } else if (frame.tree.kind === "leaf") {
      results.push(onLeaf(frame.tree.value));
    } else {
      // LIFO: the left subtree is folded first, the combine runs last
      frames.push({ kind: "combine" });
      frames.push({ kind: "visit", tree: frame.tree.right });
      frames.push({ kind: "visit", tree: frame.tree.left });
    }
  }

  if (results.length !== 1) {
    throw new Error("stack underflow");
  }
  return results[0];
};

/** Counts every node, leaves and branches alike. */
export const size = <T>(tree: Tree<T>): number =>
  fold(tree, () => 1, (lft, rgt) => 1 + lft + rgt);

/** The number of edges on the longest path from the root to a leaf. */
export const depth = <T>(tree: Tree<T>): number =>
  fold(tree, () => 0, (lft, rgt) => 1 + Math.max(lft, rgt));

export const maximum = (tree: Tree<number>): number =>
  fold(tree, (value) => value, (lft, rgt) => Math.max(lft, rgt));

export const map = <T, U>(tree: Tree<T>, f: (value: T) => U): Tree<U> =>
  fold<T, Tree<U>>(tree, (value) => leaf(f(value)), branch);

/** @returns the leaf values from left to right. */
export const leaves = <T>(tree: Tree<T>): T[] => {
  const values: T[] = [];
  const stack = [tree];

  while (stack.length > 0) {
    const item = stack.pop();

    if (item === undefined) {
      throw new Error("stack underflow");
    } else if (item.kind === "leaf") {
      values.push(item.value);
    } else {
      stack.push(item.right);
      stack.push(item.left);
    }
  }

  return values;
};

/**
 * Compare two trees for structural equivalence.
 */
export const equivalent = <T>(
  lft: Tree<T>,
  rgt: Tree<T>,
  eq: (a: T, b: T) => boolean = (a, b) => a === b,
): boolean => {
  const firstStack = [lft];
  const secondStack = [rgt];

  while (firstStack.length > 0 && secondStack.length > 0) {
    const firstItem = firstStack.pop();
    const secondItem = secondStack.pop();

    if (firstItem === undefined || secondItem === undefined) {
      throw new Error("stack underflow");
    } else if (firstItem.kind === "leaf" && secondItem.kind === "leaf") {
      if (!eq(firstItem.value, secondItem.value)) {
        return false;
      }
    } else if (firstItem.kind === "branch" && secondItem.kind === "branch") {
      firstStack.push(firstItem.right);
      firstStack.push(firstItem.left);
      secondStack.push(secondItem.right);
      secondStack.push(secondItem.left);
    } else {
      return false;
    }
  }

  return firstStack.length === secondStack.length;
};

/** Renders a tree as nested constructors, e.g. `Branch(Leaf(1), Leaf(2))`. */
export const prettyPrint = <T>(tree: Tree<T>): string =>
  fold(
    tree,
    (value) => `Leaf(${String(value)})`,
    (lft, rgt) => `Branch(${lft}, ${rgt})`,
  );
