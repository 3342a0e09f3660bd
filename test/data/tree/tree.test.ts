import { assert } from "chai";
import { describe, it } from "mocha";
import rsexport, { type RandomSeed } from "random-seed";

import { randTree } from "../../../lib/data/generator.ts";
import {
  branch,
  depth,
  equivalent,
  fold,
  leaf,
  leaves,
  map,
  maximum,
  prettyPrint,
  size,
  type Tree,
} from "../../../lib/data/tree/tree.ts";
const { create } = rsexport;

const tree = branch(leaf(1), branch(leaf(2), leaf(4)));

describe("tree measures", () => {
  it("counts every node", () => {
    assert.strictEqual(size(leaf(1)), 1);
    assert.strictEqual(size(tree), 5);
  });

  it("measures depth in edges", () => {
    assert.strictEqual(depth(leaf(1)), 0);
    assert.strictEqual(depth(tree), 2);
  });

  it("finds the maximum leaf", () => {
    assert.strictEqual(maximum(leaf(5)), 5);
    assert.strictEqual(maximum(tree), 4);
    assert.strictEqual(maximum(branch(leaf(-3), leaf(-7))), -3);
  });
});

describe("tree map", () => {
  it("maps a leaf", () => {
    assert.deepStrictEqual(map(leaf(2), (x) => x + 1), leaf(3));
  });

  it("preserves the shape of the tree", () => {
    assert.deepStrictEqual(
      map(tree, (x) => x + 1),
      branch(leaf(2), branch(leaf(3), leaf(5))),
    );
  });

  it("changes the element type", () => {
    assert.strictEqual(
      prettyPrint(map(tree, (x) => `n${x}`)),
      "Branch(Leaf(n1), Branch(Leaf(n2), Leaf(n4)))",
    );
  });

  it("leaves its input untouched", () => {
    map(tree, (x) => x * 10);
    assert.strictEqual(
      prettyPrint(tree),
      "Branch(Leaf(1), Branch(Leaf(2), Leaf(4)))",
    );
  });
});

describe("tree fold", () => {
  it("visits leaves from left to right", () => {
    const visited: number[] = [];
    fold(tree, (value) => {
      visited.push(value);
      return value;
    }, (lft, rgt) => lft + rgt);
    assert.deepStrictEqual(visited, [1, 2, 4]);
  });

  it("combines the left result before the right", () => {
    assert.strictEqual(
      fold(tree, (value) => `${value}`, (lft, rgt) => `(${lft} ${rgt})`),
      "(1 (2 4))",
    );
  });

  it("lists the leaves in order", () => {
    assert.deepStrictEqual(leaves(tree), [1, 2, 4]);
    assert.deepStrictEqual(leaves(leaf("x")), ["x"]);
  });
});

describe("tree equivalence", () => {
  it("matches identical structure and values", () => {
    assert.isTrue(
      equivalent(tree, branch(leaf(1), branch(leaf(2), leaf(4)))),
    );
  });

  it("rejects a different shape with the same leaves", () => {
    assert.isFalse(
      equivalent(tree, branch(branch(leaf(1), leaf(2)), leaf(4))),
    );
    assert.isFalse(equivalent(leaf(1), tree));
  });

  it("rejects different values", () => {
    assert.isFalse(equivalent(tree, map(tree, (x) => x + 1)));
  });

  it("uses the supplied element equality", () => {
    const sameParity = (a: number, b: number) => a % 2 === b % 2;
    assert.isTrue(
      equivalent(tree, branch(leaf(3), branch(leaf(6), leaf(8))), sameParity),
    );
  });
});

describe("deep trees", () => {
  const n = 100000;
  let spine: Tree<number> = leaf(0);
  for (let i = 1; i <= n; i++) {
    spine = branch(spine, leaf(i));
  }

  it("measures without exhausting the stack", () => {
    assert.strictEqual(depth(spine), n);
    assert.strictEqual(size(spine), 2 * n + 1);
    assert.strictEqual(maximum(spine), n);
    assert.strictEqual(leaves(spine).length, n + 1);
  });

  it("maps without exhausting the stack", () => {
    const mapped = map(spine, (x) => x + 1);
    assert.strictEqual(maximum(mapped), n + 1);
    assert.isTrue(equivalent(spine, spine));
    assert.isFalse(equivalent(spine, mapped));
  });
});

describe("tree properties", () => {
  const testSeed = "20261019";
  const leafCounts = [1, 2, 3, 5, 8, 13, 21, 34];
  const shift = (x: number) => x + 7;

  const randomTrees = () => {
    const rs: RandomSeed = create(testSeed);
    return leafCounts.map((k) => randTree(rs, k, 100));
  };

  it("has one fewer branch than leaves", () => {
    for (const t of randomTrees()) {
      assert.strictEqual(size(t), 2 * leaves(t).length - 1);
    }
  });

  it("keeps size and depth under map", () => {
    for (const t of randomTrees()) {
      const mapped = map(t, shift);
      assert.strictEqual(size(mapped), size(t));
      assert.strictEqual(depth(mapped), depth(t));
      assert.deepStrictEqual(leaves(mapped), leaves(t).map(shift));
    }
  });

  it("finds the largest leaf", () => {
    for (const t of randomTrees()) {
      assert.strictEqual(maximum(t), Math.max(...leaves(t)));
    }
  });

  it("maps the identity to an equivalent tree", () => {
    for (const t of randomTrees()) {
      assert.isTrue(equivalent(map(t, (x) => x), t));
    }
  });

  it("stays within the depth a tree of that many leaves allows", () => {
    const trees = randomTrees();
    trees.forEach((t, i) => {
      const k = leafCounts[i];
      assert.isAtLeast(depth(t), Math.ceil(Math.log2(k)));
      assert.isAtMost(depth(t), k - 1);
    });
  });
});
