import { describe, expect, test } from "vitest";
import {
  BalancedTreeStore,
  computeAvlHeightBound,
  validateBalancedTree,
  type RotationEvent,
  type TreeShapeNode,
} from "../src/balanced-tree-store.js";

function buildStore(keys: string[]): { store: BalancedTreeStore<string>; rotations: RotationEvent[] } {
  const rotations: RotationEvent[] = [];
  const store = new BalancedTreeStore<string>({ onRotation: (event) => rotations.push(event) });
  for (const key of keys) {
    store.insert(key, `value:${key}`);
  }
  return { store, rotations };
}

function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function formatKey(index: number): string {
  return `K${index.toString().padStart(4, "0")}`;
}

const BALANCED_ABC: TreeShapeNode = {
  key: "B",
  height: 2,
  left: { key: "A", height: 1 },
  right: { key: "C", height: 1 },
};

describe("balanced tree store", () => {
  test("left-left insert order triggers one right rotation", () => {
    const { store, rotations } = buildStore(["C", "B", "A"]);

    expect(store.describeShape()).toEqual(BALANCED_ABC);
    expect(rotations).toEqual([{ direction: "right", pivotKey: "B", rotatedKey: "C", rotationCase: "left-left" }]);
    expect(store.rotationCount).toBe(1);
  });

  test("right-right insert order triggers one left rotation", () => {
    const { store, rotations } = buildStore(["A", "B", "C"]);

    expect(store.describeShape()).toEqual(BALANCED_ABC);
    expect(rotations).toEqual([{ direction: "left", pivotKey: "B", rotatedKey: "A", rotationCase: "right-right" }]);
  });

  test("A, C, B is rebalanced by a right rotation at C followed by a left rotation at A", () => {
    const { store, rotations } = buildStore(["A", "C", "B"]);

    expect(store.describeShape()).toEqual(BALANCED_ABC);
    expect(rotations).toEqual([
      { direction: "right", pivotKey: "B", rotatedKey: "C", rotationCase: "right-left" },
      { direction: "left", pivotKey: "B", rotatedKey: "A", rotationCase: "right-left" },
    ]);
  });

  test("C, A, B is rebalanced by a left rotation at A followed by a right rotation at C", () => {
    const { store, rotations } = buildStore(["C", "A", "B"]);

    expect(store.describeShape()).toEqual(BALANCED_ABC);
    expect(rotations).toEqual([
      { direction: "left", pivotKey: "B", rotatedKey: "A", rotationCase: "left-right" },
      { direction: "right", pivotKey: "B", rotatedKey: "C", rotationCase: "left-right" },
    ]);
  });

  test("rotation below the root keeps heights consistent up the path", () => {
    const { store } = buildStore(["D", "B", "E", "A", "C", "F", "G"]);

    expect(store.describeShape()).toEqual({
      key: "D",
      height: 3,
      left: { key: "B", height: 2, left: { key: "A", height: 1 }, right: { key: "C", height: 1 } },
      right: { key: "F", height: 2, left: { key: "E", height: 1 }, right: { key: "G", height: 1 } },
    });
    expect(store.rotationCount).toBe(1);
  });

  test("overwriting an existing key keeps the shape and returns the latest value", () => {
    const { store, rotations } = buildStore(["M", "F", "T", "B", "H"]);
    const shapeBefore = store.describeShape();
    const rotationsBefore = rotations.length;

    store.insert("F", "replacement");
    store.insert("F", "latest");

    expect(store.describeShape()).toEqual(shapeBefore);
    expect(rotations).toHaveLength(rotationsBefore);
    expect(store.size).toBe(5);
    expect(store.find("F")).toBe("latest");
    expect(store.find("H")).toBe("value:H");
  });

  test("preserves order, height and balance invariants after every insert in random order", () => {
    const random = createRandom(20240917);
    const store = new BalancedTreeStore<number>();
    const latest = new Map<string, number>();

    for (let step = 0; step < 600; step += 1) {
      const key = formatKey(Math.floor(random() * 400));
      store.insert(key, step);
      latest.set(key, step);

      const validation = validateBalancedTree(store.describeShape());
      expect(validation.diagnostics).toEqual([]);
      expect(validation.ok).toBe(true);
    }

    const expectedKeys = [...latest.keys()].sort();
    expect([...store.entries()].map(([key]) => key)).toEqual(expectedKeys);
    expect(store.size).toBe(latest.size);

    for (const [key, value] of latest) {
      expect(store.find(key)).toBe(value);
    }
    expect(store.find("K9999")).toBeUndefined();
    expect(store.has("K9999")).toBe(false);
  });

  test("height stays within the AVL bound for sequential and shuffled inserts", () => {
    const ascending = new BalancedTreeStore<number>();
    for (let index = 0; index < 2000; index += 1) {
      ascending.insert(formatKey(index), index);
      if ((index + 1) % 250 === 0) {
        expect(ascending.height).toBeLessThanOrEqual(computeAvlHeightBound(ascending.size));
      }
    }
    expect(ascending.height).toBe(11);

    const descending = new BalancedTreeStore<number>();
    for (let index = 1999; index >= 0; index -= 1) {
      descending.insert(formatKey(index), index);
    }
    expect(descending.height).toBeLessThanOrEqual(computeAvlHeightBound(2000));

    const random = createRandom(7);
    const keys = Array.from({ length: 2000 }, (_, index) => formatKey(index));
    for (let index = keys.length - 1; index > 0; index -= 1) {
      const swap = Math.floor(random() * (index + 1));
      [keys[index], keys[swap]] = [keys[swap], keys[index]];
    }
    const shuffled = new BalancedTreeStore<number>();
    keys.forEach((key, index) => shuffled.insert(key, index));
    expect(shuffled.size).toBe(2000);
    expect(shuffled.height).toBeLessThanOrEqual(computeAvlHeightBound(2000));
    expect(validateBalancedTree(shuffled.describeShape()).ok).toBe(true);
  });

  test("in-order traversal is lazy and restartable", () => {
    const { store } = buildStore(["delta", "alpha", "echo", "charlie", "bravo"]);

    const walk = store.traverseInOrder();
    expect(walk.next()).toEqual({ done: false, value: "value:alpha" });

    const first = [...store.traverseInOrder()];
    const second = [...store.traverseInOrder()];
    expect(first).toEqual(["value:alpha", "value:bravo", "value:charlie", "value:delta", "value:echo"]);
    expect(second).toEqual(first);
    expect([...store].map(([key]) => key)).toEqual(["alpha", "bravo", "charlie", "delta", "echo"]);
  });

  test("orders keys by code unit rather than locale", () => {
    const { store } = buildStore(["b", "B", "a", "A", "CSCI2", "CSCI100"]);

    expect([...store.entries()].map(([key]) => key)).toEqual(["A", "B", "CSCI100", "CSCI2", "a", "b"]);
  });

  test("teardown empties the store and is idempotent", () => {
    const { store } = buildStore(["C", "A", "E", "B", "D"]);

    store.teardown();
    expect(store.size).toBe(0);
    expect(store.isEmpty).toBe(true);
    expect(store.height).toBe(0);
    expect(store.find("C")).toBeUndefined();
    expect(store.describeShape()).toBeUndefined();
    expect([...store.traverseInOrder()]).toEqual([]);

    store.teardown();
    new BalancedTreeStore<string>().teardown();

    store.insert("Z", "again");
    expect(store.size).toBe(1);
    expect(store.find("Z")).toBe("again");
  });

  test("an empty key is stored without breaking the invariants", () => {
    const { store } = buildStore(["M", "", "A", "Z"]);

    expect(store.find("")).toBe("value:");
    expect([...store.entries()].map(([key]) => key)).toEqual(["", "A", "M", "Z"]);
    expect(validateBalancedTree(store.describeShape()).ok).toBe(true);
  });

  test("validator reports corrupted shapes", () => {
    const result = validateBalancedTree({
      key: "M",
      height: 2,
      left: {
        key: "Q",
        height: 2,
        left: { key: "A", height: 1, left: { key: "0", height: 1 } },
      },
    });

    expect(result.ok).toBe(false);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "bst_order_violation",
      "height_mismatch",
      "height_mismatch",
      "balance_violation",
      "height_mismatch",
      "balance_violation",
    ]);
  });

  test("computes the theoretical height bound", () => {
    expect(computeAvlHeightBound(0)).toBeCloseTo(1.112, 3);
    expect(computeAvlHeightBound(6)).toBeCloseTo(3.992, 3);
  });
});
