import { compareEntityKeys } from "./catalog-entity.js";

export type RotationDirection = "left" | "right";
export type RotationCase = "left-left" | "right-right" | "left-right" | "right-left";

export interface RotationEvent {
  direction: RotationDirection;
  /** Key of the child promoted to subtree root. */
  pivotKey: string;
  /** Key of the node rotated down beneath the pivot. */
  rotatedKey: string;
  rotationCase: RotationCase;
}

export interface BalancedTreeStoreOptions {
  onRotation?: (event: RotationEvent) => void;
}

export interface TreeShapeNode {
  key: string;
  height: number;
  left?: TreeShapeNode;
  right?: TreeShapeNode;
}

export type BalancedTreeDiagnosticCode =
  | "bst_order_violation"
  | "height_mismatch"
  | "balance_violation"
  | "duplicate_key";

export interface BalancedTreeDiagnostic {
  code: BalancedTreeDiagnosticCode;
  severity: "error" | "warning";
  message: string;
  details?: Record<string, unknown>;
}

export interface BalancedTreeValidationResult {
  ok: boolean;
  diagnostics: BalancedTreeDiagnostic[];
}

interface TreeNode<TValue> {
  key: string;
  value: TValue;
  height: number;
  left: TreeNode<TValue> | null;
  right: TreeNode<TValue> | null;
}

interface InsertContext {
  created: boolean;
}

/**
 * AVL tree keyed by normalized string keys.
 *
 * Inserting an existing key replaces its value in place and leaves the structure untouched.
 * There is no removal; nodes live until {@link BalancedTreeStore.teardown}.
 * Not safe for interleaved readers and writers: rotations pass through intermediate shapes.
 */
export class BalancedTreeStore<TValue> implements Iterable<[string, TValue]> {
  private root: TreeNode<TValue> | null = null;
  private count = 0;
  private rotations = 0;
  private readonly onRotation?: (event: RotationEvent) => void;

  public constructor(options: BalancedTreeStoreOptions = {}) {
    this.onRotation = options.onRotation;
  }

  public get size(): number {
    return this.count;
  }

  public get height(): number {
    return heightOf(this.root);
  }

  public get isEmpty(): boolean {
    return this.root === null;
  }

  public get rotationCount(): number {
    return this.rotations;
  }

  public insert(key: string, value: TValue): void {
    const context: InsertContext = { created: false };
    this.root = this.insertAt(this.root, key, value, context);
    if (context.created) {
      this.count += 1;
    }
  }

  public find(key: string): TValue | undefined {
    let current = this.root;
    while (current !== null) {
      const order = compareEntityKeys(key, current.key);
      if (order === 0) {
        return current.value;
      }
      current = order < 0 ? current.left : current.right;
    }
    return undefined;
  }

  public has(key: string): boolean {
    let current = this.root;
    while (current !== null) {
      const order = compareEntityKeys(key, current.key);
      if (order === 0) {
        return true;
      }
      current = order < 0 ? current.left : current.right;
    }
    return false;
  }

  public *traverseInOrder(): Generator<TValue, void, undefined> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  public *entries(): Generator<[string, TValue], void, undefined> {
    const stack: TreeNode<TValue>[] = [];
    let current = this.root;

    while (current !== null || stack.length > 0) {
      while (current !== null) {
        stack.push(current);
        current = current.left;
      }

      const next = stack.pop();
      if (next === undefined) {
        return;
      }
      yield [next.key, next.value];
      current = next.right;
    }
  }

  public [Symbol.iterator](): Iterator<[string, TValue]> {
    return this.entries();
  }

  /**
   * Releases every node post-order (children before their parent, root last).
   * Safe to call on an empty store or more than once.
   */
  public teardown(): void {
    if (this.root === null) {
      this.count = 0;
      return;
    }

    const pending: TreeNode<TValue>[] = [this.root];
    const postOrder: TreeNode<TValue>[] = [];
    while (pending.length > 0) {
      const node = pending.pop();
      if (node === undefined) {
        break;
      }
      postOrder.push(node);
      if (node.left !== null) {
        pending.push(node.left);
      }
      if (node.right !== null) {
        pending.push(node.right);
      }
    }

    for (let index = postOrder.length - 1; index >= 0; index -= 1) {
      const node = postOrder[index];
      node.left = null;
      node.right = null;
    }

    this.root = null;
    this.count = 0;
  }

  public describeShape(): TreeShapeNode | undefined {
    return this.root === null ? undefined : describeNode(this.root);
  }

  private insertAt(node: TreeNode<TValue> | null, key: string, value: TValue, context: InsertContext): TreeNode<TValue> {
    if (node === null) {
      context.created = true;
      return { key, value, height: 1, left: null, right: null };
    }

    const order = compareEntityKeys(key, node.key);
    if (order === 0) {
      node.value = value;
      return node;
    }

    if (order < 0) {
      node.left = this.insertAt(node.left, key, value, context);
    } else {
      node.right = this.insertAt(node.right, key, value, context);
    }

    if (!context.created) {
      return node;
    }

    updateHeight(node);
    return this.rebalance(node, key);
  }

  private rebalance(node: TreeNode<TValue>, insertedKey: string): TreeNode<TValue> {
    const balanceFactor = heightOf(node.left) - heightOf(node.right);

    if (balanceFactor > 1 && node.left !== null) {
      if (compareEntityKeys(insertedKey, node.left.key) < 0) {
        return this.rotateRight(node, "left-left");
      }
      node.left = this.rotateLeft(node.left, "left-right");
      return this.rotateRight(node, "left-right");
    }

    if (balanceFactor < -1 && node.right !== null) {
      if (compareEntityKeys(insertedKey, node.right.key) > 0) {
        return this.rotateLeft(node, "right-right");
      }
      node.right = this.rotateRight(node.right, "right-left");
      return this.rotateLeft(node, "right-left");
    }

    return node;
  }

  private rotateRight(node: TreeNode<TValue>, rotationCase: RotationCase): TreeNode<TValue> {
    const pivot = node.left;
    if (pivot === null) {
      return node;
    }

    node.left = pivot.right;
    pivot.right = node;
    updateHeight(node);
    updateHeight(pivot);
    this.recordRotation({ direction: "right", pivotKey: pivot.key, rotatedKey: node.key, rotationCase });
    return pivot;
  }

  private rotateLeft(node: TreeNode<TValue>, rotationCase: RotationCase): TreeNode<TValue> {
    const pivot = node.right;
    if (pivot === null) {
      return node;
    }

    node.right = pivot.left;
    pivot.left = node;
    updateHeight(node);
    updateHeight(pivot);
    this.recordRotation({ direction: "left", pivotKey: pivot.key, rotatedKey: node.key, rotationCase });
    return pivot;
  }

  private recordRotation(event: RotationEvent): void {
    this.rotations += 1;
    this.onRotation?.(event);
  }
}

function heightOf<TValue>(node: TreeNode<TValue> | null): number {
  return node === null ? 0 : node.height;
}

function updateHeight<TValue>(node: TreeNode<TValue>): void {
  node.height = 1 + Math.max(heightOf(node.left), heightOf(node.right));
}

function describeNode<TValue>(node: TreeNode<TValue>): TreeShapeNode {
  const shape: TreeShapeNode = { key: node.key, height: node.height };
  if (node.left !== null) {
    shape.left = describeNode(node.left);
  }
  if (node.right !== null) {
    shape.right = describeNode(node.right);
  }
  return shape;
}

/**
 * Upper bound on the height of an AVL tree holding `n` keys.
 */
export function computeAvlHeightBound(n: number): number {
  return 1.44 * Math.log2(n + 2) - 0.328;
}

export function validateBalancedTree(shape: TreeShapeNode | undefined): BalancedTreeValidationResult {
  const diagnostics: BalancedTreeDiagnostic[] = [];
  const seen = new Set<string>();

  const visit = (node: TreeShapeNode | undefined, lower: string | undefined, upper: string | undefined): number => {
    if (node === undefined) {
      return 0;
    }

    if (seen.has(node.key)) {
      diagnostics.push({
        code: "duplicate_key",
        severity: "error",
        message: `Key '${node.key}' appears more than once.`,
        details: { key: node.key },
      });
    }
    seen.add(node.key);

    const belowLower = lower !== undefined && compareEntityKeys(node.key, lower) <= 0;
    const aboveUpper = upper !== undefined && compareEntityKeys(node.key, upper) >= 0;
    if (belowLower || aboveUpper) {
      diagnostics.push({
        code: "bst_order_violation",
        severity: "error",
        message: `Key '${node.key}' is outside its subtree bounds.`,
        details: { key: node.key, lower, upper },
      });
    }

    const leftHeight = visit(node.left, lower, node.key);
    const rightHeight = visit(node.right, node.key, upper);
    const expectedHeight = 1 + Math.max(leftHeight, rightHeight);

    if (node.height !== expectedHeight) {
      diagnostics.push({
        code: "height_mismatch",
        severity: "error",
        message: `Node '${node.key}' records height ${node.height} but its subtree height is ${expectedHeight}.`,
        details: { key: node.key, recorded: node.height, expected: expectedHeight },
      });
    }

    const balanceFactor = leftHeight - rightHeight;
    if (Math.abs(balanceFactor) > 1) {
      diagnostics.push({
        code: "balance_violation",
        severity: "error",
        message: `Node '${node.key}' has balance factor ${balanceFactor}.`,
        details: { key: node.key, balanceFactor },
      });
    }

    return expectedHeight;
  };

  visit(shape, undefined, undefined);

  return {
    ok: diagnostics.every((diagnostic) => diagnostic.severity !== "error"),
    diagnostics,
  };
}
