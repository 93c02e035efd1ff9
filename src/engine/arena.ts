import type { ExprOp } from "../core/ops";

export type NodeId = number;

export type ExprNode = {
  id: NodeId;
  op: ExprOp;
  /** Token text the node was built from. */
  text: string;
  /** Literal payload of a `const` node. */
  value?: bigint;
  /** Argument index of an `arg` node, phi id of a `phi`/`phi_term` node. */
  index?: number;
  children: NodeId[];
  parent: NodeId | null;
};

export type NodeInit = {
  op: ExprOp;
  text: string;
  value?: bigint;
  index?: number;
};

/**
 * Flat node storage for one tree. Nodes are appended during construction and
 * the arena is sealed before any evaluation pass sees it; the whole tree is
 * released together with the arena.
 */
export class NodeArena {
  private readonly nodes: ExprNode[] = [];
  private sealed = false;

  get size(): number {
    return this.nodes.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  add(init: NodeInit): NodeId {
    this.assertOpen();
    const id = this.nodes.length;
    this.nodes.push({ id, ...init, children: [], parent: null });
    return id;
  }

  attach(parent: NodeId, child: NodeId): void {
    this.assertOpen();
    const childNode = this.mutable(child);
    if (childNode.parent !== null) {
      throw new Error(`node ${child} already has parent ${childNode.parent}`);
    }
    this.mutable(parent).children.push(child);
    childNode.parent = parent;
  }

  retag(id: NodeId, op: ExprOp): void {
    this.assertOpen();
    this.mutable(id).op = op;
  }

  seal(): void {
    this.sealed = true;
  }

  get(id: NodeId): Readonly<ExprNode> {
    return this.mutable(id);
  }

  private mutable(id: NodeId): ExprNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`node ${id} is outside an arena of ${this.nodes.length}`);
    }
    return node;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error("arena is sealed");
    }
  }
}

export type TreeShape = "binary" | "nary";

export type ExprTree = {
  shape: TreeShape;
  arena: NodeArena;
  root: NodeId;
};

// ============================================================================
// Traversal
// ============================================================================

/** Children before parents, left to right. */
export function postorder(tree: ExprTree, from: NodeId = tree.root): NodeId[] {
  const out: NodeId[] = [];
  const stack: Array<{ id: NodeId; expanded: boolean }> = [{ id: from, expanded: false }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    if (top.expanded) {
      out.push(top.id);
      continue;
    }
    stack.push({ id: top.id, expanded: true });
    const children = tree.arena.get(top.id).children;
    for (let i = children.length - 1; i >= 0; i -= 1) {
      stack.push({ id: children[i], expanded: false });
    }
  }
  return out;
}

export function findNodes(
  tree: ExprTree,
  op: ExprOp,
  index?: number,
  from: NodeId = tree.root,
): NodeId[] {
  return postorder(tree, from).filter((id) => {
    const n = tree.arena.get(id);
    return n.op === op && (index === undefined || n.index === index);
  });
}

export function countOp(tree: ExprTree, op: ExprOp, from: NodeId = tree.root): number {
  return findNodes(tree, op, undefined, from).length;
}

export function containsOp(tree: ExprTree, op: ExprOp, from: NodeId = tree.root): boolean {
  return countOp(tree, op, from) > 0;
}

/** Nearest proper ancestor with the given kind, or null. */
export function nearestAncestor(tree: ExprTree, id: NodeId, op: ExprOp): NodeId | null {
  let cursor = tree.arena.get(id).parent;
  while (cursor !== null) {
    const n = tree.arena.get(cursor);
    if (n.op === op) return cursor;
    cursor = n.parent;
  }
  return null;
}

// ============================================================================
// Composition
// ============================================================================

function copyInto(target: NodeArena, tree: ExprTree, from: NodeId): NodeId {
  const source = tree.arena.get(from);
  const id = target.add({
    op: source.op,
    text: source.text,
    value: source.value,
    index: source.index,
  });
  for (const child of source.children) {
    target.attach(id, copyInto(target, tree, child));
  }
  return id;
}

/**
 * Build a new sealed tree `op(lhs, rhs)` whose operands are copies of two
 * existing trees. The sources are left untouched.
 */
export function combineTrees(
  op: ExprOp,
  lhs: ExprTree,
  rhs: ExprTree,
  text: string = op.toUpperCase(),
): ExprTree {
  const arena = new NodeArena();
  const root = arena.add({ op, text });
  arena.attach(root, copyInto(arena, lhs, lhs.root));
  arena.attach(root, copyInto(arena, rhs, rhs.root));
  arena.seal();
  return { shape: lhs.shape, arena, root };
}

export function constantTree(value: bigint): ExprTree {
  const arena = new NodeArena();
  const root = arena.add({ op: "const", text: value.toString(), value });
  arena.seal();
  return { shape: "binary", arena, root };
}
