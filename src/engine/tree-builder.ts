import { loadConfig } from "../config";
import {
  INCOMPLETE_MARKER,
  isOperationOp,
  isTerminalOp,
  lookupToken,
  type ExprOp,
} from "../core/ops";
import { NodeArena, type ExprTree, type NodeId, type TreeShape } from "./arena";
import { MalformedExpressionError } from "./engine-errors";

export type BuildOptions = {
  /** Inputs above this size become a pointer-chase sentinel. */
  maxSize?: number;
};

function sentinel(shape: TreeShape, op: ExprOp, text: string): ExprTree {
  const arena = new NodeArena();
  const root = arena.add({ op, text });
  arena.seal();
  return { shape, arena, root };
}

function addToken(arena: NodeArena, text: string): NodeId {
  const info = lookupToken(text);
  return arena.add({ op: info.op, text, value: info.value, index: info.index });
}

// ============================================================================
// Binary form (postfix)
// ============================================================================

/**
 * Build a binary tree from postfix tokens.
 *
 * Operations pop their right operand first, so `["4", "ARG0", "MUL"]` builds
 * `mul(4, arg0)`. The first `PHI` seen is the loop-entry terminal; the next
 * one is the merge that closes the recurrence.
 *
 * Returns null for an empty stream.
 */
export function buildBinaryTree(
  tokens: readonly string[],
  options: BuildOptions = {},
): ExprTree | null {
  if (tokens.length === 0) return null;
  if (tokens[0] === INCOMPLETE_MARKER) return sentinel("binary", "incomp", INCOMPLETE_MARKER);
  const maxSize = options.maxSize ?? loadConfig().maxBinaryTokens;
  if (tokens.length > maxSize) return sentinel("binary", "pc", "PC");

  const arena = new NodeArena();
  const stack: NodeId[] = [];
  let awaitingPhiTerm = true;

  for (const [position, text] of tokens.entries()) {
    const id = addToken(arena, text);
    const op = arena.get(id).op;

    if (op === "phi" && awaitingPhiTerm) {
      arena.retag(id, "phi_term");
      awaitingPhiTerm = false;
      stack.push(id);
      continue;
    }

    if (isOperationOp(op)) {
      const rhs = stack.pop();
      const lhs = stack.pop();
      if (lhs === undefined || rhs === undefined) {
        throw new MalformedExpressionError(
          `operator ${text} at position ${position} needs two operands`,
        );
      }
      arena.attach(id, lhs);
      arena.attach(id, rhs);
      if (op === "phi") awaitingPhiTerm = true;
    }
    stack.push(id);
  }

  if (stack.length !== 1) {
    throw new MalformedExpressionError(
      `postfix stream left ${stack.length} operands on the stack: ${tokens.join(" ")}`,
    );
  }
  arena.seal();
  return { shape: "binary", arena, root: stack[0] };
}

// ============================================================================
// N-ary form (parenthesized prefix)
// ============================================================================

const IGNORED_TOKENS = new Set(["[", "]"]);

function checkArity(arena: NodeArena, id: NodeId): void {
  const n = arena.get(id);
  const count = n.children.length;
  if (n.op === "phi") {
    if (count === 0) {
      arena.retag(id, "phi_term");
    } else if (count < 2) {
      throw new MalformedExpressionError(`phi merge ${n.text} has a single incoming value`);
    }
    return;
  }
  if (isTerminalOp(n.op) && count > 0) {
    throw new MalformedExpressionError(`terminal ${n.text} cannot take operands`);
  }
  if (isOperationOp(n.op) && count < 2) {
    throw new MalformedExpressionError(`operator ${n.text} needs at least two operands`);
  }
}

/**
 * Build an n-ary tree from a parenthesized prefix stream such as
 * `( ADD ( ARG0 ) ( 4 ) )`. Bare tokens are leaves of the enclosing node.
 */
export function buildNaryTree(
  tokens: readonly string[],
  options: BuildOptions = {},
): ExprTree | null {
  const stream = tokens.filter((t) => !IGNORED_TOKENS.has(t));
  if (stream.length === 0) return null;
  const first = stream.find((t) => t !== "(");
  if (first === INCOMPLETE_MARKER) return sentinel("nary", "incomp", INCOMPLETE_MARKER);

  const maxSize = options.maxSize ?? loadConfig().maxNaryNodes;
  const nodeCount = stream.filter((t) => t !== "(" && t !== ")").length;
  if (nodeCount > maxSize) return sentinel("nary", "pc", "PC");

  const arena = new NodeArena();
  const open: NodeId[] = [];
  let root: NodeId | null = null;
  let expectOperator = false;

  for (const text of stream) {
    if (text === "(") {
      if (expectOperator) throw new MalformedExpressionError("'(' must be followed by an operator");
      expectOperator = true;
      continue;
    }
    if (text === ")") {
      const closed = open.pop();
      if (expectOperator || closed === undefined) {
        throw new MalformedExpressionError("unbalanced ')' in prefix stream");
      }
      checkArity(arena, closed);
      continue;
    }
    const id = addToken(arena, text);
    const parent = open[open.length - 1];
    if (parent !== undefined) {
      arena.attach(parent, id);
    } else if (root === null) {
      root = id;
    } else {
      throw new MalformedExpressionError(`second root ${text} in prefix stream`);
    }
    if (expectOperator) {
      open.push(id);
      expectOperator = false;
    } else {
      checkArity(arena, id);
    }
  }

  if (expectOperator || open.length > 0) {
    throw new MalformedExpressionError(`prefix stream ends with ${open.length} unclosed nodes`);
  }
  if (root === null) {
    throw new MalformedExpressionError("prefix stream has no operator");
  }
  arena.seal();
  return { shape: "nary", arena, root };
}
