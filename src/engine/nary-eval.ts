import type { StructuralOp } from "../core/ops";
import { isOperationOp, isTerminalOp } from "../core/ops";
import { nearestAncestor, type ExprTree, type NodeId } from "./arena";
import { NonTerminalOperandError, UnsupportedPhiChainError } from "./engine-errors";
import type { BoundMode, ExpressionEvaluator } from "./interval";
import type { LoopAccounting } from "./loops";
import { known, type Value } from "./values";

/**
 * Extremal evaluation over n-ary trees.
 *
 * Unlike the postfix engine this one follows loop-carried chains: a phi
 * terminal nested under its merge is worth the merge's entry value plus the
 * per-iteration increment times the loop's trip count.
 */
export class NaryEvaluator<H> {
  constructor(
    private readonly evaluator: ExpressionEvaluator<H>,
    private readonly loops: LoopAccounting<H>,
  ) {}

  extremal(tree: ExprTree, mode: BoundMode, loopId = 0, from: NodeId = tree.root): Value<H> {
    return this.visit(tree, from, mode, loopId);
  }

  workingSetSize(tree: ExprTree, loopId = 0): Value<H> {
    const hi = this.extremal(tree, "max", loopId);
    const lo = this.extremal(tree, "min", loopId);
    return this.evaluator.arith.span(hi, lo);
  }

  private visit(tree: ExprTree, id: NodeId, mode: BoundMode, loopId: number): Value<H> {
    const n = tree.arena.get(id);
    const arith = this.evaluator.arith;

    if (n.op === "phi_term") {
      const merge = nearestAncestor(tree, id, "phi");
      if (merge !== null) return this.recurrence(tree, id, merge, mode, loopId);
    }
    if (isTerminalOp(n.op)) {
      return this.evaluator.terminalValue(tree, id, mode, loopId);
    }

    const values = (ids: readonly NodeId[]): Value<H>[] =>
      ids.map((c) => this.visit(tree, c, mode, loopId));

    if (isOperationOp(n.op)) {
      const [first, ...rest] = values(n.children);
      if (first === undefined) {
        throw new NonTerminalOperandError(`${n.text} has no operands`);
      }
      switch (n.op) {
        case "add":
        case "or":
          return rest.reduce((acc, v) => arith.apply("add", acc, v), first);
        case "sub":
          return rest.reduce((acc, v) => arith.apply("sub", acc, v), first);
        case "and":
          return rest.reduce((acc, v) => arith.apply("and", acc, v), first);
        case "mul":
          return rest.reduce((acc, v) => arith.mul64(acc, v), first);
        case "shl":
          return rest.reduce((acc, v) => arith.apply("shl", acc, v), first);
        case "lshr":
          return rest.reduce((acc, v) => arith.apply("lshr", acc, v), first);
        case "div":
        case "udiv":
          return rest.reduce((acc, v) => arith.apply("udiv", acc, v), first);
        case "sdiv":
          return rest.reduce((acc, v) => arith.apply("sdiv", acc, v), first);
        case "srem":
          return rest.reduce((acc, v) => arith.apply("srem", acc, v), first);
        case "phi":
          return rest.reduce((acc, v) => arith.apply(mode, acc, v), first);
        case "icmp":
        case "fcmp":
        case "fmul":
        case "fdiv":
          throw new NonTerminalOperandError(`${n.text} has no integer value`);
      }
    }

    return this.structural(tree, id, n.op, mode, loopId, values);
  }

  private structural(
    tree: ExprTree,
    id: NodeId,
    op: StructuralOp,
    mode: BoundMode,
    loopId: number,
    values: (ids: readonly NodeId[]) => Value<H>[],
  ): Value<H> {
    const n = tree.arena.get(id);
    const arith = this.evaluator.arith;
    switch (op) {
      case "gep": {
        // The base pointer is children[0]; only the offsets move the address.
        if (n.children.length === 1) return values(n.children)[0];
        return arith.sum(values(n.children.slice(1)));
      }
      case "select": {
        if (n.children.length !== 3) {
          throw new NonTerminalOperandError(`select needs a condition and two values, got ${n.children.length}`);
        }
        const [a, b] = values(n.children.slice(1));
        return arith.apply(mode, a, b);
      }
      case "load":
      case "store":
      case "zext":
      case "sext":
      case "trunc":
      case "freeze":
      case "double":
      case "fptosi":
      case "sitofp":
      case "uitofp": {
        const last = n.children[n.children.length - 1];
        if (last === undefined) {
          throw new NonTerminalOperandError(`${n.text} has no operand to pass through`);
        }
        return this.visit(tree, last, mode, loopId);
      }
      case "call":
      case "atomicrmw":
      case "pc":
        throw new NonTerminalOperandError(`${n.text} has no integer value`);
    }
  }

  /**
   * Value of a phi terminal under its merge: the extreme of the merge's
   * other incoming values, plus the sum of the siblings added on the way up
   * to the merge, once per iteration of the phi's loop.
   */
  private recurrence(
    tree: ExprTree,
    term: NodeId,
    merge: NodeId,
    mode: BoundMode,
    loopId: number,
  ): Value<H> {
    const arith = this.evaluator.arith;
    const increments: Value<H>[] = [];
    let cursor = term;
    let parent = tree.arena.get(cursor).parent;
    while (parent !== null && parent !== merge) {
      const p = tree.arena.get(parent);
      if (p.op !== "add" && p.op !== "or") {
        throw new UnsupportedPhiChainError(
          `loop-carried value passes through ${p.text}; only additions are supported`,
        );
      }
      for (const sibling of p.children) {
        if (sibling !== cursor) increments.push(this.visit(tree, sibling, mode, loopId));
      }
      cursor = parent;
      parent = p.parent;
    }

    const entries = tree.arena.get(merge).children.filter((c) => c !== cursor);
    if (entries.length === 0) {
      throw new UnsupportedPhiChainError("phi merge has no loop-entry value");
    }
    const [firstEntry, ...otherEntries] = entries.map((c) => this.visit(tree, c, mode, loopId));
    const entry = otherEntries.reduce((acc, v) => arith.apply(mode, acc, v), firstEntry);

    const phiLoop = this.evaluator.loopOfPhi(tree.arena.get(term).index, loopId);
    const trips = phiLoop === 0 ? known(1n) : this.loops.iterations(phiLoop);
    const drift = arith.mul64(arith.sum(increments), trips);
    return arith.apply("add", arith.widen(entry), drift);
  }
}
