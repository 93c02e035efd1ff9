import type { ExprOp } from "../core/ops";
import { findNodes, nearestAncestor, type ExprTree, type NodeId } from "./arena";
import { IncomputableLoopError, UnsupportedPhiChainError } from "./engine-errors";
import type { ExpressionEvaluator } from "./interval";
import { known, type Value } from "./values";

export type CoefficientTarget = {
  op: ExprOp;
  /** Restricts `arg` targets to one formal argument. */
  index?: number;
};

/**
 * Strides of an address expression with respect to one variable.
 *
 * For each occurrence of the target, walk to the root collecting the
 * operands of `mul`/`shl` ancestors as multipliers and of division
 * ancestors as divisors. Occurrences are summed.
 */
export class CoefficientExtractor<H> {
  constructor(private readonly evaluator: ExpressionEvaluator<H>) {}

  coefficient(tree: ExprTree, target: CoefficientTarget, loopId = 0): Value<H> {
    const arith = this.evaluator.arith;
    const terms = findNodes(tree, target.op, target.index).map((id) =>
      this.strideAt(tree, id, loopId),
    );
    return arith.sum(terms);
  }

  /**
   * Change of the address per iteration of the loop-carried value. With the
   * recurrence in the tree, the increment is what the chain adds before the
   * merge; without it, the loop's own step.
   */
  phiCoefficient(tree: ExprTree, loopId = 0): Value<H> {
    const arith = this.evaluator.arith;
    const terms = findNodes(tree, "phi_term").map((term) => {
      const merge = nearestAncestor(tree, term, "phi");
      if (merge === null) {
        const phiLoop = this.evaluator.loopOfPhi(tree.arena.get(term).index, loopId);
        return arith.mul64(this.stepOf(phiLoop), this.strideAt(tree, term, loopId));
      }
      return arith.mul64(this.chainIncrement(tree, term, merge, loopId), this.strideAt(tree, merge, loopId));
    });
    return arith.sum(terms);
  }

  /** Product of multipliers over product of divisors on the path from `id` to the root. */
  strideAt(tree: ExprTree, id: NodeId, loopId: number): Value<H> {
    const arith = this.evaluator.arith;
    const multipliers: Value<H>[] = [];
    const divisors: Value<H>[] = [];
    let cursor = id;
    let parent = tree.arena.get(cursor).parent;
    while (parent !== null) {
      const p = tree.arena.get(parent);
      const others = p.children.filter((c) => c !== cursor);
      switch (p.op) {
        case "mul":
          for (const c of others) multipliers.push(this.concrete(tree, c, loopId));
          break;
        case "shl":
          for (const c of others) {
            multipliers.push(arith.apply("shl", known(1n), this.concrete(tree, c, loopId)));
          }
          break;
        case "div":
        case "udiv":
        case "sdiv":
          // Only a dividend scales with the target.
          if (p.children[0] === cursor) {
            for (const c of others) divisors.push(this.concrete(tree, c, loopId));
          }
          break;
        default:
          break;
      }
      cursor = parent;
      parent = p.parent;
    }
    return divisors.reduce<Value<H>>(
      (acc, d) => arith.apply("sdiv", acc, arith.widen(d)),
      arith.product(multipliers),
    );
  }

  private chainIncrement(tree: ExprTree, term: NodeId, merge: NodeId, loopId: number): Value<H> {
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
      for (const c of p.children) {
        if (c !== cursor) increments.push(this.concrete(tree, c, loopId));
      }
      cursor = parent;
      parent = p.parent;
    }
    return this.evaluator.arith.sum(increments);
  }

  private stepOf(loopId: number): Value<H> {
    const loop = this.evaluator.kernel.loops.get(loopId);
    if (loop?.step.kind === "malformed") {
      throw new IncomputableLoopError(loopId, "step is malformed");
    }
    if (loop === undefined || loop.step.kind !== "tree") return known(1n);
    return this.evaluator.evaluate(loop.step.tree, "concrete", loop.parentLoopId);
  }

  private concrete(tree: ExprTree, id: NodeId, loopId: number): Value<H> {
    return this.evaluator.evaluate(tree, "concrete", loopId, undefined, id);
  }
}
