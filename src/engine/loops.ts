import { DEBUG_ENGINE } from "../config";
import type { KernelCatalogue, LoopRecord } from "../runtime/catalogue";
import { combineTrees, constantTree, type ExprTree } from "./arena";
import {
  DivisionByZeroError,
  IncomputableLoopError,
  MalformedExpressionError,
  UnresolvedTerminalError,
} from "./engine-errors";
import { formatTree } from "./format";
import type { ExpressionEvaluator } from "./interval";
import { known, type Value } from "./values";

export type LoopIterations<H> =
  | { kind: "computed"; value: Value<H> }
  | { kind: "incomputable"; reason: string };

/**
 * Trip counts per loop id for one invocation pass.
 *
 * A loop's own count is `(final − init) / step`, evaluated for the first
 * thread of the grid in the context of its parent loop. Failures are cached
 * as well, so every access inside an incomputable loop sees the same error.
 */
export class LoopAccounting<H> {
  private readonly counts = new Map<number, Value<H> | IncomputableLoopError>();

  constructor(
    private readonly kernel: KernelCatalogue,
    private readonly evaluator: ExpressionEvaluator<H>,
  ) {}

  /** `sdiv(sub(final, init), step)` over copies of the stored bounds. */
  iterationTree(loop: LoopRecord): ExprTree {
    if (loop.init.kind !== "tree") {
      throw new IncomputableLoopError(loop.loopId, `initial bound is ${loop.init.kind}`);
    }
    if (loop.final.kind !== "tree") {
      throw new IncomputableLoopError(loop.loopId, `final bound is ${loop.final.kind}`);
    }
    if (loop.step.kind === "malformed") {
      throw new IncomputableLoopError(loop.loopId, "step is malformed");
    }
    // A loop without a recorded step advances by one.
    const step = loop.step.kind === "tree" ? loop.step.tree : constantTree(1n);
    const span = combineTrees("sub", loop.final.tree, loop.init.tree);
    return combineTrees("sdiv", span, step);
  }

  iterations(loopId: number): Value<H> {
    const cached = this.counts.get(loopId);
    if (cached instanceof IncomputableLoopError) throw cached;
    if (cached !== undefined) return cached;
    try {
      const value = this.computeIterations(loopId);
      this.counts.set(loopId, value);
      return value;
    } catch (e) {
      const error = asIncomputable(loopId, e);
      this.counts.set(loopId, error);
      throw error;
    }
  }

  tryIterations(loopId: number): LoopIterations<H> {
    try {
      return { kind: "computed", value: this.iterations(loopId) };
    } catch (e) {
      if (e instanceof IncomputableLoopError) return { kind: "incomputable", reason: e.message };
      throw e;
    }
  }

  /** Product of trip counts from `loopId` out to the top level; 1 outside any loop. */
  nestedIterations(loopId: number): Value<H> {
    const arith = this.evaluator.arith;
    const seen = new Set<number>();
    let total: Value<H> = known(1n);
    let cursor = loopId;
    while (cursor !== 0) {
      if (seen.has(cursor)) {
        throw new IncomputableLoopError(loopId, `loop nesting cycles back to ${cursor}`);
      }
      seen.add(cursor);
      const loop = this.requireLoop(cursor);
      total = arith.mul64(total, this.iterations(cursor));
      cursor = loop.parentLoopId;
    }
    return total;
  }

  private computeIterations(loopId: number): Value<H> {
    const loop = this.requireLoop(loopId);
    if (loop.knownIterCount !== undefined) return known(loop.knownIterCount);
    const tree = this.iterationTree(loop);
    if (DEBUG_ENGINE) console.log(`[loops] ${this.kernel.name} loop ${loopId}: ${formatTree(tree)}`);
    return this.evaluator.evaluate(tree, "min", loop.parentLoopId);
  }

  private requireLoop(loopId: number): LoopRecord {
    const loop = this.kernel.loops.get(loopId);
    if (loop === undefined) {
      throw new IncomputableLoopError(loopId, `not catalogued for kernel ${this.kernel.name}`);
    }
    return loop;
  }
}

function asIncomputable(loopId: number, e: unknown): IncomputableLoopError {
  if (e instanceof IncomputableLoopError) return e;
  if (
    e instanceof UnresolvedTerminalError ||
    e instanceof DivisionByZeroError ||
    e instanceof MalformedExpressionError
  ) {
    return new IncomputableLoopError(loopId, e.message, { cause: e });
  }
  throw e;
}
