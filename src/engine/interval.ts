import { isOperationOp, isTerminalOp, type OperationOp, type TerminalOp } from "../core/ops";
import type { KernelCatalogue } from "../runtime/catalogue";
import type { Axis, Dimension, InvocationRecord } from "../runtime/invocation";
import { containsOp, findNodes, postorder, type ExprTree, type NodeId } from "./arena";
import {
  IncomputableLoopError,
  MalformedExpressionError,
  NonTerminalOperandError,
  UnresolvedTerminalError,
} from "./engine-errors";
import { NO_OVERRIDES, ValueResolver, type Overrides } from "./resolver";
import { deferred, known, StagedArithmetic, type Emitter, type Value } from "./values";

/**
 * `concrete` resolves terminals to their actual values; `min` and `max`
 * substitute the extremes of thread/block indices and loop-carried values.
 */
export type EvalMode = "concrete" | "min" | "max";
export type BoundMode = Exclude<EvalMode, "concrete">;

/** A reduced operand, or a structural leaf that has no integer value. */
type Slot<H> = { node: NodeId; value: Value<H> | null };

const ONE = known(1n);

/**
 * Postfix evaluator for binary trees, plus the terminal substitution rules
 * the n-ary engine shares.
 *
 * One instance serves one invocation pass. Resolved loop bounds and grid
 * sizes are memoized on the instance, never on the trees.
 */
export class ExpressionEvaluator<H> {
  readonly resolver: ValueResolver<H>;
  readonly arith: StagedArithmetic<H>;

  private readonly bounds = new Map<string, Value<H>>();
  private readonly pendingBounds = new Set<string>();
  private readonly gridDims = new Map<Axis, Value<H>>();

  constructor(
    readonly kernel: KernelCatalogue,
    readonly invocation: InvocationRecord<H>,
    emitter: Emitter<H> | null = null,
  ) {
    this.resolver = new ValueResolver(invocation);
    this.arith = new StagedArithmetic(emitter);
  }

  evaluate(
    tree: ExprTree,
    mode: EvalMode,
    loopId = 0,
    overrides: Overrides<H> = NO_OVERRIDES,
    from: NodeId = tree.root,
  ): Value<H> {
    const stack: Slot<H>[] = [];
    for (const id of postorder(tree, from)) {
      const n = tree.arena.get(id);
      if (n.children.length === 0) {
        stack.push({ node: id, value: this.leafValue(tree, id, mode, loopId, overrides) });
        continue;
      }
      if (!isOperationOp(n.op) || n.children.length !== 2) {
        throw new NonTerminalOperandError(
          `${n.text} with ${n.children.length} operands is not a binary operation`,
        );
      }
      const rhs = stack.pop();
      const lhs = stack.pop();
      if (lhs === undefined || rhs === undefined) {
        throw new MalformedExpressionError(`operator ${n.text} is missing operands`);
      }
      stack.push({ node: id, value: this.reduce(tree, id, n.op, lhs, rhs, mode) });
    }
    const result = stack.pop();
    if (result === undefined || stack.length > 0) {
      throw new MalformedExpressionError("expression did not reduce to a single value");
    }
    if (result.value === null) {
      throw new NonTerminalOperandError(`${tree.arena.get(result.node).text} has no integer value`);
    }
    return result.value;
  }

  /** max − min, each side bound independently, clamped at zero. */
  workingSetSize(tree: ExprTree, loopId = 0): Value<H> {
    const hi = this.evaluate(tree, "max", loopId);
    const lo = this.evaluate(tree, "min", loopId);
    return this.arith.span(hi, lo);
  }

  // ==========================================================================
  // Terminals
  // ==========================================================================

  terminalValue(
    tree: ExprTree,
    id: NodeId,
    mode: EvalMode,
    loopId: number,
    overrides: Overrides<H> = NO_OVERRIDES,
  ): Value<H> {
    const override = overrides.get(id);
    if (override !== undefined) return override;
    const n = tree.arena.get(id);
    if (!isTerminalOp(n.op)) {
      throw new NonTerminalOperandError(`${n.text} is not a terminal`);
    }
    const op: TerminalOp = n.op;
    switch (op) {
      case "tidx":
      case "tidy":
        return this.threadIndex(op === "tidx" ? "x" : "y", mode, n.text);
      case "bidx":
      case "bidy":
        return this.blockIndex(op === "bidx" ? "x" : "y", mode, n.text);
      case "phi_term":
        return this.phiTermValue(this.loopOfPhi(n.index, loopId), mode, n.text);
      case "const":
      case "arg":
      case "bdimx":
      case "bdimy":
      case "incomp":
      case "undef":
      case "unknown":
        return this.resolver.resolve(tree, id, overrides);
    }
  }

  /** Loop a phi belongs to: the catalogue's phi map first, then the enclosing loop. */
  loopOfPhi(phiId: number | undefined, loopId: number): number {
    if (phiId !== undefined) {
      const mapped = this.kernel.phiLoops.get(phiId);
      if (mapped !== undefined) return mapped;
    }
    return loopId;
  }

  phiTermValue(loopId: number, mode: EvalMode, text = "phi"): Value<H> {
    if (mode === "concrete") {
      throw new UnresolvedTerminalError(`${text} has no single concrete value`);
    }
    if (loopId === 0) return ONE;
    return this.loopBound(loopId, mode === "min" ? "init" : "final", mode);
  }

  /**
   * Lower or upper bound of a loop's induction variable. The bound tree is
   * evaluated in the context of the enclosing loop, so a bound that refers to
   * an outer induction variable picks up that loop's bound in turn.
   */
  loopBound(loopId: number, which: "init" | "final", mode: BoundMode): Value<H> {
    const key = `${loopId}:${which}:${mode}`;
    const cached = this.bounds.get(key);
    if (cached !== undefined) return cached;
    if (this.pendingBounds.has(key)) {
      throw new IncomputableLoopError(loopId, `${which} bound depends on itself`);
    }
    const loop = this.kernel.loops.get(loopId);
    if (loop === undefined) {
      throw new IncomputableLoopError(loopId, `not catalogued for kernel ${this.kernel.name}`);
    }
    const built = loop[which];
    if (built.kind !== "tree") {
      throw new IncomputableLoopError(loopId, `${which} bound is ${built.kind}`);
    }
    this.pendingBounds.add(key);
    try {
      const value = this.evaluate(built.tree, mode, loop.parentLoopId);
      this.bounds.set(key, value);
      return value;
    } finally {
      this.pendingBounds.delete(key);
    }
  }

  private threadIndex(axis: "x" | "y", mode: EvalMode, text: string): Value<H> {
    switch (mode) {
      case "min":
        return known(0n);
      case "max":
        return this.arith.apply("sub", this.resolver.blockDim(this.invocation.block[axis], axis), ONE);
      case "concrete":
        throw new UnresolvedTerminalError(`${text} varies across threads`);
    }
  }

  private blockIndex(axis: "x" | "y", mode: EvalMode, text: string): Value<H> {
    switch (mode) {
      case "min":
        return known(0n);
      case "max":
        return this.arith.apply("sub", this.gridDimension(axis), ONE);
      case "concrete":
        throw new UnresolvedTerminalError(`${text} varies across blocks`);
    }
  }

  // ==========================================================================
  // Launch geometry
  // ==========================================================================

  gridDimension(axis: Axis): Value<H> {
    const cached = this.gridDims.get(axis);
    if (cached !== undefined) return cached;
    const value = this.dimension(this.invocation.grid[axis]);
    this.gridDims.set(axis, value);
    return value;
  }

  blockDimension(axis: Axis): Value<H> {
    return this.resolver.blockDim(this.invocation.block[axis], axis);
  }

  /** gx·gy·gz·bx·by·bz in 64 bits. */
  gridThreadCount(): Value<H> {
    const axes: Axis[] = ["x", "y", "z"];
    return this.arith.product([
      ...axes.map((a) => this.gridDimension(a)),
      ...axes.map((a) => this.blockDimension(a)),
    ]);
  }

  private dimension(dim: Dimension<H>): Value<H> {
    switch (dim.kind) {
      case "constant":
        return known(dim.value);
      case "handle":
        return deferred(dim.handle, "i32");
      case "expression": {
        // Host-side size expression, taken at the first iteration of any host loop.
        const atIterationZero = new Map<NodeId, Value<H>>(
          findNodes(dim.tree, "phi_term").map((id) => [id, known(0n)]),
        );
        return this.evaluate(dim.tree, "concrete", 0, atIterationZero);
      }
    }
  }

  // ==========================================================================
  // Reduction
  // ==========================================================================

  private leafValue(
    tree: ExprTree,
    id: NodeId,
    mode: EvalMode,
    loopId: number,
    overrides: Overrides<H>,
  ): Value<H> | null {
    const n = tree.arena.get(id);
    if (isTerminalOp(n.op)) return this.terminalValue(tree, id, mode, loopId, overrides);
    if (isOperationOp(n.op)) {
      throw new MalformedExpressionError(`operator ${n.text} has no operands`);
    }
    return overrides.get(id) ?? null;
  }

  private reduce(
    tree: ExprTree,
    id: NodeId,
    op: OperationOp,
    lhs: Slot<H>,
    rhs: Slot<H>,
    mode: EvalMode,
  ): Value<H> {
    const a = this.operand(tree, id, lhs);
    const b = this.operand(tree, id, rhs);
    switch (op) {
      case "add":
      case "or":
        return this.arith.apply("add", a, b);
      case "sub":
        return this.arith.apply("sub", a, b);
      case "and":
        return this.arith.apply("and", a, b);
      case "mul":
        return this.arith.mul64(a, b);
      case "shl":
        return this.arith.apply("shl", a, b);
      case "lshr":
        return this.arith.apply("lshr", a, b);
      case "div":
      case "udiv":
        return this.arith.apply("udiv", a, b);
      case "sdiv":
        return this.arith.apply("sdiv", a, b);
      case "srem":
        return this.arith.apply("srem", a, b);
      case "phi":
        return this.mergePhi(tree, lhs, rhs, a, b, mode);
      case "icmp":
      case "fcmp":
      case "fmul":
      case "fdiv":
        throw new NonTerminalOperandError(`${tree.arena.get(id).text} has no integer value`);
    }
  }

  private operand(tree: ExprTree, parent: NodeId, slot: Slot<H>): Value<H> {
    if (slot.value === null) {
      throw new NonTerminalOperandError(
        `${tree.arena.get(slot.node).text} cannot be an operand of ${tree.arena.get(parent).text}`,
      );
    }
    return slot.value;
  }

  private mergePhi(
    tree: ExprTree,
    lhs: Slot<H>,
    rhs: Slot<H>,
    a: Value<H>,
    b: Value<H>,
    mode: EvalMode,
  ): Value<H> {
    if (mode !== "concrete") return this.arith.apply(mode, a, b);
    // Concretely the merge holds its loop-entry value: the side with no recurrence.
    const lhsRecurs = containsOp(tree, "phi_term", lhs.node);
    const rhsRecurs = containsOp(tree, "phi_term", rhs.node);
    if (lhsRecurs === rhsRecurs) {
      throw new NonTerminalOperandError("phi merge has no unique loop-entry operand");
    }
    return lhsRecurs ? b : a;
  }
}
