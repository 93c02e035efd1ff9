import { DEBUG_ENGINE } from "../config";
import type { AccessRecord, Catalogue, KernelCatalogue } from "../runtime/catalogue";
import { treeOf } from "../runtime/catalogue";
import type { InvocationRecord } from "../runtime/invocation";
import type { AccessKey, RuntimeSink, SensitivityAxis } from "../runtime/sink";
import { containsOp, countOp, type ExprTree } from "./arena";
import { CoefficientExtractor } from "./coefficients";
import {
  DivisionByZeroError,
  IncomputableLoopError,
  MalformedExpressionError,
  NonTerminalOperandError,
  UnresolvedTerminalError,
  UnsupportedPhiChainError,
} from "./engine-errors";
import { formatTree } from "./format";
import { ExpressionEvaluator } from "./interval";
import { LoopAccounting, type LoopIterations } from "./loops";
import { NaryEvaluator } from "./nary-eval";
import { known, type Emitter, type Value } from "./values";

export type IncomputableReason =
  | "empty-expression"
  | "malformed"
  | "incomplete"
  | "unresolved"
  | "loop"
  | "internal";

export type AccessOutcome =
  | { status: "estimated" }
  | { status: "pointer-chase" }
  | { status: "indirect" }
  | { status: "incomputable"; reason: IncomputableReason; message: string };

export type InvocationSummary = {
  invocationId: number;
  kernelName: string;
  outcomes: Map<number, AccessOutcome>;
};

export type EstimatorOptions<H> = {
  /** Needed whenever a result depends on launch-time values. */
  emitter?: Emitter<H> | null;
};

type Estimate<H> = {
  executionCount: Value<H>;
  sensitivities: Array<[SensitivityAxis, Value<H>]>;
  workingSetSize: Value<H>;
};

/**
 * Everything the estimator needs for one invocation. Built per launch and
 * dropped afterwards, together with its memoized bounds and trip counts.
 */
class InvocationPass<H> {
  readonly evaluator: ExpressionEvaluator<H>;
  readonly loops: LoopAccounting<H>;
  readonly nary: NaryEvaluator<H>;
  readonly coefficients: CoefficientExtractor<H>;

  constructor(
    readonly kernel: KernelCatalogue,
    readonly invocation: InvocationRecord<H>,
    emitter: Emitter<H> | null,
  ) {
    this.evaluator = new ExpressionEvaluator(kernel, invocation, emitter);
    this.loops = new LoopAccounting(kernel, this.evaluator);
    this.nary = new NaryEvaluator(this.evaluator, this.loops);
    this.coefficients = new CoefficientExtractor(this.evaluator);
  }

  estimate(access: AccessRecord, expression: ExprTree): Estimate<H> {
    const { evaluator, loops, coefficients } = this;
    const arith = evaluator.arith;
    const loopId = access.enclosingLoopId;

    const trips = loops.nestedIterations(loopId);
    const executionCount = arith.mul64(evaluator.gridThreadCount(), trips);

    const sensitivities: Array<[SensitivityAxis, Value<H>]> = [
      ["bidx", arith.widen(coefficients.coefficient(expression, { op: "bidx" }, loopId))],
      ["bidy", arith.widen(coefficients.coefficient(expression, { op: "bidy" }, loopId))],
      ["phi", arith.widen(coefficients.phiCoefficient(expression, loopId))],
    ];
    const inductionArgs = [...this.invocation.args.entries()]
      .filter(([, actual]) => actual.kind === "induction")
      .map(([index]) => index);
    if (inductionArgs.length > 0) {
      const hostLoop = arith.sum(
        inductionArgs.map((index) =>
          arith.widen(coefficients.coefficient(expression, { op: "arg", index }, loopId)),
        ),
      );
      sensitivities.push(["hostLoop", hostLoop]);
    }

    return {
      executionCount,
      sensitivities,
      workingSetSize: this.workingSetSize(access, expression),
    };
  }

  private workingSetSize(access: AccessRecord, expression: ExprTree): Value<H> {
    const loopId = access.enclosingLoopId;
    const tree = treeOf(access.tree);
    // No address arithmetic: every thread touches the same element.
    if (!containsOp(tree ?? expression, "gep")) return known(1n);
    if (tree === null) return this.evaluator.workingSetSize(expression, loopId);
    return this.nary.workingSetSize(tree, loopId);
  }
}

function classify(e: unknown): { reason: IncomputableReason; message: string } {
  if (e instanceof MalformedExpressionError) return { reason: "malformed", message: e.message };
  if (e instanceof UnresolvedTerminalError || e instanceof DivisionByZeroError) {
    return { reason: "unresolved", message: e.message };
  }
  if (e instanceof IncomputableLoopError) return { reason: "loop", message: e.message };
  if (e instanceof NonTerminalOperandError || e instanceof UnsupportedPhiChainError) {
    return { reason: "internal", message: `${e.name}: ${e.message}` };
  }
  throw e;
}

function loopResult<H>(pass: InvocationPass<H>, loopId: number): LoopIterations<H> {
  try {
    return pass.loops.tryIterations(loopId);
  } catch (e) {
    const { message } = classify(e);
    console.error(`[estimator] ${pass.kernel.name} loop ${loopId}: ${message}`);
    return { kind: "incomputable", reason: message };
  }
}

/** A second load in the address means it was read through a pointer. */
function isIndirect(access: AccessRecord, expression: ExprTree): boolean {
  const tree = treeOf(access.tree) ?? expression;
  return countOp(tree, "load") > 1;
}

function hasPointerChase(access: AccessRecord): boolean {
  const expression = treeOf(access.expression);
  const tree = treeOf(access.tree);
  return (
    (expression !== null && containsOp(expression, "pc")) ||
    (tree !== null && containsOp(tree, "pc"))
  );
}

function analyzeAccess<H>(
  pass: InvocationPass<H>,
  access: AccessRecord,
  sink: RuntimeSink<H>,
): AccessOutcome {
  const { invocation } = pass;
  const key: AccessKey<H> = {
    invocationId: invocation.invocationId,
    accessId: access.accessId,
    allocation: {
      argIndex: access.allocationArgIndex,
      actual: invocation.args.get(access.allocationArgIndex) ?? null,
    },
  };
  const incomputable = (reason: IncomputableReason, message: string): AccessOutcome => {
    sink.flag(key, "incomputable", `${reason}: ${message}`);
    return { status: "incomputable", reason, message };
  };

  const built = access.expression;
  if (built.kind === "empty") return incomputable("empty-expression", "no tokens recorded");
  if (built.kind === "malformed") return incomputable("malformed", built.error.message);
  if (built.tree.arena.get(built.tree.root).op === "incomp") {
    return incomputable("incomplete", "analysis could not finish this expression");
  }
  if (access.tree !== null && access.tree.kind === "malformed") {
    return incomputable("malformed", access.tree.error.message);
  }
  const nary = treeOf(access.tree);
  if (nary !== null && nary.arena.get(nary.root).op === "incomp") {
    return incomputable("incomplete", "analysis could not finish the operand tree");
  }
  if (hasPointerChase(access)) {
    sink.flag(key, "pointer-chase");
    return { status: "pointer-chase" };
  }
  if (isIndirect(access, built.tree)) {
    sink.flag(key, "indirect", "address depends on more than one load");
    return { status: "indirect" };
  }

  let estimate: Estimate<H>;
  try {
    estimate = pass.estimate(access, built.tree);
  } catch (e) {
    const { reason, message } = classify(e);
    if (reason === "internal") {
      console.error(
        `[estimator] ${access.kernelName} access ${access.accessId}: ${message} in ${formatTree(built.tree)}`,
      );
    }
    return incomputable(reason, message);
  }

  sink.executionCount(key, estimate.executionCount);
  for (const [axis, value] of estimate.sensitivities) sink.sensitivity(key, axis, value);
  sink.workingSetSize(key, estimate.workingSetSize);
  if (access.enclosingCondId !== 0) {
    const branch = access.condKind === "none" ? "inside" : `${access.condKind} branch of`;
    sink.flag(key, "conditional", `${branch} condition ${access.enclosingCondId}`);
  }
  if (DEBUG_ENGINE) {
    console.log(`[estimator] ${access.kernelName} access ${access.accessId}: ${formatTree(built.tree)}`);
  }
  return { status: "estimated" };
}

/**
 * Analyze every loop and access of the invoked kernel and hand the results
 * to `sink`. A failing access is flagged and skipped; the pass continues.
 */
export function analyzeInvocation<H>(
  catalogue: Catalogue,
  invocation: InvocationRecord<H>,
  sink: RuntimeSink<H>,
  options: EstimatorOptions<H> = {},
): InvocationSummary {
  const summary: InvocationSummary = {
    invocationId: invocation.invocationId,
    kernelName: invocation.kernelName,
    outcomes: new Map(),
  };
  const kernel = catalogue.kernel(invocation.kernelName);
  if (kernel === undefined) {
    console.warn(`[estimator] kernel ${invocation.kernelName} is not in the catalogue`);
    return summary;
  }

  const pass = new InvocationPass(kernel, invocation, options.emitter ?? null);
  for (const loopId of [...kernel.loops.keys()].sort((a, b) => a - b)) {
    const result = loopResult(pass, loopId);
    sink.loopIterations(invocation.invocationId, kernel.name, loopId, result);
    if (DEBUG_ENGINE && result.kind === "incomputable") {
      console.log(`[estimator] ${kernel.name} loop ${loopId}: ${result.reason}`);
    }
  }
  for (const accessId of [...kernel.accesses.keys()].sort((a, b) => a - b)) {
    const access = kernel.accesses.get(accessId);
    if (access === undefined) continue;
    summary.outcomes.set(accessId, analyzeAccess(pass, access, sink));
  }
  return summary;
}
