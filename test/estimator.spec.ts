import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { analyzeInvocation } from "../src/engine/estimator";
import { known } from "../src/engine/values";
import { Catalogue, type AccessRow } from "../src/runtime/catalogue";
import { SymbolicEmitter } from "../src/runtime/emitter";
import { dim3, type ActualValue } from "../src/runtime/invocation";
import { RecordingSink } from "../src/runtime/sink";
import { invocation } from "./helpers/kernel";

function access(accessId: number, row: Partial<AccessRow>): AccessRow {
  return { kernelName: "k", accessId, allocationArgIndex: 0, expressionTokens: [], ...row };
}

function chain(operands: number): string[] {
  const tokens = ["TIDX"];
  for (let i = 1; i < operands; i += 1) tokens.push("1", "ADD");
  return tokens;
}

const args = new Map<number, ActualValue<string>>([
  [0, { kind: "handle", handle: "%x" }],
  [1, { kind: "handle", handle: "%y" }],
  [2, { kind: "constant", value: 8n }],
  [3, { kind: "constant", value: 3n }],
]);

describe("analyzeInvocation", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function run() {
    const catalogue = Catalogue.fromTables({
      loops: [
        { kernelName: "k", loopId: 1, initTokens: ["0"], finalTokens: ["ARG2"] },
        { kernelName: "k", loopId: 2, parentLoopId: 1, initTokens: ["0"], finalTokens: ["ARG3"] },
        { kernelName: "k", loopId: 3, initTokens: [], finalTokens: ["10"] },
      ],
      accesses: [
        access(1, {
          expressionTokens: "BIDX BDIMX MUL TIDX ADD".split(" "),
          treeTokens: "( GEP ( ARG0 ) ( ADD ( MUL ( BIDX ) ( BDIMX ) ) ( TIDX ) ) )".split(" "),
        }),
        access(2, { enclosingLoopId: 2, expressionTokens: "TIDX PHI 32 MUL ADD".split(" ") }),
        access(3, { enclosingLoopId: 3, expressionTokens: ["TIDX"] }),
        access(4, {
          expressionTokens: "LOAD TIDX ADD".split(" "),
          treeTokens: "( LOAD ( GEP ( ARG0 ) ( LOAD ( GEP ( ARG1 ) ( TIDX ) ) ) ) )".split(" "),
        }),
        access(5, {
          expressionTokens: "TIDX 4 MUL".split(" "),
          treeTokens: "( LOAD ( ADD ( ARG0 ) ( MUL ( TIDX ) ( 4 ) ) ) )".split(" "),
        }),
        access(6, { expressionTokens: chain(26) }),
        access(7, { expressionTokens: [] }),
        access(8, { expressionTokens: ["ADD"] }),
        access(9, { expressionTokens: "ARG7 4 MUL".split(" ") }),
        access(10, { expressionTokens: "GEP 4 ADD".split(" ") }),
        access(11, { expressionTokens: ["INCOMP"] }),
        access(12, { expressionTokens: "TIDX 4 MUL BIDX ADD".split(" ") }),
        access(13, { enclosingCondId: 3, condKind: "then", expressionTokens: ["TIDX"] }),
        access(14, { enclosingCondId: 3, expressionTokens: ["TIDX"] }),
      ],
    });
    const sink = new RecordingSink<string>();
    const summary = analyzeInvocation(
      catalogue,
      invocation({ grid: dim3(4), block: dim3(32), args }),
      sink,
    );
    return { sink, summary };
  }

  it("estimates a grid-strided access", () => {
    const report = run().sink.access(1, 1);
    expect(report?.executionCount).toEqual(known(128n));
    expect(report?.workingSetSize).toEqual(known(127n));
    expect(report?.sensitivities).toEqual({
      bidx: known(32n),
      bidy: known(0n),
      phi: known(0n),
    });
    expect(report?.flags).toEqual([]);
    expect(report?.key.allocation).toEqual({
      argIndex: 0,
      actual: { kind: "handle", handle: "%x" },
    });
  });

  it("multiplies in every enclosing loop", () => {
    const report = run().sink.access(1, 2);
    expect(report?.executionCount).toEqual(known(3072n));
    expect(report?.sensitivities.phi).toEqual(known(32n));
    expect(report?.workingSetSize).toEqual(known(1n));
  });

  it("reports every loop", () => {
    const { sink } = run();
    expect(sink.loop(1, "k", 1)).toEqual({ kind: "computed", value: known(8n) });
    expect(sink.loop(1, "k", 2)).toEqual({ kind: "computed", value: known(3n) });
    expect(sink.loop(1, "k", 3)).toEqual({
      kind: "incomputable",
      reason: "loop 3: initial bound is empty",
    });
  });

  it("flags accesses inside an incomputable loop", () => {
    const { sink, summary } = run();
    expect(summary.outcomes.get(3)).toEqual({
      status: "incomputable",
      reason: "loop",
      message: "loop 3: initial bound is empty",
    });
    expect(sink.access(1, 3)?.flags).toEqual([
      { flag: "incomputable", detail: "loop: loop 3: initial bound is empty" },
    ]);
    expect(sink.access(1, 3)?.executionCount).toBeUndefined();
  });

  it("flags indirect addresses without estimating them", () => {
    const { sink, summary } = run();
    expect(summary.outcomes.get(4)).toEqual({ status: "indirect" });
    expect(sink.access(1, 4)?.flags).toEqual([
      { flag: "indirect", detail: "address depends on more than one load" },
    ]);
    expect(sink.access(1, 4)?.executionCount).toBeUndefined();
  });

  it("counts one element for an address without a gep", () => {
    const { sink } = run();
    expect(sink.access(1, 5)?.workingSetSize).toEqual(known(1n));
    expect(sink.access(1, 5)?.executionCount).toEqual(known(128n));
    expect(sink.access(1, 12)?.workingSetSize).toEqual(known(1n));
    expect(sink.access(1, 12)?.sensitivities.bidx).toEqual(known(1n));
  });

  it("marks counts under a branch as upper bounds", () => {
    const { sink, summary } = run();
    expect(summary.outcomes.get(13)).toEqual({ status: "estimated" });
    expect(sink.access(1, 13)?.executionCount).toEqual(known(128n));
    expect(sink.access(1, 13)?.flags).toEqual([
      { flag: "conditional", detail: "then branch of condition 3" },
    ]);
    expect(sink.access(1, 14)?.flags).toEqual([
      { flag: "conditional", detail: "inside condition 3" },
    ]);
  });

  it("flags oversized expressions as pointer chasing", () => {
    const { sink, summary } = run();
    expect(summary.outcomes.get(6)).toEqual({ status: "pointer-chase" });
    expect(sink.access(1, 6)?.flags).toEqual([{ flag: "pointer-chase" }]);
  });

  it("classifies expressions it cannot evaluate", () => {
    const { sink, summary } = run();
    expect(summary.outcomes.get(7)).toEqual({
      status: "incomputable",
      reason: "empty-expression",
      message: "no tokens recorded",
    });
    expect(sink.access(1, 8)?.flags).toEqual([
      { flag: "incomputable", detail: "malformed: operator ADD at position 0 needs two operands" },
    ]);
    expect(sink.access(1, 9)?.flags).toEqual([
      { flag: "incomputable", detail: "unresolved: ARG7 is not bound in invocation 1" },
    ]);
    expect(sink.access(1, 9)?.executionCount).toBeUndefined();
    expect(summary.outcomes.get(11)).toEqual({
      status: "incomputable",
      reason: "incomplete",
      message: "analysis could not finish this expression",
    });
  });

  it("logs internal failures and carries on", () => {
    const { summary } = run();
    expect(summary.outcomes.get(10)).toEqual({
      status: "incomputable",
      reason: "internal",
      message: "NonTerminalOperandError: GEP cannot be an operand of ADD",
    });
    expect(console.error).toHaveBeenCalledWith(
      "[estimator] k access 10: NonTerminalOperandError: GEP cannot be an operand of ADD in (gep + 4)",
    );
    expect(summary.outcomes.get(11)?.status).toBe("incomputable");
    expect(summary.outcomes.size).toBe(14);
  });

  it("warns about malformed rows while building the catalogue", () => {
    run();
    expect(console.warn).toHaveBeenCalledWith(
      "[catalogue] k access 8 is malformed: operator ADD at position 0 needs two operands",
    );
  });

  it("measures sensitivity to a host loop", () => {
    const catalogue = Catalogue.fromTables({
      accesses: [
        {
          kernelName: "host",
          accessId: 1,
          allocationArgIndex: 0,
          expressionTokens: "ARG5 256 MUL TIDX ADD".split(" "),
          treeTokens: "( GEP ( ARG0 ) ( ADD ( MUL ( ARG5 ) ( 256 ) ) ( TIDX ) ) )".split(" "),
        },
      ],
    });
    const sink = new RecordingSink<string>();
    analyzeInvocation(
      catalogue,
      invocation({
        kernelName: "host",
        args: new Map<number, ActualValue<string>>([[5, { kind: "induction", handle: "%i" }]]),
      }),
      sink,
      { emitter: new SymbolicEmitter() },
    );
    const report = sink.access(1, 1);
    expect(report?.sensitivities.hostLoop).toEqual(known(256n));
    expect(report?.key.allocation.actual).toBeNull();
    expect(report?.workingSetSize).toEqual({
      kind: "deferred",
      handle:
        "(max (sub (add i64:0 (add (mul (cast i64 %i) i64:256) i64:31)) " +
        "(add i64:0 (add (mul (cast i64 %i) i64:256) i64:0))) i64:0)",
      width: "i64",
    });
  });

  it("skips kernels the catalogue does not know", () => {
    const sink = new RecordingSink<string>();
    const summary = analyzeInvocation(
      Catalogue.fromTables({}),
      invocation({ kernelName: "missing" }),
      sink,
    );
    expect(summary.outcomes.size).toBe(0);
    expect(sink.size).toBe(0);
    expect(console.warn).toHaveBeenCalledWith("[estimator] kernel missing is not in the catalogue");
  });
});
