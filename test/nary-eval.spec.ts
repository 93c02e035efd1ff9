import { describe, expect, it } from "vitest";

import { NonTerminalOperandError, UnsupportedPhiChainError } from "../src/engine/engine-errors";
import { LoopAccounting } from "../src/engine/loops";
import { NaryEvaluator } from "../src/engine/nary-eval";
import { dim3 } from "../src/runtime/invocation";
import { constArgs, evaluatorFor, invocation, kernelOf, knownValue, prefix } from "./helpers/kernel";

const kernel = kernelOf(
  {
    loops: [
      {
        kernelName: "scan",
        loopId: 1,
        initTokens: ["0"],
        finalTokens: ["ARG1"],
        stepTokens: ["1"],
      },
    ],
    phiLoops: [{ kernelName: "scan", phiId: 3, loopId: 1 }],
  },
  "scan",
);

function naryEvaluator(): NaryEvaluator<string> {
  const inv = invocation({
    kernelName: "scan",
    grid: dim3(2),
    block: dim3(32),
    args: constArgs({ 1: 10 }),
  });
  const evaluator = evaluatorFor(inv, kernel);
  return new NaryEvaluator(evaluator, new LoopAccounting(kernel, evaluator));
}

function bounds(source: string): [bigint, bigint] {
  const nary = naryEvaluator();
  const tree = prefix(source);
  return [knownValue(nary.extremal(tree, "min")), knownValue(nary.extremal(tree, "max"))];
}

describe("NaryEvaluator", () => {
  it("sums gep offsets past the base pointer", () => {
    expect(bounds("( GEP ( ARG0 ) ( ADD ( TIDX ) ( MUL ( BIDX ) ( 32 ) ) ) )")).toEqual([0n, 63n]);
  });

  it("passes a lone gep operand through", () => {
    expect(bounds("( GEP ( TIDX ) )")).toEqual([0n, 31n]);
  });

  it("folds operators over every operand", () => {
    expect(bounds("( ADD ( 1 ) ( 2 ) ( 3 ) )")).toEqual([6n, 6n]);
  });

  it("looks through loads and casts", () => {
    expect(bounds("( LOAD ( ZEXT ( TIDX ) ) )")).toEqual([0n, 31n]);
  });

  it("bounds a select by both values and ignores its condition", () => {
    expect(bounds("( SELECT ( ICMP ( TIDX ) ( 4 ) ) ( TIDX ) ( 0 ) )")).toEqual([0n, 31n]);
  });

  it("accumulates a loop-carried increment over the trip count", () => {
    const nary = naryEvaluator();
    const tree = prefix("( PHI3 ( 4 ) ( ADD ( PHI3 ) ( 2 ) ) )");
    expect(knownValue(nary.extremal(tree, "max"))).toBe(26n);
    expect(knownValue(nary.extremal(tree, "min"))).toBe(4n);
    expect(knownValue(nary.workingSetSize(tree))).toBe(22n);
  });

  it("clamps the working set of a subtracted thread index", () => {
    const tree = prefix("( GEP ( ARG0 ) ( SUB ( 100 ) ( TIDX ) ) )");
    expect(bounds("( GEP ( ARG0 ) ( SUB ( 100 ) ( TIDX ) ) )")).toEqual([100n, 69n]);
    expect(knownValue(naryEvaluator().workingSetSize(tree))).toBe(0n);
  });

  it("bounds a phi outside its merge by the loop bounds", () => {
    expect(bounds("( MUL ( PHI3 ) ( 4 ) )")).toEqual([0n, 40n]);
  });

  it("rejects recurrences through anything but additions", () => {
    const tree = prefix("( PHI3 ( 0 ) ( MUL ( PHI3 ) ( 2 ) ) )");
    expect(() => naryEvaluator().extremal(tree, "max")).toThrow(UnsupportedPhiChainError);
    expect(() => naryEvaluator().extremal(tree, "max")).toThrow(
      "loop-carried value passes through MUL; only additions are supported",
    );
  });

  it("rejects calls and comparisons", () => {
    expect(() => naryEvaluator().extremal(prefix("( CALL ( ARG0 ) )"), "max")).toThrow(
      NonTerminalOperandError,
    );
    expect(() => naryEvaluator().extremal(prefix("( ICMP ( TIDX ) ( 4 ) )"), "max")).toThrow(
      "ICMP has no integer value",
    );
  });
});
