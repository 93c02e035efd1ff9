import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { CoefficientExtractor } from "../src/engine/coefficients";
import { LoopAccounting } from "../src/engine/loops";
import { dim3 } from "../src/runtime/invocation";
import { evaluatorFor, invocation, kernelOf, knownValue, postfix } from "./helpers/kernel";

const leafArb = fc.oneof(
  fc.constantFrom("TIDX", "TIDY", "BIDX", "BDIMX"),
  fc.integer({ min: 0, max: 50 }).map(String),
);

function exprArb(depth: number, ops: readonly string[]): fc.Arbitrary<string[]> {
  const leaf = leafArb.map((t) => [t]);
  if (depth === 0) return leaf;
  const inner = exprArb(depth - 1, ops);
  return fc.oneof(
    leaf,
    fc
      .tuple(inner, inner, fc.constantFrom(...ops))
      .map(([lhs, rhs, op]) => [...lhs, ...rhs, op]),
  );
}

/** Postfix streams over non-negative terms, so max and min bracket every thread. */
function monotoneExprArb(depth: number): fc.Arbitrary<string[]> {
  return exprArb(depth, ["ADD", "MUL", "OR"]);
}

const launch = invocation({ grid: dim3(4, 2), block: dim3(32, 4) });

describe("property: evaluation", () => {
  it("a literal evaluates to itself", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(2n ** 62n), max: 2n ** 62n }), (value) => {
        const tree = postfix(value.toString());
        expect(knownValue(evaluatorFor(launch).evaluate(tree, "concrete"))).toBe(value);
      }),
    );
  });

  it("max never falls below min", () => {
    fc.assert(
      fc.property(monotoneExprArb(3), (tokens) => {
        const ev = evaluatorFor(launch);
        const tree = postfix(tokens.join(" "));
        const hi = knownValue(ev.evaluate(tree, "max"));
        const lo = knownValue(ev.evaluate(tree, "min"));
        expect(hi >= lo).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("the working set is never negative", () => {
    fc.assert(
      fc.property(exprArb(3, ["ADD", "SUB", "MUL"]), (tokens) => {
        const size = knownValue(evaluatorFor(launch).workingSetSize(postfix(tokens.join(" "))));
        expect(size >= 0n).toBe(true);
      }),
    );
  });

  it("evaluation is repeatable", () => {
    fc.assert(
      fc.property(monotoneExprArb(3), (tokens) => {
        const ev = evaluatorFor(launch);
        const tree = postfix(tokens.join(" "));
        expect(ev.evaluate(tree, "max")).toEqual(ev.evaluate(tree, "max"));
      }),
    );
  });
});

describe("property: strides", () => {
  const extractor = new CoefficientExtractor(evaluatorFor(launch));

  it("a multiplier is the stride", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1000 }), (k) => {
        const tree = postfix(`ARG0 ${k} MUL`);
        expect(knownValue(extractor.coefficient(tree, { op: "arg", index: 0 }))).toBe(BigInt(k));
      }),
    );
  });

  it("a left shift is a power of two", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 40 }), (k) => {
        const tree = postfix(`ARG0 ${k} SHL`);
        expect(knownValue(extractor.coefficient(tree, { op: "arg", index: 0 }))).toBe(1n << BigInt(k));
      }),
    );
  });
});

describe("property: trip counts", () => {
  it("a counted loop runs span / step times", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 1000 }),
        fc.integer({ min: 0, max: 1000 }),
        fc.integer({ min: 1, max: 16 }),
        (init, span, step) => {
          const kernel = kernelOf({
            loops: [
              {
                kernelName: "k",
                loopId: 1,
                initTokens: [String(init)],
                finalTokens: [String(init + span)],
                stepTokens: [String(step)],
              },
            ],
          });
          const loops = new LoopAccounting(kernel, evaluatorFor(launch, kernel));
          expect(knownValue(loops.iterations(1))).toBe(BigInt(Math.floor(span / step)));
        },
      ),
    );
  });
});
