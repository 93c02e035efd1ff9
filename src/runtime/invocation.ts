import type { IntKind } from "../core/int64";
import type { ExprTree } from "../engine/arena";
import { buildBinaryTree } from "../engine/tree-builder";

/** Actual value bound to one formal kernel argument. */
export type ActualValue<H> =
  | { kind: "constant"; value: bigint }
  | { kind: "handle"; handle: H; width?: IntKind }
  /** Induction variable of the host loop that encloses the launch. */
  | { kind: "induction"; handle: H; width?: IntKind };

export type Dimension<H> =
  | { kind: "constant"; value: bigint }
  | { kind: "handle"; handle: H }
  /** Grid size known only as an expression over host values. */
  | { kind: "expression"; tree: ExprTree };

export type Dim3<H> = {
  x: Dimension<H>;
  y: Dimension<H>;
  z: Dimension<H>;
};

export type Axis = "x" | "y" | "z";

/** One kernel launch. Lives for a single analysis pass. */
export type InvocationRecord<H> = {
  invocationId: number;
  kernelName: string;
  grid: Dim3<H>;
  block: Dim3<H>;
  args: ReadonlyMap<number, ActualValue<H>>;
};

export function constantDim(value: number | bigint): Dimension<never> {
  return { kind: "constant", value: BigInt(value) };
}

export function dim3(x: number | bigint, y: number | bigint = 1, z: number | bigint = 1): Dim3<never> {
  return { x: constantDim(x), y: constantDim(y), z: constantDim(z) };
}

/** Grid dimension given as postfix tokens, e.g. `["ARG1", "255", "ADD", "256", "UDIV"]`. */
export function expressionDim(tokens: readonly string[]): Dimension<never> {
  const tree = buildBinaryTree(tokens);
  if (tree === null) {
    throw new Error("grid expression has no tokens");
  }
  return { kind: "expression", tree };
}
