import type { ActualValue, Dimension, InvocationRecord } from "../runtime/invocation";
import type { ExprTree, NodeId } from "./arena";
import { MalformedExpressionError, UnresolvedTerminalError } from "./engine-errors";
import { deferred, known, type Value } from "./values";

/** Caller-supplied substitutions, keyed by node id within one tree. */
export type Overrides<H> = ReadonlyMap<NodeId, Value<H>>;

export const NO_OVERRIDES: Overrides<never> = new Map();

/**
 * Resolves terminals against one invocation: overrides first, then literals,
 * block sizes and argument bindings. Anything else is unresolved.
 */
export class ValueResolver<H> {
  constructor(private readonly invocation: InvocationRecord<H>) {}

  resolve(tree: ExprTree, id: NodeId, overrides: Overrides<H> = NO_OVERRIDES): Value<H> {
    const override = overrides.get(id);
    if (override !== undefined) return override;

    const n = tree.arena.get(id);
    switch (n.op) {
      case "const":
        if (n.value === undefined) {
          throw new MalformedExpressionError(`constant ${n.text} has no payload`);
        }
        return known(n.value);
      case "bdimx":
        return this.blockDim(this.invocation.block.x, "x");
      case "bdimy":
        return this.blockDim(this.invocation.block.y, "y");
      case "arg":
        return this.argument(n.index, n.text);
      default:
        throw new UnresolvedTerminalError(`${n.text} has no value in invocation ${this.invocation.invocationId}`);
    }
  }

  blockDim(dim: Dimension<H>, axis: string): Value<H> {
    switch (dim.kind) {
      case "constant":
        return known(dim.value);
      case "handle":
        return deferred(dim.handle, "i32");
      case "expression":
        throw new UnresolvedTerminalError(`block dimension ${axis} must be a constant or a handle`);
    }
  }

  argument(index: number | undefined, text: string): Value<H> {
    const actual = index === undefined ? undefined : this.invocation.args.get(index);
    if (actual === undefined) {
      throw new UnresolvedTerminalError(
        `${text} is not bound in invocation ${this.invocation.invocationId}`,
      );
    }
    return actualValue(actual);
  }
}

export function actualValue<H>(actual: ActualValue<H>): Value<H> {
  switch (actual.kind) {
    case "constant":
      return known(actual.value);
    case "handle":
      return deferred(actual.handle, actual.width ?? "i64");
    case "induction":
      return deferred(actual.handle, actual.width ?? "i32");
  }
}
