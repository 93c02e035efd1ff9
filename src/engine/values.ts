import { foldInt64, INT_BITS, type ArithOp, type IntKind } from "../core/int64";
import { UnresolvedTerminalError } from "./engine-errors";

/**
 * A value computed at analysis time, or a handle to code that computes it
 * once the kernel is launched.
 */
export type Value<H> =
  | { kind: "known"; value: bigint }
  | { kind: "deferred"; handle: H; width: IntKind };

export function known<H = never>(value: bigint): Value<H> {
  return { kind: "known", value };
}

export function deferred<H>(handle: H, width: IntKind): Value<H> {
  return { kind: "deferred", handle, width };
}

/**
 * Code-generation boundary. Handles are opaque to the engine; only the
 * emitter knows what they stand for.
 */
export interface Emitter<H> {
  emitConstant(kind: IntKind, value: bigint): H;
  emitBinaryOp(op: ArithOp, lhs: H, rhs: H): H;
  /** Sign-extend or truncate `handle` to `kind`. */
  emitCast(handle: H, kind: IntKind): H;
}

/**
 * Arithmetic over staged values: folds when both sides are known, emits
 * otherwise. Mixed-width operands are widened to the wider side first.
 */
export class StagedArithmetic<H> {
  constructor(private readonly emitter: Emitter<H> | null = null) {}

  get canEmit(): boolean {
    return this.emitter !== null;
  }

  apply(op: ArithOp, lhs: Value<H>, rhs: Value<H>): Value<H> {
    if (lhs.kind === "known" && rhs.kind === "known") {
      return known(foldInt64(op, lhs.value, rhs.value));
    }
    const emitter = this.requireEmitter(op);
    const width = widest(lhs, rhs);
    const out = emitter.emitBinaryOp(op, this.handleOf(lhs, width), this.handleOf(rhs, width));
    return deferred(out, width);
  }

  /** Multiply with both operands promoted to 64 bits. */
  mul64(lhs: Value<H>, rhs: Value<H>): Value<H> {
    return this.apply("mul", this.widen(lhs), this.widen(rhs));
  }

  widen(v: Value<H>): Value<H> {
    if (v.kind === "known" || v.width === "i64") return v;
    const emitter = this.requireEmitter("widen");
    return deferred(emitter.emitCast(v.handle, "i64"), "i64");
  }

  /** `hi − lo` in 64 bits, never below zero. */
  span(hi: Value<H>, lo: Value<H>): Value<H> {
    return this.apply("max", this.apply("sub", this.widen(hi), this.widen(lo)), known(0n));
  }

  sum(values: readonly Value<H>[]): Value<H> {
    return values.reduce<Value<H>>((acc, v) => this.apply("add", acc, v), known(0n));
  }

  product(values: readonly Value<H>[]): Value<H> {
    return values.reduce<Value<H>>((acc, v) => this.mul64(acc, v), known(1n));
  }

  private handleOf(v: Value<H>, width: IntKind): H {
    const emitter = this.requireEmitter("materialize");
    if (v.kind === "known") return emitter.emitConstant(width, v.value);
    return v.width === width ? v.handle : emitter.emitCast(v.handle, width);
  }

  private requireEmitter(what: string): Emitter<H> {
    if (this.emitter === null) {
      throw new UnresolvedTerminalError(
        `${what} needs a launch-time value but no emitter is attached`,
      );
    }
    return this.emitter;
  }
}

function widest<H>(lhs: Value<H>, rhs: Value<H>): IntKind {
  const bits = (v: Value<H>): number => {
    if (v.kind === "deferred") return INT_BITS[v.width];
    return BigInt.asIntN(32, v.value) === v.value ? 0 : 64;
  };
  return Math.max(bits(lhs), bits(rhs)) > 32 ? "i64" : "i32";
}
