import { DivisionByZeroError } from "../engine/engine-errors";

/** Binary operators with an integer meaning on 64-bit values. */
export type ArithOp =
  | "add"
  | "sub"
  | "mul"
  | "and"
  | "shl"
  | "lshr"
  | "udiv"
  | "sdiv"
  | "srem"
  | "max"
  | "min";

export type IntKind = "i32" | "i64";

export const INT_BITS: Record<IntKind, number> = { i32: 32, i64: 64 };

export function wrapSigned64(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

function toUnsigned64(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}

function shiftAmount(value: bigint): bigint {
  return value & 63n;
}

/**
 * Fold one operator over two signed 64-bit operands. Overflow wraps the way
 * the target's 64-bit integer arithmetic does.
 */
export function foldInt64(op: ArithOp, lhs: bigint, rhs: bigint): bigint {
  switch (op) {
    case "add":
      return wrapSigned64(lhs + rhs);
    case "sub":
      return wrapSigned64(lhs - rhs);
    case "mul":
      return wrapSigned64(lhs * rhs);
    case "and":
      return wrapSigned64(lhs & rhs);
    case "shl":
      return wrapSigned64(lhs << shiftAmount(rhs));
    case "lshr":
      return wrapSigned64(toUnsigned64(lhs) >> shiftAmount(rhs));
    case "udiv":
      if (rhs === 0n) throw new DivisionByZeroError(`udiv ${lhs} by zero`);
      return wrapSigned64(toUnsigned64(lhs) / toUnsigned64(rhs));
    case "sdiv":
      if (rhs === 0n) throw new DivisionByZeroError(`sdiv ${lhs} by zero`);
      return wrapSigned64(lhs / rhs);
    case "srem":
      if (rhs === 0n) throw new DivisionByZeroError(`srem ${lhs} by zero`);
      return wrapSigned64(lhs % rhs);
    case "max":
      return lhs > rhs ? lhs : rhs;
    case "min":
      return lhs < rhs ? lhs : rhs;
  }
}
