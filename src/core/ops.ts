/**
 * Operator vocabulary for access expressions.
 *
 * Kinds are split into three closed families. Every consumer switches over a
 * family exhaustively, so adding a kind is a compile error until each engine
 * decides what it means.
 */

export type TerminalOp =
  | "const"
  | "arg"
  | "phi_term"
  | "tidx"
  | "tidy"
  | "bidx"
  | "bidy"
  | "bdimx"
  | "bdimy"
  | "incomp"
  | "undef"
  | "unknown";

export type OperationOp =
  | "add"
  | "sub"
  | "and"
  | "or"
  | "mul"
  | "shl"
  | "lshr"
  | "div"
  | "udiv"
  | "sdiv"
  | "srem"
  | "phi"
  | "icmp"
  | "fcmp"
  | "fmul"
  | "fdiv";

export type StructuralOp =
  | "gep"
  | "load"
  | "store"
  | "zext"
  | "sext"
  | "trunc"
  | "freeze"
  | "double"
  | "fptosi"
  | "sitofp"
  | "uitofp"
  | "select"
  | "call"
  | "atomicrmw"
  | "pc";

export type ExprOp = TerminalOp | OperationOp | StructuralOp;

export type OpFamily = "terminal" | "operation" | "structural";

const TERMINAL_OPS: ReadonlySet<string> = new Set<TerminalOp>([
  "const",
  "arg",
  "phi_term",
  "tidx",
  "tidy",
  "bidx",
  "bidy",
  "bdimx",
  "bdimy",
  "incomp",
  "undef",
  "unknown",
]);

const OPERATION_OPS: ReadonlySet<string> = new Set<OperationOp>([
  "add",
  "sub",
  "and",
  "or",
  "mul",
  "shl",
  "lshr",
  "div",
  "udiv",
  "sdiv",
  "srem",
  "phi",
  "icmp",
  "fcmp",
  "fmul",
  "fdiv",
]);

export function isTerminalOp(op: ExprOp): op is TerminalOp {
  return TERMINAL_OPS.has(op);
}

export function isOperationOp(op: ExprOp): op is OperationOp {
  return OPERATION_OPS.has(op);
}

export function opFamily(op: ExprOp): OpFamily {
  if (isTerminalOp(op)) return "terminal";
  if (isOperationOp(op)) return "operation";
  return "structural";
}

// ============================================================================
// Token table
// ============================================================================

const TOKEN_TO_OP: ReadonlyMap<string, ExprOp> = new Map<string, ExprOp>([
  ["PC", "pc"],
  ["ADD", "add"],
  ["SUB", "sub"],
  ["AND", "and"],
  ["OR", "or"],
  ["MUL", "mul"],
  ["SHL", "shl"],
  ["LSHR", "lshr"],
  ["DIV", "div"],
  ["UDIV", "udiv"],
  ["SDIV", "sdiv"],
  ["SREM", "srem"],
  ["FDIV", "fdiv"],
  ["FMUL", "fmul"],
  ["PHI", "phi"],
  ["ICMP", "icmp"],
  ["FCMP", "fcmp"],
  ["LOAD", "load"],
  ["STORE", "store"],
  ["TIDX", "tidx"],
  ["TIDY", "tidy"],
  ["BIDX", "bidx"],
  ["BIDY", "bidy"],
  ["BDIMX", "bdimx"],
  ["BDIMY", "bdimy"],
  ["GEP", "gep"],
  ["ZEXT", "zext"],
  ["SEXT", "sext"],
  ["FREEZE", "freeze"],
  ["double", "double"],
  ["TRUNC", "trunc"],
  ["FPTOSI", "fptosi"],
  ["SITOFP", "sitofp"],
  ["UITOFP", "uitofp"],
  ["SELECT", "select"],
  ["CALL", "call"],
  ["ATOMICRMW", "atomicrmw"],
  ["UNDEF", "undef"],
  ["INCOMP", "incomp"],
  ["UNKNOWN", "unknown"],
]);

export const INCOMPLETE_MARKER = "INCOMP";

/** Token text decoded into an operator kind and its embedded payload. */
export type TokenInfo = {
  op: ExprOp;
  value?: bigint;
  index?: number;
};

const INTEGER_LITERAL = /^-?\d+$/;
const INDEXED_TOKEN = /^(ARG|PHI)(\d+)$/;

export function lookupToken(text: string): TokenInfo {
  if (INTEGER_LITERAL.test(text)) {
    return { op: "const", value: BigInt(text) };
  }
  const indexed = INDEXED_TOKEN.exec(text);
  if (indexed) {
    const index = Number.parseInt(indexed[2], 10);
    return { op: indexed[1] === "ARG" ? "arg" : "phi", index };
  }
  return { op: TOKEN_TO_OP.get(text) ?? "unknown" };
}
