import type { ExprTree, NodeId } from "./arena";

const INFIX: Partial<Record<string, string>> = {
  add: "+",
  sub: "-",
  mul: "*",
  and: "&",
  or: "|",
  shl: "<<",
  lshr: ">>>",
  div: "/",
  udiv: "/u",
  sdiv: "/s",
  srem: "%",
};

function label(tree: ExprTree, id: NodeId): string {
  const n = tree.arena.get(id);
  switch (n.op) {
    case "const":
      return String(n.value ?? n.text);
    case "arg":
      return `arg${n.index ?? "?"}`;
    case "phi_term":
      return n.index === undefined ? "phi" : `phi${n.index}`;
    default:
      return n.op;
  }
}

function renderBinary(tree: ExprTree, id: NodeId): string {
  const n = tree.arena.get(id);
  if (n.children.length !== 2) return label(tree, id);
  const [lhs, rhs] = n.children.map((c) => renderBinary(tree, c));
  const symbol = INFIX[n.op];
  return symbol === undefined ? `${n.op}(${lhs}, ${rhs})` : `(${lhs} ${symbol} ${rhs})`;
}

function renderNary(tree: ExprTree, id: NodeId): string {
  const n = tree.arena.get(id);
  if (n.children.length === 0) return label(tree, id);
  const head = n.op === "phi" && n.index !== undefined ? `phi${n.index}` : n.op;
  return `(${head} ${n.children.map((c) => renderNary(tree, c)).join(" ")})`;
}

/** Infix for binary trees, s-expression for n-ary ones. */
export function formatTree(tree: ExprTree, from: NodeId = tree.root): string {
  return tree.shape === "binary" ? renderBinary(tree, from) : renderNary(tree, from);
}
