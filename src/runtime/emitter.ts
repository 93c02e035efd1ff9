import type { ArithOp, IntKind } from "../core/int64";
import type { Emitter } from "../engine/values";

/**
 * Emitter whose handles are the printed expressions themselves, e.g.
 * `(mul %n i64:4)`. Launch-time inputs are named with a leading `%`.
 */
export class SymbolicEmitter implements Emitter<string> {
  readonly emitted: string[] = [];

  emitConstant(kind: IntKind, value: bigint): string {
    return `${kind}:${value}`;
  }

  emitBinaryOp(op: ArithOp, lhs: string, rhs: string): string {
    return this.record(`(${op} ${lhs} ${rhs})`);
  }

  emitCast(handle: string, kind: IntKind): string {
    return this.record(`(cast ${kind} ${handle})`);
  }

  private record(text: string): string {
    this.emitted.push(text);
    return text;
  }
}
