/** Token stream does not reduce to a single tree. */
export class MalformedExpressionError extends Error {
  name = "MalformedExpressionError";
}

/** A terminal has no value under the current invocation. */
export class UnresolvedTerminalError extends Error {
  name = "UnresolvedTerminalError";
}

/** An operand reached a reduction without being reducible to a value. */
export class NonTerminalOperandError extends Error {
  name = "NonTerminalOperandError";
}

/** A loop-carried chain passes through something other than an add. */
export class UnsupportedPhiChainError extends Error {
  name = "UnsupportedPhiChainError";
}

export class DivisionByZeroError extends Error {
  name = "DivisionByZeroError";
}

export class IncomputableLoopError extends Error {
  name = "IncomputableLoopError";

  constructor(
    readonly loopId: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`loop ${loopId}: ${message}`, options);
  }
}

export class CatalogueError extends Error {
  name = "CatalogueError";
}
