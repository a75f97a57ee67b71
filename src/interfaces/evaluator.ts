/**
 * @module interfaces/evaluator
 * @description Errors raised while evaluating a packet tree as an
 * expression.
 *
 * The grammar lets any operator carry any number of children. Arity is
 * therefore checked here, when a tree is evaluated, rather than when it
 * is parsed.
 */

/**
 * Errors that may be thrown by `evaluate`.
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: "MALFORMED_OPERANDS"
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}
