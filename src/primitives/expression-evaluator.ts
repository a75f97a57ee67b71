/**
 * @module primitives/expression-evaluator
 * @description Evaluates a packet tree as an arithmetic/relational
 * expression over arbitrary-precision integers.
 *
 * | Kind          | Result                                   |
 * |---------------|------------------------------------------|
 * | LITERAL       | its value                                |
 * | SUM           | Σ children (0 when empty)                |
 * | PRODUCT       | Π children (1 when empty)                |
 * | MINIMUM       | smallest child                           |
 * | MAXIMUM       | largest child                            |
 * | GREATER_THAN  | 1 if first > second, else 0              |
 * | LESS_THAN     | 1 if first < second, else 0              |
 * | EQUAL_TO      | 1 if first = second, else 0              |
 *
 * MINIMUM and MAXIMUM need at least one child; the relational kinds need
 * exactly two. Anything else is rejected with MALFORMED_OPERANDS rather
 * than truncated or defaulted.
 */

import { EvaluationError } from "../interfaces/evaluator.js";
import type { OperatorPacket, Packet, RelationalKind } from "../types/packet.js";

/**
 * Evaluate a packet tree. Pure: the tree is never modified.
 *
 * @throws {EvaluationError} code=MALFORMED_OPERANDS on an operator whose
 *   child count its kind does not accept.
 */
export function evaluate(packet: Packet): bigint {
  if (packet.kind === "LITERAL") {
    return packet.value;
  }

  const operands = packet.children.map(evaluate);

  switch (packet.kind) {
    case "SUM":
      return operands.reduce((acc, v) => acc + v, 0n);
    case "PRODUCT":
      return operands.reduce((acc, v) => acc * v, 1n);
    case "MINIMUM":
      return requireOperands(packet, operands).reduce((acc, v) => (v < acc ? v : acc));
    case "MAXIMUM":
      return requireOperands(packet, operands).reduce((acc, v) => (v > acc ? v : acc));
    case "GREATER_THAN":
    case "LESS_THAN":
    case "EQUAL_TO":
      return compare(packet, packet.kind, operands);
  }
}

function compare(
  packet: OperatorPacket,
  kind: RelationalKind,
  operands: readonly bigint[]
): bigint {
  const [left, right] = operands;
  if (operands.length !== 2 || left === undefined || right === undefined) {
    throw new EvaluationError(
      `${kind} takes exactly 2 operands, got ${operands.length} (version ${packet.version})`,
      "MALFORMED_OPERANDS"
    );
  }

  switch (kind) {
    case "GREATER_THAN":
      return left > right ? 1n : 0n;
    case "LESS_THAN":
      return left < right ? 1n : 0n;
    case "EQUAL_TO":
      return left === right ? 1n : 0n;
  }
}

function requireOperands(
  packet: OperatorPacket,
  operands: readonly bigint[]
): [bigint, ...bigint[]] {
  const [first, ...rest] = operands;
  if (first === undefined) {
    throw new EvaluationError(
      `${packet.kind} needs at least 1 operand, got none (version ${packet.version})`,
      "MALFORMED_OPERANDS"
    );
  }
  return [first, ...rest];
}
