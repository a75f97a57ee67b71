import { describe, it, expect } from "vitest";
import { evaluate } from "../src/primitives/expression-evaluator.js";
import { EvaluationError } from "../src/interfaces/evaluator.js";
import { lit, op, thrownBy } from "./helpers.js";

describe("evaluate()", () => {
  it("should return a literal's value", () => {
    expect(evaluate(lit(2021))).toBe(2021n);
  });

  describe("arithmetic", () => {
    it("should sum children", () => {
      expect(evaluate(op("SUM", [lit(1), lit(2), lit(3)]))).toBe(6n);
    });

    it("should multiply children", () => {
      expect(evaluate(op("PRODUCT", [lit(2), lit(3), lit(4)]))).toBe(24n);
    });

    it("should return the only child of a single-operand product", () => {
      expect(evaluate(op("PRODUCT", [lit(9)]))).toBe(9n);
    });

    it("should use 0 and 1 as the empty sum and product", () => {
      expect(evaluate(op("SUM", []))).toBe(0n);
      expect(evaluate(op("PRODUCT", []))).toBe(1n);
    });

    it("should not overflow past 64 bits", () => {
      const big = 2n ** 64n;
      expect(evaluate(op("SUM", [lit(big), lit(big)]))).toBe(2n ** 65n);
      expect(evaluate(op("PRODUCT", [lit(big), lit(big)]))).toBe(2n ** 128n);
    });

    it("should pick the minimum and maximum", () => {
      const children = [lit(7), lit(3), lit(9)];
      expect(evaluate(op("MINIMUM", children))).toBe(3n);
      expect(evaluate(op("MAXIMUM", children))).toBe(9n);
    });

    it("should reject MINIMUM and MAXIMUM without operands", () => {
      for (const kind of ["MINIMUM", "MAXIMUM"] as const) {
        const err = thrownBy(() => evaluate(op(kind, [])));
        expect(err).toBeInstanceOf(EvaluationError);
        expect(err).toMatchObject({ code: "MALFORMED_OPERANDS" });
      }
    });
  });

  describe("relational", () => {
    it("should compare with GREATER_THAN", () => {
      expect(evaluate(op("GREATER_THAN", [lit(5), lit(3)]))).toBe(1n);
      expect(evaluate(op("GREATER_THAN", [lit(3), lit(5)]))).toBe(0n);
      expect(evaluate(op("GREATER_THAN", [lit(4), lit(4)]))).toBe(0n);
    });

    it("should compare with LESS_THAN", () => {
      expect(evaluate(op("LESS_THAN", [lit(3), lit(5)]))).toBe(1n);
      expect(evaluate(op("LESS_THAN", [lit(5), lit(3)]))).toBe(0n);
    });

    it("should compare with EQUAL_TO", () => {
      expect(evaluate(op("EQUAL_TO", [lit(4), lit(4)]))).toBe(1n);
      expect(evaluate(op("EQUAL_TO", [lit(4), lit(5)]))).toBe(0n);
    });

    it("should compare values wider than 64 bits", () => {
      const a = (1n << 80n) + 1n;
      const b = 1n << 80n;
      expect(evaluate(op("GREATER_THAN", [lit(a), lit(b)]))).toBe(1n);
      expect(evaluate(op("EQUAL_TO", [lit(a), lit(a)]))).toBe(1n);
    });

    it("should throw MALFORMED_OPERANDS with a single operand", () => {
      const err = thrownBy(() => evaluate(op("GREATER_THAN", [lit(1)])));
      expect(err).toBeInstanceOf(EvaluationError);
      expect(err).toMatchObject({
        code: "MALFORMED_OPERANDS",
        message: "GREATER_THAN takes exactly 2 operands, got 1 (version 0)",
      });
    });

    it("should throw MALFORMED_OPERANDS rather than ignore a third operand", () => {
      const err = thrownBy(() => evaluate(op("EQUAL_TO", [lit(1), lit(1), lit(2)], 3)));
      expect(err).toMatchObject({
        code: "MALFORMED_OPERANDS",
        message: "EQUAL_TO takes exactly 2 operands, got 3 (version 3)",
      });
    });
  });

  it("should evaluate nested expressions", () => {
    // (1 + 3) == (2 * 2)
    const tree = op("EQUAL_TO", [
      op("SUM", [lit(1), lit(3)]),
      op("PRODUCT", [lit(2), lit(2)]),
    ]);
    expect(evaluate(tree)).toBe(1n);
  });

  it("should give the same result on repeated evaluation", () => {
    const tree = op("MAXIMUM", [op("SUM", [lit(5), lit(6)]), lit(10)]);
    expect(evaluate(tree)).toBe(11n);
    expect(evaluate(tree)).toBe(11n);
  });
});
