/**
 * Unit tests for the expression evaluator
 * Precedence, associativity, literals, functions, and every parse failure
 */

import { describe, expect, test } from "vitest";
import {
  CalculatorError,
  DivisionByZeroError,
  DomainError,
  EmptyExpressionError,
  MalformedNumberError,
  MissingArgumentSeparatorError,
  MissingParenthesisError,
  NestingTooDeepError,
  UnexpectedTrailingInputError,
} from "../src/lib/errors.ts";
import { evaluate } from "../src/lib/math/index.ts";

function captureError(fn: () => unknown): CalculatorError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CalculatorError) return error;
    throw error;
  }
  throw new Error("expected evaluation to fail");
}

// =============================================================================
// ARITHMETIC
// =============================================================================

describe("evaluate - arithmetic", () => {
  test("basic operations with and without spaces", () => {
    expect(evaluate("2 + 3")).toBe(5);
    expect(evaluate("2+3")).toBe(5);
    expect(evaluate("5 - 2")).toBe(3);
    expect(evaluate("4 * 3")).toBe(12);
    expect(evaluate("10 / 2")).toBe(5);
    expect(evaluate("10 / 4")).toBe(2.5);
  });

  test("multiplication binds tighter than addition", () => {
    expect(evaluate("2 + 3 * 4")).toBe(14);
    expect(evaluate("(2 + 3) * 4")).toBe(20);
    expect(evaluate("2 + 3 * 4 - 5")).toBe(9);
    expect(evaluate("(2 + 3) * (4 - 1)")).toBe(15);
    expect(evaluate("10 / (2 + 3)")).toBe(2);
  });

  test("subtraction and division are left-associative", () => {
    expect(evaluate("2 - 3 - 4")).toBe(-5);
    expect(evaluate("100 / 10 / 5")).toBe(2);
  });

  test("decimals", () => {
    expect(evaluate("3.5 * 2")).toBe(7);
    expect(evaluate("2.50")).toBe(2.5);
    expect(evaluate(".5 + 1")).toBe(1.5);
    expect(evaluate("0.1 + 0.2")).toBeCloseTo(0.3);
  });
});

// =============================================================================
// EXPONENTIATION
// =============================================================================

describe("evaluate - exponentiation", () => {
  test("after numbers and groups", () => {
    expect(evaluate("2 ** 3")).toBe(8);
    expect(evaluate("(2 + 1) ** 2")).toBe(9);
    expect(evaluate("2 ** (1 + 2)")).toBe(8);
    expect(evaluate("2 ** 3 + 4")).toBe(12);
  });

  test("is right-associative", () => {
    expect(evaluate("2 ** 3 ** 2")).toBe(512);
  });

  test("negative exponent", () => {
    expect(evaluate("2 ** -1")).toBe(0.5);
  });

  test("negative literal is the base", () => {
    expect(evaluate("-2 ** 2")).toBe(4);
  });

  test("negative base with fractional exponent is a domain error", () => {
    expect(() => evaluate("(-8) ** 0.5")).toThrow(DomainError);
  });

  test("zero to a negative power is division by zero", () => {
    expect(() => evaluate("0 ** -1")).toThrow(DivisionByZeroError);
  });

  test("overflow is a domain error", () => {
    expect(() => evaluate("10 ** 400")).toThrow(DomainError);
  });

  test("is not accepted directly after a function call", () => {
    const error = captureError(() => evaluate("sqrt(4) ** 2"));
    expect(error).toBeInstanceOf(MalformedNumberError);
    expect(error.message).toBe("Expected number at position 8");
  });
});

// =============================================================================
// UNARY MINUS
// =============================================================================

describe("evaluate - negative literals", () => {
  test("minus is folded into the literal", () => {
    expect(evaluate("5 - -3")).toBe(8);
    expect(evaluate("-5 * -3")).toBe(15);
    expect(evaluate("-5 + 3")).toBe(-2);
    expect(evaluate("5 + -3")).toBe(2);
    expect(evaluate("5 * -3")).toBe(-15);
    expect(evaluate("-10 / 2")).toBe(-5);
    expect(evaluate("10 / -2")).toBe(-5);
  });

  test("negative zero is normalized", () => {
    expect(Object.is(evaluate("-0"), 0)).toBe(true);
    expect(Object.is(evaluate("0 * -1"), 0)).toBe(true);
  });

  test("minus before a group is not a literal", () => {
    const error = captureError(() => evaluate("-(2 + 3)"));
    expect(error).toBeInstanceOf(MalformedNumberError);
    expect(error.message).toBe("Invalid number format: -");
  });
});

// =============================================================================
// FUNCTIONS
// =============================================================================

describe("evaluate - functions", () => {
  test("sqrt", () => {
    expect(evaluate("sqrt(4)")).toBe(2);
    expect(evaluate("sqrt(9)")).toBe(3);
    expect(evaluate("sqrt(2 + 2)")).toBe(2);
    expect(evaluate("sqrt(3 ** 2)")).toBe(3);
    expect(Number.isInteger(evaluate("sqrt(4)"))).toBe(true);
  });

  test("sqrt combined with other operators", () => {
    expect(evaluate("sqrt(16) + 2 ** 2")).toBe(8);
    expect(evaluate("(sqrt(16) + 2) ** 2")).toBe(36);
    expect(evaluate("2 * sqrt(sqrt(16))")).toBe(4);
  });

  test("log(p, q) is the log of p in base q", () => {
    expect(evaluate("log(8, 2)")).toBe(3);
    expect(evaluate("log(100, 10)")).toBe(2);
    expect(evaluate("log(81, 3)")).toBeCloseTo(4);
    expect(evaluate("log(2, 8)")).toBeCloseTo(1 / 3);
    expect(evaluate("log(8, 2) - -1")).toBe(4);
  });

  test("log arguments are full expressions", () => {
    expect(evaluate("log(2 ** 5, 1 + 1)")).toBe(5);
  });

  test("sqrt of a negative number", () => {
    expect(() => evaluate("sqrt(-4)")).toThrow(DomainError);
  });

  test("log domain", () => {
    expect(() => evaluate("log(5, 1)")).toThrow(DomainError);
    expect(() => evaluate("log(8, -2)")).toThrow(DomainError);
    expect(() => evaluate("log(0, 2)")).toThrow(DomainError);
    expect(() => evaluate("log(-8, 2)")).toThrow(DomainError);
  });
});

// =============================================================================
// WHITESPACE
// =============================================================================

describe("evaluate - whitespace", () => {
  test("all whitespace is removed, even inside numbers", () => {
    expect(evaluate("1 0")).toBe(10);
    expect(evaluate("\t2\n+ 3")).toBe(5);
    expect(evaluate("s q r t ( 9 )")).toBe(3);
  });
});

// =============================================================================
// ERRORS
// =============================================================================

describe("evaluate - errors", () => {
  test("empty input", () => {
    expect(() => evaluate("")).toThrow(EmptyExpressionError);
    expect(() => evaluate("   ")).toThrow(EmptyExpressionError);
  });

  test("division by zero", () => {
    expect(() => evaluate("5 / 0")).toThrow(DivisionByZeroError);
    expect(() => evaluate("5 / (2 - 2)")).toThrow(DivisionByZeroError);
  });

  test("unclosed group", () => {
    const error = captureError(() => evaluate("(2 + 3"));
    expect(error).toBeInstanceOf(MissingParenthesisError);
    expect(error.code).toBe("MissingParenthesis");
    expect(error.position).toBe(4);
  });

  test("trailing input", () => {
    const error = captureError(() => evaluate("2 + 3)"));
    expect(error).toBeInstanceOf(UnexpectedTrailingInputError);
    expect(error.message).toBe("Unexpected character at position 3: ')'");
    expect(error.position).toBe(3);
  });

  test("unknown operator is trailing input", () => {
    const error = captureError(() => evaluate("5 ? 3"));
    expect(error.code).toBe("UnexpectedTrailingInput");
    expect(error.message).toBe("Unexpected character at position 1: '?'");
  });

  test("function without parentheses", () => {
    const error = captureError(() => evaluate("sqrt 4"));
    expect(error).toBeInstanceOf(MissingParenthesisError);
    expect(error.message).toBe("sqrt function requires parentheses");
    expect(error.position).toBe(4);

    expect(() => evaluate("log 2")).toThrow(MissingParenthesisError);
  });

  test("unclosed function call", () => {
    const error = captureError(() => evaluate("sqrt(4"));
    expect(error.message).toBe("Missing closing parenthesis for sqrt function");
    expect(() => evaluate("log(2, 8")).toThrow(MissingParenthesisError);
  });

  test("log without a comma", () => {
    const error = captureError(() => evaluate("log(2 8)"));
    expect(error).toBeInstanceOf(MissingArgumentSeparatorError);
    expect(error.position).toBe(6);
  });

  test("malformed numbers", () => {
    expect(captureError(() => evaluate(".")).message).toBe("Invalid number format: .");
    expect(captureError(() => evaluate("-")).message).toBe("Invalid number format: -");
    expect(captureError(() => evaluate("1.2.3")).message).toBe("Invalid number format: 1.2.3");
  });

  test("missing operand", () => {
    const error = captureError(() => evaluate("2 +"));
    expect(error).toBeInstanceOf(MalformedNumberError);
    expect(error.message).toBe("Expected number at position 2");

    expect(() => evaluate("()")).toThrow(MalformedNumberError);
    expect(() => evaluate("abc")).toThrow(MalformedNumberError);
  });

  test("every failure is a CalculatorError", () => {
    for (const input of ["", "(", ")", "*", "2**", "log(", "sqrt()", "1/0", "9 9 9 )"]) {
      expect(() => evaluate(input)).toThrow(CalculatorError);
    }
  });
});

// =============================================================================
// NESTING & PURITY
// =============================================================================

describe("evaluate - nesting depth", () => {
  test("within the limit", () => {
    expect(evaluate("((1))", { maxDepth: 3 })).toBe(1);
    expect(evaluate(`${"(".repeat(100)}7${")".repeat(100)}`)).toBe(7);
  });

  test("beyond the limit", () => {
    const error = captureError(() => evaluate("((1))", { maxDepth: 2 }));
    expect(error).toBeInstanceOf(NestingTooDeepError);
    expect(error.position).toBe(2);

    expect(() => evaluate(`${"(".repeat(500)}7${")".repeat(500)}`)).toThrow(NestingTooDeepError);
  });

  test("long exponent chains count toward depth", () => {
    expect(() => evaluate("1 ** 1 ** 1 ** 1", { maxDepth: 3 })).toThrow(NestingTooDeepError);
    expect(evaluate("1 ** 1 ** 1 ** 1", { maxDepth: 4 })).toBe(1);
  });
});

describe("evaluate - idempotence", () => {
  test("same input, same result", () => {
    const expr = "(sqrt(16) + log(8, 2)) ** 2 / 7";
    const first = evaluate(expr);
    expect(evaluate(expr)).toBe(first);
    expect(first).toBe(7);
  });
});
