/**
 * Operation Dispatcher
 * Constant resolution plus unary/binary operator semantics with domain validation.
 * Every operator application made by the evaluator goes through here.
 */

import {
  DivisionByZeroError,
  DomainError,
  InvalidOperandError,
  UnknownOperationError,
} from "../errors.ts";

// =============================================================================
// OPERANDS & CONSTANTS
// =============================================================================

/** Named constants accepted wherever an operand is */
export const CONSTANTS = {
  pi: Math.PI,
  e: Math.E,
} as const;

export type ConstantName = keyof typeof CONSTANTS;

/** A number, or the name of a constant that resolves to one */
export type Operand = number | string;

export function isConstantName(name: string): name is ConstantName {
  return Object.hasOwn(CONSTANTS, name);
}

/**
 * Resolve an operand to a number
 * Constant names are substituted; any other string is rejected.
 */
export function resolveOperand(operand: Operand): number {
  if (typeof operand === "number") return operand;
  if (isConstantName(operand)) return CONSTANTS[operand];
  throw new InvalidOperandError(`Invalid operand: ${operand}`);
}

/** Collapse negative zero so integral results compare and print as plain integers */
export function normalizeNumber(n: number): number {
  return n === 0 ? 0 : n;
}

// =============================================================================
// OPERATOR TABLES
// =============================================================================

export const UNARY_OPERATORS = ["sqrt"] as const;
export const BINARY_OPERATORS = ["+", "-", "*", "/", "**", "log"] as const;

export type UnaryOperator = (typeof UNARY_OPERATORS)[number];
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

const UNARY_SET: ReadonlySet<string> = new Set(UNARY_OPERATORS);
const BINARY_SET: ReadonlySet<string> = new Set(BINARY_OPERATORS);

export function isUnaryOperator(op: string): op is UnaryOperator {
  return UNARY_SET.has(op);
}

export function isBinaryOperator(op: string): op is BinaryOperator {
  return BINARY_SET.has(op);
}

// =============================================================================
// DISPATCH
// =============================================================================

/** Apply a unary operation (currently only sqrt) */
export function unaryOperation(a: Operand, operation: string): number {
  const x = resolveOperand(a);

  if (!isUnaryOperator(operation)) {
    throw new UnknownOperationError(operation);
  }

  switch (operation) {
    case "sqrt":
      if (x < 0) {
        throw new DomainError("Cannot calculate square root of a negative number");
      }
      return Math.sqrt(x);
  }
}

/**
 * Apply a binary operation
 *
 * For "log" the operands are (base, value): the result is the logarithm of
 * `b` in base `a`.
 */
export function binaryOperation(a: Operand, b: Operand, operation: string): number {
  const x = resolveOperand(a);
  const y = resolveOperand(b);

  if (!isBinaryOperator(operation)) {
    throw new UnknownOperationError(operation);
  }

  switch (operation) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "/":
      if (y === 0) throw new DivisionByZeroError();
      return x / y;
    case "**":
      return power(x, y);
    case "log":
      return logarithm(x, y);
  }
}

function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new DivisionByZeroError("Cannot raise zero to a negative power");
  }

  const result = base ** exponent;

  // Negative base with a fractional exponent has no real value
  if (Number.isNaN(result)) {
    throw new DomainError(`${base} ** ${exponent} has no real result`);
  }
  if (!Number.isFinite(result) && Number.isFinite(base) && Number.isFinite(exponent)) {
    throw new DomainError(`${base} ** ${exponent} is too large to represent`);
  }
  return result;
}

function logarithm(base: number, value: number): number {
  if (base <= 0 || base === 1) {
    throw new DomainError("Log base must be positive and not equal to 1");
  }
  if (value <= 0) {
    throw new DomainError("Cannot calculate logarithm of a non-positive number");
  }

  // Dedicated paths keep exact powers exact (log10(1000) = 3, not 2.9999999999999996)
  if (base === 2) return Math.log2(value);
  if (base === 10) return Math.log10(value);
  if (base === Math.E) return Math.log(value);
  return Math.log(value) / Math.log(base);
}
