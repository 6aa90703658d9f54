/**
 * Calculator error taxonomy
 * Every failure raised by the dispatcher, evaluator and compute helpers is a
 * CalculatorError subclass carrying a stable `code`.
 */

export type CalculatorErrorCode =
  | "EmptyExpression"
  | "MissingParenthesis"
  | "MissingArgumentSeparator"
  | "MalformedNumber"
  | "UnexpectedTrailingInput"
  | "NestingTooDeep"
  | "UnknownOperation"
  | "InvalidOperand"
  | "DomainError"
  | "DivisionByZero";

export class CalculatorError extends Error {
  readonly code: CalculatorErrorCode;
  /** Offset into the whitespace-stripped expression, when the error came from parsing */
  readonly position?: number;

  constructor(code: CalculatorErrorCode, message: string, position?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.position = position;
  }
}

export class EmptyExpressionError extends CalculatorError {
  constructor() {
    super("EmptyExpression", "Empty expression");
  }
}

export class MissingParenthesisError extends CalculatorError {
  constructor(message: string, position: number) {
    super("MissingParenthesis", message, position);
  }
}

export class MissingArgumentSeparatorError extends CalculatorError {
  constructor(message: string, position: number) {
    super("MissingArgumentSeparator", message, position);
  }
}

export class MalformedNumberError extends CalculatorError {
  constructor(message: string, position: number) {
    super("MalformedNumber", message, position);
  }
}

export class UnexpectedTrailingInputError extends CalculatorError {
  constructor(char: string, position: number) {
    super("UnexpectedTrailingInput", `Unexpected character at position ${position}: '${char}'`, position);
  }
}

export class NestingTooDeepError extends CalculatorError {
  constructor(maxDepth: number, position: number) {
    super("NestingTooDeep", `Expression nesting exceeds maximum depth of ${maxDepth}`, position);
  }
}

export class UnknownOperationError extends CalculatorError {
  constructor(operation: string) {
    super("UnknownOperation", `Invalid operation: ${operation}`);
  }
}

export class InvalidOperandError extends CalculatorError {
  constructor(message: string) {
    super("InvalidOperand", message);
  }
}

export class DomainError extends CalculatorError {
  constructor(message: string) {
    super("DomainError", message);
  }
}

export class DivisionByZeroError extends CalculatorError {
  constructor(message = "Cannot divide by zero") {
    super("DivisionByZero", message);
  }
}

export function isCalculatorError(error: unknown): error is CalculatorError {
  return error instanceof CalculatorError;
}
