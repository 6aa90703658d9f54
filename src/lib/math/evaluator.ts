/**
 * Expression Evaluator
 * Recursive descent parser that evaluates while it parses - no AST, no eval.
 *
 * Grammar (whitespace removed before parsing):
 *   expression → term (('+' | '-') term)*
 *   term       → factor (('*' | '/') factor)*
 *   factor     → 'sqrt' '(' expression ')'
 *              | 'log' '(' expression ',' expression ')'
 *              | '(' expression ')' ('**' factor)?
 *              | number ('**' factor)?          // right-associative
 *   number     → '-'? [0-9.]+
 *
 * Each production takes the cursor and returns it advanced; nothing is shared
 * between productions or between calls.
 */

import {
  EmptyExpressionError,
  MalformedNumberError,
  MissingArgumentSeparatorError,
  MissingParenthesisError,
  NestingTooDeepError,
  UnexpectedTrailingInputError,
} from "../errors.ts";
import { binaryOperation, normalizeNumber, unaryOperation } from "./operators.ts";

export const DEFAULT_MAX_DEPTH = 200;

export interface EvaluateOptions {
  /** Maximum nesting of groups, function calls and exponent chains */
  maxDepth?: number;
}

/** Value produced by a production, with the cursor just past it */
interface Parsed {
  value: number;
  pos: number;
}

interface ParseContext {
  readonly expr: string;
  readonly maxDepth: number;
}

const NUMBER_LITERAL = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Evaluate an arithmetic expression
 *
 * @example
 * evaluate("2 + 3 * 4");        // 14
 * evaluate("2 ** 3 ** 2");      // 512
 * evaluate("log(8, 2) - -1");   // 4
 */
export function evaluate(expression: string, options: EvaluateOptions = {}): number {
  const expr = expression.replace(/\s+/g, "");
  if (!expr) {
    throw new EmptyExpressionError();
  }

  const ctx: ParseContext = { expr, maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH };
  const { value, pos } = parseExpression(ctx, 0, 0);

  if (pos < expr.length) {
    throw new UnexpectedTrailingInputError(expr.charAt(pos), pos);
  }
  return normalizeNumber(value);
}

function parseExpression(ctx: ParseContext, start: number, depth: number): Parsed {
  let { value, pos } = parseTerm(ctx, start, depth);

  while (pos < ctx.expr.length && (ctx.expr[pos] === "+" || ctx.expr[pos] === "-")) {
    const op = ctx.expr.charAt(pos);
    const right = parseTerm(ctx, pos + 1, depth);
    value = binaryOperation(value, right.value, op);
    pos = right.pos;
  }

  return { value, pos };
}

function parseTerm(ctx: ParseContext, start: number, depth: number): Parsed {
  let { value, pos } = parseFactor(ctx, start, depth);

  while (pos < ctx.expr.length && (ctx.expr[pos] === "*" || ctx.expr[pos] === "/")) {
    // "**" after a function call is not part of the grammar; let the factor reject it
    const op = ctx.expr.charAt(pos);
    const right = parseFactor(ctx, pos + 1, depth);
    value = binaryOperation(value, right.value, op);
    pos = right.pos;
  }

  return { value, pos };
}

function parseFactor(ctx: ParseContext, start: number, depth: number): Parsed {
  if (depth >= ctx.maxDepth) {
    throw new NestingTooDeepError(ctx.maxDepth, start);
  }
  const { expr } = ctx;

  if (expr.startsWith("sqrt", start)) {
    return parseSqrt(ctx, start + 4, depth + 1);
  }
  if (expr.startsWith("log", start)) {
    return parseLog(ctx, start + 3, depth + 1);
  }

  if (expr[start] === "(") {
    const inner = parseExpression(ctx, start + 1, depth + 1);
    if (expr[inner.pos] !== ")") {
      throw new MissingParenthesisError("Missing closing parenthesis", inner.pos);
    }
    return parseExponent(ctx, inner.value, inner.pos + 1, depth);
  }

  const literal = parseNumber(expr, start);
  return parseExponent(ctx, literal.value, literal.pos, depth);
}

/** Optional `** factor` suffix after a group or literal */
function parseExponent(ctx: ParseContext, base: number, pos: number, depth: number): Parsed {
  if (!ctx.expr.startsWith("**", pos)) {
    return { value: base, pos };
  }
  const exponent = parseFactor(ctx, pos + 2, depth + 1);
  return { value: binaryOperation(base, exponent.value, "**"), pos: exponent.pos };
}

function parseSqrt(ctx: ParseContext, start: number, depth: number): Parsed {
  const { expr } = ctx;
  if (expr[start] !== "(") {
    throw new MissingParenthesisError("sqrt function requires parentheses", start);
  }

  const arg = parseExpression(ctx, start + 1, depth);
  if (expr[arg.pos] !== ")") {
    throw new MissingParenthesisError("Missing closing parenthesis for sqrt function", arg.pos);
  }
  return { value: unaryOperation(arg.value, "sqrt"), pos: arg.pos + 1 };
}

function parseLog(ctx: ParseContext, start: number, depth: number): Parsed {
  const { expr } = ctx;
  if (expr[start] !== "(") {
    throw new MissingParenthesisError("log function requires parentheses", start);
  }

  const first = parseExpression(ctx, start + 1, depth);
  if (expr[first.pos] !== ",") {
    throw new MissingArgumentSeparatorError(
      "log function requires two arguments separated by a comma",
      first.pos,
    );
  }

  const second = parseExpression(ctx, first.pos + 1, depth);
  if (expr[second.pos] !== ")") {
    throw new MissingParenthesisError("Missing closing parenthesis for log function", second.pos);
  }
  // Arguments reach the dispatcher swapped: log(p, q) is the log of p in base q
  return { value: binaryOperation(second.value, first.value, "log"), pos: second.pos + 1 };
}

/** Numeric literal, with an optional leading minus folded into it */
function parseNumber(expr: string, start: number): Parsed {
  let pos = start;
  if (expr[pos] === "-") pos++;
  while (pos < expr.length && /[\d.]/.test(expr.charAt(pos))) pos++;

  if (pos === start) {
    throw new MalformedNumberError(`Expected number at position ${pos}`, pos);
  }

  const text = expr.slice(start, pos);
  if (!NUMBER_LITERAL.test(text)) {
    throw new MalformedNumberError(`Invalid number format: ${text}`, start);
  }
  return { value: normalizeNumber(Number(text)), pos };
}
