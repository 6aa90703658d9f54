import { z } from "zod";
import { getConfig } from "../lib/config.ts";
import { binaryOperation, evaluate, unaryOperation } from "../lib/math/index.ts";
import { formatNumber, runCalculation } from "./helpers.ts";

/**
 * Basic arithmetic tools: single operations and whole expressions
 */

const config = getConfig();

const operandSchema = z
  .union([z.number(), z.string()])
  .describe("A number, or a constant name: 'pi' or 'e'");

const UnaryOperationSchema = z.object({
  a: operandSchema,
  operation: z.string().describe("The operation to perform: 'sqrt'"),
});

export const unaryOperationTool = {
  name: "unary_operation",
  description: "Perform a unary operation on a number. Supported operation: sqrt.",
  parameters: UnaryOperationSchema,
  execute: async (args: z.infer<typeof UnaryOperationSchema>): Promise<string> =>
    runCalculation("unary_operation", args, () =>
      formatNumber(unaryOperation(args.a, args.operation)),
    ),
};

const BinaryOperationSchema = z.object({
  a: operandSchema,
  b: operandSchema,
  operation: z
    .string()
    .describe("The operation to perform: '+', '-', '*', '/', '**', or 'log' (log of b in base a)"),
});

export const binaryOperationTool = {
  name: "binary_operation",
  description: `Perform a basic arithmetic operation on two numbers.

Operations: +, -, *, /, **, log.
For log, a is the base and b is the value.`,
  parameters: BinaryOperationSchema,
  execute: async (args: z.infer<typeof BinaryOperationSchema>): Promise<string> =>
    runCalculation("binary_operation", args, () =>
      formatNumber(binaryOperation(args.a, args.b, args.operation)),
    ),
};

const CalculateExpressionSchema = z.object({
  expression: z
    .string()
    .max(config.maxExpressionLength)
    .describe('A mathematical expression, e.g. "2 + 3 * 4" or "sqrt(16) + log(8, 2)"'),
});

export const calculateExpressionTool = {
  name: "calculate_expression",
  description: `Evaluate a mathematical expression.

Operators: +, -, *, /, ** (right-associative). Grouping with parentheses.
Functions: sqrt(x), log(x, base) (log(8, 2) = 3).
A minus sign directly before a number is part of the number: "5 - -3" = 8.`,
  parameters: CalculateExpressionSchema,
  execute: async (args: z.infer<typeof CalculateExpressionSchema>): Promise<string> =>
    runCalculation("calculate_expression", args, () =>
      formatNumber(evaluate(args.expression, { maxDepth: config.maxNestingDepth })),
    ),
};
