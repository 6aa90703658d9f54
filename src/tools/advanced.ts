import { z } from "zod";
import {
  ANGLE_UNITS,
  calculateStatistics,
  convertAngle,
  factorial,
  fibonacci,
  HYPERBOLIC_OPERATIONS,
  hyperbolicOperation,
  solveQuadratic,
  TRIG_OPERATIONS,
  trigonometricOperation,
} from "../lib/compute/index.ts";
import { getConfig } from "../lib/config.ts";
import { formatJson, formatNumber, runCalculation } from "./helpers.ts";

/**
 * Advanced math tools: sequences, statistics, equations, angles
 */

const config = getConfig();

const SequenceIndexSchema = z.object({
  n: z
    .number()
    .int()
    .min(0)
    .max(config.maxSequenceIndex)
    .describe("A non-negative integer"),
});

type SequenceIndexArgs = z.infer<typeof SequenceIndexSchema>;

export const factorialTool = {
  name: "calc_factorial",
  description: "Calculate the factorial of a non-negative integer (n!). The result is exact.",
  parameters: SequenceIndexSchema,
  execute: async (args: SequenceIndexArgs): Promise<string> =>
    runCalculation("calc_factorial", args, () => factorial(args.n).toString()),
};

export const fibonacciTool = {
  name: "calc_fibonacci",
  description: "Calculate the nth Fibonacci number, with F(0) = 0 and F(1) = 1. The result is exact.",
  parameters: SequenceIndexSchema,
  execute: async (args: SequenceIndexArgs): Promise<string> =>
    runCalculation("calc_fibonacci", args, () => fibonacci(args.n).toString()),
};

const StatsSchema = z.object({
  numbers: z.array(z.number()).min(1).describe("A non-empty list of numbers"),
});

export const statsTool = {
  name: "stats",
  description: `Calculate statistical measures for a list of numbers.

Returns mean, median, mode (null when there is no unique mode), min, max, range,
and sample variance / standard deviation.`,
  parameters: StatsSchema,
  execute: async (args: z.infer<typeof StatsSchema>): Promise<string> =>
    runCalculation("stats", args, () => formatJson(calculateStatistics(args.numbers))),
};

const QuadraticSchema = z.object({
  a: z.number().describe("Coefficient of x²"),
  b: z.number().describe("Coefficient of x"),
  c: z.number().describe("Constant term"),
});

export const quadraticTool = {
  name: "quadratic",
  description:
    "Solve a quadratic equation ax² + bx + c = 0. Complex roots are returned as {real, imag}.",
  parameters: QuadraticSchema,
  execute: async (args: z.infer<typeof QuadraticSchema>): Promise<string> =>
    runCalculation("quadratic", args, () => formatJson(solveQuadratic(args.a, args.b, args.c))),
};

const AngleConvertSchema = z.object({
  angle: z.number().describe("The angle value to convert"),
  from_unit: z.enum(ANGLE_UNITS).describe("Unit to convert from"),
  to_unit: z.enum(ANGLE_UNITS).describe("Unit to convert to"),
});

export const angleConvertTool = {
  name: "angle_convert",
  description: "Convert an angle between degrees (deg), radians (rad) and gradians (grad).",
  parameters: AngleConvertSchema,
  execute: async (args: z.infer<typeof AngleConvertSchema>): Promise<string> =>
    runCalculation("angle_convert", args, () =>
      formatJson({
        original: { value: args.angle, unit: args.from_unit },
        converted: { value: convertAngle(args.angle, args.from_unit, args.to_unit), unit: args.to_unit },
      }),
    ),
};

const TrigSchema = z.object({
  angle: z.number().describe("The angle"),
  operation: z.enum(TRIG_OPERATIONS).describe("sin, cos or tan"),
  unit: z.enum(ANGLE_UNITS).default("rad").describe("Unit of the angle"),
});

export const trigTool = {
  name: "trig",
  description: "Calculate sin, cos or tan of an angle given in radians, degrees or gradians.",
  parameters: TrigSchema,
  execute: async (args: z.infer<typeof TrigSchema>): Promise<string> =>
    runCalculation("trig", args, () =>
      formatNumber(trigonometricOperation(convertAngle(args.angle, args.unit, "rad"), args.operation)),
    ),
};

const HyperbolicSchema = z.object({
  value: z.number().describe("The argument"),
  operation: z.enum(HYPERBOLIC_OPERATIONS).describe("sinh, cosh or tanh"),
});

export const hyperbolicTool = {
  name: "hyperbolic",
  description: "Calculate sinh, cosh or tanh of a number.",
  parameters: HyperbolicSchema,
  execute: async (args: z.infer<typeof HyperbolicSchema>): Promise<string> =>
    runCalculation("hyperbolic", args, () =>
      formatNumber(hyperbolicOperation(args.value, args.operation)),
    ),
};
