import {
  angleConvertTool,
  factorialTool,
  fibonacciTool,
  hyperbolicTool,
  quadraticTool,
  statsTool,
  trigTool,
} from "./advanced.ts";
import { binaryOperationTool, calculateExpressionTool, unaryOperationTool } from "./arithmetic.ts";

export {
  angleConvertTool,
  binaryOperationTool,
  calculateExpressionTool,
  factorialTool,
  fibonacciTool,
  hyperbolicTool,
  quadraticTool,
  statsTool,
  trigTool,
  unaryOperationTool,
};

/** Every tool, in registration order */
export const allTools = [
  unaryOperationTool,
  binaryOperationTool,
  calculateExpressionTool,
  factorialTool,
  fibonacciTool,
  statsTool,
  quadraticTool,
  angleConvertTool,
  trigTool,
  hyperbolicTool,
] as const;
