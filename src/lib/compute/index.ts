/**
 * Compute helpers
 *
 * Thin wrappers over Math primitives with input validation:
 * - Sequences: factorial, Fibonacci (exact bigint)
 * - Statistics: mean, median, mode, range, sample variance
 * - Quadratic roots, real or complex
 * - Angle conversion, trigonometric and hyperbolic functions
 */

export {
  ANGLE_UNITS,
  type AngleUnit,
  convertAngle,
  HYPERBOLIC_OPERATIONS,
  hyperbolicOperation,
  isAngleUnit,
  TRIG_OPERATIONS,
  trigonometricOperation,
} from "./angles.ts";
export { factorial, fibonacci } from "./math.ts";
export {
  type ComplexRoot,
  type QuadraticRoot,
  type QuadraticSolution,
  solveQuadratic,
} from "./quadratic.ts";
export {
  calculateStatistics,
  mean,
  median,
  mode,
  type StatisticsResult,
  sampleVariance,
} from "./statistics.ts";
