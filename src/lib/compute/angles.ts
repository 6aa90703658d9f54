/**
 * Angle conversion, trigonometric and hyperbolic functions
 */

import { InvalidOperandError, UnknownOperationError } from "../errors.ts";

export const ANGLE_UNITS = ["deg", "rad", "grad"] as const;
export type AngleUnit = (typeof ANGLE_UNITS)[number];

export const TRIG_OPERATIONS = ["sin", "cos", "tan"] as const;
export const HYPERBOLIC_OPERATIONS = ["sinh", "cosh", "tanh"] as const;

/** Radians per unit */
const RADIANS_PER: Record<AngleUnit, number> = {
  deg: Math.PI / 180,
  rad: 1,
  grad: Math.PI / 200,
};

const UNIT_SET: ReadonlySet<string> = new Set(ANGLE_UNITS);

export function isAngleUnit(unit: string): unit is AngleUnit {
  return UNIT_SET.has(unit);
}

/** Convert between units, going through radians */
export function convertAngle(angle: number, fromUnit: string, toUnit: string): number {
  if (!isAngleUnit(fromUnit) || !isAngleUnit(toUnit)) {
    throw new InvalidOperandError(`Units must be one of: ${ANGLE_UNITS.join(", ")}`);
  }
  if (fromUnit === toUnit) return angle;

  const radians = angle * RADIANS_PER[fromUnit];
  return radians / RADIANS_PER[toUnit];
}

/** sin, cos or tan of an angle in radians */
export function trigonometricOperation(angle: number, operation: string): number {
  switch (operation) {
    case "sin":
      return Math.sin(angle);
    case "cos":
      return Math.cos(angle);
    case "tan":
      return Math.tan(angle);
    default:
      throw new UnknownOperationError(operation);
  }
}

export function hyperbolicOperation(x: number, operation: string): number {
  switch (operation) {
    case "sinh":
      return Math.sinh(x);
    case "cosh":
      return Math.cosh(x);
    case "tanh":
      return Math.tanh(x);
    default:
      throw new UnknownOperationError(operation);
  }
}
