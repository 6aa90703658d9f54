/**
 * Quadratic equation solver: ax² + bx + c = 0
 */

import { DomainError } from "../errors.ts";

export interface ComplexRoot {
  real: number;
  imag: number;
}

export type QuadraticRoot = number | ComplexRoot;

export interface QuadraticSolution {
  equation: string;
  discriminant: number;
  solutions: [QuadraticRoot, QuadraticRoot];
}

/**
 * Solve for both roots
 * A negative discriminant yields a complex-conjugate pair.
 */
export function solveQuadratic(a: number, b: number, c: number): QuadraticSolution {
  if (a === 0) {
    throw new DomainError("Coefficient 'a' cannot be zero in a quadratic equation");
  }

  const discriminant = b ** 2 - 4 * a * c;
  const equation = `${a}x² + ${b}x + ${c} = 0`;

  if (discriminant >= 0) {
    const root = Math.sqrt(discriminant);
    return {
      equation,
      discriminant,
      solutions: [(-b + root) / (2 * a), (-b - root) / (2 * a)],
    };
  }

  const real = -b / (2 * a);
  const imag = Math.sqrt(-discriminant) / (2 * a);
  return {
    equation,
    discriminant,
    solutions: [
      { real, imag },
      { real, imag: -imag },
    ],
  };
}
