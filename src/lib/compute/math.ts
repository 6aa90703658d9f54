/**
 * Integer sequence helpers
 * Exact results as bigint - 25! already exceeds Number.MAX_SAFE_INTEGER
 */

import { DomainError, InvalidOperandError } from "../errors.ts";

/** Require a non-negative safe integer index */
function assertIndex(n: number, what: string): void {
  if (!Number.isSafeInteger(n)) {
    throw new InvalidOperandError(`${what} requires an integer, got ${n}`);
  }
  if (n < 0) {
    throw new DomainError(`${what} is not defined for negative numbers`);
  }
}

/** Calculate factorial n! */
export function factorial(n: number): bigint {
  assertIndex(n, "Factorial");
  let result = 1n;
  for (let i = 2n; i <= BigInt(n); i++) {
    result *= i;
  }
  return result;
}

/** Calculate nth Fibonacci number, F(0) = 0, F(1) = 1 */
export function fibonacci(n: number): bigint {
  assertIndex(n, "Fibonacci");
  if (n <= 1) return BigInt(n);

  let a = 0n,
    b = 1n;
  for (let i = 2; i <= n; i++) {
    [a, b] = [b, a + b];
  }
  return b;
}
