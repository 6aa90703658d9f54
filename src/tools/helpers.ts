import { UserError } from "fastmcp";
import { isCalculatorError } from "../lib/errors.ts";
import { createServiceLogger } from "../lib/logger.ts";
import { normalizeNumber } from "../lib/math/index.ts";

const log = createServiceLogger("tools");

/** Render a numeric result as tool output text */
export function formatNumber(n: number): string {
  return String(normalizeNumber(n));
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Run a tool body, reporting calculator failures to the client as tool errors
 * Anything that is not a CalculatorError is rethrown as-is.
 */
export async function runCalculation(
  tool: string,
  args: Record<string, unknown>,
  compute: () => string,
): Promise<string> {
  try {
    const text = compute();
    log.debug("tool call", { tool, args, result: text });
    return text;
  } catch (error) {
    if (isCalculatorError(error)) {
      log.warn(error.message, { tool, code: error.code, position: error.position });
      throw new UserError(`${error.code}: ${error.message}`);
    }
    log.error("tool failed", {
      tool,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
