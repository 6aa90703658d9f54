/**
 * Server configuration from environment variables
 * `.env` is loaded by the entry point (dotenv) before loadConfig runs.
 */

import { z } from "zod";

const intFromEnv = (fallback: number, max: number) =>
  z.coerce.number().int().positive().max(max).default(fallback);

/** Deeper nesting than this would exhaust the host stack before NestingTooDeep fires */
export const MAX_NESTING_DEPTH_LIMIT = 1000;
export const MAX_EXPRESSION_LENGTH_LIMIT = 100_000;

export const ConfigSchema = z.object({
  MCP_TRANSPORT: z.enum(["stdio", "httpStream"]).default("stdio"),
  MCP_PORT: intFromEnv(8080, 65535),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  CALC_MAX_EXPRESSION_LENGTH: intFromEnv(1000, MAX_EXPRESSION_LENGTH_LIMIT),
  CALC_MAX_NESTING_DEPTH: intFromEnv(200, MAX_NESTING_DEPTH_LIMIT),
  CALC_MAX_SEQUENCE_INDEX: intFromEnv(5000, 100_000),
});

export type LogLevel = z.infer<typeof ConfigSchema>["LOG_LEVEL"];

export interface Config {
  transport: "stdio" | "httpStream";
  port: number;
  logLevel: LogLevel;
  maxExpressionLength: number;
  maxNestingDepth: number;
  maxSequenceIndex: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    transport: vars.MCP_TRANSPORT,
    port: vars.MCP_PORT,
    logLevel: vars.LOG_LEVEL,
    maxExpressionLength: vars.CALC_MAX_EXPRESSION_LENGTH,
    maxNestingDepth: vars.CALC_MAX_NESTING_DEPTH,
    maxSequenceIndex: vars.CALC_MAX_SEQUENCE_INDEX,
  };
}

let current: Config | null = null;

/** Process-wide config, parsed once on first use */
export function getConfig(): Config {
  if (!current) {
    current = loadConfig();
  }
  return current;
}
