import "dotenv/config";
import { FastMCP } from "fastmcp";
import { getConfig } from "./lib/config.ts";
import { createServiceLogger } from "./lib/logger.ts";
import {
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
} from "./tools/index.ts";

const log = createServiceLogger("server");

const server = new FastMCP({
  name: "scientific-calculator",
  version: "0.1.0",
});

// Basic arithmetic
server.addTool(unaryOperationTool);
server.addTool(binaryOperationTool);
server.addTool(calculateExpressionTool);

// Advanced math
server.addTool(factorialTool);
server.addTool(fibonacciTool);
server.addTool(statsTool);
server.addTool(quadraticTool);
server.addTool(angleConvertTool);
server.addTool(trigTool);
server.addTool(hyperbolicTool);

async function main(): Promise<void> {
  const config = getConfig();

  if (config.transport === "httpStream") {
    await server.start({ transportType: "httpStream", httpStream: { port: config.port } });
    log.info(`Server running on http stream, port ${config.port}`);
  } else {
    // stdio for local MCP agents
    await server.start({ transportType: "stdio" });
    log.info("Server running on stdio");
  }
}

main().catch((err: unknown) => {
  log.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
