import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { createCareerAssistant } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { errorMessage } from "./domain/errors.js";
import { DEFAULT_MCP_PATH, startHttpTransport } from "./transport/httpTransport.js";
import { createLogger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logging);
  const { service, close } = await createCareerAssistant(config, logger);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  if (config.transport === "http") {
    const http = await startHttpTransport({
      host: config.host,
      port: config.port,
      createMcpServer: () => createAppServer(service),
      logger,
    });
    shutdownTasks.unshift(http.close);
    logger.info(`MCP HTTP server listening on http://${config.host}:${http.port}${DEFAULT_MCP_PATH}`);
  } else {
    await createAppServer(service).connect(new StdioServerTransport());
    logger.info("MCP stdio server ready");
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: errorMessage(error) }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
