import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./appServer.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { MCP_PATH, startHttpServer } from "./httpServer.js";
import { createQueryAgent } from "./services/createQueryAgent.js";
import { QueryAgent } from "./services/queryAgent.js";
import { ConsoleLogger, Logger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger({ level: config.logLevel });
  const agent = createQueryAgent(config, logger);

  if (config.corpusPath) {
    await indexCorpus(agent, config.corpusPath, logger);
  } else {
    logger.warn("CORPUS_PATH is not set; document questions have no context until a document is indexed.");
  }

  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    const httpServer = await startHttpServer({
      host: config.host,
      port: config.port,
      agent,
      logger,
    });
    shutdownTasks.push(() => httpServer.close());
    logger.info(`MCP HTTP server listening on http://${config.host}:${httpServer.port}${MCP_PATH}`);
  } else {
    await runStdioServer(createAppServer(agent));
  }

  const shutdown = () => {
    runShutdownTasks(shutdownTasks).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", { error: describeError(error) });
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function indexCorpus(agent: QueryAgent, corpusPath: string, logger: Logger): Promise<void> {
  try {
    const summary = await agent.indexDocumentFile(corpusPath);
    logger.info("Corpus indexed", { ...summary });
  } catch (error) {
    // Weather questions still work; document questions report index_unavailable.
    logger.error("Corpus indexing failed", { path: corpusPath, error: describeError(error) });
  }
}

async function runShutdownTasks(tasks: Array<() => Promise<void>>): Promise<void> {
  for (const task of tasks) {
    await task();
  }
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
