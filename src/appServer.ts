import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QueryAgent } from "./services/queryAgent.js";
import { registerAskTool } from "./tools/ask.js";
import { registerGetWeatherTool } from "./tools/getWeather.js";
import { registerIndexDocumentTool } from "./tools/indexDocument.js";
import { registerIndexStatusTool } from "./tools/indexStatus.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "weather-doc-agent";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(agent: QueryAgent): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running (index: ${agent.getStatus().status}). hello ${who}`,
          },
        ],
      };
    },
  );

  registerAskTool(server, agent);
  registerGetWeatherTool(server, agent);
  registerSearchChunksTool(server, agent);
  registerIndexDocumentTool(server, agent);
  registerIndexStatusTool(server, agent);

  return server;
}
