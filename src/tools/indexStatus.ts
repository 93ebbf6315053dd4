import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { QueryAgent } from "../services/queryAgent.js";
import { jsonResult } from "./toolResult.js";

export function registerIndexStatusTool(server: McpServer, agent: QueryAgent) {
  server.registerTool(
    "index_status",
    {
      title: "Index Status",
      description: "Reports whether the document index is empty, ready or failed.",
      inputSchema: {},
    },
    async () => jsonResult(agent.getStatus()),
  );
}
