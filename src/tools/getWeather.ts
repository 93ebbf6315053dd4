import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatWeatherReport } from "../pipelines/answering.js";
import { QueryAgent } from "../services/queryAgent.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerGetWeatherTool(server: McpServer, agent: QueryAgent) {
  server.registerTool(
    "get_weather",
    {
      title: "Get Weather",
      description: "Returns current conditions for a city or place.",
      inputSchema: {
        place: z.string().min(1).describe("City or place name, e.g. London"),
      },
    },
    async ({ place }, { signal }) => {
      try {
        const report = await agent.lookupWeather(place, signal);
        return jsonResult({
          summary: formatWeatherReport(report),
          report,
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
