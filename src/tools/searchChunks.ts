import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QueryAgent } from "../services/queryAgent.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, agent: QueryAgent) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves top matching chunks from the indexed document.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }, { signal }) => {
      try {
        const hits = await agent.searchChunks(query, top_k, signal);
        return jsonResult({
          query,
          hits: hits.map((hit) => ({
            score: Number(hit.score.toFixed(4)),
            document_id: hit.chunk.documentId,
            chunk_index: hit.chunk.index,
            snippet: hit.chunk.text.slice(0, 240),
          })),
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
