import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { Answer } from "../domain/types.js";
import { QueryAgent } from "../services/queryAgent.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerAskTool(server: McpServer, agent: QueryAgent) {
  server.registerTool(
    "ask",
    {
      title: "Ask",
      description:
        "Answers a question. Weather questions are answered from live conditions; everything else from the indexed document.",
      inputSchema: {
        question: z.string().min(1).describe("Natural-language question"),
      },
    },
    async ({ question }, { signal }) => {
      try {
        const answer = await agent.handleQuery(question, { signal });
        return jsonResult(toPayload(answer));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}

function toPayload(answer: Answer) {
  const base = {
    answer: answer.text,
    provenance: answer.provenance,
    status: answer.status,
    latency_ms: answer.latencyMs,
  };

  if (answer.provenance === "weather") {
    return {
      ...base,
      place: answer.place,
      report: answer.status === "ok" ? answer.report : null,
      error: answer.status === "ok" ? null : answer.error,
    };
  }

  return {
    ...base,
    citations: answer.retrieval.map((hit) => ({
      document_id: hit.chunk.documentId,
      chunk_index: hit.chunk.index,
      score: Number(hit.score.toFixed(4)),
    })),
    error: answer.status === "ok" || answer.status === "no_context" ? null : answer.error,
  };
}
