import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ValidationError } from "../domain/errors.js";
import { QueryAgent } from "../services/queryAgent.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIndexDocumentTool(server: McpServer, agent: QueryAgent) {
  server.registerTool(
    "index_document",
    {
      title: "Index Document",
      description:
        "Replaces the indexed document, either from a local .md/.txt/.pdf file or from raw text.",
      inputSchema: {
        path: z.string().optional().describe("Local file path to index"),
        text: z.string().optional().describe("Raw document text to index"),
        document_id: z
          .string()
          .optional()
          .describe("Identifier for raw text; defaults to 'inline'"),
      },
    },
    async ({ path, text, document_id }) => {
      try {
        if (path && text !== undefined) {
          throw new ValidationError("Pass either path or text, not both.");
        }

        const summary = path
          ? await agent.indexDocumentFile(path)
          : text !== undefined
            ? await agent.indexDocument({ documentId: document_id?.trim() || "inline", text })
            : null;
        if (!summary) {
          throw new ValidationError("Either path or text is required.");
        }

        return jsonResult(summary);
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
