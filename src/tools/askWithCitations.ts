import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerAskWithCitationsTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "ask_with_citations",
    {
      title: "Ask With Citations",
      description: "Answers a question from the indexed documents and lists the sources used.",
      inputSchema: {
        question: z.string().min(2).describe("Question for the indexed docs"),
        top_k: z.number().int().min(1).max(10).optional().describe("Retrieval size"),
      },
    },
    async ({ question, top_k }) =>
      runTool(async () => {
        const startedAt = Date.now();
        const result = await service.ask({ question, k: top_k });
        return {
          answer: result.answer,
          references: result.references,
          context_used: result.contextUsed,
          latency_ms: Date.now() - startedAt,
        };
      }),
  );
}
