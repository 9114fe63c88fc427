import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

const SNIPPET_CHARS = 240;

export function registerSearchChunksTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves top matching chunks from indexed documents.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) =>
      runTool(async () => {
        const hits = await service.search(query, top_k);
        return {
          query,
          hits: hits.map((hit) => ({
            score: Number(hit.score.toFixed(4)),
            filename: hit.chunk.filename,
            page: hit.chunk.page,
            chunk_id: hit.entryId,
            sequence_index: hit.chunk.sequenceIndex,
            snippet: hit.chunk.text.slice(0, SNIPPET_CHARS),
          })),
        };
      }),
  );
}
