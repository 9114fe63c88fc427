import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerRebuildIndexTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "rebuild_index",
    {
      title: "Rebuild Index",
      description:
        "Re-indexes every stored document into a fresh collection and swaps it in when complete.",
      inputSchema: {},
    },
    async () =>
      runTool(async () => {
        const result = await service.rebuildIndex();
        return {
          indexed_count: result.indexed.length,
          chunk_count: result.chunkCount,
          failed: result.failed,
        };
      }),
  );
}
