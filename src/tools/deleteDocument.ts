import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerDeleteDocumentTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "delete_document",
    {
      title: "Delete Document",
      description: "Deletes a stored document and its indexed chunks.",
      inputSchema: {
        filename: z.string().min(1).describe("Stored file name"),
      },
    },
    async ({ filename }) =>
      runTool(async () => {
        const removed = await service.remove(filename);
        return { filename: removed.filename, entries_removed: removed.entriesRemoved };
      }),
  );
}
