import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerListDocumentsTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists the stored documents with their sizes in bytes.",
      inputSchema: {},
    },
    async () => runTool(async () => ({ documents: await service.listDocuments() })),
  );
}
