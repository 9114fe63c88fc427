import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocumentQaService } from "../services/documentQaService.js";
import { registerAskWithCitationsTool } from "./askWithCitations.js";
import { registerDeleteDocumentTool } from "./deleteDocument.js";
import { registerListDocumentsTool } from "./listDocuments.js";
import { registerRebuildIndexTool } from "./rebuildIndex.js";
import { registerSearchChunksTool } from "./searchChunks.js";
import { registerUploadDocumentTool } from "./uploadDocument.js";

export const SERVER_NAME = "doc-answer-service";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(service: DocumentQaService): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  registerListDocumentsTool(server, service);
  registerUploadDocumentTool(server, service);
  registerDeleteDocumentTool(server, service);
  registerSearchChunksTool(server, service);
  registerAskWithCitationsTool(server, service);
  registerRebuildIndexTool(server, service);

  return server;
}
