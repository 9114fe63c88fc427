import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerUploadDocumentTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "upload_document",
    {
      title: "Upload Document",
      description:
        "Stores a .md, .txt or .pdf document and indexes it. Provide either text content or base64 bytes.",
      inputSchema: {
        filename: z.string().min(1).describe("Target file name, e.g. notes.md"),
        text: z.string().optional().describe("UTF-8 content for text documents"),
        content_base64: z.string().optional().describe("Base64 bytes, required for PDFs"),
      },
    },
    async ({ filename, text, content_base64 }) =>
      runTool(async () => {
        const content =
          content_base64 !== undefined
            ? Buffer.from(content_base64, "base64")
            : Buffer.from(text ?? "", "utf-8");
        const result = await service.upload(filename, content);
        return {
          filename: result.filename,
          chunks_indexed: result.chunksIndexed,
          status: result.status,
          ...(result.warning ? { warning: result.warning } : {}),
        };
      }),
  );
}
