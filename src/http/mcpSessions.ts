import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../domain/errors.js";
import type { McpRequestHandler } from "./restApi.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export interface McpSessionRouter {
  handle: McpRequestHandler;
  closeAll: () => Promise<void>;
}

/**
 * Streamable-HTTP MCP endpoint. Each initialize request gets its own server
 * instance and session id; later requests are routed by `mcp-session-id`.
 */
export function createMcpSessionRouter(serverFactory: () => McpServer): McpSessionRouter {
  const sessions = new Map<string, SessionEntry>();

  const handlePost = async (req: IncomingMessage, res: ServerResponse, body: unknown) => {
    const sessionId = getSessionId(req);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    if (existing) {
      await existing.transport.handleRequest(req, res, body);
      return;
    }

    if (sessionId) {
      writeJsonRpcError(res, 404, -32001, "Session not found");
      return;
    }

    if (!isInitializeRequest(body)) {
      writeJsonRpcError(
        res,
        400,
        -32000,
        "Initialize request is required when session is not established",
      );
      return;
    }

    const server = serverFactory();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        sessions.set(newSessionId, { server, transport });
      },
    });

    transport.onclose = () => {
      const closedSessionId = transport.sessionId;
      const entry = closedSessionId ? sessions.get(closedSessionId) : undefined;
      if (!closedSessionId || !entry) {
        return;
      }
      sessions.delete(closedSessionId);
      entry.server.close().catch((error: unknown) => {
        console.error(`Closing MCP session ${closedSessionId} failed: ${describeError(error)}`);
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const handleSessionRequest = async (req: IncomingMessage, res: ServerResponse) => {
    const sessionId = getSessionId(req);
    const entry = sessionId ? sessions.get(sessionId) : undefined;
    if (!entry) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing or invalid mcp-session-id");
      return;
    }
    await entry.transport.handleRequest(req, res);
  };

  return {
    handle: async (req, res, body) => {
      if (req.method === "POST") {
        await handlePost(req, res, body);
        return;
      }
      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res);
        return;
      }
      res.writeHead(405, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Method not allowed" }));
    },
    closeAll: async () => {
      const entries = [...sessions.values()];
      sessions.clear();
      await Promise.all(
        entries.map(async (entry) => {
          await entry.transport.close();
          await entry.server.close();
        }),
      );
    },
  };
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(res: ServerResponse, httpCode: number, code: number, message: string) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}
