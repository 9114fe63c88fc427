import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import {
  AppError,
  InvalidRequestError,
  describeError,
  toHttpStatus,
} from "../domain/errors.js";
import { resolveDocumentKind } from "../infra/parsers/documentLoader.js";
import { sanitizeFilename } from "../services/documentSetManager.js";
import type { DocumentQaService } from "../services/documentQaService.js";
import { type UploadedFile, isMultipartRequest, readMultipartFile } from "./multipartUpload.js";

export const MCP_PATH = "/mcp";

const MAX_BODY_BYTES = 32 * 1024 * 1024;

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, mcp-session-id",
  "Access-Control-Expose-Headers": "mcp-session-id",
};

const uploadSchema = z.object({
  filename: z.string().min(1),
  content_base64: z
    .string()
    .transform((value) => value.replace(/\s+/g, ""))
    .refine((value) => /^[A-Za-z0-9+/]*={0,2}$/.test(value) && value.length % 4 === 0, {
      message: "content_base64 must be valid base64",
    }),
});

const querySchema = z.object({
  question: z.string(),
  k: z.number().optional(),
});

/** Handles `/mcp` requests; `body` is the parsed JSON for POST, undefined otherwise. */
export type McpRequestHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
) => Promise<void>;

export interface HttpHandlerOptions {
  mcp?: McpRequestHandler;
}

export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createHttpHandler(
  service: DocumentQaService,
  options: HttpHandlerOptions = {},
): HttpHandler {
  return async (req, res) => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      const method = req.method ?? "GET";

      if (method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (url.pathname === MCP_PATH && options.mcp) {
        const body = method === "POST" ? await readJsonBody(req) : undefined;
        await options.mcp(req, res, body);
        return;
      }

      await route(service, method, url.pathname, req, res);
    } catch (error) {
      writeError(res, error);
    }
  };
}

async function route(
  service: DocumentQaService,
  method: string,
  pathname: string,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  if (pathname === "/healthz" && method === "GET") {
    writeJson(res, 200, { ok: true });
    return;
  }

  if (pathname === "/documents" && method === "GET") {
    const documents = await service.listDocuments();
    writeJson(res, 200, { documents });
    return;
  }

  if (pathname.startsWith("/documents/")) {
    const filename = decodePathSegment(pathname.slice("/documents/".length));
    if (method === "GET") {
      await sendDocument(service, filename, res);
      return;
    }
    if (method === "DELETE") {
      const removed = await service.remove(filename);
      writeJson(res, 200, {
        message: `Deleted ${removed.filename}`,
        filename: removed.filename,
        entries_removed: removed.entriesRemoved,
      });
      return;
    }
    writeMethodNotAllowed(res);
    return;
  }

  if (pathname === "/upload" && method === "POST") {
    const upload = await readUpload(req);
    const result = await service.upload(upload.filename, upload.content);
    writeJson(res, 200, {
      filename: result.filename,
      chunks_indexed: result.chunksIndexed,
      status: result.status,
      ...(result.warning ? { warning: result.warning } : {}),
    });
    return;
  }

  if (pathname === "/query" && method === "POST") {
    const input = parseBody(querySchema, await readJsonBody(req));
    const result = await service.ask(input);
    writeJson(res, 200, {
      answer: result.answer,
      references: result.references,
      context_used: result.contextUsed,
    });
    return;
  }

  if (pathname === "/index/status" && method === "GET") {
    const status = await service.getIndexStatus();
    writeJson(res, 200, {
      collection: status.collection
        ? {
            name: status.collection.name,
            embedding_model: status.collection.embeddingModel,
            dimension: status.collection.dimension,
            entry_count: status.collection.entryCount,
          }
        : null,
      pending: status.pending,
    });
    return;
  }

  if (pathname === "/index/rebuild" && method === "POST") {
    const result = await service.rebuildIndex();
    writeJson(res, 200, {
      indexed: result.indexed.map((item) => ({
        filename: item.filename,
        chunk_count: item.chunkCount,
      })),
      failed: result.failed,
      chunk_count: result.chunkCount,
    });
    return;
  }

  writeJson(res, 404, { error: "Not found" });
}

async function sendDocument(
  service: DocumentQaService,
  rawFilename: string,
  res: ServerResponse,
): Promise<void> {
  const filename = sanitizeFilename(rawFilename);
  const kind = resolveDocumentKind(filename);
  const content = await service.readDocument(filename);

  if (kind === "pdf") {
    res.writeHead(200, {
      "Content-Type": "application/pdf",
      "Content-Length": content.length,
    });
    res.end(content);
    return;
  }

  writeJson(res, 200, { filename, content: content.toString("utf-8") });
}

/** Accepts a multipart file upload or JSON `{ filename, content_base64 }`. */
async function readUpload(req: IncomingMessage): Promise<UploadedFile> {
  if (isMultipartRequest(req)) {
    return readMultipartFile(req, MAX_BODY_BYTES);
  }
  const input = parseBody(uploadSchema, await readJsonBody(req));
  return { filename: input.filename, content: Buffer.from(input.content_base64, "base64") };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidRequestError(`Invalid request body. ${where}${issue?.message ?? ""}`.trim());
  }
  return parsed.data;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidRequestError("Malformed document path.");
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new InvalidRequestError("Request body is too large.");
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("Invalid JSON body");
  }
}

function writeError(res: ServerResponse, error: unknown): void {
  const status = toHttpStatus(error);
  let message: string;
  if (error instanceof AppError && error.clientFacing) {
    message = error.message;
  } else if (status === 503) {
    console.error(`Upstream service failure: ${describeError(error)}`);
    message = "A dependent service is unavailable. Please try again later.";
  } else {
    console.error("Unhandled request error:", error);
    message = "Internal server error";
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  const code = error instanceof AppError ? error.code : "INTERNAL";
  writeJson(res, status, { error: message, code });
}

function writeMethodNotAllowed(res: ServerResponse): void {
  writeJson(res, 405, { error: "Method not allowed" });
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
