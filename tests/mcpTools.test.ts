import { promises as fs } from "node:fs";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AppContext, bootstrap } from "../src/bootstrap.js";
import { InMemoryKnowledgeBase } from "../src/infra/store/inMemoryKnowledgeBase.js";
import { createMcpServer } from "../src/tools/index.js";
import { FakeAiClient, createTempDir, fakePdfExtractor, testConfig } from "./helpers/fakes.js";

function readToolText(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (!first || first.type !== "text") {
    throw new Error("Expected a text result");
  }
  return { text: first.text, isError: parsed.isError === true };
}

describe("MCP tools", () => {
  let dir: string;
  let app: AppContext;
  let client: Client;

  const call = async (name: string, args: Record<string, unknown> = {}) =>
    readToolText(await client.callTool({ name, arguments: args }));

  beforeEach(async () => {
    dir = await createTempDir();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    app = await bootstrap(testConfig(dir), {
      aiClient: new FakeAiClient(async () => "Thirty days [1]."),
      knowledgeBase: new InMemoryKnowledgeBase(),
      extractPdfPages: fakePdfExtractor,
    });
    await app.service.ensureIndexReady();

    const server = createMcpServer(app.service);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    vi.restoreAllMocks();
    await app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("registers the document tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_with_citations",
      "delete_document",
      "list_documents",
      "rebuild_index",
      "search_chunks",
      "upload_document",
    ]);
  });

  it("uploads, searches, answers and deletes", async () => {
    const uploaded = await call("upload_document", {
      filename: "refunds.md",
      text: "Refund window is 30 days.",
    });
    expect(JSON.parse(uploaded.text)).toEqual({
      filename: "refunds.md",
      chunks_indexed: 1,
      status: "indexed",
    });

    const listed = await call("list_documents");
    expect(JSON.parse(listed.text)).toEqual({
      documents: [{ filename: "refunds.md", size: 25 }],
    });

    const search = JSON.parse((await call("search_chunks", { query: "refund", top_k: 1 })).text);
    expect(search.hits).toHaveLength(1);
    expect(search.hits[0]).toMatchObject({
      filename: "refunds.md",
      page: null,
      sequence_index: 0,
      snippet: "Refund window is 30 days.",
    });

    const answer = JSON.parse((await call("ask_with_citations", { question: "refund window?" })).text);
    expect(answer.answer).toBe("Thirty days [1].");
    expect(answer.references).toEqual([
      {
        filename: "refunds.md",
        source: "/documents/refunds.md",
        preview: "Refund window is 30 days.",
      },
    ]);
    expect(answer.context_used).toBe(1);

    const deleted = await call("delete_document", { filename: "refunds.md" });
    expect(JSON.parse(deleted.text)).toEqual({ filename: "refunds.md", entries_removed: 1 });
  });

  it("reports service errors as tool errors", async () => {
    const result = await call("delete_document", { filename: "missing.txt" });
    expect(result).toEqual({ text: "Document not found: missing.txt", isError: true });
  });

  it("rebuilds the index", async () => {
    await call("upload_document", {
      filename: "policy.pdf",
      content_base64: Buffer.from("Refund page.\fShipping page.").toString("base64"),
    });

    const rebuilt = await call("rebuild_index");
    expect(JSON.parse(rebuilt.text)).toEqual({ indexed_count: 1, chunk_count: 2, failed: [] });
  });
});
