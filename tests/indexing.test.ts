import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EmbeddingServiceError, VectorStoreError } from "../src/domain/errors.js";
import type { StoredDocument } from "../src/domain/types.js";
import { DocumentLoader } from "../src/infra/parsers/documentLoader.js";
import { DocumentStorage } from "../src/infra/storage/documentStorage.js";
import { InMemoryKnowledgeBase } from "../src/infra/store/inMemoryKnowledgeBase.js";
import { Indexer, createEntryId } from "../src/pipelines/indexing.js";
import {
  FAST_RETRY,
  FakeAiClient,
  VOCABULARY,
  createTempDir,
  fakePdf,
  fakePdfExtractor,
} from "./helpers/fakes.js";

const LONG_TEXT = "Refund policy details apply here. ".repeat(20);

function textDocument(filename: string, text: string): StoredDocument {
  return { filename, kind: "text", content: Buffer.from(text, "utf-8") };
}

describe("Indexer", () => {
  let dir: string;
  let storage: DocumentStorage;
  let kb: InMemoryKnowledgeBase;
  let ai: FakeAiClient;
  let loader: DocumentLoader;
  let indexer: Indexer;

  beforeEach(async () => {
    dir = await createTempDir();
    storage = new DocumentStorage(dir);
    kb = new InMemoryKnowledgeBase();
    ai = new FakeAiClient();
    loader = new DocumentLoader({ chunkSize: 100, chunkOverlap: 10, extractPdfPages: fakePdfExtractor });
    indexer = new Indexer(kb, ai, loader, storage, {
      embeddingBatchSize: 2,
      vectorDimension: VOCABULARY.length,
      retry: FAST_RETRY,
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("derives stable entry ids from filename and position", () => {
    expect(createEntryId("a.txt", 3)).toBe(createEntryId("a.txt", 3));
    expect(createEntryId("a.txt", 3)).toMatch(/^[0-9a-f]{16}:3$/);
    expect(createEntryId("a.txt", 3)).not.toBe(createEntryId("b.txt", 3));
  });

  it("reports a missing collection without touching it", async () => {
    await expect(indexer.index(textDocument("a.txt", "Refund"))).rejects.toMatchObject({
      kind: "missing_collection",
    });
  });

  describe("with a collection", () => {
    beforeEach(async () => {
      await indexer.rebuildAll();
    });

    it("is idempotent for unchanged content", async () => {
      const doc = textDocument("a.txt", LONG_TEXT);
      const expected = [...(await loader.load(doc))].length;

      expect(await indexer.index(doc)).toBe(expected);
      expect(await indexer.index(doc)).toBe(expected);
      expect(await kb.countByFilename("a.txt")).toBe(expected);
      expect(expected).toBeGreaterThan(2);
    });

    it("embeds in batches", async () => {
      const doc = textDocument("a.txt", LONG_TEXT);
      const count = await indexer.index(doc);
      expect(ai.embedCalls).toBe(Math.ceil(count / 2));
    });

    it("drops entries left over from a longer previous version", async () => {
      await indexer.index(textDocument("a.txt", LONG_TEXT));
      expect(await indexer.index(textDocument("a.txt", "Short refund note."))).toBe(1);

      const hits = await kb.search({ vector: [1, 0, 0, 0, 0, 0, 0, 0], topK: 50 });
      expect(hits.map((hit) => hit.chunk.text)).toEqual(["Short refund note."]);
    });

    it("removes the document's entries when indexing fails", async () => {
      await indexer.index(textDocument("a.txt", LONG_TEXT));
      ai.embedFailures = 3;

      await expect(indexer.index(textDocument("a.txt", "New refund text."))).rejects.toThrow(
        EmbeddingServiceError,
      );
      expect(await kb.countByFilename("a.txt")).toBe(0);
    });

    it("recovers from transient embedding failures", async () => {
      ai.embedFailures = 2;
      expect(await indexer.index(textDocument("a.txt", "Refund."))).toBe(1);
    });

    it("removes all entries of a file", async () => {
      await indexer.index(textDocument("a.txt", LONG_TEXT));
      await indexer.index(textDocument("b.txt", "Shipping."));

      expect(await indexer.remove("a.txt")).toBeGreaterThan(2);
      expect(await kb.listFilenames()).toEqual(["b.txt"]);
      expect(await indexer.remove("a.txt")).toBe(0);
    });
  });

  it("rebuilds from storage and reports documents it cannot index", async () => {
    await storage.write("a.txt", Buffer.from("Refund window is 30 days.", "utf-8"));
    await storage.write("policy.pdf", fakePdf("Refund policy.", "Shipping policy."));
    await storage.write("broken.pdf", Buffer.from("BROKEN", "utf-8"));
    await fs.writeFile(path.join(dir, "data.csv"), "a,b");

    const result = await indexer.rebuildAll();

    expect(result.indexed).toEqual([
      { filename: "a.txt", chunkCount: 1 },
      { filename: "policy.pdf", chunkCount: 2 },
    ]);
    expect(result.failed).toEqual([
      {
        filename: "broken.pdf",
        reason: "Could not read broken.pdf: PDF text extraction failed (bad xref table)",
      },
      { filename: "data.csv", reason: "unsupported file type" },
    ]);
    expect(result.chunkCount).toBe(3);
    expect(await kb.describeCollection()).toEqual({
      name: "knowledge_base",
      embeddingModel: "fake:keywords",
      dimension: VOCABULARY.length,
      entryCount: 3,
    });
  });

  it("keeps the previous collection when a rebuild fails in the vector store", async () => {
    await storage.write("a.txt", Buffer.from("Refund.", "utf-8"));
    await indexer.rebuildAll();

    const mismatched = new Indexer(kb, ai, loader, storage, {
      embeddingBatchSize: 2,
      vectorDimension: 3,
      retry: FAST_RETRY,
    });
    await expect(mismatched.rebuildAll()).rejects.toThrow(VectorStoreError);

    expect(await kb.describeCollection()).toMatchObject({
      dimension: VOCABULARY.length,
      entryCount: 1,
    });
  });
});
