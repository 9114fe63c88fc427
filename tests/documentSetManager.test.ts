import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AppContext, bootstrap } from "../src/bootstrap.js";
import {
  CorruptDocumentError,
  DocumentLimitError,
  InvalidFilenameError,
  NotFoundError,
  UnsupportedFormatError,
  VectorStoreError,
} from "../src/domain/errors.js";
import { InMemoryKnowledgeBase } from "../src/infra/store/inMemoryKnowledgeBase.js";
import { sanitizeFilename } from "../src/services/documentSetManager.js";
import {
  FakeAiClient,
  createTempDir,
  fakePdfExtractor,
  keywordVector,
  testConfig,
} from "./helpers/fakes.js";

const text = (value: string) => Buffer.from(value, "utf-8");

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("sanitizeFilename", () => {
  it("keeps the base name and replaces reserved characters", () => {
    expect(sanitizeFilename("notes.txt")).toBe("notes.txt");
    expect(sanitizeFilename("dir/sub/notes.txt")).toBe("notes.txt");
    expect(sanitizeFilename("C:\\docs\\report.md")).toBe("report.md");
    expect(sanitizeFilename("a:b?.md")).toBe("a_b_.md");
  });

  it("rejects unsafe names", () => {
    for (const raw of ["", "   ", "../etc/passwd", "docs/../../x.txt", ".env", "a\u0000.txt"]) {
      expect(() => sanitizeFilename(raw)).toThrow(InvalidFilenameError);
    }
    expect(() => sanitizeFilename(`${"x".repeat(201)}.txt`)).toThrow(InvalidFilenameError);
  });
});

describe("DocumentSetManager", () => {
  let dir: string;
  let ai: FakeAiClient;
  let kb: InMemoryKnowledgeBase;
  let app: AppContext;

  const setup = async (maxDocuments = 20) => {
    app = await bootstrap(testConfig(dir, { maxDocuments }), {
      aiClient: ai,
      knowledgeBase: kb,
      extractPdfPages: fakePdfExtractor,
    });
    return app.manager;
  };

  beforeEach(async () => {
    dir = await createTempDir();
    ai = new FakeAiClient();
    kb = new InMemoryKnowledgeBase();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates the collection on the first upload", async () => {
    const manager = await setup();

    const result = await manager.add("refunds.txt", text("Refund window is 30 days."));

    expect(result).toEqual({ filename: "refunds.txt", chunksIndexed: 1, status: "indexed" });
    expect(await kb.describeCollection()).toMatchObject({ entryCount: 1 });
  });

  it("indexes uploads into an existing collection", async () => {
    const manager = await setup();
    await manager.rebuildAll();

    const result = await manager.add("dir/notes.md", text("Shipping takes a week."));

    expect(result).toEqual({ filename: "notes.md", chunksIndexed: 1, status: "indexed" });
    expect(await manager.list()).toEqual([{ filename: "notes.md", size: 22 }]);
    expect((await manager.read("notes.md")).toString("utf-8")).toBe("Shipping takes a week.");
  });

  it("keeps the upload and flags it pending when embedding keeps timing out", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    ai.embedFailures = 3;

    const result = await manager.add("notes.txt", text("Refund notes."));

    expect(result).toEqual({
      filename: "notes.txt",
      chunksIndexed: 0,
      status: "pending",
      warning: "Stored, but indexing failed and will be retried: Embedding request timed out",
    });
    expect((await manager.list()).map((doc) => doc.filename)).toEqual(["notes.txt"]);
    expect((await manager.getStatus()).pending).toEqual(["notes.txt"]);
    expect(await kb.countByFilename("notes.txt")).toBe(0);

    expect(await manager.retryPending()).toEqual([
      { filename: "notes.txt", chunksIndexed: 1, status: "indexed" },
    ]);
    expect((await manager.getStatus()).pending).toEqual([]);
  });

  it("clears pending flags on a full rebuild", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    ai.embedFailures = 3;
    await manager.add("notes.txt", text("Refund notes."));

    const rebuilt = await manager.rebuildAll();

    expect(rebuilt.indexed).toEqual([{ filename: "notes.txt", chunkCount: 1 }]);
    expect((await manager.getStatus()).pending).toEqual([]);
  });

  it("rejects unsupported types without storing them", async () => {
    const manager = await setup();

    await expect(manager.add("sheet.xlsx", text("a,b"))).rejects.toThrow(UnsupportedFormatError);
    expect(await manager.list()).toEqual([]);
  });

  it("rejects corrupt documents and does not keep them", async () => {
    const manager = await setup();
    await manager.rebuildAll();

    await expect(manager.add("scan.pdf", text("BROKEN"))).rejects.toThrow(CorruptDocumentError);
    expect(await manager.list()).toEqual([]);
    expect((await manager.getStatus()).pending).toEqual([]);
  });

  it("enforces the document limit for new names only", async () => {
    const manager = await setup(2);
    await manager.rebuildAll();
    await manager.add("a.txt", text("Refund."));
    await manager.add("b.txt", text("Shipping."));

    await expect(manager.add("c.txt", text("Warranty."))).rejects.toThrow(DocumentLimitError);
    await expect(manager.add("a.txt", text("Refund again."))).resolves.toMatchObject({
      status: "indexed",
    });
  });

  it("removes the file and its entries", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    await manager.add("a.txt", text("Refund."));
    await manager.add("b.txt", text("Shipping."));

    expect(await manager.remove("a.txt")).toEqual({ filename: "a.txt", entriesRemoved: 1 });
    expect(await kb.listFilenames()).toEqual(["b.txt"]);
    expect((await manager.list()).map((doc) => doc.filename)).toEqual(["b.txt"]);
    await expect(manager.remove("a.txt")).rejects.toThrow(NotFoundError);
  });

  it("keeps the file when deleting its entries fails, so the delete can be repeated", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    await manager.add("policy.txt", text("Refund window is 30 days."));
    const outage = new VectorStoreError("connection reset", "transient");
    vi.spyOn(kb, "deleteByFilename")
      .mockRejectedValueOnce(outage)
      .mockRejectedValueOnce(outage)
      .mockRejectedValueOnce(outage);

    await expect(manager.remove("policy.txt")).rejects.toThrow(VectorStoreError);
    expect((await manager.list()).map((doc) => doc.filename)).toEqual(["policy.txt"]);

    expect(await manager.remove("policy.txt")).toEqual({
      filename: "policy.txt",
      entriesRemoved: 1,
    });
    expect(await manager.list()).toEqual([]);
    expect(await kb.listFilenames()).toEqual([]);
  });

  it("finishes an in-flight upload before a delete of the same name", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    const embedding = deferred();
    const release = deferred();
    vi.spyOn(ai, "embedTexts").mockImplementationOnce(async (texts) => {
      embedding.resolve();
      await release.promise;
      return texts.map(keywordVector);
    });

    const adding = manager.add("race.txt", text("Refund window is 30 days."));
    await embedding.promise;
    const removing = manager.remove("race.txt");
    release.resolve();

    await expect(adding).resolves.toMatchObject({ status: "indexed", chunksIndexed: 1 });
    await expect(removing).resolves.toEqual({ filename: "race.txt", entriesRemoved: 1 });
    expect(await kb.countByFilename("race.txt")).toBe(0);
    expect(await manager.list()).toEqual([]);
  });

  it("reconciles the collection with storage when it is reused", async () => {
    const manager = await setup();
    await manager.rebuildAll();
    await manager.add("gone.txt", text("Refund window is 30 days."));
    await fs.rm(path.join(dir, "gone.txt"));
    await fs.writeFile(path.join(dir, "copied.md"), "Holiday schedule.");

    expect(await manager.ensureIndexReady()).toBeNull();

    expect(await kb.listFilenames()).toEqual(["copied.md"]);
    expect((await manager.getStatus()).pending).toEqual([]);
  });

  it("serialises concurrent uploads of the same name, last writer wins", async () => {
    const manager = await setup();
    await manager.rebuildAll();

    await Promise.all([
      manager.add("same.txt", text("Refund. ".repeat(60))),
      manager.add("same.txt", text("Shipping only.")),
    ]);

    expect((await manager.read("same.txt")).toString("utf-8")).toBe("Shipping only.");
    expect(await kb.countByFilename("same.txt")).toBe(1);
  });

  it("rebuilds when the embedding model changes", async () => {
    const manager = await setup();
    await manager.add("a.txt", text("Refund."));
    expect(await manager.ensureIndexReady()).toBeNull();

    ai.embeddingModelId = "fake:v2";
    const result = await manager.ensureIndexReady();

    expect(result?.indexed).toEqual([{ filename: "a.txt", chunkCount: 1 }]);
    expect((await kb.describeCollection())?.embeddingModel).toBe("fake:v2");
  });

  it("indexes files already on disk at cold start", async () => {
    await fs.writeFile(path.join(dir, "existing.md"), "Holiday schedule.");
    const manager = await setup();

    const result = await manager.ensureIndexReady();

    expect(result?.indexed).toEqual([{ filename: "existing.md", chunkCount: 1 }]);
  });
});
