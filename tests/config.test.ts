import { describe, expect, it } from "vitest";
import { loadConfig, resolveEmbeddingModelId } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config).toMatchObject({
      documentsDir: "documents",
      maxDocuments: 20,
      enablePgvector: false,
      databaseUrl: null,
      collectionName: "knowledge_base",
      chunkSize: 1000,
      chunkOverlap: 200,
      defaultTopK: 4,
      minSimilarity: null,
      transport: "http",
      port: 8000,
      retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 },
      generationRetry: { maxAttempts: 2, baseDelayMs: 500, maxDelayMs: 8000 },
    });
    expect(resolveEmbeddingModelId(config)).toBe("openai:text-embedding-3-small");
  });

  it("parses numeric and provider settings", () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: "ollama",
      GENERATION_PROVIDER: "ollama",
      OLLAMA_BASE_URL: "http://ollama:11434/",
      CHUNK_SIZE: "500",
      CHUNK_OVERLAP: "50",
      MIN_SIMILARITY: "0.3",
    });

    expect(config.openaiApiKey).toBeNull();
    expect(config.ollamaBaseUrl).toBe("http://ollama:11434");
    expect(config.chunkSize).toBe(500);
    expect(config.minSimilarity).toBe(0.3);
    expect(resolveEmbeddingModelId(config)).toBe("ollama:nomic-embed-text");
  });

  it("rejects inconsistent settings", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", ENABLE_PGVECTOR: "true" })).toThrow(
      "ENABLE_PGVECTOR=true requires DATABASE_URL.",
    );
    expect(() =>
      loadConfig({ OPENAI_API_KEY: "test-secret", CHUNK_SIZE: "200", CHUNK_OVERLAP: "200" }),
    ).toThrow("CHUNK_OVERLAP (200) must be smaller than CHUNK_SIZE (200).");
    expect(() => loadConfig({})).toThrow("OPENAI_API_KEY is required");
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", COLLECTION_NAME: "Bad-Name" })).toThrow();
  });
});
