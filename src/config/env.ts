import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  DOCUMENTS_DIR: z.string().default("documents"),
  MAX_DOCUMENTS: z.coerce.number().int().positive().default(20),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  ENABLE_PGVECTOR: booleanFlag,
  DATABASE_URL: z.string().optional(),
  COLLECTION_NAME: z
    .string()
    .regex(/^[a-z_][a-z0-9_]{0,47}$/, "COLLECTION_NAME must be a lowercase SQL identifier")
    .default("knowledge_base"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  CHUNK_SIZE: z.coerce.number().int().min(100).default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  DEFAULT_TOP_K: z.coerce.number().int().positive().default(4),
  MIN_SIMILARITY: z.coerce.number().min(-1).max(1).optional(),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8_000),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(2),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("http"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
});

export type ModelProvider = "openai" | "ollama";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  documentsDir: string;
  maxDocuments: number;
  embeddingProvider: ModelProvider;
  generationProvider: ModelProvider;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  enablePgvector: boolean;
  databaseUrl: string | null;
  collectionName: string;
  vectorDimension: number;
  chunkSize: number;
  chunkOverlap: number;
  defaultTopK: number;
  minSimilarity: number | null;
  embeddingBatchSize: number;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
  retry: RetryPolicy;
  generationRetry: RetryPolicy;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";
  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const usesOpenAi =
    parsed.EMBEDDING_PROVIDER === "openai" || parsed.GENERATION_PROVIDER === "openai";
  if (usesOpenAi && !openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required when an OpenAI provider is selected.");
  }

  const retry: RetryPolicy = {
    maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
    baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
  };

  return {
    documentsDir: parsed.DOCUMENTS_DIR,
    maxDocuments: parsed.MAX_DOCUMENTS,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider: parsed.GENERATION_PROVIDER,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    collectionName: parsed.COLLECTION_NAME,
    vectorDimension: parsed.VECTOR_DIMENSION,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    defaultTopK: parsed.DEFAULT_TOP_K,
    minSimilarity: parsed.MIN_SIMILARITY ?? null,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    retry,
    generationRetry: { ...retry, maxAttempts: parsed.GENERATION_MAX_ATTEMPTS },
    transport: parsed.MCP_TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
  };
}

export function resolveEmbeddingModelId(config: AppConfig): string {
  return config.embeddingProvider === "openai"
    ? `openai:${config.openaiEmbeddingModel}`
    : `ollama:${config.ollamaEmbeddingModel}`;
}
