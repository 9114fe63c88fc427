import type { AppConfig } from "../../config/env.js";
import type { KnowledgeBase } from "../../domain/knowledgeBase.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryKnowledgeBase } from "./inMemoryKnowledgeBase.js";
import { PgVectorKnowledgeBase } from "./pgVectorKnowledgeBase.js";

export interface KnowledgeBaseBootstrapResult {
  knowledgeBase: KnowledgeBase;
  close: () => Promise<void>;
}

export async function createKnowledgeBase(
  config: AppConfig,
): Promise<KnowledgeBaseBootstrapResult> {
  if (!config.enablePgvector) {
    const knowledgeBase = new InMemoryKnowledgeBase(config.collectionName);
    return {
      knowledgeBase,
      close: () => knowledgeBase.close(),
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const knowledgeBase = new PgVectorKnowledgeBase(pool, config.collectionName);
  try {
    await knowledgeBase.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    knowledgeBase,
    close: () => knowledgeBase.close(),
  };
}
