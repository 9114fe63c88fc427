import type { AppConfig } from "./config/env.js";
import type { KnowledgeBase } from "./domain/knowledgeBase.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import type { AiClient } from "./infra/ai/types.js";
import { DocumentLoader, type PdfPageExtractor } from "./infra/parsers/documentLoader.js";
import { DocumentStorage } from "./infra/storage/documentStorage.js";
import { createKnowledgeBase } from "./infra/store/createKnowledgeBase.js";
import { AnswerSynthesizer } from "./pipelines/answering.js";
import { Indexer } from "./pipelines/indexing.js";
import { Retriever } from "./pipelines/retrieval.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { DocumentSetManager } from "./services/documentSetManager.js";

/** Replacements for the outbound collaborators, used by tests. */
export interface BootstrapOverrides {
  aiClient?: AiClient;
  knowledgeBase?: KnowledgeBase;
  extractPdfPages?: PdfPageExtractor;
}

export interface AppContext {
  config: AppConfig;
  service: DocumentQaService;
  manager: DocumentSetManager;
  knowledgeBase: KnowledgeBase;
  close: () => Promise<void>;
}

export async function bootstrap(
  config: AppConfig,
  overrides: BootstrapOverrides = {},
): Promise<AppContext> {
  const storage = new DocumentStorage(config.documentsDir);
  await storage.initialize();

  const aiClient = overrides.aiClient ?? new DefaultAiClient(config);
  const { knowledgeBase, close } = overrides.knowledgeBase
    ? wrapKnowledgeBase(overrides.knowledgeBase)
    : await createKnowledgeBase(config);

  const loader = new DocumentLoader({
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    extractPdfPages: overrides.extractPdfPages,
  });
  const indexer = new Indexer(knowledgeBase, aiClient, loader, storage, {
    embeddingBatchSize: config.embeddingBatchSize,
    vectorDimension: config.vectorDimension,
    retry: config.retry,
  });
  const manager = new DocumentSetManager(storage, indexer, knowledgeBase, aiClient, {
    maxDocuments: config.maxDocuments,
  });
  const retriever = new Retriever(knowledgeBase, aiClient, {
    defaultTopK: config.defaultTopK,
    minSimilarity: config.minSimilarity,
    retry: config.retry,
  });
  const synthesizer = new AnswerSynthesizer(aiClient, { retry: config.generationRetry });

  return {
    config,
    service: new DocumentQaService(manager, retriever, synthesizer),
    manager,
    knowledgeBase,
    close,
  };
}

function wrapKnowledgeBase(knowledgeBase: KnowledgeBase) {
  return { knowledgeBase, close: () => knowledgeBase.close() };
}
