import { isMissingCollection } from "../domain/errors.js";
import type { DocumentListing, Reference, ScoredChunk } from "../domain/types.js";
import type { AnswerSynthesizer } from "../pipelines/answering.js";
import type { RebuildResult } from "../pipelines/indexing.js";
import type { Retriever } from "../pipelines/retrieval.js";
import type {
  AddResult,
  DocumentSetManager,
  IndexStatus,
  RemoveResult,
} from "./documentSetManager.js";

export interface AskInput {
  question: string;
  k?: number;
}

export interface AskResult {
  answer: string;
  references: Reference[];
  /** Number of retrieved chunks handed to the model. */
  contextUsed: number;
}

/**
 * Single entry point for the HTTP API and the MCP tools. Queries go through
 * the retriever and synthesizer; document changes go through the manager.
 */
export class DocumentQaService {
  constructor(
    private readonly manager: DocumentSetManager,
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
  ) {}

  async ask({ question, k }: AskInput): Promise<AskResult> {
    const hits = await this.search(question, k);
    const chunks = hits.map((hit) => hit.chunk);
    const result = await this.synthesizer.answer(question.trim(), chunks);
    return {
      answer: result.answer,
      references: result.references,
      contextUsed: chunks.length,
    };
  }

  /** Retrieves scored chunks, rebuilding once if the collection has gone missing. */
  async search(question: string, k?: number): Promise<ScoredChunk[]> {
    try {
      return await this.retriever.retrieve(question, k);
    } catch (error) {
      if (!isMissingCollection(error)) {
        throw error;
      }
      console.error("Vector collection missing during query; rebuilding before retry.");
      await this.manager.ensureIndexReady();
      return this.retriever.retrieve(question, k);
    }
  }

  upload(filename: string, content: Buffer): Promise<AddResult> {
    return this.manager.add(filename, content);
  }

  remove(filename: string): Promise<RemoveResult> {
    return this.manager.remove(filename);
  }

  listDocuments(): Promise<DocumentListing[]> {
    return this.manager.list();
  }

  readDocument(filename: string): Promise<Buffer> {
    return this.manager.read(filename);
  }

  rebuildIndex(): Promise<RebuildResult> {
    return this.manager.rebuildAll();
  }

  getIndexStatus(): Promise<IndexStatus> {
    return this.manager.getStatus();
  }

  ensureIndexReady(): Promise<RebuildResult | null> {
    return this.manager.ensureIndexReady();
  }
}
