import { createHash } from "node:crypto";
import type { RetryPolicy } from "../config/env.js";
import {
  VectorStoreError,
  describeError,
  isMissingCollection,
} from "../domain/errors.js";
import type { KnowledgeBase, KnowledgeBaseStaging } from "../domain/knowledgeBase.js";
import type { Chunk, StoredDocument, VectorEntry } from "../domain/types.js";
import type { AiClient } from "../infra/ai/types.js";
import {
  DocumentLoader,
  isSupportedDocumentExtension,
} from "../infra/parsers/documentLoader.js";
import type { DocumentStorage } from "../infra/storage/documentStorage.js";
import { withRetry } from "../utils/retry.js";

export interface IndexerOptions {
  embeddingBatchSize: number;
  vectorDimension: number;
  retry: RetryPolicy;
}

export interface FailedIndexing {
  filename: string;
  reason: string;
}

export interface RebuildResult {
  indexed: Array<{ filename: string; chunkCount: number }>;
  failed: FailedIndexing[];
  chunkCount: number;
}

export class Indexer {
  constructor(
    private readonly knowledgeBase: KnowledgeBase,
    private readonly aiClient: AiClient,
    private readonly loader: DocumentLoader,
    private readonly storage: DocumentStorage,
    private readonly options: IndexerOptions,
  ) {}

  /**
   * Writes every chunk of `document` into the live collection and drops
   * entries left over from a longer previous version. If anything fails, the
   * document's entries are removed before the error is rethrown.
   */
  async index(document: StoredDocument): Promise<number> {
    try {
      const entries = await this.buildEntries(document);
      await this.retry(() => this.knowledgeBase.upsertEntries(entries));
      await this.retry(() =>
        this.knowledgeBase.deleteByFilename(document.filename, {
          fromSequenceIndex: entries.length,
        }),
      );
      return entries.length;
    } catch (error) {
      if (!isMissingCollection(error)) {
        await this.rollback(document.filename);
      }
      throw error;
    }
  }

  async remove(filename: string): Promise<number> {
    return this.retry(() => this.knowledgeBase.deleteByFilename(filename));
  }

  /**
   * Re-derives the whole collection from storage into a staging collection
   * and swaps it in once complete. Documents that cannot be loaded or
   * embedded are reported and left out; a vector-store failure aborts the
   * rebuild and leaves the previous collection as it was.
   */
  async rebuildAll(): Promise<RebuildResult> {
    const staging = await this.retry(() =>
      this.knowledgeBase.createStaging({
        embeddingModel: this.aiClient.getEmbeddingModelId(),
        dimension: this.options.vectorDimension,
      }),
    );

    const result: RebuildResult = { indexed: [], failed: [], chunkCount: 0 };
    try {
      const listings = await this.storage.list();
      for (const { filename } of listings) {
        const entries = await this.buildEntriesForRebuild(filename, result.failed);
        if (!entries) {
          continue;
        }
        await this.writeToStaging(staging, entries);
        result.indexed.push({ filename, chunkCount: entries.length });
        result.chunkCount += entries.length;
      }
      await staging.commit();
    } catch (error) {
      await discardStaging(staging);
      throw error;
    }

    return result;
  }

  private async buildEntriesForRebuild(
    filename: string,
    failed: FailedIndexing[],
  ): Promise<VectorEntry[] | null> {
    if (!isSupportedDocumentExtension(filename)) {
      failed.push({ filename, reason: "unsupported file type" });
      return null;
    }
    try {
      const document = await this.storage.load(filename);
      return await this.buildEntries(document);
    } catch (error) {
      if (error instanceof VectorStoreError) {
        throw error;
      }
      console.error(`Rebuild skipped ${filename}: ${describeError(error)}`);
      failed.push({ filename, reason: describeError(error) });
      return null;
    }
  }

  private async writeToStaging(staging: KnowledgeBaseStaging, entries: VectorEntry[]) {
    await this.retry(() => staging.upsertEntries(entries));
  }

  private async buildEntries(document: StoredDocument): Promise<VectorEntry[]> {
    const chunks = [...(await this.loader.load(document))];
    const vectors = await this.embedInBatches(chunks);
    return chunks.map((chunk, index) => toVectorEntry(chunk, vectors[index]));
  }

  private async embedInBatches(chunks: Chunk[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const batchSize = Math.max(1, this.options.embeddingBatchSize);

    for (let start = 0; start < chunks.length; start += batchSize) {
      const texts = chunks.slice(start, start + batchSize).map((chunk) => chunk.text);
      const batch = await this.retry(() => this.aiClient.embedTexts(texts));
      if (batch.length !== texts.length) {
        throw new Error(`Embedding count mismatch (${batch.length} != ${texts.length}).`);
      }
      vectors.push(...batch);
    }

    return vectors;
  }

  private async rollback(filename: string): Promise<void> {
    try {
      await this.knowledgeBase.deleteByFilename(filename);
    } catch (error) {
      console.error(`Rollback of ${filename} failed: ${describeError(error)}`);
    }
  }

  private retry<T>(task: () => Promise<T>): Promise<T> {
    return withRetry(task, this.options.retry, {
      onRetry: ({ attempt, delayMs, error }) => {
        console.warn(
          `Retrying after attempt ${attempt} in ${delayMs}ms: ${describeError(error)}`,
        );
      },
    });
  }
}

export function createEntryId(filename: string, sequenceIndex: number): string {
  const digest = createHash("sha1").update(filename).digest("hex").slice(0, 16);
  return `${digest}:${sequenceIndex}`;
}

function toVectorEntry(chunk: Chunk, vector: number[]): VectorEntry {
  return {
    id: createEntryId(chunk.filename, chunk.sequenceIndex),
    vector,
    filename: chunk.filename,
    page: chunk.page,
    sequenceIndex: chunk.sequenceIndex,
    chunkText: chunk.text,
  };
}

async function discardStaging(staging: KnowledgeBaseStaging): Promise<void> {
  try {
    await staging.discard();
  } catch (error) {
    console.error(`Discarding staging collection failed: ${describeError(error)}`);
  }
}
