import path from "node:path";
import {
  CorruptDocumentError,
  DocumentLimitError,
  InvalidFilenameError,
  NotFoundError,
  describeError,
  isMissingCollection,
} from "../domain/errors.js";
import type { KnowledgeBase } from "../domain/knowledgeBase.js";
import type { CollectionInfo, DocumentListing } from "../domain/types.js";
import type { AiClient } from "../infra/ai/types.js";
import { resolveDocumentKind } from "../infra/parsers/documentLoader.js";
import type { DocumentStorage } from "../infra/storage/documentStorage.js";
import type { Indexer, RebuildResult } from "../pipelines/indexing.js";
import { KeyedLock } from "../utils/keyedLock.js";

const MAX_FILENAME_LENGTH = 200;

export type IndexingStatus = "indexed" | "pending";

export interface AddResult {
  filename: string;
  chunksIndexed: number;
  status: IndexingStatus;
  /** Present when the file was stored but could not be indexed. */
  warning?: string;
}

export interface RemoveResult {
  filename: string;
  entriesRemoved: number;
}

export interface IndexStatus {
  collection: CollectionInfo | null;
  pending: string[];
}

export interface DocumentSetManagerOptions {
  maxDocuments: number;
}

/**
 * Keeps the vector collection in step with the documents directory. File
 * mutations are serialised per filename; rebuilds exclude all of them.
 */
export class DocumentSetManager {
  private readonly lock = new KeyedLock();

  private readonly pending = new Set<string>();

  constructor(
    private readonly storage: DocumentStorage,
    private readonly indexer: Indexer,
    private readonly knowledgeBase: KnowledgeBase,
    private readonly aiClient: AiClient,
    private readonly options: DocumentSetManagerOptions,
  ) {}

  /**
   * Stores the document, then indexes it. The upload succeeds even when
   * indexing does not; the document is then flagged pending and the result
   * carries a warning. Content that cannot be parsed is removed again and
   * the `CorruptDocumentError` is rethrown.
   */
  async add(rawFilename: string, content: Buffer): Promise<AddResult> {
    const filename = sanitizeFilename(rawFilename);
    const kind = resolveDocumentKind(filename);

    const outcome = await this.lock.runExclusive(filename, async (): Promise<AddResult | null> => {
      if (!(await this.storage.exists(filename))) {
        const existing = await this.storage.list();
        if (existing.length >= this.options.maxDocuments) {
          throw new DocumentLimitError(this.options.maxDocuments);
        }
      }

      await this.storage.write(filename, content);
      this.pending.add(filename);

      try {
        const chunksIndexed = await this.indexer.index({ filename, kind, content });
        this.pending.delete(filename);
        return { filename, chunksIndexed, status: "indexed" };
      } catch (error) {
        if (isMissingCollection(error)) {
          return null;
        }
        if (error instanceof CorruptDocumentError) {
          // Unparseable uploads are not kept.
          await this.storage.remove(filename);
          this.pending.delete(filename);
          throw error;
        }
        console.error(`Indexing ${filename} failed: ${describeError(error)}`);
        return pendingResult(filename, describeError(error));
      }
    });

    // No collection yet: the rebuild indexes everything in storage, this file included.
    return outcome ?? this.addThroughRebuild(filename);
  }

  /**
   * Deletes the document's entries, then the file. A failed vector delete
   * leaves the file in place so the call can be repeated.
   */
  async remove(rawFilename: string): Promise<RemoveResult> {
    const filename = sanitizeFilename(rawFilename);

    return this.lock.runExclusive(filename, async () => {
      if (!(await this.storage.exists(filename))) {
        throw new NotFoundError(filename);
      }

      let entriesRemoved = 0;
      try {
        entriesRemoved = await this.indexer.remove(filename);
      } catch (error) {
        if (!isMissingCollection(error)) {
          throw error;
        }
      }

      await this.storage.remove(filename);
      this.pending.delete(filename);
      return { filename, entriesRemoved };
    });
  }

  async list(): Promise<DocumentListing[]> {
    return this.storage.list();
  }

  async read(rawFilename: string): Promise<Buffer> {
    return this.storage.read(sanitizeFilename(rawFilename));
  }

  async rebuildAll(): Promise<RebuildResult> {
    return this.lock.runGlobal(() => this.rebuildUnlocked());
  }

  /** Re-indexes documents whose last indexing attempt failed. */
  async retryPending(): Promise<AddResult[]> {
    const results: AddResult[] = [];
    for (const filename of [...this.pending].sort()) {
      const result = await this.lock.runExclusive(filename, async (): Promise<AddResult | null> => {
        if (!this.pending.has(filename)) {
          return null;
        }
        return this.reindex(filename);
      });
      if (result) {
        results.push(result);
      }
    }
    return results;
  }

  /**
   * Rebuilds when the collection is missing or was built with a different
   * embedding model than the one configured now. Otherwise the existing
   * collection is reconciled with storage and null is returned.
   */
  async ensureIndexReady(): Promise<RebuildResult | null> {
    return this.lock.runGlobal(async () => {
      const info = await this.knowledgeBase.describeCollection();
      if (info && info.embeddingModel === this.aiClient.getEmbeddingModelId()) {
        await this.reconcileUnlocked();
        return null;
      }
      console.error(
        info
          ? `Collection "${info.name}" was built with ${info.embeddingModel}; rebuilding.`
          : "Vector collection not found; rebuilding from documents directory.",
      );
      return this.rebuildUnlocked();
    });
  }

  async getStatus(): Promise<IndexStatus> {
    return {
      collection: await this.knowledgeBase.describeCollection(),
      pending: [...this.pending].sort(),
    };
  }

  private async rebuildUnlocked(): Promise<RebuildResult> {
    const result = await this.indexer.rebuildAll();
    for (const { filename } of result.indexed) {
      this.pending.delete(filename);
    }
    for (const { filename } of result.failed) {
      this.pending.add(filename);
    }
    return result;
  }

  /**
   * Drops entries of files no longer in storage and indexes stored files
   * that are pending or have no entries.
   */
  private async reconcileUnlocked(): Promise<void> {
    const stored = (await this.storage.list()).map((doc) => doc.filename);
    const storedNames = new Set(stored);

    for (const filename of await this.knowledgeBase.listFilenames()) {
      if (!storedNames.has(filename)) {
        const removed = await this.indexer.remove(filename);
        console.error(`Removed ${removed} orphaned entries of ${filename}.`);
      }
    }

    for (const filename of stored) {
      if (
        this.pending.has(filename) ||
        (await this.knowledgeBase.countByFilename(filename)) === 0
      ) {
        await this.reindex(filename);
      }
    }
  }

  private async reindex(filename: string): Promise<AddResult | null> {
    if (!(await this.storage.exists(filename))) {
      this.pending.delete(filename);
      return null;
    }
    try {
      const document = await this.storage.load(filename);
      const chunksIndexed = await this.indexer.index(document);
      this.pending.delete(filename);
      return { filename, chunksIndexed, status: "indexed" };
    } catch (error) {
      this.pending.add(filename);
      console.error(`Indexing ${filename} failed: ${describeError(error)}`);
      return pendingResult(filename, describeError(error));
    }
  }

  private async addThroughRebuild(filename: string): Promise<AddResult> {
    const result = await this.ensureIndexReady();
    const indexed = result?.indexed.find((item) => item.filename === filename);
    if (indexed) {
      return { filename, chunksIndexed: indexed.chunkCount, status: "indexed" };
    }
    if (!result) {
      // The collection appeared meanwhile; reconciling already indexed the file.
      if (!this.pending.has(filename)) {
        const chunksIndexed = await this.knowledgeBase.countByFilename(filename);
        return { filename, chunksIndexed, status: "indexed" };
      }
      return this.retryOne(filename);
    }
    const failure = result.failed.find((item) => item.filename === filename);
    return pendingResult(filename, failure?.reason ?? "unknown error");
  }

  private async retryOne(filename: string): Promise<AddResult> {
    const [retried] = (await this.retryPending()).filter((item) => item.filename === filename);
    return retried ?? pendingResult(filename, "document was not found after rebuild");
  }
}

function pendingResult(filename: string, reason: string): AddResult {
  return {
    filename,
    chunksIndexed: 0,
    status: "pending",
    warning: `Stored, but indexing failed and will be retried: ${reason}`,
  };
}

/**
 * Reduces an uploaded name to a safe base name. Names with parent-directory
 * segments, control characters, or nothing left after cleaning are rejected.
 */
export function sanitizeFilename(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidFilenameError(raw, "name is empty");
  }
  if (/[\u0000-\u001f\u007f]/.test(trimmed)) {
    throw new InvalidFilenameError(raw, "name contains control characters");
  }

  const segments = trimmed.split(/[\\/]+/);
  if (segments.some((segment) => segment === "..")) {
    throw new InvalidFilenameError(raw, "path traversal is not allowed");
  }

  const base = path.posix.basename(segments.join("/"));
  const cleaned = base.replace(/[:*?"<>|]/g, "_").trim();
  if (!cleaned || cleaned === "." || cleaned.startsWith(".")) {
    throw new InvalidFilenameError(raw, "name must not be empty or start with a dot");
  }
  if (cleaned.length > MAX_FILENAME_LENGTH) {
    throw new InvalidFilenameError(raw, `name is longer than ${MAX_FILENAME_LENGTH} characters`);
  }
  return cleaned;
}
