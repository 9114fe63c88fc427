import type {
  CollectionSpec,
  DeleteByFilenameOptions,
  KnowledgeBase,
  KnowledgeBaseStaging,
  SearchInput,
} from "../../domain/knowledgeBase.js";
import { VectorStoreError } from "../../domain/errors.js";
import type { CollectionInfo, ScoredChunk, VectorEntry } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

interface InMemoryCollection {
  spec: CollectionSpec;
  entries: Map<string, VectorEntry>;
}

/**
 * Process-local vector collection. Used when pgvector is disabled and in
 * tests; its contents do not survive a restart, so a fresh process starts
 * with no collection and triggers a rebuild.
 */
export class InMemoryKnowledgeBase implements KnowledgeBase {
  private collection: InMemoryCollection | null = null;

  constructor(private readonly name: string = "knowledge_base") {}

  async describeCollection(): Promise<CollectionInfo | null> {
    if (!this.collection) {
      return null;
    }
    return {
      name: this.name,
      embeddingModel: this.collection.spec.embeddingModel,
      dimension: this.collection.spec.dimension,
      entryCount: this.collection.entries.size,
    };
  }

  async upsertEntries(entries: VectorEntry[]): Promise<void> {
    const collection = this.requireCollection();
    for (const entry of entries) {
      assertDimension(entry, collection.spec.dimension);
    }
    for (const entry of entries) {
      collection.entries.set(entry.id, copyEntry(entry));
    }
  }

  async deleteByFilename(
    filename: string,
    options: DeleteByFilenameOptions = {},
  ): Promise<number> {
    const collection = this.requireCollection();
    const from = options.fromSequenceIndex ?? 0;
    let removed = 0;
    for (const [id, entry] of collection.entries) {
      if (entry.filename === filename && entry.sequenceIndex >= from) {
        collection.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  async countByFilename(filename: string): Promise<number> {
    const collection = this.requireCollection();
    let count = 0;
    for (const entry of collection.entries.values()) {
      if (entry.filename === filename) {
        count += 1;
      }
    }
    return count;
  }

  async listFilenames(): Promise<string[]> {
    const collection = this.requireCollection();
    const names = new Set<string>();
    for (const entry of collection.entries.values()) {
      names.add(entry.filename);
    }
    return [...names].sort((a, b) => a.localeCompare(b));
  }

  async search(input: SearchInput): Promise<ScoredChunk[]> {
    const collection = this.requireCollection();
    if (input.topK <= 0) {
      return [];
    }

    const candidates: ScoredChunk[] = [];
    for (const entry of collection.entries.values()) {
      const score = cosineSimilarity(input.vector, entry.vector);
      if (input.minScore != null && score < input.minScore) {
        continue;
      }
      candidates.push({
        entryId: entry.id,
        score,
        chunk: {
          filename: entry.filename,
          page: entry.page,
          sequenceIndex: entry.sequenceIndex,
          text: entry.chunkText,
        },
      });
    }

    return candidates
      .sort((a, b) => b.score - a.score || a.entryId.localeCompare(b.entryId))
      .slice(0, input.topK);
  }

  async createStaging(spec: CollectionSpec): Promise<KnowledgeBaseStaging> {
    const staged: InMemoryCollection = { spec: { ...spec }, entries: new Map() };
    let open = true;

    const assertOpen = () => {
      if (!open) {
        throw new VectorStoreError("Staging collection is already closed.", "fatal");
      }
    };

    return {
      upsertEntries: async (entries) => {
        assertOpen();
        for (const entry of entries) {
          assertDimension(entry, staged.spec.dimension);
          staged.entries.set(entry.id, copyEntry(entry));
        }
      },
      commit: async () => {
        assertOpen();
        open = false;
        this.collection = staged;
      },
      discard: async () => {
        open = false;
      },
    };
  }

  async close(): Promise<void> {}

  private requireCollection(): InMemoryCollection {
    if (!this.collection) {
      throw new VectorStoreError(
        `Collection "${this.name}" does not exist.`,
        "missing_collection",
      );
    }
    return this.collection;
  }
}

function copyEntry(entry: VectorEntry): VectorEntry {
  return { ...entry, vector: [...entry.vector] };
}

function assertDimension(entry: VectorEntry, dimension: number) {
  if (entry.vector.length !== dimension) {
    throw new VectorStoreError(
      `Vector for ${entry.id} has dimension ${entry.vector.length}, collection expects ${dimension}.`,
      "fatal",
    );
  }
}
