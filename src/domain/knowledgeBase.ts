import type { CollectionInfo, ScoredChunk, VectorEntry } from "./types.js";

export interface CollectionSpec {
  embeddingModel: string;
  dimension: number;
}

export interface SearchInput {
  vector: number[];
  topK: number;
  minScore?: number | null;
}

export interface DeleteByFilenameOptions {
  /** Only delete entries whose sequence index is at or past this value. */
  fromSequenceIndex?: number;
}

/**
 * A collection being built next to the live one. Nothing written here is
 * visible to readers until `commit()` swaps it in.
 */
export interface KnowledgeBaseStaging {
  upsertEntries(entries: VectorEntry[]): Promise<void>;
  commit(): Promise<void>;
  discard(): Promise<void>;
}

/**
 * Vector collection contract. Every method except `describeCollection`,
 * `createStaging` and `close` throws a `VectorStoreError` of kind
 * `missing_collection` when the collection has not been created yet.
 */
export interface KnowledgeBase {
  describeCollection(): Promise<CollectionInfo | null>;
  upsertEntries(entries: VectorEntry[]): Promise<void>;
  deleteByFilename(filename: string, options?: DeleteByFilenameOptions): Promise<number>;
  countByFilename(filename: string): Promise<number>;
  listFilenames(): Promise<string[]>;
  search(input: SearchInput): Promise<ScoredChunk[]>;
  createStaging(spec: CollectionSpec): Promise<KnowledgeBaseStaging>;
  close(): Promise<void>;
}
