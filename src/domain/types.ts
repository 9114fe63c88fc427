export type DocumentKind = "text" | "pdf";

export interface StoredDocument {
  filename: string;
  kind: DocumentKind;
  content: Buffer;
}

export interface DocumentListing {
  filename: string;
  size: number;
}

export interface Chunk {
  filename: string;
  /** 1-based; null for documents without pages. */
  page: number | null;
  sequenceIndex: number;
  text: string;
}

export interface VectorEntry {
  id: string;
  vector: number[];
  filename: string;
  page: number | null;
  sequenceIndex: number;
  chunkText: string;
}

export interface ScoredChunk {
  entryId: string;
  chunk: Chunk;
  score: number;
}

export interface Reference {
  filename: string;
  page?: number;
  source: string;
  preview: string;
}

export interface CollectionInfo {
  name: string;
  embeddingModel: string;
  dimension: number;
  entryCount: number;
}
