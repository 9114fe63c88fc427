import type pg from "pg";
import type {
  CollectionSpec,
  DeleteByFilenameOptions,
  KnowledgeBase,
  KnowledgeBaseStaging,
  SearchInput,
} from "../../domain/knowledgeBase.js";
import { VectorStoreError, type VectorStoreErrorKind } from "../../domain/errors.js";
import type { CollectionInfo, ScoredChunk, VectorEntry } from "../../domain/types.js";
import { toVectorLiteral } from "../../utils/vector.js";
import { withTransaction } from "../db/postgres.js";

interface PgEntryRow {
  id: string;
  filename: string;
  page: number | null;
  sequence_index: number;
  chunk_text: string;
  score: number;
}

interface PgMetaRow {
  embedding_model: string;
  dimension: number;
}

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "57P01",
  "57P02",
  "57P03",
  "53300",
  "40001",
  "40P01",
]);

/**
 * Collection stored as a pgvector table `<name>` plus a one-row `<name>_meta`
 * table recording the embedding model and dimension. Rebuilds fill
 * `<name>_staging` and rename it over the live table in one transaction.
 */
export class PgVectorKnowledgeBase implements KnowledgeBase {
  private initialized = false;

  private readonly table: string;

  private readonly metaTable: string;

  private readonly stagingTable: string;

  constructor(
    private readonly pool: pg.Pool,
    private readonly name: string,
  ) {
    if (!/^[a-z_][a-z0-9_]{0,47}$/.test(name)) {
      throw new Error(`Invalid collection name: ${name}`);
    }
    this.table = name;
    this.metaTable = `${name}_meta`;
    this.stagingTable = `${name}_staging`;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.run(async () => {
      await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS ${this.metaTable} (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          embedding_model TEXT NOT NULL,
          dimension INTEGER NOT NULL,
          built_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);
    });

    this.initialized = true;
  }

  async describeCollection(): Promise<CollectionInfo | null> {
    await this.initialize();
    return this.run(async () => {
      const meta = await this.pool.query<PgMetaRow>(
        `SELECT embedding_model, dimension FROM ${this.metaTable} WHERE id = 1`,
      );
      const tableCheck = await this.pool.query<{ exists: boolean }>(
        `SELECT to_regclass($1) IS NOT NULL AS exists`,
        [this.table],
      );
      if (meta.rows.length === 0 || !tableCheck.rows[0]?.exists) {
        return null;
      }

      const count = await this.pool.query<{ count: string }>(
        `SELECT COUNT(*)::text AS count FROM ${this.table}`,
      );
      return {
        name: this.name,
        embeddingModel: meta.rows[0].embedding_model,
        dimension: meta.rows[0].dimension,
        entryCount: Number(count.rows[0]?.count ?? 0),
      };
    });
  }

  async upsertEntries(entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.initialize();
    await this.run(() => this.writeEntries(this.table, entries));
  }

  async deleteByFilename(
    filename: string,
    options: DeleteByFilenameOptions = {},
  ): Promise<number> {
    await this.initialize();
    return this.run(async () => {
      const result = await this.pool.query(
        `DELETE FROM ${this.table} WHERE filename = $1 AND sequence_index >= $2`,
        [filename, options.fromSequenceIndex ?? 0],
      );
      return result.rowCount ?? 0;
    });
  }

  async countByFilename(filename: string): Promise<number> {
    await this.initialize();
    return this.run(async () => {
      const result = await this.pool.query<{ count: string }>(
        `SELECT COUNT(*)::text AS count FROM ${this.table} WHERE filename = $1`,
        [filename],
      );
      return Number(result.rows[0]?.count ?? 0);
    });
  }

  async listFilenames(): Promise<string[]> {
    await this.initialize();
    return this.run(async () => {
      const result = await this.pool.query<{ filename: string }>(
        `SELECT DISTINCT filename FROM ${this.table} ORDER BY filename ASC`,
      );
      return result.rows.map((row) => row.filename);
    });
  }

  async search(input: SearchInput): Promise<ScoredChunk[]> {
    await this.initialize();
    if (input.topK <= 0) {
      return [];
    }

    return this.run(async () => {
      const result = await this.pool.query<PgEntryRow>(
        `
          SELECT
            id,
            filename,
            page,
            sequence_index,
            chunk_text,
            (1 - (embedding <=> $1::vector)) AS score
          FROM ${this.table}
          WHERE ($2::float8 IS NULL OR (1 - (embedding <=> $1::vector)) >= $2::float8)
          ORDER BY embedding <=> $1::vector, id ASC
          LIMIT $3
        `,
        [toVectorLiteral(input.vector), input.minScore ?? null, input.topK],
      );

      return result.rows.map((row) => ({
        entryId: row.id,
        score: Number(row.score),
        chunk: {
          filename: row.filename,
          page: row.page,
          sequenceIndex: row.sequence_index,
          text: row.chunk_text,
        },
      }));
    });
  }

  async createStaging(spec: CollectionSpec): Promise<KnowledgeBaseStaging> {
    await this.initialize();
    const staging = this.stagingTable;

    await this.run(async () => {
      await this.pool.query(`DROP TABLE IF EXISTS ${staging}`);
      await this.pool.query(`
        CREATE TABLE ${staging} (
          id TEXT NOT NULL,
          embedding VECTOR(${spec.dimension}) NOT NULL,
          filename TEXT NOT NULL,
          page INTEGER,
          sequence_index INTEGER NOT NULL,
          chunk_text TEXT NOT NULL,
          CONSTRAINT ${staging}_pkey PRIMARY KEY (id)
        )
      `);
      await this.pool.query(`CREATE INDEX ${staging}_filename_idx ON ${staging} (filename)`);
      await this.pool.query(
        `CREATE INDEX ${staging}_embedding_idx ON ${staging} USING hnsw (embedding vector_cosine_ops)`,
      );
    });

    let open = true;
    const assertOpen = () => {
      if (!open) {
        throw new VectorStoreError("Staging collection is already closed.", "fatal");
      }
    };

    return {
      upsertEntries: async (entries) => {
        assertOpen();
        if (entries.length > 0) {
          await this.run(() => this.writeEntries(staging, entries));
        }
      },
      commit: async () => {
        assertOpen();
        open = false;
        await this.run(() => this.swapInStaging(spec));
      },
      discard: async () => {
        open = false;
        await this.run(async () => {
          await this.pool.query(`DROP TABLE IF EXISTS ${staging}`);
        });
      },
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async swapInStaging(spec: CollectionSpec): Promise<void> {
    const live = this.table;
    const staging = this.stagingTable;
    await withTransaction(this.pool, async (client) => {
      await client.query(`DROP TABLE IF EXISTS ${live}`);
      await client.query(`ALTER TABLE ${staging} RENAME TO ${live}`);
      await client.query(`ALTER INDEX ${staging}_pkey RENAME TO ${live}_pkey`);
      await client.query(`ALTER INDEX ${staging}_filename_idx RENAME TO ${live}_filename_idx`);
      await client.query(`ALTER INDEX ${staging}_embedding_idx RENAME TO ${live}_embedding_idx`);
      await client.query(
        `
          INSERT INTO ${this.metaTable} (id, embedding_model, dimension, built_at)
          VALUES (1, $1, $2, NOW())
          ON CONFLICT (id)
          DO UPDATE SET embedding_model = EXCLUDED.embedding_model,
                        dimension = EXCLUDED.dimension,
                        built_at = NOW()
        `,
        [spec.embeddingModel, spec.dimension],
      );
    });
  }

  private async writeEntries(table: string, entries: VectorEntry[]): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      for (const entry of entries) {
        await client.query(
          `
            INSERT INTO ${table} (id, embedding, filename, page, sequence_index, chunk_text)
            VALUES ($1, $2::vector, $3, $4, $5, $6)
            ON CONFLICT (id)
            DO UPDATE SET embedding = EXCLUDED.embedding,
                          filename = EXCLUDED.filename,
                          page = EXCLUDED.page,
                          sequence_index = EXCLUDED.sequence_index,
                          chunk_text = EXCLUDED.chunk_text
          `,
          [
            entry.id,
            toVectorLiteral(entry.vector),
            entry.filename,
            entry.page,
            entry.sequenceIndex,
            entry.chunkText,
          ],
        );
      }
    });
  }

  private async run<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof VectorStoreError) {
        throw error;
      }
      const kind = classifyPgError(error);
      const message = error instanceof Error ? error.message : "unknown database error";
      throw new VectorStoreError(
        kind === "missing_collection"
          ? `Collection "${this.name}" does not exist.`
          : `Vector store request failed: ${message}`,
        kind,
        { cause: error },
      );
    }
  }
}

export function classifyPgError(error: unknown): VectorStoreErrorKind {
  const code = readErrorCode(error);
  if (code === "42P01") {
    return "missing_collection";
  }
  if (code && (TRANSIENT_CODES.has(code) || code.startsWith("08"))) {
    return "transient";
  }
  return "fatal";
}

function readErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}
