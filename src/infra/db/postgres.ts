import pg from "pg";

export type PostgresPool = pg.Pool;

export function createPostgresPool(connectionString: string): PostgresPool {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on("error", (error) => {
    console.error("Postgres pool error:", error.message);
  });

  return pool;
}

export interface TransactionClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(error?: Error | boolean): void;
}

export interface TransactionPool {
  connect(): Promise<TransactionClient>;
}

/**
 * Runs `work` between BEGIN and COMMIT on a pooled client. On failure the
 * client is released as broken so the pool drops it, and a failed ROLLBACK is
 * only logged: the caller sees the error that aborted the transaction.
 */
export async function withTransaction<T>(
  pool: TransactionPool,
  work: (client: TransactionClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      const message = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
      console.error("Postgres rollback failed:", message);
    }
    client.release(error instanceof Error ? error : true);
    throw error;
  }
}
