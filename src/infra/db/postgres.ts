import pg from "pg";
import { logger } from "../../lib/logger.js";

const log = logger.child({ module: "postgres" });

export function createPostgresPool(databaseUrl: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    application_name: "search-space-mcp",
  });

  pool.on("error", (error) => {
    log.error("Error in idle Postgres client", { error });
  });

  return pool;
}

/** Runs `task` inside BEGIN/COMMIT on one pooled client, rolling back on error. */
export async function withTransaction<T>(
  pool: pg.Pool,
  task: (client: pg.PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await task(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
