import type { Pool } from "pg";
import type { Logger } from "pino";

function indexName(table: string, suffix: string): string {
    const bare = table.split(".").pop() ?? table;
    return `${bare}_${suffix}`;
}

/**
 * Creates the pgvector extension and the entries table when missing. The
 * embedding column is left dimensionless so the model can change between
 * full rebuilds.
 */
export async function ensureSchema(pool: Pool, logger: Logger, table: string): Promise<void> {
    await pool.query("CREATE EXTENSION IF NOT EXISTS vector");
    await pool.query(`
        CREATE TABLE IF NOT EXISTS ${table} (
            id BIGSERIAL PRIMARY KEY,
            collection TEXT NOT NULL,
            chunk_id TEXT NOT NULL,
            source_id TEXT NOT NULL,
            kind TEXT NOT NULL,
            display_name TEXT NOT NULL,
            content TEXT NOT NULL,
            embedding_text TEXT NOT NULL,
            chunk_index INTEGER NOT NULL,
            file TEXT,
            embedding vector NOT NULL,
            updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
            UNIQUE (collection, chunk_id)
        )
    `);
    await pool.query(
        `CREATE INDEX IF NOT EXISTS ${indexName(table, "collection_source_idx")} ON ${table} (collection, source_id)`
    );

    logger.info(`Ensured schema for table "${table}"`);
}
