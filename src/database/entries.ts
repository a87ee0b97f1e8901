import type { Pool } from "pg";
import type { Logger } from "pino";
import { batchChunks } from "../utils/batchChunks";
import { buildFilterClause, toVectorLiteral } from "./filters";
import type { IndexEntry, MetadataFilter } from "./types";

const UPSERT_BATCH_SIZE = 100;
const COLUMNS_PER_ENTRY = 10;

export async function upsertEntries(
    pool: Pool,
    logger: Logger,
    table: string,
    collection: string,
    entries: IndexEntry[]
): Promise<void> {
    if (entries.length === 0) {
        return;
    }

    for (const batch of batchChunks(entries, UPSERT_BATCH_SIZE)) {
        const values: unknown[] = [];
        const placeholders = batch.map((entry, row) => {
            values.push(
                collection,
                entry.chunkId,
                entry.sourceId,
                entry.metadata.kind,
                entry.metadata.displayName,
                entry.text,
                entry.embeddingText,
                entry.metadata.chunkIndex,
                entry.metadata.file ?? null,
                toVectorLiteral(entry.embedding)
            );
            const base = row * COLUMNS_PER_ENTRY;
            const params = Array.from({ length: COLUMNS_PER_ENTRY }, (_, column) =>
                column === COLUMNS_PER_ENTRY - 1 ? `$${base + column + 1}::vector` : `$${base + column + 1}`
            );
            return `(${params.join(", ")})`;
        });

        await pool.query(
            `
            INSERT INTO ${table} (
                collection, chunk_id, source_id, kind, display_name, content,
                embedding_text, chunk_index, file, embedding
            ) VALUES ${placeholders.join(", ")}
            ON CONFLICT (collection, chunk_id) DO UPDATE SET
                source_id = EXCLUDED.source_id,
                kind = EXCLUDED.kind,
                display_name = EXCLUDED.display_name,
                content = EXCLUDED.content,
                embedding_text = EXCLUDED.embedding_text,
                chunk_index = EXCLUDED.chunk_index,
                file = EXCLUDED.file,
                embedding = EXCLUDED.embedding,
                updated_at = now()
            `,
            values
        );
    }

    logger.debug(`Upserted ${entries.length} entr${entries.length === 1 ? "y" : "ies"} into "${collection}"`);
}

export async function deleteEntries(
    pool: Pool,
    logger: Logger,
    table: string,
    collection: string,
    filter: MetadataFilter
): Promise<number> {
    const clause = buildFilterClause(filter, 2);
    const result = await pool.query(`DELETE FROM ${table} WHERE collection = $1${clause.sql}`, [
        collection,
        ...clause.values,
    ]);

    const removed = result.rowCount ?? 0;
    if (removed > 0) {
        logger.debug(`Deleted ${removed} entr${removed === 1 ? "y" : "ies"} from "${collection}"`);
    }
    return removed;
}

export async function countEntries(pool: Pool, table: string, collection: string): Promise<number> {
    const result = await pool.query<{ total: number }>(
        `SELECT count(*)::int AS total FROM ${table} WHERE collection = $1`,
        [collection]
    );
    return result.rows[0]?.total ?? 0;
}

export async function listSourceIds(pool: Pool, table: string, collection: string): Promise<string[]> {
    const result = await pool.query<{ source_id: string }>(
        `SELECT DISTINCT source_id FROM ${table} WHERE collection = $1 ORDER BY source_id`,
        [collection]
    );
    return result.rows.map((row) => row.source_id);
}
