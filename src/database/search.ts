import type { Pool } from "pg";
import { buildFilterClause, toVectorLiteral } from "./filters";
import type { DocumentKind, MetadataFilter, RetrievedChunk } from "./types";

interface PostgresMatchRow {
    chunk_id: string;
    source_id: string;
    content: string;
    display_name: string;
    kind: string;
    similarity: number;
}

function parseKind(value: string): DocumentKind {
    return value === "general" ? "general" : "faculty";
}

function toRetrievedChunk(row: PostgresMatchRow): RetrievedChunk {
    return {
        chunkId: row.chunk_id,
        sourceId: row.source_id,
        text: row.content,
        displayName: row.display_name,
        kind: parseKind(row.kind),
        similarity: Number(row.similarity),
    };
}

const MATCH_COLUMNS = "chunk_id, source_id, content, display_name, kind, 1 - (embedding <=> $2::vector) AS similarity";

export async function matchEntries(
    pool: Pool,
    table: string,
    collection: string,
    embedding: number[],
    k: number,
    filter?: MetadataFilter
): Promise<RetrievedChunk[]> {
    const clause = buildFilterClause(filter, 4);
    const result = await pool.query<PostgresMatchRow>(
        `SELECT ${MATCH_COLUMNS}
         FROM ${table}
         WHERE collection = $1${clause.sql}
         ORDER BY embedding <=> $2::vector, chunk_id
         LIMIT $3`,
        [collection, toVectorLiteral(embedding), k, ...clause.values]
    );

    return result.rows.map(toRetrievedChunk);
}

export async function matchEntriesByDisplayName(
    pool: Pool,
    table: string,
    collection: string,
    tokens: string[],
    embedding: number[],
    limit: number
): Promise<RetrievedChunk[]> {
    if (tokens.length === 0 || limit <= 0) {
        return [];
    }

    const result = await pool.query<PostgresMatchRow>(
        `SELECT ${MATCH_COLUMNS}
         FROM ${table}
         WHERE collection = $1
           AND kind = 'faculty'
           AND regexp_split_to_array(lower(display_name), '\\s+') && $4::text[]
         ORDER BY embedding <=> $2::vector, chunk_id
         LIMIT $3`,
        [collection, toVectorLiteral(embedding), limit, tokens.map((token) => token.toLowerCase())]
    );

    return result.rows.map(toRetrievedChunk);
}
