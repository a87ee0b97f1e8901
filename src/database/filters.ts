import type { MetadataFilter } from "./types";

export interface SqlFragment {
    sql: string;
    values: unknown[];
}

/**
 * Renders a filter as `AND ...` conditions whose placeholders start at
 * `firstParam`. An empty filter renders as an empty string.
 */
export function buildFilterClause(filter: MetadataFilter | undefined, firstParam: number): SqlFragment {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const next = () => `$${firstParam + values.length}`;

    if (filter?.kind) {
        conditions.push(`kind = ${next()}`);
        values.push(filter.kind);
    }

    if (filter?.sourceId) {
        conditions.push(`source_id = ${next()}`);
        values.push(filter.sourceId);
    }

    if (filter?.sourceIds) {
        conditions.push(`source_id = ANY(${next()}::text[])`);
        values.push(filter.sourceIds);
    }

    return {
        sql: conditions.map((condition) => ` AND ${condition}`).join(""),
        values,
    };
}

export function toVectorLiteral(embedding: number[]): string {
    return `[${embedding.join(",")}]`;
}
