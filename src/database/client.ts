import { Pool } from "pg";
import type { Logger } from "pino";
import type { DatabaseConfig } from "../config/types";
import { IngestionInProgressError, VectorIndexError, errorMessage } from "../errors";
import { getLogger } from "../utils/logger";
import * as entries from "./entries";
import { ensureSchema } from "./schema";
import * as search from "./search";
import type { IndexEntry, MetadataFilter, RetrievedChunk, VectorIndex } from "./types";

export class PostgresVectorStore implements VectorIndex {
    protected readonly logger: Logger;
    protected readonly pool: Pool;
    protected readonly table: string;

    constructor(config: DatabaseConfig, logger?: Logger) {
        this.table = config.table;
        this.logger = logger ?? getLogger();

        this.pool = new Pool({
            connectionString: config.databaseUrl,
            max: 10,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 5_000,
            query_timeout: 15_000,
        });

        this.pool.on("error", (err) => {
            this.logger.error({ err }, "Unexpected error on idle PostgreSQL client");
        });
    }

    async verifyConnection(): Promise<void> {
        try {
            await this.pool.query(`SELECT id FROM ${this.table} LIMIT 1`);
            this.logger.info(`Connected to the table "${this.table}"`);
        } catch (error) {
            this.logger.error({ err: error }, `Failed to connect to PostgreSQL table "${this.table}"`);
            throw new VectorIndexError(`Failed to connect to PostgreSQL table "${this.table}": ${errorMessage(error)}`, {
                cause: error,
            });
        }
    }

    async ensureSchema(): Promise<void> {
        return this.run("ensureSchema", () => ensureSchema(this.pool, this.logger, this.table));
    }

    async upsert(collection: string, toUpsert: IndexEntry[]): Promise<void> {
        return this.run("upsert", () => entries.upsertEntries(this.pool, this.logger, this.table, collection, toUpsert));
    }

    async delete(collection: string, filter: MetadataFilter): Promise<number> {
        return this.run("delete", () => entries.deleteEntries(this.pool, this.logger, this.table, collection, filter));
    }

    async query(collection: string, embedding: number[], k: number, filter?: MetadataFilter): Promise<RetrievedChunk[]> {
        return this.run("query", () => search.matchEntries(this.pool, this.table, collection, embedding, k, filter));
    }

    async count(collection: string): Promise<number> {
        return this.run("count", () => entries.countEntries(this.pool, this.table, collection));
    }

    async listSourceIds(collection: string): Promise<string[]> {
        return this.run("listSourceIds", () => entries.listSourceIds(this.pool, this.table, collection));
    }

    async findByDisplayNameTokens(
        collection: string,
        tokens: string[],
        embedding: number[],
        limit: number
    ): Promise<RetrievedChunk[]> {
        return this.run("findByDisplayNameTokens", () =>
            search.matchEntriesByDisplayName(this.pool, this.table, collection, tokens, embedding, limit)
        );
    }

    /**
     * Session-level advisory lock keyed on table and collection, so two
     * ingestion processes never interleave deletes and upserts.
     */
    async withExclusiveLock<T>(collection: string, task: () => Promise<T>): Promise<T> {
        const lockKey = `${this.table}:${collection}`;
        const client = await this.run("lock", () => this.pool.connect());
        let discardClient = false;

        try {
            const { rows } = await this.run("lock", () =>
                client.query<{ locked: boolean }>("SELECT pg_try_advisory_lock(hashtext($1)) AS locked", [lockKey])
            );
            if (!rows[0]?.locked) {
                throw new IngestionInProgressError(`Another ingestion run holds the lock for collection "${collection}".`);
            }

            try {
                return await task();
            } finally {
                await client.query("SELECT pg_advisory_unlock(hashtext($1))", [lockKey]).catch((error: unknown) => {
                    // a pooled session must not keep the lock alive
                    discardClient = true;
                    this.logger.error({ err: error, collection }, "Failed to release ingestion lock");
                });
            }
        } finally {
            client.release(discardClient);
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.logger.error({ err: error, operation }, "Vector index operation failed");
            throw new VectorIndexError(`Vector index ${operation} failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}

export function createPostgresStore(config: DatabaseConfig, logger?: Logger): PostgresVectorStore {
    return new PostgresVectorStore(config, logger);
}
