import type { Logger } from "pino";
import type { MetadataFilter, RetrievedChunk, VectorIndex } from "../database/types";
import { RetrievalUnavailableError, errorMessage } from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import { childLogger, getLogger } from "../utils/logger";

export interface RetrieveOptions {
    signal?: AbortSignal;
}

export interface QuestionRetrievalOptions extends RetrieveOptions {
    k: number;
    filter?: MetadataFilter;
    /** Words to look up against faculty display names. */
    nameTokens?: string[];
    nameMatchLimit?: number;
}

export interface QuestionRetrieval {
    chunks: RetrievedChunk[];
    /** True when a filtered search came back empty and was rerun unfiltered. */
    usedFallback: boolean;
}

/**
 * Embeds questions with the ingestion-time provider and searches one
 * collection. Any embedding or index failure surfaces as
 * RetrievalUnavailableError, never as an empty result.
 */
export class Retriever {
    private readonly logger: Logger;

    constructor(
        private readonly embedding: EmbeddingProvider,
        private readonly index: VectorIndex,
        private readonly collection: string,
        logger?: Logger
    ) {
        this.logger = childLogger(logger ?? getLogger(), { module: "query" });
    }

    async retrieve(query: string, k: number, filter?: MetadataFilter, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
        if (k < 1) {
            return [];
        }

        return this.guard("retrieve", async () => {
            const embedding = await this.embedding.embedQuery(query, { signal: options.signal });
            return this.index.query(this.collection, embedding, k, filter);
        });
    }

    /**
     * Ranked vector results, rerun without the filter when the filtered
     * search is empty, followed by faculty chunks whose display name contains
     * one of `nameTokens`. Chunks appear at most once.
     */
    async retrieveForQuestion(query: string, options: QuestionRetrievalOptions): Promise<QuestionRetrieval> {
        if (options.k < 1) {
            return { chunks: [], usedFallback: false };
        }

        return this.guard("retrieveForQuestion", async () => {
            const embedding = await this.embedding.embedQuery(query, { signal: options.signal });

            let usedFallback = false;
            let ranked = await this.index.query(this.collection, embedding, options.k, options.filter);
            if (ranked.length === 0 && options.filter) {
                usedFallback = true;
                ranked = await this.index.query(this.collection, embedding, options.k);
            }

            const nameTokens = options.nameTokens ?? [];
            const nameMatchLimit = options.nameMatchLimit ?? 0;
            const nameMatches =
                nameTokens.length > 0 && nameMatchLimit > 0
                    ? await this.index.findByDisplayNameTokens(this.collection, nameTokens, embedding, nameMatchLimit)
                    : [];

            const seen = new Set(ranked.map((chunk) => chunk.chunkId));
            const chunks = [...ranked];
            for (const match of nameMatches) {
                if (!seen.has(match.chunkId)) {
                    seen.add(match.chunkId);
                    chunks.push(match);
                }
            }

            this.logger.debug(
                { ranked: ranked.length, nameMatches: chunks.length - ranked.length, usedFallback },
                "Retrieved context"
            );
            return { chunks, usedFallback };
        });
    }

    private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.logger.error({ err: error, operation }, "Retrieval failed");
            throw new RetrievalUnavailableError(`Retrieval unavailable: ${errorMessage(error)}`, { cause: error });
        }
    }
}
