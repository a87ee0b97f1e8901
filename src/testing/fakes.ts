import pino from "pino";
import type { AppConfig, ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { IndexEntry, MetadataFilter, RetrievedChunk, VectorIndex } from "../database/types";
import { CompletionProviderError, EmbeddingProviderError, IngestionInProgressError, VectorIndexError } from "../errors";
import type { ChatProvider, CompletionOptions, EmbedOptions, EmbeddingProvider } from "../llm/types";

export const silentLogger = pino({ level: "silent" });

export const FAKE_DIMENSIONS = 512;

export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matchesFilter(entry: IndexEntry, filter?: MetadataFilter): boolean {
    if (!filter) {
        return true;
    }
    if (filter.kind && entry.metadata.kind !== filter.kind) {
        return false;
    }
    if (filter.sourceId && entry.sourceId !== filter.sourceId) {
        return false;
    }
    if (filter.sourceIds && !filter.sourceIds.includes(entry.sourceId)) {
        return false;
    }
    return true;
}

/**
 * VectorIndex kept in process memory, ranking by cosine similarity with the
 * same tie-break as the Postgres store.
 */
export class InMemoryVectorIndex implements VectorIndex {
    reachable = true;
    closed = false;
    readonly lifecycle: Array<"ensureSchema" | "verifyConnection" | "close"> = [];
    readonly upsertCalls: Array<{ collection: string; entries: IndexEntry[] }> = [];

    private readonly collections = new Map<string, Map<string, IndexEntry>>();
    private readonly locked = new Set<string>();

    async ensureSchema(): Promise<void> {
        this.lifecycle.push("ensureSchema");
        this.assertReachable("ensureSchema");
    }

    async verifyConnection(): Promise<void> {
        this.lifecycle.push("verifyConnection");
        this.assertReachable("verifyConnection");
    }

    async upsert(collection: string, entries: IndexEntry[]): Promise<void> {
        this.assertReachable("upsert");
        this.upsertCalls.push({ collection, entries });
        const stored = this.collection(collection);
        for (const entry of entries) {
            stored.set(entry.chunkId, entry);
        }
    }

    async delete(collection: string, filter: MetadataFilter): Promise<number> {
        this.assertReachable("delete");
        const stored = this.collection(collection);
        let removed = 0;
        for (const [chunkId, entry] of stored) {
            if (matchesFilter(entry, filter)) {
                stored.delete(chunkId);
                removed += 1;
            }
        }
        return removed;
    }

    async query(collection: string, embedding: number[], k: number, filter?: MetadataFilter): Promise<RetrievedChunk[]> {
        this.assertReachable("query");
        return this.rank(collection, embedding, (entry) => matchesFilter(entry, filter)).slice(0, k);
    }

    async count(collection: string): Promise<number> {
        this.assertReachable("count");
        return this.collection(collection).size;
    }

    async listSourceIds(collection: string): Promise<string[]> {
        this.assertReachable("listSourceIds");
        const ids = new Set([...this.collection(collection).values()].map((entry) => entry.sourceId));
        return [...ids].sort();
    }

    async findByDisplayNameTokens(
        collection: string,
        tokens: string[],
        embedding: number[],
        limit: number
    ): Promise<RetrievedChunk[]> {
        this.assertReachable("findByDisplayNameTokens");
        const wanted = new Set(tokens.map((token) => token.toLowerCase()));
        return this.rank(collection, embedding, (entry) => {
            if (entry.metadata.kind !== "faculty") {
                return false;
            }
            return entry.metadata.displayName
                .toLowerCase()
                .split(/\s+/)
                .some((part) => wanted.has(part));
        }).slice(0, Math.max(0, limit));
    }

    async withExclusiveLock<T>(collection: string, task: () => Promise<T>): Promise<T> {
        this.assertReachable("lock");
        if (this.locked.has(collection)) {
            throw new IngestionInProgressError(`Another ingestion run holds the lock for collection "${collection}".`);
        }
        this.locked.add(collection);
        try {
            return await task();
        } finally {
            this.locked.delete(collection);
        }
    }

    async close(): Promise<void> {
        this.lifecycle.push("close");
        this.closed = true;
    }

    entries(collection: string): IndexEntry[] {
        return [...this.collection(collection).values()];
    }

    private rank(collection: string, embedding: number[], include: (entry: IndexEntry) => boolean): RetrievedChunk[] {
        return [...this.collection(collection).values()]
            .filter(include)
            .map((entry) => ({
                chunkId: entry.chunkId,
                sourceId: entry.sourceId,
                text: entry.text,
                displayName: entry.metadata.displayName,
                kind: entry.metadata.kind,
                similarity: cosineSimilarity(entry.embedding, embedding),
            }))
            .sort((a, b) => b.similarity - a.similarity || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0));
    }

    private collection(name: string): Map<string, IndexEntry> {
        let stored = this.collections.get(name);
        if (!stored) {
            stored = new Map();
            this.collections.set(name, stored);
        }
        return stored;
    }

    private assertReachable(operation: string): void {
        if (!this.reachable) {
            throw new VectorIndexError(`Vector index ${operation} failed: connection refused`);
        }
    }
}

export function tokenizeForEmbedding(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter(Boolean);
}

/**
 * Bag-of-words embedder: every distinct word gets its own dimension (modulo
 * the vector size) in order of first appearance, and vectors are normalized.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "fake-embedding" };
    readonly calls: string[][] = [];
    available = true;
    /** Inputs containing this marker fail with EmbeddingProviderError. */
    failMarker?: string;

    private readonly vocabulary = new Map<string, number>();

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        options?.signal?.throwIfAborted();
        this.calls.push([...texts]);
        if (!this.available) {
            throw new EmbeddingProviderError("fake:embed failed: provider unreachable");
        }
        const marker = this.failMarker;
        if (marker && texts.some((text) => text.includes(marker))) {
            throw new EmbeddingProviderError("fake:embed failed: request timed out");
        }
        return texts.map((text) => this.vectorFor(text));
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [vector] = await this.embedDocuments([query], options);
        return vector ?? [];
    }

    vectorFor(text: string): number[] {
        const vector = new Array<number>(FAKE_DIMENSIONS).fill(0);
        for (const token of tokenizeForEmbedding(text)) {
            let slot = this.vocabulary.get(token);
            if (slot === undefined) {
                slot = this.vocabulary.size % FAKE_DIMENSIONS;
                this.vocabulary.set(token, slot);
            }
            vector[slot] = (vector[slot] ?? 0) + 1;
        }
        const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
        return norm === 0 ? vector : vector.map((value) => value / norm);
    }
}

export type FakeReply = string | ((options: CompletionOptions) => string);

export class FakeChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = { provider: "openai", model: "fake-chat", temperature: 0 };
    readonly calls: CompletionOptions[] = [];
    available = true;

    constructor(private readonly reply: FakeReply = "Here is what I found.") {}

    async complete(options: CompletionOptions): Promise<string> {
        this.calls.push(options);
        if (!this.available) {
            throw new CompletionProviderError("fake:chat failed: request timed out");
        }
        return typeof this.reply === "string" ? this.reply : this.reply(options);
    }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        logging: { level: "info", pretty: false },
        server: { port: 0, corsOrigin: "*", apiKey: "test-secret", rankingsPath: "/nonexistent/rankings.json" },
        database: { databaseUrl: "postgres://localhost/test", table: "index_entries", collection: "faculty_data" },
        ingest: {
            dataDir: "./data",
            generalInfoDir: "general_info",
            chunkSize: 200,
            chunkOverlap: 20,
            prefixFacultyNames: true,
        },
        retrieval: { topK: 12, routing: "keyword", nameMatchLimit: 8 },
        synthesis: { historyLimit: 5, instituteName: "Water Institute", contact: "555-0100" },
        llm: {
            embedding: { provider: "openai", model: "fake-embedding", apiKey: "test-secret" },
            chat: { provider: "openai", model: "fake-chat", apiKey: "test-secret", temperature: 0 },
        },
        ...overrides,
    };
}
