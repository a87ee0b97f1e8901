export type DocumentKind = "faculty" | "general";

export interface EntryMetadata {
    kind: DocumentKind;
    displayName: string;
    sourceId: string;
    chunkIndex: number;
    file?: string;
}

/**
 * One persisted chunk. `text` is the verbatim chunk; `embeddingText` is what
 * was embedded and may carry a display-name prefix.
 */
export interface IndexEntry {
    chunkId: string;
    sourceId: string;
    text: string;
    embeddingText: string;
    embedding: number[];
    metadata: EntryMetadata;
}

export interface RetrievedChunk {
    chunkId: string;
    sourceId: string;
    text: string;
    displayName: string;
    kind: DocumentKind;
    similarity: number;
}

/**
 * Structured predicate over entry metadata; every field that is set must hold.
 */
export interface MetadataFilter {
    kind?: DocumentKind;
    sourceId?: string;
    sourceIds?: string[];
}

export interface VectorIndex {
    /** Creates the backing storage when absent. Safe to call repeatedly. */
    ensureSchema(): Promise<void>;
    verifyConnection(): Promise<void>;
    upsert(collection: string, entries: IndexEntry[]): Promise<void>;
    /** Removes matching entries and resolves with how many were removed. */
    delete(collection: string, filter: MetadataFilter): Promise<number>;
    /** Nearest neighbours by cosine similarity, best first, at most `k`. */
    query(collection: string, embedding: number[], k: number, filter?: MetadataFilter): Promise<RetrievedChunk[]>;
    count(collection: string): Promise<number>;
    listSourceIds(collection: string): Promise<string[]>;
    /**
     * Faculty entries whose display name contains one of `tokens` as a whole
     * word (case-insensitive), scored against `embedding`.
     */
    findByDisplayNameTokens(collection: string, tokens: string[], embedding: number[], limit: number): Promise<RetrievedChunk[]>;
    /**
     * Runs `task` while holding the collection's writer lock; rejects with
     * IngestionInProgressError when another holder exists.
     */
    withExclusiveLock<T>(collection: string, task: () => Promise<T>): Promise<T>;
    close(): Promise<void>;
}
