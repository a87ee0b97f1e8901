export type ErrorCode =
    | "configuration_error"
    | "chunking_error"
    | "embedding_provider_error"
    | "completion_provider_error"
    | "vector_index_error"
    | "retrieval_unavailable"
    | "synthesis_unavailable"
    | "ingestion_in_progress";

/**
 * Base class for every failure the service distinguishes. The `code` is stable
 * and is what the HTTP layer reports to callers.
 */
export abstract class InstituteRagError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing credentials, endpoints or malformed settings. Fatal at startup.
 */
export class ConfigurationError extends InstituteRagError {
    readonly code = "configuration_error";
}

/**
 * A source document could not be read or split. Skipped during ingestion.
 */
export class ChunkingError extends InstituteRagError {
    readonly code = "chunking_error";

    constructor(message: string, public readonly sourceId?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class EmbeddingProviderError extends InstituteRagError {
    readonly code = "embedding_provider_error";
}

export class CompletionProviderError extends InstituteRagError {
    readonly code = "completion_provider_error";
}

export class VectorIndexError extends InstituteRagError {
    readonly code = "vector_index_error";
}

/**
 * Raised by the retriever when the query cannot be embedded or the index
 * cannot be searched. Never downgraded to an empty result.
 */
export class RetrievalUnavailableError extends InstituteRagError {
    readonly code = "retrieval_unavailable";
}

/**
 * Raised by the synthesizer when the completion provider fails or times out.
 */
export class SynthesisUnavailableError extends InstituteRagError {
    readonly code = "synthesis_unavailable";
}

export class IngestionInProgressError extends InstituteRagError {
    readonly code = "ingestion_in_progress";
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
