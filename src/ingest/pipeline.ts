import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import type { IndexEntry, VectorIndex } from "../database/types";
import { EmbeddingProviderError, InstituteRagError, errorMessage, type ErrorCode } from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import { childLogger, getLogger } from "../utils/logger";
import { chunkIdFor, chunkText } from "./chunker";
import { loadSourceDocuments, type SourceDocument } from "./sources";

export interface IngestSettings {
    collection: string;
    chunkSize: number;
    chunkOverlap: number;
    prefixFacultyNames: boolean;
}

export interface IngestDependencies {
    embedding: EmbeddingProvider;
    index: VectorIndex;
    logger?: Logger;
}

export interface IngestOptions {
    /** Clear the whole collection before writing. */
    rebuild?: boolean;
    /** Source ids that are not being ingested this run but must not be pruned. */
    retainSourceIds?: string[];
    signal?: AbortSignal;
}

export interface IngestionError {
    sourceId: string;
    code: ErrorCode;
    message: string;
}

export interface IngestionReport {
    documentsProcessed: number;
    documentsSkipped: number;
    chunksCreated: number;
    entriesPruned: number;
    errors: IngestionError[];
    durationMs: number;
}

type DocumentOutcome =
    | { status: "indexed"; chunks: number }
    | { status: "empty" }
    | { status: "failed"; error: IngestionError };

/**
 * Faculty chunks that never mention the person get the name on its own line,
 * so a query naming them still lands near every chunk of the profile.
 */
export function embeddingTextFor(document: SourceDocument, chunk: string, prefixFacultyNames: boolean): string {
    if (!prefixFacultyNames || document.kind !== "faculty") {
        return chunk;
    }
    if (chunk.toLowerCase().includes(document.displayName.toLowerCase())) {
        return chunk;
    }
    return `${document.displayName}\n${chunk}`;
}

export function buildEntries(document: SourceDocument, chunks: string[], embeddings: number[][], prefixFacultyNames: boolean): IndexEntry[] {
    return chunks.map((text, index) => ({
        chunkId: chunkIdFor(document.id, index),
        sourceId: document.id,
        text,
        embeddingText: embeddingTextFor(document, text, prefixFacultyNames),
        embedding: embeddings[index] ?? [],
        metadata: {
            kind: document.kind,
            displayName: document.displayName,
            sourceId: document.id,
            chunkIndex: index,
            file: document.relativePath,
        },
    }));
}

function toIngestionError(sourceId: string, error: unknown): IngestionError {
    if (error instanceof InstituteRagError) {
        return { sourceId, code: error.code, message: error.message };
    }
    return { sourceId, code: "embedding_provider_error", message: errorMessage(error) };
}

async function ingestDocument(
    document: SourceDocument,
    settings: IngestSettings,
    deps: IngestDependencies,
    logger: Logger,
    signal?: AbortSignal
): Promise<DocumentOutcome> {
    let chunks: string[];
    try {
        chunks = chunkText(document.rawText, settings.chunkSize, settings.chunkOverlap);
    } catch (error) {
        logger.error({ err: error }, "Chunking failed");
        return { status: "failed", error: toIngestionError(document.id, error) };
    }

    // a document's prior entries are gone before its new chunks are embedded
    const removed = await deps.index.delete(settings.collection, { sourceId: document.id });
    if (removed > 0) {
        logger.debug(`Removed ${removed} previously indexed entr${removed === 1 ? "y" : "ies"}`);
    }

    if (chunks.length === 0) {
        logger.warn("No chunks were generated for this document. Skipping.");
        return { status: "empty" };
    }

    let embeddings: number[][];
    try {
        const inputs = chunks.map((chunk) => embeddingTextFor(document, chunk, settings.prefixFacultyNames));
        embeddings = await deps.embedding.embedDocuments(inputs, { signal });
        if (embeddings.length !== chunks.length) {
            throw new EmbeddingProviderError(`Received ${embeddings.length} embeddings for ${chunks.length} chunks.`);
        }
    } catch (error) {
        if (signal?.aborted) {
            throw error;
        }
        logger.error({ err: error }, "Embedding failed; the document has no indexed entries until the next run");
        return { status: "failed", error: toIngestionError(document.id, error) };
    }

    await deps.index.upsert(
        settings.collection,
        buildEntries(document, chunks, embeddings, settings.prefixFacultyNames)
    );

    logger.info(`Indexed ${chunks.length} chunk${chunks.length === 1 ? "" : "s"}`);
    return { status: "indexed", chunks: chunks.length };
}

async function pruneRemovedSources(
    currentSourceIds: string[],
    settings: IngestSettings,
    index: VectorIndex,
    logger: Logger
): Promise<number> {
    const current = new Set(currentSourceIds);
    const stale = (await index.listSourceIds(settings.collection)).filter((sourceId) => !current.has(sourceId));

    if (stale.length === 0) {
        return 0;
    }

    const removed = await index.delete(settings.collection, { sourceIds: stale });
    logger.info(`Pruned ${removed} entr${removed === 1 ? "y" : "ies"} from ${stale.length} removed source document${stale.length === 1 ? "" : "s"}`);
    return removed;
}

/**
 * Chunks, embeds and writes every document under the collection's writer
 * lock. Embedding and chunking failures are recorded per document; index
 * failures abort the run.
 */
export async function ingest(
    documents: SourceDocument[],
    settings: IngestSettings,
    deps: IngestDependencies,
    options: IngestOptions = {}
): Promise<IngestionReport> {
    const startedAt = Date.now();
    const logger = childLogger(deps.logger ?? getLogger(), { module: "ingest" });

    return deps.index.withExclusiveLock(settings.collection, async () => {
        const report: IngestionReport = {
            documentsProcessed: 0,
            documentsSkipped: 0,
            chunksCreated: 0,
            entriesPruned: 0,
            errors: [],
            durationMs: 0,
        };

        if (options.rebuild) {
            const cleared = await deps.index.delete(settings.collection, {});
            logger.info(`Cleared ${cleared} entr${cleared === 1 ? "y" : "ies"} before rebuilding "${settings.collection}"`);
        }

        logger.info(`Processing ${documents.length} document${documents.length === 1 ? "" : "s"}.`);

        for (const document of documents) {
            options.signal?.throwIfAborted();
            const documentLogger = childLogger(logger, { source: document.id });
            const outcome = await ingestDocument(document, settings, deps, documentLogger, options.signal);

            switch (outcome.status) {
                case "indexed":
                    report.documentsProcessed += 1;
                    report.chunksCreated += outcome.chunks;
                    break;
                case "empty":
                    report.documentsSkipped += 1;
                    break;
                case "failed":
                    report.documentsSkipped += 1;
                    report.errors.push(outcome.error);
                    break;
            }
        }

        if (!options.rebuild) {
            const currentSourceIds = [
                ...documents.map((document) => document.id),
                ...(options.retainSourceIds ?? []),
            ];
            report.entriesPruned = await pruneRemovedSources(currentSourceIds, settings, deps.index, logger);
        }

        report.durationMs = Date.now() - startedAt;
        logger.info(
            `Ingestion finished: ${report.documentsProcessed} processed, ${report.documentsSkipped} skipped, ${report.chunksCreated} chunks.`
        );
        return report;
    });
}

export function ingestSettingsFrom(config: AppConfig): IngestSettings {
    return {
        collection: config.database.collection,
        chunkSize: config.ingest.chunkSize,
        chunkOverlap: config.ingest.chunkOverlap,
        prefixFacultyNames: config.ingest.prefixFacultyNames,
    };
}

/**
 * Loads the data directory and ingests it. Unreadable files count as skipped
 * documents with a chunking error each.
 */
export async function runIngestionPipeline(
    appConfig: AppConfig,
    embedding: EmbeddingProvider,
    index: VectorIndex,
    logger?: Logger,
    options: IngestOptions = {}
): Promise<IngestionReport> {
    const baseLogger = logger ?? getLogger();
    const { documents, failures } = await loadSourceDocuments(
        {
            dataDir: appConfig.ingest.dataDir,
            generalInfoDir: appConfig.ingest.generalInfoDir,
            instituteName: appConfig.synthesis.instituteName,
        },
        childLogger(baseLogger, { module: "ingest" })
    );

    // a file that exists but could not be read keeps its previous entries
    const unreadable = failures.flatMap((failure) => (failure.sourceId ? [failure.sourceId] : []));
    const report = await ingest(
        documents,
        ingestSettingsFrom(appConfig),
        { embedding, index, logger: baseLogger },
        { ...options, retainSourceIds: [...(options.retainSourceIds ?? []), ...unreadable] }
    );

    return {
        ...report,
        documentsSkipped: report.documentsSkipped + failures.length,
        errors: [
            ...failures.map((failure): IngestionError => ({
                sourceId: failure.sourceId ?? "unknown",
                code: failure.code,
                message: failure.message,
            })),
            ...report.errors,
        ],
    };
}
