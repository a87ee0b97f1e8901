import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import type { VectorIndex } from "../database/types";
import { errorMessage } from "../errors";
import type { ChatMessage } from "../llm/types";
import { childLogger, getLogger } from "../utils/logger";
import { extractNameTokens, type QueryKindClassifier } from "./classifier";
import { resolveRetrievalQuery } from "./followUp";
import type { Retriever } from "./retriever";
import type { Answer, AnswerSynthesizer } from "./synthesizer";

export interface ChatRequest {
    message: string;
    history: ChatMessage[];
}

export type HealthStatus = "healthy" | "empty" | "unavailable";

export interface HealthReport {
    status: HealthStatus;
    reachable: boolean;
    collectionCount: number;
    error?: string;
}

export interface ChatServiceDependencies {
    retriever: Retriever;
    synthesizer: AnswerSynthesizer;
    classifier: QueryKindClassifier;
    index: VectorIndex;
    collection: string;
    retrieval: RetrievalConfig;
    noContextAnswer: string;
    logger?: Logger;
}

export function noContextAnswerFor(instituteName: string, contact?: string): string {
    const reach = contact ? ` You can also contact the ${instituteName} directly at ${contact}.` : "";
    return `I couldn't find any information about that in the ${instituteName} knowledge base yet.${reach}`;
}

/**
 * Stateless façade: every call resolves the search text, retrieves, then
 * synthesizes. Nothing is cached between requests.
 */
export class ChatService {
    private readonly logger: Logger;

    constructor(private readonly deps: ChatServiceDependencies) {
        this.logger = childLogger(deps.logger ?? getLogger(), { module: "query" });
    }

    async chat(request: ChatRequest, signal?: AbortSignal): Promise<Answer> {
        const searchText = resolveRetrievalQuery(request.message, request.history);
        const kind = this.deps.classifier.classify(searchText);

        const { chunks, usedFallback } = await this.deps.retriever.retrieveForQuestion(searchText, {
            k: this.deps.retrieval.topK,
            filter: kind ? { kind } : undefined,
            nameTokens: extractNameTokens(request.message),
            nameMatchLimit: this.deps.retrieval.nameMatchLimit,
            signal,
        });

        this.logger.info(
            {
                followUp: searchText !== request.message,
                kind: kind ?? "any",
                usedFallback,
                chunks: chunks.length,
            },
            "Retrieved context for chat request"
        );

        if (chunks.length === 0) {
            return { text: this.deps.noContextAnswer, sources: [] };
        }

        return this.deps.synthesizer.synthesize(request.message, chunks, request.history, { signal });
    }

    async health(): Promise<HealthReport> {
        try {
            const collectionCount = await this.deps.index.count(this.deps.collection);
            return {
                status: collectionCount > 0 ? "healthy" : "empty",
                reachable: true,
                collectionCount,
            };
        } catch (error) {
            this.logger.warn({ err: error }, "Vector index health check failed");
            return { status: "unavailable", reachable: false, collectionCount: 0, error: errorMessage(error) };
        }
    }
}
