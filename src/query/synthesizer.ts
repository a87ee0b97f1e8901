import type { Logger } from "pino";
import type { SynthesisConfig } from "../config/types";
import type { RetrievedChunk } from "../database/types";
import { SynthesisUnavailableError, errorMessage } from "../errors";
import { buildSystemPrompt, buildUserMessage } from "../llm/prompt";
import type { ChatMessage, ChatProvider } from "../llm/types";
import { childLogger, getLogger } from "../utils/logger";

export interface Answer {
    text: string;
    sources: string[];
}

export interface SynthesizeOptions {
    signal?: AbortSignal;
}

/**
 * Most recent `limit` turns, oldest first. A limit of zero drops all history.
 */
export function truncateHistory(history: ChatMessage[], limit: number): ChatMessage[] {
    if (limit <= 0) {
        return [];
    }
    return history.slice(-limit);
}

export function collectSources(chunks: RetrievedChunk[]): string[] {
    return [...new Set(chunks.map((chunk) => chunk.displayName))];
}

export class AnswerSynthesizer {
    private readonly logger: Logger;
    private readonly systemPrompt: string;

    constructor(
        private readonly chat: ChatProvider,
        private readonly config: SynthesisConfig,
        logger?: Logger
    ) {
        this.logger = childLogger(logger ?? getLogger(), { module: "query" });
        this.systemPrompt = buildSystemPrompt(config);
    }

    async synthesize(
        query: string,
        retrieved: RetrievedChunk[],
        history: ChatMessage[],
        options: SynthesizeOptions = {}
    ): Promise<Answer> {
        const messages: ChatMessage[] = [
            ...truncateHistory(history, this.config.historyLimit),
            { role: "user", content: buildUserMessage(query, retrieved) },
        ];

        let text: string;
        try {
            text = await this.chat.complete({
                systemPrompt: this.systemPrompt,
                messages,
                signal: options.signal,
            });
        } catch (error) {
            this.logger.error({ err: error }, "Answer synthesis failed");
            throw new SynthesisUnavailableError(`Answer synthesis unavailable: ${errorMessage(error)}`, { cause: error });
        }

        return { text, sources: collectSources(retrieved) };
    }
}
