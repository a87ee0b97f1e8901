import pLimit from "p-limit";
import pRetry, { type FailedAttemptError } from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, ProviderLimitsConfig } from "../config/types";
import { CompletionProviderError, EmbeddingProviderError, errorMessage } from "../errors";
import { batchChunks } from "../utils/batchChunks";
import { attemptSignal } from "../utils/providerUtils";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, CompletionOptions, EmbedOptions, EmbeddingProvider } from "./types";

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Request/token rate limiting plus bounded retries with backoff and a
 * per-attempt timeout, shared by embedding and chat providers.
 */
abstract class ScheduledProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;
    protected readonly retryDelayMs: number;
    protected readonly timeoutMs?: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    protected constructor(
        limits: ProviderLimitsConfig,
        timeoutMs: number | undefined,
        protected readonly logger?: Logger
    ) {
        this.retries = Math.max(0, limits.retries ?? 1);
        this.retryDelayMs = Math.max(0, limits.retryDelayMs ?? 1_000);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);
        this.timeoutMs = timeoutMs;

        this.requestLimiter = createRateLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(this.concurrencyLimit, Math.ceil(limits.maxTokensPerMinute));
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    protected get tracksTokens(): boolean {
        return this.tokenLimiter !== undefined;
    }

    protected async schedule<T>(
        tokens: number,
        task: (signal: AbortSignal | undefined) => Promise<T>,
        { logPrefix, signal }: ScheduleOptions
    ): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(() => task(attemptSignal(this.timeoutMs, signal)), {
                retries: this.retries,
                minTimeout: this.retryDelayMs,
                maxTimeout: Math.max(this.retryDelayMs, this.retryDelayMs * 4),
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends ScheduledProvider implements EmbeddingProvider {
    protected readonly batchSize: number;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderLimitsConfig,
        logger?: Logger
    ) {
        super(limits, config.timeoutMs, logger);
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
    }

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const logPrefix = `${this.config.provider}:embed`;
        const batches = batchChunks(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: this.tracksTokens ? countTokensInBatch(batch, this.config.model) : 0,
        }));

        const limit = pLimit(this.concurrencyLimit);

        try {
            const results = await Promise.all(
                batches.map(({ batch, idx, tokens }) =>
                    limit(async () => {
                        const embeddings = await this.schedule(
                            tokens,
                            (signal) => this.sendEmbeddingRequest(batch, { signal }),
                            { logPrefix, signal: options?.signal }
                        );
                        if (embeddings.length !== batch.length) {
                            throw new EmbeddingProviderError(
                                `${logPrefix} returned ${embeddings.length} vectors for ${batch.length} inputs.`
                            );
                        }
                        return { idx, embeddings };
                    })
                )
            );

            const vectors = results.sort((a, b) => a.idx - b.idx).flatMap((entry) => entry.embeddings);
            assertConsistentDimensions(vectors, logPrefix);
            return vectors;
        } catch (error) {
            if (error instanceof EmbeddingProviderError) {
                throw error;
            }
            throw new EmbeddingProviderError(`${logPrefix} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        if (!embedding) {
            throw new EmbeddingProviderError(`${this.config.provider}:embed returned no vector for the query.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider extends ScheduledProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderLimitsConfig,
        logger?: Logger
    ) {
        super(limits, config.timeoutMs, logger);
    }

    async complete(options: CompletionOptions): Promise<string> {
        const logPrefix = `${this.config.provider}:chat`;
        const tokens = this.tracksTokens ? this.estimateChatTokens(options) : 0;

        try {
            const text = await this.schedule(
                tokens,
                (signal) => this.sendCompletionRequest({ ...options, signal }),
                { logPrefix, signal: options.signal }
            );

            if (!text.trim()) {
                throw new CompletionProviderError(`${logPrefix} returned an empty completion.`);
            }
            return text;
        } catch (error) {
            if (error instanceof CompletionProviderError) {
                throw error;
            }
            throw new CompletionProviderError(`${logPrefix} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    protected estimateChatTokens(options: CompletionOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.systemPrompt, model);
        tokens += options.messages.reduce((sum, message) => sum + countTokens(message.content, model), 0);
        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 1_000;
        return tokens;
    }

    protected abstract sendCompletionRequest(options: CompletionOptions): Promise<string>;
}

function assertConsistentDimensions(vectors: number[][], logPrefix: string): void {
    const [first] = vectors;
    if (!first) {
        return;
    }

    const dimensions = first.length;
    if (dimensions === 0 || vectors.some((vector) => vector.length !== dimensions)) {
        throw new EmbeddingProviderError(`${logPrefix} returned vectors of inconsistent or zero length.`);
    }
}
