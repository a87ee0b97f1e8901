import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import { ConfigurationError } from "../../errors";
import type { CompletionOptions } from "../types";
import { completeWithModel } from "../sdk";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigurationError("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 1,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
        });
    }

    protected async sendCompletionRequest(options: CompletionOptions): Promise<string> {
        return completeWithModel(this.sdk(this.config.model), this.config, options);
    }
}
