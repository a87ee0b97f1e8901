import { embedMany, generateText, type CoreMessage, type EmbeddingModel, type LanguageModel } from "ai";
import type { ChatModelConfig } from "../config/types";
import type { ChatMessage, CompletionOptions } from "./types";

// retries are owned by BaseEmbeddingProvider/BaseChatProvider, never the SDK
const SDK_MAX_RETRIES = 0;

export function toCoreMessages(messages: ChatMessage[]): CoreMessage[] {
    return messages.map((message): CoreMessage =>
        message.role === "user"
            ? { role: "user", content: message.content }
            : { role: "assistant", content: message.content }
    );
}

export async function embedWithModel(
    model: EmbeddingModel<string>,
    values: string[],
    signal?: AbortSignal
): Promise<number[][]> {
    const { embeddings } = await embedMany({
        model,
        values,
        abortSignal: signal,
        maxRetries: SDK_MAX_RETRIES,
    });

    return embeddings;
}

export async function completeWithModel(
    model: LanguageModel,
    config: ChatModelConfig,
    options: CompletionOptions
): Promise<string> {
    const { text } = await generateText({
        model,
        system: options.systemPrompt,
        messages: toCoreMessages(options.messages),
        temperature: options.temperature ?? config.temperature,
        maxTokens: options.maxTokens ?? config.maxOutputTokens,
        abortSignal: options.signal,
        maxRetries: SDK_MAX_RETRIES,
    });

    return text;
}
