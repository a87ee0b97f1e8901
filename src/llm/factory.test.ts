import { describe, expect, it } from "vitest";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { ConfigurationError } from "../errors";
import { createChatProvider, createEmbeddingProvider } from "./factory";
import { AnthropicChatProvider } from "./providers/anthropic";
import { OpenAIEmbeddingProvider } from "./providers/openai";

const embedding: EmbeddingModelConfig = { provider: "openai", model: "text-embedding-3-small", apiKey: "test-secret" };
const chat: ChatModelConfig = { provider: "anthropic", model: "claude-test", apiKey: "test-secret", temperature: 0.7 };

describe("createEmbeddingProvider", () => {
    it("builds the configured provider", () => {
        expect(createEmbeddingProvider(embedding)).toBeInstanceOf(OpenAIEmbeddingProvider);
    });

    it("rejects a provider without an embeddings API", () => {
        expect(() => createEmbeddingProvider({ ...embedding, provider: "anthropic" })).toThrow(
            'Embedding provider "anthropic" is not supported.'
        );
    });

    it("requires an API key", () => {
        expect(() => createEmbeddingProvider({ ...embedding, apiKey: undefined })).toThrow(ConfigurationError);
    });
});

describe("createChatProvider", () => {
    it("builds the configured provider", () => {
        expect(createChatProvider(chat)).toBeInstanceOf(AnthropicChatProvider);
    });

    it("requires an API key", () => {
        expect(() => createChatProvider({ ...chat, apiKey: undefined })).toThrow(
            "Anthropic API key is required for chat completions."
        );
    });
});
