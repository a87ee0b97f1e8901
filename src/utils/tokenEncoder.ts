import { get_encoding, encoding_for_model, type Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

const SPECIAL_TOKENS = [
    "<|endoftext|>",
    "<|endofprompt|>",
    "<|fim_prefix|>",
    "<|fim_middle|>",
    "<|fim_suffix|>",
] as const;

// tiktoken throws on literal special tokens in input text
function sanitizeSpecialTokens(text: string): string {
    let sanitized = text;
    for (const token of SPECIAL_TOKENS) {
        sanitized = sanitized.split(token).join(token.replace(/[<>|]/g, ""));
    }
    return sanitized;
}

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        return getEncoder(model).encode(sanitizeSpecialTokens(text)).length;
    } catch {
        // roughly four characters per token for English prose
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[], model?: string): number {
    return texts.reduce((sum, current) => sum + countTokens(current, model), 0);
}
