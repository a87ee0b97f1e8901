import type { RetrievedChunk } from "../database/types";

export interface PromptOptions {
    instituteName: string;
    contact?: string;
}

export function buildSystemPrompt({ instituteName, contact }: PromptOptions): string {
    const fallback = contact
        ? `If the context does not contain the answer, say so politely and suggest contacting the ${instituteName} directly (${contact}).`
        : `If the context does not contain the answer, say so politely and suggest contacting the ${instituteName} directly.`;

    return [
        `You are a helpful assistant for the ${instituteName}.`,
        "You answer questions about the institute's faculty members, their research, programs, facilities, partnerships and general information.",
        "Be concise, friendly and accurate. Answer only from the provided context.",
        fallback,
        "Do not invent facts, names or URLs. Only use links that appear word-for-word in the context.",
        "",
        "STAY ON TOPIC:",
        `- Questions about the ${instituteName}, its faculty or its research are on-topic.`,
        "- A question naming a person whose profile appears in the context is always on-topic.",
        `- For anything unrelated, reply only: "I'm designed to help with questions about the ${instituteName}. Feel free to ask about our faculty, research, programs, or anything else related to the institute!"`,
        "",
        "When asked for an expert in an area, recommend up to three relevant faculty as a numbered list:",
        "**Name** - Department. One-sentence summary of relevant expertise.",
        "",
        "Sources are attached separately by the system; do not add a sources section.",
    ].join("\n");
}

export function formatContext(chunks: RetrievedChunk[]): string {
    return chunks
        .map((chunk, index) => `Source ${index + 1}: ${chunk.displayName}\n${chunk.text.trim()}`)
        .join("\n\n");
}

export function buildUserMessage(question: string, chunks: RetrievedChunk[]): string {
    return [
        "Use the provided context to inform your response.",
        "Relevant context:",
        formatContext(chunks),
        `Question: ${question.trim()}`,
    ].join("\n\n");
}
