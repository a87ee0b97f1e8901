import type { ChatMessage } from "../llm/types";

const FOLLOW_UP_PHRASES = new Set([
    "yes",
    "yeah",
    "yep",
    "sure",
    "ok",
    "okay",
    "please",
    "more",
    "show more",
    "yes please",
    "show me more",
    "tell me more",
    "yes i would",
    "yes please show me more",
    "go ahead",
]);

function normalize(message: string): string {
    return message.toLowerCase().trim().replace(/[.!]+$/, "").trim();
}

export function isFollowUp(message: string): boolean {
    return FOLLOW_UP_PHRASES.has(normalize(message));
}

/**
 * Text to search with. A bare follow-up ("yes", "tell me more") searches with
 * the latest substantive user turn instead; otherwise the message itself.
 */
export function resolveRetrievalQuery(message: string, history: ChatMessage[]): string {
    if (!isFollowUp(message)) {
        return message;
    }

    for (let i = history.length - 1; i >= 0; i -= 1) {
        const turn = history[i];
        if (turn && turn.role === "user" && turn.content.trim() && !isFollowUp(turn.content)) {
            return turn.content;
        }
    }

    return message;
}
