import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { ChatService } from "../../query/chatService";
import { sendError, sendInvalidRequest } from "../utils/errors";

export interface ChatRouteContext {
    chatService: ChatService;
}

const conversationTurnSchema = z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
});

export const chatRequestSchema = z.object({
    message: z.string().trim().min(1, "message must not be empty"),
    conversation_history: z.array(conversationTurnSchema).nullish(),
});

export interface ChatResponseBody {
    response: string;
    sources: string[];
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

export async function handleChatRequest(
    req: Request,
    res: Response,
    context: ChatRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
        sendInvalidRequest(res, describeIssues(parsed.error));
        return;
    }

    // abandon provider calls once the caller has gone away
    const controller = new AbortController();
    res.on("close", () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });

    try {
        const answer = await context.chatService.chat(
            {
                message: parsed.data.message,
                history: parsed.data.conversation_history ?? [],
            },
            controller.signal
        );

        const body: ChatResponseBody = { response: answer.text, sources: answer.sources };
        res.json(body);
    } catch (error) {
        if (controller.signal.aborted) {
            logger.info("Client disconnected before the chat answer was ready.");
            return;
        }
        sendError(res, error, logger, "Chat request");
    }
}
