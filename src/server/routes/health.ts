import type { Request, Response } from "express";
import type { ChatService, HealthStatus } from "../../query/chatService";

export interface HealthRouteContext {
    chatService: ChatService;
    ingestionBusy: boolean;
}

export interface HealthResponseBody {
    status: HealthStatus;
    reachable: boolean;
    collection_count: number;
    ingestionBusy: boolean;
}

export async function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): Promise<void> {
    const health = await context.chatService.health();
    const body: HealthResponseBody = {
        status: health.status,
        reachable: health.reachable,
        collection_count: health.collectionCount,
        ingestionBusy: context.ingestionBusy,
    };
    res.status(health.reachable ? 200 : 503).json(body);
}
