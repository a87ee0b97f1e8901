import { Router } from "express";
import type { Logger } from "pino";
import { createApiKeyMiddleware } from "../middleware/apiKey";
import type { RouterContext } from "../utils/context";
import { handleChatRequest } from "./chat";
import { handleHealthRequest } from "./health";
import { handleIngestRequest } from "./ingest";
import { handleRankingsRequest } from "./rankings";

export function createApiRouter(context: RouterContext, logger: Logger): Router {
    const router = Router();
    const requireApiKey = createApiKeyMiddleware(context.config.server.apiKey);

    router.get("/", (_req, res) => {
        res.json({ status: `${context.config.synthesis.instituteName} Chatbot API is running` });
    });

    router.get("/health", async (req, res) => {
        await handleHealthRequest(req, res, {
            chatService: context.chatService,
            ingestionBusy: context.isIngestionBusy(),
        });
    });

    router.get("/rankings", async (req, res) => {
        await handleRankingsRequest(req, res, { rankingsPath: context.config.server.rankingsPath }, logger);
    });

    router.post("/chat", async (req, res) => {
        await handleChatRequest(req, res, { chatService: context.chatService }, logger);
    });

    router.post("/ingest", requireApiKey, async (req, res) => {
        await handleIngestRequest(
            req,
            res,
            {
                runIngestion: context.runIngestion,
                isIngestionBusy: context.isIngestionBusy,
                setIngestionBusy: context.setIngestionBusy,
            },
            logger
        );
    });

    return router;
}
