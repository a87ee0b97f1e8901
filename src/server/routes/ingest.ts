import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { IngestionRunner } from "../utils/context";
import { sendError, sendInvalidRequest } from "../utils/errors";

export interface IngestRouteContext {
    runIngestion: IngestionRunner;
    isIngestionBusy: () => boolean;
    setIngestionBusy: (busy: boolean) => void;
}

const ingestRequestSchema = z
    .object({
        rebuild: z.boolean().optional(),
    })
    .optional();

export async function handleIngestRequest(
    req: Request,
    res: Response,
    context: IngestRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = ingestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
        sendInvalidRequest(res, "rebuild must be a boolean");
        return;
    }

    if (context.isIngestionBusy()) {
        res.status(409).json({
            status: "error",
            code: "ingestion_in_progress",
            message: "Ingestion already running.",
        });
        return;
    }

    context.setIngestionBusy(true);
    const rebuild = parsed.data?.rebuild ?? false;

    try {
        logger.info({ rebuild }, "Starting ingestion.");
        const report = await context.runIngestion({ rebuild });
        logger.info({ report }, "Ingestion completed.");
        res.json({ status: "ok", report });
    } catch (error) {
        sendError(res, error, logger, "Ingestion");
    } finally {
        context.setIngestionBusy(false);
    }
}
