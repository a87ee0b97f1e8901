import { readFile } from "node:fs/promises";
import type { Request, Response } from "express";
import type { Logger } from "pino";
import { sendError } from "../utils/errors";

export interface RankingsRouteContext {
    rankingsPath: string;
}

export const EMPTY_RANKINGS = {
    updated: null,
    overall: [],
    categories: {},
    message: "Rankings are being generated. Please check back soon.",
} as const;

function isMissingFile(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Serves the rankings file produced by the offline ranking job as-is.
 */
export async function handleRankingsRequest(
    _req: Request,
    res: Response,
    context: RankingsRouteContext,
    logger: Logger
): Promise<void> {
    let raw: string;
    try {
        raw = await readFile(context.rankingsPath, "utf8");
    } catch (error) {
        if (isMissingFile(error)) {
            res.json(EMPTY_RANKINGS);
            return;
        }
        sendError(res, error, logger, "Rankings request");
        return;
    }

    try {
        const rankings: unknown = JSON.parse(raw);
        res.json(rankings);
    } catch (error) {
        sendError(res, error, logger, "Rankings request");
    }
}
