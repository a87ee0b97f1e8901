import type { NextFunction, Request, Response } from "express";

function extractHeader(req: Request, key: string): string | undefined {
    const value = req.get(key);
    return typeof value === "string" ? value.trim() : undefined;
}

export function extractApiKey(req: Request): string | undefined {
    const headerKey = extractHeader(req, "x-api-key");
    if (headerKey) {
        return headerKey;
    }

    const authHeader = extractHeader(req, "authorization");
    if (authHeader?.toLowerCase().startsWith("bearer ")) {
        return authHeader.slice(7).trim();
    }
    return undefined;
}

/**
 * Without a configured key the guarded routes are disabled outright.
 */
export function createApiKeyMiddleware(expectedKey: string | undefined) {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!expectedKey) {
            res.status(403).json({
                status: "error",
                code: "forbidden",
                message: "This endpoint is disabled until an API key is configured.",
            });
            return;
        }

        const providedKey = extractApiKey(req);
        if (!providedKey || providedKey !== expectedKey) {
            res.status(401).json({ status: "error", code: "unauthorized", message: "Invalid or missing API key." });
            return;
        }

        next();
    };
}
