import type { NextFunction, Request, Response } from "express";

export function createCors(origin: string) {
    return (req: Request, res: Response, next: NextFunction): void => {
        res.setHeader("Access-Control-Allow-Origin", origin);
        res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, x-api-key");
        if (origin !== "*") {
            res.setHeader("Vary", "Origin");
        }

        if (req.method === "OPTIONS") {
            res.sendStatus(204);
            return;
        }

        next();
    };
}
