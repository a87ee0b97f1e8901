import type { Response } from "express";
import type { Logger } from "pino";
import {
    IngestionInProgressError,
    RetrievalUnavailableError,
    SynthesisUnavailableError,
} from "../../errors";

export interface ErrorBody {
    status: "error";
    code: string;
    message: string;
}

interface MappedError {
    statusCode: number;
    body: ErrorBody;
}

export function mapError(error: unknown): MappedError {
    if (error instanceof RetrievalUnavailableError) {
        return {
            statusCode: 503,
            body: { status: "error", code: error.code, message: "Retrieval is unavailable; the knowledge base cannot be searched right now." },
        };
    }
    if (error instanceof SynthesisUnavailableError) {
        return {
            statusCode: 502,
            body: { status: "error", code: error.code, message: "The answer service is unavailable right now." },
        };
    }
    if (error instanceof IngestionInProgressError) {
        return { statusCode: 409, body: { status: "error", code: error.code, message: error.message } };
    }
    return {
        statusCode: 500,
        body: { status: "error", code: "internal_error", message: "Unexpected server error." },
    };
}

export function sendError(res: Response, error: unknown, logger: Logger, context: string): void {
    const { statusCode, body } = mapError(error);
    if (statusCode >= 500) {
        logger.error({ err: error, statusCode }, `${context} failed`);
    } else {
        logger.warn({ err: error, statusCode }, `${context} rejected`);
    }

    if (res.headersSent || res.writableEnded) {
        return;
    }
    res.status(statusCode).json(body);
}

export function sendInvalidRequest(res: Response, message: string, statusCode = 400): void {
    const body: ErrorBody = { status: "error", code: "invalid_request", message };
    res.status(statusCode).json(body);
}
