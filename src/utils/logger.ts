import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig): Logger {
    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport: config.pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                    },
                }
            : undefined,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({
            level: process.env.INSTITUTE_RAG_LOGGING_LEVEL ?? "info",
            base: undefined,
        });
    }
    return loggerInstance;
}

export function childLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
    return typeof logger.child === "function" ? logger.child(bindings) : logger;
}
