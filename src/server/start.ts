import { getLogger } from "../utils/logger";
import { startServer, type RunningServer } from "./server";

function registerShutdown(server: RunningServer): void {
    let closing = false;

    const shutdown = (signal: NodeJS.Signals) => {
        if (closing) {
            return;
        }
        closing = true;

        const logger = getLogger();
        logger.info({ signal }, "Shutting down.");
        server.close().then(
            () => {
                logger.info("Server closed.");
            },
            (error: unknown) => {
                logger.error({ err: error }, "Failed to close server cleanly.");
                process.exitCode = 1;
            }
        );
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

startServer({ configPath: process.env.INSTITUTE_RAG_CONFIG_PATH })
    .then(registerShutdown)
    .catch((error: unknown) => {
        getLogger().fatal({ err: error }, "Failed to start server.");
        process.exitCode = 1;
    });
