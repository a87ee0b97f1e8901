import type { Server } from "node:http";
import express, { type ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import type { AppConfig } from "../config/types";
import { createPostgresStore } from "../database/client";
import type { VectorIndex } from "../database/types";
import { runIngestionPipeline } from "../ingest/pipeline";
import { createLLMClient } from "../llm/factory";
import type { ChatProvider, EmbeddingProvider } from "../llm/types";
import { ChatService, noContextAnswerFor } from "../query/chatService";
import { createClassifier } from "../query/classifier";
import { Retriever } from "../query/retriever";
import { AnswerSynthesizer } from "../query/synthesizer";
import { childLogger, configureLogger } from "../utils/logger";
import { createApiRouter } from "./routes/router";
import { createCors } from "./utils/cors";
import { type ServerContext, createRouterContext } from "./utils/context";
import { sendError, sendInvalidRequest } from "./utils/errors";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

export interface Collaborators {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
    index: VectorIndex;
}

interface BodyParserError {
    status: number;
    type?: unknown;
    message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return (
        error instanceof Error &&
        "status" in error &&
        typeof error.status === "number" &&
        error.status >= 400 &&
        error.status < 500
    );
}

/**
 * Wires retriever, synthesizer and chat service around explicit collaborators.
 */
export function createServerContext(config: AppConfig, collaborators: Collaborators, logger: Logger): ServerContext {
    const { embedding, chat, index } = collaborators;

    const chatService = new ChatService({
        retriever: new Retriever(embedding, index, config.database.collection, logger),
        synthesizer: new AnswerSynthesizer(chat, config.synthesis, logger),
        classifier: createClassifier(config.retrieval.routing),
        index,
        collection: config.database.collection,
        retrieval: config.retrieval,
        noContextAnswer: noContextAnswerFor(config.synthesis.instituteName, config.synthesis.contact),
        logger,
    });

    return {
        config,
        chatService,
        index,
        runIngestion: (options) => runIngestionPipeline(config, embedding, index, logger, options),
        ingestionBusy: false,
        logger,
    };
}

export function createApp(context: ServerContext): ExpressApp {
    const logger = childLogger(context.logger, { module: "server" });

    const app = express();
    app.disable("x-powered-by");
    app.use(createCors(context.config.server.corsOrigin));
    app.use(express.json({ limit: "1mb" }));

    app.use(createApiRouter(createRouterContext(context), logger));

    const handleErrors: ErrorRequestHandler = (error: unknown, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (isBodyParserError(error)) {
            // body-parser marks unparsable JSON; size and charset failures keep their own status
            const message = error.type === "entity.parse.failed" ? "Request body must be valid JSON." : error.message;
            sendInvalidRequest(res, message, error.status);
            return;
        }
        sendError(res, error, logger, "Request");
    };
    app.use(handleErrors);

    return app;
}

/**
 * Creates the index storage when missing, then checks that it answers.
 * Closes the index when either step fails.
 */
export async function openIndex(index: VectorIndex): Promise<void> {
    try {
        await index.ensureSchema();
        await index.verifyConnection();
    } catch (error) {
        await index.close();
        throw error;
    }
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const config = await loadAppConfig(options.configPath);

    const logger = configureLogger(config.logging);
    logger.info("Loaded server configuration.");

    const llm = createLLMClient(config.llm, logger);
    const index = createPostgresStore(config.database, childLogger(logger, { module: "database" }));

    await openIndex(index);

    const context = createServerContext(config, { embedding: llm.embedding, chat: llm.chat, index }, logger);
    return { app: createApp(context), context };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const logger = context.logger;
    const requestedPort = options.port ?? context.config.server.port;

    let server: Server;
    try {
        server = await new Promise<Server>((resolve, reject) => {
            const listener = app
                .listen(requestedPort, () => {
                    listener.off("error", reject);
                    resolve(listener);
                })
                .on("error", reject);
        });
    } catch (error) {
        await context.index.close();
        throw error;
    }

    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : requestedPort;
    logger.info({ port }, "Server listening.");

    return {
        app,
        port,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
            await context.index.close();
        },
    };
}
