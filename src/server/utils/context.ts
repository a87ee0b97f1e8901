import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import type { VectorIndex } from "../../database/types";
import type { IngestOptions, IngestionReport } from "../../ingest/pipeline";
import type { ChatService } from "../../query/chatService";

export type IngestionRunner = (options: IngestOptions) => Promise<IngestionReport>;

export interface ServerContext {
    config: AppConfig;
    chatService: ChatService;
    index: VectorIndex;
    runIngestion: IngestionRunner;
    ingestionBusy: boolean;
    logger: Logger;
}

export interface RouterContext {
    config: AppConfig;
    chatService: ChatService;
    runIngestion: IngestionRunner;
    isIngestionBusy: () => boolean;
    setIngestionBusy: (busy: boolean) => void;
    logger: Logger;
}

export function createRouterContext(context: ServerContext): RouterContext {
    return {
        config: context.config,
        chatService: context.chatService,
        runIngestion: (options) => context.runIngestion(options),
        isIngestionBusy: () => context.ingestionBusy,
        setIngestionBusy: (busy: boolean) => {
            context.ingestionBusy = busy;
        },
        logger: context.logger,
    };
}
