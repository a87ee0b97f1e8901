import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { createPostgresStore } from "../database/client";
import { runIngestionPipeline, type IngestionReport } from "../ingest/pipeline";
import { createEmbeddingProvider } from "../llm/factory";
import { childLogger, configureLogger, getLogger } from "../utils/logger";

interface CliOptions {
    configPath?: string;
    rebuild: boolean;
    help: boolean;
}

function printHelp(): void {
    const lines = [
        "Usage: ingest [--config <path-to-env>] [--rebuild]",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in the working directory).",
        "  -r, --rebuild  Clear the collection before ingesting.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = { rebuild: false, help: false };

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            options.help = true;
            continue;
        }

        if (arg === "-r" || arg === "--rebuild") {
            options.rebuild = true;
            continue;
        }

        if (arg === "-c" || arg === "--config") {
            options.configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (!options.configPath && arg) {
            options.configPath = arg;
        }
    }

    return options;
}

function logReport(report: IngestionReport): void {
    const logger = getLogger();
    logger.info(`Processed documents: ${report.documentsProcessed}`);
    logger.info(`Skipped documents: ${report.documentsSkipped}`);
    logger.info(`Chunks created: ${report.chunksCreated}`);
    logger.info(`Entries pruned: ${report.entriesPruned}`);
    logger.info(`Duration: ${report.durationMs}ms`);
    for (const error of report.errors) {
        logger.warn({ sourceId: error.sourceId, code: error.code }, error.message);
    }
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
        printHelp();
        return;
    }

    const config = await loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${resolveConfigPath(options.configPath)}`);

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const index = createPostgresStore(config.database, childLogger(logger, { module: "database" }));

    try {
        await index.ensureSchema();
        logger.info("Starting ingestion pipeline.");

        const report = await runIngestionPipeline(config, embedding, index, logger, { rebuild: options.rebuild });
        logReport(report);

        const attempted = report.documentsProcessed + report.errors.length;
        if (attempted > 0 && report.documentsProcessed === 0) {
            logger.error("Every document failed to ingest.");
            process.exitCode = 1;
            return;
        }

        logger.info("Ingestion pipeline completed.");
    } finally {
        await index.close();
    }
}

main().catch((error: unknown) => {
    getLogger().error({ err: error }, "Ingestion pipeline failed.");
    process.exitCode = 1;
});
