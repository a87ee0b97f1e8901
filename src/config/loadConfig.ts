import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { ConfigurationError } from "../errors";
import type { AppConfig, LLMProviderName, LoggingConfig, ProviderLimitsConfig, RoutingMode } from "./types";

type Env = Record<string, string | undefined>;

const ENV_PREFIX = "INSTITUTE_RAG_";
const MAX_RETRIES = 3;
const PROVIDERS: readonly LLMProviderName[] = ["openai", "google", "anthropic", "mistral"];
const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];
const ROUTING_MODES: readonly RoutingMode[] = ["keyword", "none"];
const TABLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

class EnvReader {
    constructor(private readonly env: Env) {}

    string(key: string): string | undefined {
        const value = this.env[`${ENV_PREFIX}${key}`]?.trim();
        return value ? value : undefined;
    }

    required(key: string): string {
        const value = this.string(key);
        if (!value) {
            throw new ConfigurationError(`Missing required environment variable: ${ENV_PREFIX}${key}`);
        }
        return value;
    }

    number(key: string): number | undefined;
    number(key: string, defaultValue: number): number;
    number(key: string, defaultValue?: number): number | undefined {
        const value = this.string(key);
        if (!value) {
            return defaultValue;
        }
        const parsed = Number.parseFloat(value);
        if (Number.isNaN(parsed)) {
            throw new ConfigurationError(`Environment variable ${ENV_PREFIX}${key} must be a valid number, got: ${value}`);
        }
        return parsed;
    }

    boolean(key: string, defaultValue = false): boolean {
        const value = this.string(key);
        if (!value) {
            return defaultValue;
        }
        const lowered = value.toLowerCase();
        return lowered === "true" || lowered === "1" || lowered === "yes";
    }

    oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
        const value = this.string(key) ?? defaultValue;
        const match = allowed.find((candidate) => candidate === value);
        if (!match) {
            throw new ConfigurationError(
                `Environment variable ${ENV_PREFIX}${key} must be one of ${allowed.join(", ")}, got: ${value}`
            );
        }
        return match;
    }

    provider(key: string): LLMProviderName {
        const value = this.required(key);
        const match = PROVIDERS.find((candidate) => candidate === value.toLowerCase());
        if (!match) {
            throw new ConfigurationError(`Unsupported LLM provider "${value}" in ${ENV_PREFIX}${key}.`);
        }
        return match;
    }
}

function readLimits(reader: EnvReader, scope: "EMBEDDING" | "CHAT", defaults: ProviderLimitsConfig): ProviderLimitsConfig {
    const key = (name: string) => `LLM_${scope}_LIMITS_${name}`;
    const retries = reader.number(key("RETRIES"), defaults.retries ?? 1);

    return {
        batchSize: reader.number(key("BATCH_SIZE")) ?? defaults.batchSize,
        concurrency: reader.number(key("CONCURRENCY")) ?? defaults.concurrency,
        maxRequestsPerMinute: reader.number(key("MAX_REQUESTS_PER_MINUTE")) ?? defaults.maxRequestsPerMinute,
        maxTokensPerMinute: reader.number(key("MAX_TOKENS_PER_MINUTE")) ?? defaults.maxTokensPerMinute,
        retries: Math.min(MAX_RETRIES, Math.max(0, Math.floor(retries))),
        retryDelayMs: reader.number(key("RETRY_DELAY_MS")) ?? defaults.retryDelayMs,
    };
}

function assertPositiveInteger(value: number, name: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${ENV_PREFIX}${name} must be a positive integer, got: ${value}`);
    }
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.INSTITUTE_RAG_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.INSTITUTE_RAG_CONFIG_PATH);
    }

    return path.resolve(process.cwd(), ".env");
}

/**
 * Builds the typed configuration from an environment map. Throws
 * ConfigurationError on the first missing or malformed value.
 */
export function buildAppConfig(env: Env, baseDir = process.cwd()): AppConfig {
    const reader = new EnvReader(env);

    const databaseUrl = reader.required("DATABASE_URL");
    const table = reader.string("DATABASE_TABLE") ?? "index_entries";
    if (!TABLE_IDENTIFIER.test(table)) {
        throw new ConfigurationError(`${ENV_PREFIX}DATABASE_TABLE is not a valid SQL identifier: ${table}`);
    }

    const chunkSize = reader.number("CHUNK_SIZE", 2500);
    const chunkOverlap = reader.number("CHUNK_OVERLAP", 250);
    assertPositiveInteger(chunkSize, "CHUNK_SIZE");
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new ConfigurationError(
            `${ENV_PREFIX}CHUNK_OVERLAP must be a non-negative integer smaller than CHUNK_SIZE (${chunkSize}), got: ${chunkOverlap}`
        );
    }

    const topK = reader.number("RETRIEVAL_TOP_K", 12);
    assertPositiveInteger(topK, "RETRIEVAL_TOP_K");

    const historyLimit = reader.number("HISTORY_LIMIT", 5);
    if (!Number.isInteger(historyLimit) || historyLimit < 0) {
        throw new ConfigurationError(`${ENV_PREFIX}HISTORY_LIMIT must be a non-negative integer, got: ${historyLimit}`);
    }

    const embeddingTimeoutMs = reader.number("LLM_EMBEDDING_TIMEOUT_MS", 20_000);
    const chatTimeoutMs = reader.number("LLM_CHAT_TIMEOUT_MS", 60_000);
    assertPositiveInteger(embeddingTimeoutMs, "LLM_EMBEDDING_TIMEOUT_MS");
    assertPositiveInteger(chatTimeoutMs, "LLM_CHAT_TIMEOUT_MS");

    const dataDir = path.resolve(baseDir, reader.string("DATA_DIR") ?? "./data");
    const port = Number.parseInt(env.PORT ?? "", 10);

    return {
        logging: {
            level: reader.oneOf("LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: reader.boolean("LOGGING_PRETTY", false),
        },
        server: {
            port: Number.isNaN(port) ? 8000 : port,
            corsOrigin: reader.string("SERVER_CORS_ORIGIN") ?? "*",
            apiKey: reader.string("SERVER_API_KEY"),
            rankingsPath: path.resolve(baseDir, reader.string("RANKINGS_PATH") ?? path.join(dataDir, "rankings.json")),
        },
        database: {
            databaseUrl,
            table,
            collection: reader.string("COLLECTION") ?? "faculty_data",
        },
        ingest: {
            dataDir,
            generalInfoDir: reader.string("GENERAL_INFO_DIR") ?? "general_info",
            chunkSize,
            chunkOverlap,
            prefixFacultyNames: reader.boolean("PREFIX_FACULTY_NAMES", true),
        },
        retrieval: {
            topK,
            routing: reader.oneOf("RETRIEVAL_ROUTING", ROUTING_MODES, "keyword"),
            nameMatchLimit: reader.number("RETRIEVAL_NAME_MATCH_LIMIT", 8),
        },
        synthesis: {
            historyLimit,
            instituteName: reader.string("INSTITUTE_NAME") ?? "Research Institute",
            contact: reader.string("CONTACT"),
        },
        llm: {
            embedding: {
                provider: reader.provider("LLM_EMBEDDING_PROVIDER"),
                model: reader.required("LLM_EMBEDDING_MODEL"),
                apiKey: reader.string("LLM_EMBEDDING_API_KEY"),
                baseUrl: reader.string("LLM_EMBEDDING_BASE_URL"),
                timeoutMs: embeddingTimeoutMs,
                limits: readLimits(reader, "EMBEDDING", { retries: 1 }),
            },
            chat: {
                provider: reader.provider("LLM_CHAT_PROVIDER"),
                model: reader.required("LLM_CHAT_MODEL"),
                apiKey: reader.string("LLM_CHAT_API_KEY"),
                baseUrl: reader.string("LLM_CHAT_BASE_URL"),
                temperature: reader.number("LLM_CHAT_TEMPERATURE", 0.7),
                maxOutputTokens: reader.number("LLM_CHAT_MAX_OUTPUT_TOKENS", 500),
                timeoutMs: chatTimeoutMs,
                limits: readLimits(reader, "CHAT", { retries: 1 }),
            },
        },
    };
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const namedPath = configPath ?? process.env.INSTITUTE_RAG_CONFIG_PATH;
    const envPath = resolveConfigPath(namedPath);
    const result = loadDotenv({ path: envPath });

    // a missing default .env is fine when the variables come from the environment
    if (result.error && namedPath) {
        throw new ConfigurationError(`Failed to load environment file from "${namedPath}": ${result.error.message}`, {
            cause: result.error,
        });
    }

    return buildAppConfig(process.env);
}
