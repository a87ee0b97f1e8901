export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    corsOrigin: string;
    apiKey?: string;
    rankingsPath: string;
}

export interface DatabaseConfig {
    databaseUrl: string;
    table: string;
    collection: string;
}

export interface IngestConfig {
    dataDir: string;
    generalInfoDir: string;
    chunkSize: number;
    chunkOverlap: number;
    prefixFacultyNames: boolean;
}

export type RoutingMode = "keyword" | "none";

export interface RetrievalConfig {
    topK: number;
    routing: RoutingMode;
    nameMatchLimit: number;
}

export interface SynthesisConfig {
    historyLimit: number;
    instituteName: string;
    contact?: string;
}

export type LLMProviderName =
    | "openai"
    | "google"
    | "anthropic"
    | "mistral";

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    retryDelayMs?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    model: string;
    apiKey?: string;
    baseUrl?: string;
    timeoutMs?: number;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {}

export interface ChatModelConfig extends BaseModelConfig {
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    database: DatabaseConfig;
    ingest: IngestConfig;
    retrieval: RetrievalConfig;
    synthesis: SynthesisConfig;
    llm: LLMConfig;
}
