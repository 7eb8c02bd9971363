export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    apiKey?: string;
    port: number;
}

export interface ChunkingConfig {
    chunkSize: number;
    chunkOverlap: number;
}

export interface IngestionConfig extends ChunkingConfig {
    sourcePath: string;
    indexPath: string;
}

export type ContextUnit = "characters" | "tokens";

export interface RetrievalConfig {
    topK: number;
    maxContextSize: number;
    contextUnit: ContextUnit;
}

export type LLMProviderName =
    | "openai"
    | "google"
    | "anthropic";

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    server: ServerConfig;
    logging: LoggingConfig;
    ingestion: IngestionConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
