export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
    level: LogLevel;
    pretty: boolean;
}

export interface DataConfig {
    /** Path of the JSON array of publications to ingest. */
    publicationsPath: string;
    /** Publications whose body is not longer than this are dropped. */
    minContentLength: number;
}

export interface ChunkingConfig {
    chunkSize: number;
    overlap: number;
    /** tiktoken encoding used to measure and split chunks. */
    encoding: string;
}

export interface IndexConfig {
    directory: string;
    collection: string;
}

export interface RetrievalConfig {
    matchCount: number;
}

export const LLM_PROVIDER_NAMES = ["openai", "google", "anthropic", "mistral", "groq"] as const;

export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    /** Delay before the first retry; later retries back off exponentially. */
    retryDelayMs?: number;
    /** Per-attempt timeout. `0` disables it. */
    timeoutMs?: number;
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
    logging: LoggingConfig;
    data: DataConfig;
    chunking: ChunkingConfig;
    index: IndexConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
